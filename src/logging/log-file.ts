import fs from 'node:fs/promises'
import path from 'node:path'

export type LogFileOptions = {
  filePath: string
  maxBytes: number
  maxFiles: number
}

export type LogFileWriter = {
  filePath: string
  write: (line: string) => void
  flush: () => Promise<void>
}

const MIN_BYTES = 1024

/** `app.log` → [`app.log`, `app.log.1`, …, `app.log.<maxFiles-1>`] */
export function rotationPaths(filePath: string, maxFiles: number): string[] {
  const count = Number.isFinite(maxFiles) && maxFiles > 0 ? Math.trunc(maxFiles) : 1
  return Array.from({ length: count }, (_, index) =>
    index === 0 ? filePath : `${filePath}.${index}`
  )
}

async function sizeOf(filePath: string): Promise<number> {
  const stat = await fs.stat(filePath).catch(() => null)
  return stat?.size ?? 0
}

async function shift(paths: string[]): Promise<void> {
  const [current] = paths
  if (!current) return
  if (paths.length === 1) {
    await fs.truncate(current, 0).catch(() => undefined)
    return
  }
  // Oldest first so nothing is overwritten before it moved.
  for (let i = paths.length - 1; i >= 1; i -= 1) {
    const from = paths[i - 1]
    const to = paths[i]
    if (!from || !to) continue
    await fs.rm(to, { force: true })
    await fs.rename(from, to).catch(() => undefined)
  }
}

/**
 * Append-only line writer with size-based rotation. Writes are queued so callers can
 * log synchronously; `flush()` resolves once everything queued so far is on disk.
 * A failed write is reported once to `onError` and does not stop later writes.
 */
export function createLogFileWriter(
  options: LogFileOptions,
  onError?: ((error: unknown) => void) | null
): LogFileWriter {
  const filePath = path.resolve(options.filePath)
  const maxBytes =
    Number.isFinite(options.maxBytes) && options.maxBytes > 0
      ? Math.max(MIN_BYTES, Math.trunc(options.maxBytes))
      : MIN_BYTES
  const paths = rotationPaths(filePath, options.maxFiles)
  // Settles to the mkdir error or null; the first write reports it.
  const ready: Promise<unknown> = fs.mkdir(path.dirname(filePath), { recursive: true }).then(
    () => null,
    (error: unknown) => error
  )
  let queue: Promise<void> = Promise.resolve()
  let reported = false

  const write = (line: string) => {
    const text = line.endsWith('\n') ? line : `${line}\n`
    const bytes = Buffer.byteLength(text, 'utf8')
    queue = queue
      .then(async () => {
        const mkdirError = await ready
        if (mkdirError) throw mkdirError
        if ((await sizeOf(filePath)) + bytes > maxBytes) await shift(paths)
        await fs.appendFile(filePath, text, 'utf8')
      })
      .catch((error: unknown) => {
        if (reported) return
        reported = true
        onError?.(error)
      })
  }

  return { filePath, write, flush: async () => await queue }
}
