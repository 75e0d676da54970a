import { promises as fs } from 'node:fs'
import path from 'node:path'

import { toPosixPath } from './files.js'

export const MANIFEST_FILE_NAME = 'ffmpeg_input.txt'

export type ManifestEntry = {
  /** Absolute, forward-slash path. */
  path: string
  /** `null` only for the trailing repeat of the last image. */
  durationSeconds: number | null
}

/** Escape a path for a single-quoted concat-demuxer `file` directive. */
export function escapeConcatPath(value: string): string {
  return value.replaceAll("'", "'\\''")
}

export function formatSeconds(value: number): string {
  return value.toFixed(4)
}

/**
 * One entry per asset, plus the last asset once more without a duration: the concat
 * demuxer ignores the duration of the final entry, so without the repeat the last
 * image would get no screen time.
 */
export function buildManifestEntries(
  assets: readonly string[],
  root: string,
  durationSeconds: number
): ManifestEntry[] {
  const entries: ManifestEntry[] = assets.map((asset) => ({
    path: toPosixPath(path.resolve(root, asset)),
    durationSeconds,
  }))
  const last = entries.at(-1)
  if (last) entries.push({ path: last.path, durationSeconds: null })
  return entries
}

export function renderManifest(entries: readonly ManifestEntry[]): string {
  const lines: string[] = []
  for (const entry of entries) {
    lines.push(`file '${escapeConcatPath(entry.path)}'`)
    if (entry.durationSeconds !== null) {
      lines.push(`duration ${formatSeconds(entry.durationSeconds)}`)
    }
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : ''
}

export async function writeManifest({
  assets,
  root,
  durationSeconds,
}: {
  assets: readonly string[]
  root: string
  durationSeconds: number
}): Promise<{ manifestPath: string; entries: ManifestEntry[] }> {
  const entries = buildManifestEntries(assets, root, durationSeconds)
  const manifestPath = path.join(root, MANIFEST_FILE_NAME)
  await fs.writeFile(manifestPath, renderManifest(entries), 'utf8')
  return { manifestPath, entries }
}
