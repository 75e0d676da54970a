import { spawn } from 'node:child_process'
import { accessSync, constants as fsConstants, statSync } from 'node:fs'
import path from 'node:path'

import { isErrnoException } from './errors.js'

const STDERR_CAPTURE_LIMIT = 8192
const DEFAULT_TOOL_TIMEOUT_MS = 120_000

export type ToolFailureReason = 'missing' | 'exit' | 'timeout' | 'error'

export type ToolResult =
  | { ok: true; stdout: string; stderr: string }
  | {
      ok: false
      reason: ToolFailureReason
      exitCode: number | null
      stderr: string
      message: string
    }

export type ToolRunner = (
  command: string,
  args: string[],
  options?: { timeoutMs?: number }
) => Promise<ToolResult>

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false
    if (process.platform !== 'win32') accessSync(candidate, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

export function resolveExecutableInPath(
  binary: string,
  env: Record<string, string | undefined>
): string | null {
  const trimmed = binary.trim()
  if (!trimmed) return null
  if (trimmed.includes('/') || trimmed.includes('\\')) {
    return isExecutableFile(trimmed) ? path.resolve(trimmed) : null
  }
  const pathValue = env.PATH ?? env.Path ?? ''
  const extensions =
    process.platform === 'win32'
      ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)
      : ['']
  for (const dir of pathValue.split(path.delimiter)) {
    if (!dir) continue
    for (const ext of extensions) {
      const candidate = path.join(dir, `${trimmed}${ext}`)
      if (isExecutableFile(candidate)) return candidate
    }
  }
  return null
}

function appendCapped(buffer: string, chunk: string): string {
  if (buffer.length >= STDERR_CAPTURE_LIMIT) return buffer
  return (buffer + chunk).slice(0, STDERR_CAPTURE_LIMIT)
}

/**
 * One-shot subprocess with captured output. Never rejects: a missing binary, a
 * non-zero exit and a timeout all come back as `{ ok: false }`.
 */
export const runTool: ToolRunner = async (command, args, options) => {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS
  return await new Promise<ToolResult>((resolve) => {
    let settled = false
    const finish = (result: ToolResult) => {
      if (settled) return
      settled = true
      clearTimeout(timeout)
      resolve(result)
    }

    let stdout = ''
    let stderr = ''
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })

    if (proc.stdout) {
      proc.stdout.setEncoding('utf8')
      proc.stdout.on('data', (chunk: string) => {
        stdout = appendCapped(stdout, chunk)
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        stderr = appendCapped(stderr, chunk)
      })
    }

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL')
      finish({
        ok: false,
        reason: 'timeout',
        exitCode: null,
        stderr: stderr.trim(),
        message: `${path.basename(command)} timed out after ${timeoutMs}ms`,
      })
    }, timeoutMs)

    proc.on('error', (error) => {
      const missing = isErrnoException(error) && error.code === 'ENOENT'
      finish({
        ok: false,
        reason: missing ? 'missing' : 'error',
        exitCode: null,
        stderr: stderr.trim(),
        message: missing ? `${command} not found` : error.message,
      })
    })

    proc.on('close', (code) => {
      if (code === 0) {
        finish({ ok: true, stdout, stderr })
        return
      }
      const trimmed = stderr.trim()
      const suffix = trimmed ? `: ${trimmed}` : ''
      finish({
        ok: false,
        reason: 'exit',
        exitCode: code,
        stderr: trimmed,
        message: `${path.basename(command)} exited with code ${code}${suffix}`,
      })
    })
  })
}
