import { resolveExecutableInPath, type ToolRunner } from './process.js'

export type ToolName = 'ffmpeg' | 'magick'

/** Resolved binary path per tool, or `null` when it is not usable. */
export type ToolAvailability = Record<ToolName, string | null>

export type ToolOverrides = Partial<Record<ToolName, string | null>>

const ENV_OVERRIDES: Record<ToolName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  magick: 'MAGICK_PATH',
}

const PROBE_TIMEOUT_MS = 15_000

export function resolveToolBinary(
  tool: ToolName,
  env: Record<string, string | undefined>,
  override?: string | null
): string | null {
  const explicit = env[ENV_OVERRIDES[tool]]?.trim() || override?.trim() || ''
  return resolveExecutableInPath(explicit || tool, env)
}

async function probeTool(
  tool: ToolName,
  env: Record<string, string | undefined>,
  runTool: ToolRunner,
  override?: string | null
): Promise<string | null> {
  const binary = resolveToolBinary(tool, env, override)
  if (!binary) return null
  const result = await runTool(binary, ['-version'], { timeoutMs: PROBE_TIMEOUT_MS })
  return result.ok ? binary : null
}

/**
 * Resolve and `-version`-probe every external tool once. Callers keep the result for
 * the whole run instead of re-probing per image.
 */
export async function probeTools({
  env,
  runTool,
  overrides,
}: {
  env: Record<string, string | undefined>
  runTool: ToolRunner
  overrides?: ToolOverrides | null
}): Promise<ToolAvailability> {
  const [ffmpeg, magick] = await Promise.all([
    probeTool('ffmpeg', env, runTool, overrides?.ffmpeg),
    probeTool('magick', env, runTool, overrides?.magick),
  ])
  return { ffmpeg, magick }
}
