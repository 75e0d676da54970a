import { readFileSync } from 'node:fs'
import { join, resolve } from 'node:path'

import JSON5 from 'json5'

import type { VideoSettings } from './encoder/args.js'
import { normalizeExtensions } from './files.js'
import { defaultWorkerCount } from './images/concurrency.js'
import type { LogFormat, LoggingSettings, LogLevel } from './logging/logger.js'

export const DEFAULT_IMAGE_EXTENSIONS = ['.webp', '.jpg', '.jpeg', '.png'] as const
export const DEFAULT_AUDIO_EXTENSIONS = ['.mp3', '.wav', '.aac', '.flac', '.ogg', '.opus'] as const

const DEFAULT_FPS = 4
const DEFAULT_FADE_SECONDS = 2
const DEFAULT_STALL_TIMEOUT_SECONDS = 120
const DEFAULT_KILL_GRACE_MS = 2_000
const DEFAULT_LOG_MAX_MB = 10
const DEFAULT_LOG_MAX_FILES = 3

export type PagereelConfig = {
  video?: {
    fps?: number
    /**
     * Seconds each page stays on screen.
     *
     * Default: `1 / fps`.
     */
    frameDurationSeconds?: number
    width?: number
    height?: number
    /** `boxblur` argument for the background copy, e.g. `10:1`. */
    blur?: string
    codec?: string
    pixelFormat?: string
  }
  audio?: {
    fadeInSeconds?: number
    fadeOutSeconds?: number
    extensions?: string[]
  }
  images?: {
    extensions?: string[]
    /** Re-encode pages through ImageMagick before verification (default: true). */
    reconstruct?: boolean
    workers?: number
  }
  tools?: {
    ffmpeg?: string
    magick?: string
  }
  output?: {
    /** Where videos are encoded to. Unset: next to each archive. */
    dir?: string
    /** Move finished videos back to the directory their archive was selected from. */
    relocate?: boolean
  }
  encoder?: {
    stallTimeoutSeconds?: number
  }
  logging?: {
    level?: LogLevel
    format?: LogFormat
    file?: string
    maxMb?: number
    maxFiles?: number
  }
}

export type PipelineConfig = Readonly<{
  video: Readonly<VideoSettings>
  frameDurationSeconds: number
  audio: Readonly<{ fadeInSeconds: number; fadeOutSeconds: number; extensions: readonly string[] }>
  images: Readonly<{ extensions: readonly string[]; reconstruct: boolean; workers: number }>
  tools: Readonly<{ ffmpeg: string | null; magick: string | null }>
  output: Readonly<{ dir: string | null; relocate: boolean }>
  encoder: Readonly<{ stallTimeoutMs: number; killGraceMs: number }>
  logging: Readonly<LoggingSettings>
}>

export type ConfigOverrides = {
  fps?: number
  frameDurationSeconds?: number
  fadeInSeconds?: number
  fadeOutSeconds?: number
  reconstruct?: boolean
  workers?: number
  outputDir?: string
  relocate?: boolean
  logLevel?: LogLevel
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseSection(
  raw: unknown,
  path: string,
  label: string
): Record<string, unknown> | undefined {
  if (typeof raw === 'undefined') return undefined
  if (!isRecord(raw)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be an object.`)
  }
  return raw
}

function parsePositiveNumber(raw: unknown, path: string, label: string): number | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw <= 0) {
    throw new Error(`Invalid config file ${path}: "${label}" must be a positive number.`)
  }
  return raw
}

function parseNonNegativeNumber(raw: unknown, path: string, label: string): number | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw < 0) {
    throw new Error(`Invalid config file ${path}: "${label}" must be a number >= 0.`)
  }
  return raw
}

function parseBoolean(raw: unknown, path: string, label: string): boolean | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'boolean') {
    throw new Error(`Invalid config file ${path}: "${label}" must be true or false.`)
  }
  return raw
}

function parseNonEmptyString(raw: unknown, path: string, label: string): string | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new Error(`Invalid config file ${path}: "${label}" must be a non-empty string.`)
  }
  return raw.trim()
}

function parseExtensionList(raw: unknown, path: string, label: string): string[] | undefined {
  if (typeof raw === 'undefined') return undefined
  const items =
    typeof raw === 'string' ? raw.split(',') : Array.isArray(raw) ? raw : null
  if (!items || items.some((item) => typeof item !== 'string')) {
    throw new Error(`Invalid config file ${path}: "${label}" must be an array of strings.`)
  }
  const extensions = normalizeExtensions(items.filter((item): item is string => typeof item === 'string'))
  if (extensions.length === 0) {
    throw new Error(`Invalid config file ${path}: "${label}" must not be empty.`)
  }
  return extensions
}

function parseLogLevel(raw: unknown, path: string): LogLevel | undefined {
  if (typeof raw === 'undefined') return undefined
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : ''
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value
  throw new Error(
    `Invalid config file ${path}: "logging.level" must be one of "debug", "info", "warn", "error".`
  )
}

function parseLogFormat(raw: unknown, path: string): LogFormat | undefined {
  if (typeof raw === 'undefined') return undefined
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : ''
  if (value === 'pretty' || value === 'json') return value
  throw new Error(`Invalid config file ${path}: "logging.format" must be "pretty" or "json".`)
}

function assertNoComments(raw: string, path: string): void {
  let inString: '"' | "'" | null = null
  let escaped = false
  let line = 1
  let col = 1

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i] ?? ''
    const next = raw[i + 1] ?? ''

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === inString) {
        inString = null
      }
    } else if (ch === '"' || ch === "'") {
      inString = ch
    } else if (ch === '/' && (next === '/' || next === '*')) {
      throw new Error(
        `Invalid config file ${path}: comments are not allowed (found /${next} at ${line}:${col}).`
      )
    }

    if (ch === '\n') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
}

export function parsePagereelConfig(parsed: unknown, path: string): PagereelConfig {
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const videoRaw = parseSection(parsed.video, path, 'video')
  const video = videoRaw
    ? {
        fps: parsePositiveNumber(videoRaw.fps, path, 'video.fps'),
        frameDurationSeconds: parsePositiveNumber(
          videoRaw.frameDurationSeconds,
          path,
          'video.frameDurationSeconds'
        ),
        width: parsePositiveNumber(videoRaw.width, path, 'video.width'),
        height: parsePositiveNumber(videoRaw.height, path, 'video.height'),
        blur: parseNonEmptyString(videoRaw.blur, path, 'video.blur'),
        codec: parseNonEmptyString(videoRaw.codec, path, 'video.codec'),
        pixelFormat: parseNonEmptyString(videoRaw.pixelFormat, path, 'video.pixelFormat'),
      }
    : undefined

  const audioRaw = parseSection(parsed.audio, path, 'audio')
  const audio = audioRaw
    ? {
        fadeInSeconds: parseNonNegativeNumber(audioRaw.fadeInSeconds, path, 'audio.fadeInSeconds'),
        fadeOutSeconds: parseNonNegativeNumber(
          audioRaw.fadeOutSeconds,
          path,
          'audio.fadeOutSeconds'
        ),
        extensions: parseExtensionList(audioRaw.extensions, path, 'audio.extensions'),
      }
    : undefined

  const imagesRaw = parseSection(parsed.images, path, 'images')
  const images = imagesRaw
    ? {
        extensions: parseExtensionList(imagesRaw.extensions, path, 'images.extensions'),
        reconstruct: parseBoolean(imagesRaw.reconstruct, path, 'images.reconstruct'),
        workers: (() => {
          const workers = parsePositiveNumber(imagesRaw.workers, path, 'images.workers')
          return typeof workers === 'number' ? Math.max(1, Math.trunc(workers)) : undefined
        })(),
      }
    : undefined

  const toolsRaw = parseSection(parsed.tools, path, 'tools')
  const tools = toolsRaw
    ? {
        ffmpeg: parseNonEmptyString(toolsRaw.ffmpeg, path, 'tools.ffmpeg'),
        magick: parseNonEmptyString(toolsRaw.magick, path, 'tools.magick'),
      }
    : undefined

  const outputRaw = parseSection(parsed.output, path, 'output')
  const output = outputRaw
    ? {
        dir: parseNonEmptyString(outputRaw.dir, path, 'output.dir'),
        relocate: parseBoolean(outputRaw.relocate, path, 'output.relocate'),
      }
    : undefined

  const encoderRaw = parseSection(parsed.encoder, path, 'encoder')
  const encoder = encoderRaw
    ? {
        stallTimeoutSeconds: parseNonNegativeNumber(
          encoderRaw.stallTimeoutSeconds,
          path,
          'encoder.stallTimeoutSeconds'
        ),
      }
    : undefined

  const loggingRaw = parseSection(parsed.logging, path, 'logging')
  const logging = loggingRaw
    ? {
        level: parseLogLevel(loggingRaw.level, path),
        format: parseLogFormat(loggingRaw.format, path),
        file: parseNonEmptyString(loggingRaw.file, path, 'logging.file'),
        maxMb: parsePositiveNumber(loggingRaw.maxMb, path, 'logging.maxMb'),
        maxFiles: (() => {
          const maxFiles = parsePositiveNumber(loggingRaw.maxFiles, path, 'logging.maxFiles')
          return typeof maxFiles === 'number' ? Math.trunc(maxFiles) : undefined
        })(),
      }
    : undefined

  return {
    ...(video ? { video } : {}),
    ...(audio ? { audio } : {}),
    ...(images ? { images } : {}),
    ...(tools ? { tools } : {}),
    ...(output ? { output } : {}),
    ...(encoder ? { encoder } : {}),
    ...(logging ? { logging } : {}),
  }
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const explicit = env.PAGEREEL_CONFIG?.trim()
  if (explicit) return resolve(explicit)
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  if (!home) return null
  return join(home, '.pagereel', 'config.json')
}

export function loadPagereelConfig({ env }: { env: Record<string, string | undefined> }): {
  config: PagereelConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  let parsed: unknown
  assertNoComments(raw, path)
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  return { config: parsePagereelConfig(parsed, path), path }
}

function readEnvNumber(
  env: Record<string, string | undefined>,
  key: string,
  { integer }: { integer: boolean }
): number | undefined {
  const raw = env[key]?.trim()
  if (!raw) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${key} must be a positive number (got "${raw}")`)
  }
  return integer ? Math.max(1, Math.trunc(value)) : value
}

function readEnvLogLevel(env: Record<string, string | undefined>): LogLevel | undefined {
  const raw = env.PAGEREEL_LOG_LEVEL?.trim().toLowerCase()
  if (!raw) return undefined
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') return raw
  throw new Error(`PAGEREEL_LOG_LEVEL must be one of debug, info, warn, error (got "${raw}")`)
}

/**
 * Merge CLI overrides > env > config file > defaults into one frozen value. Nothing in
 * the pipeline reads configuration from anywhere else.
 */
export function resolvePipelineConfig({
  file,
  env,
  overrides,
}: {
  file: PagereelConfig | null
  env: Record<string, string | undefined>
  overrides?: ConfigOverrides | null
}): PipelineConfig {
  const fps =
    overrides?.fps ??
    readEnvNumber(env, 'PAGEREEL_FPS', { integer: false }) ??
    file?.video?.fps ??
    DEFAULT_FPS
  const frameDurationSeconds =
    overrides?.frameDurationSeconds ?? file?.video?.frameDurationSeconds ?? 1 / fps
  const workers =
    overrides?.workers ??
    readEnvNumber(env, 'PAGEREEL_WORKERS', { integer: true }) ??
    file?.images?.workers ??
    defaultWorkerCount()
  const logFile = file?.logging?.file ?? null
  const outputDir = overrides?.outputDir ?? file?.output?.dir ?? null

  const config: PipelineConfig = {
    video: Object.freeze({
      fps,
      width: file?.video?.width ?? 1280,
      height: file?.video?.height ?? 720,
      blur: file?.video?.blur ?? '10:1',
      codec: file?.video?.codec ?? 'libx264',
      pixelFormat: file?.video?.pixelFormat ?? 'yuv420p',
    }),
    frameDurationSeconds,
    audio: Object.freeze({
      fadeInSeconds: overrides?.fadeInSeconds ?? file?.audio?.fadeInSeconds ?? DEFAULT_FADE_SECONDS,
      fadeOutSeconds:
        overrides?.fadeOutSeconds ?? file?.audio?.fadeOutSeconds ?? DEFAULT_FADE_SECONDS,
      extensions: Object.freeze(file?.audio?.extensions ?? [...DEFAULT_AUDIO_EXTENSIONS]),
    }),
    images: Object.freeze({
      extensions: Object.freeze(file?.images?.extensions ?? [...DEFAULT_IMAGE_EXTENSIONS]),
      reconstruct: overrides?.reconstruct ?? file?.images?.reconstruct ?? true,
      workers,
    }),
    tools: Object.freeze({
      ffmpeg: file?.tools?.ffmpeg ?? null,
      magick: file?.tools?.magick ?? null,
    }),
    output: Object.freeze({
      dir: outputDir ? resolve(outputDir) : null,
      relocate: overrides?.relocate ?? file?.output?.relocate ?? true,
    }),
    encoder: Object.freeze({
      stallTimeoutMs:
        (file?.encoder?.stallTimeoutSeconds ?? DEFAULT_STALL_TIMEOUT_SECONDS) * 1000,
      killGraceMs: DEFAULT_KILL_GRACE_MS,
    }),
    logging: Object.freeze({
      level: overrides?.logLevel ?? readEnvLogLevel(env) ?? file?.logging?.level ?? 'info',
      format: file?.logging?.format ?? 'pretty',
      file: logFile ? resolve(logFile) : null,
      maxBytes: Math.trunc((file?.logging?.maxMb ?? DEFAULT_LOG_MAX_MB) * 1024 * 1024),
      maxFiles: file?.logging?.maxFiles ?? DEFAULT_LOG_MAX_FILES,
    }),
  }
  return Object.freeze(config)
}
