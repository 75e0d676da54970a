import { CommanderError } from 'commander'

import { type BatchResult, createSeededRandom, formatBatchSummary, runBatch } from './batch.js'
import {
  type ConfigOverrides,
  loadPagereelConfig,
  type PipelineConfig,
  resolvePipelineConfig,
} from './config.js'
import { describeError } from './errors.js'
import { parseFpsArg, parseSecondsArg, parseSeedArg, parseWorkersArg } from './flags.js'
import type { JobDeps } from './job.js'
import { createPipelineLogging, type PipelineLogging } from './logging/logger.js'
import { runTool as defaultRunTool, type ToolRunner } from './process.js'
import { attachRichHelp, buildProgram } from './run/help.js'
import {
  type AudioSelection,
  formatListing,
  resolveArchiveInputs,
  resolveAudioInput,
} from './run/inputs.js'
import { probeTools } from './tools.js'
import { createJobProgressRenderer } from './tty/progress/job.js'
import { type Spinner, startSpinner } from './tty/spinner.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export type RunEnv = {
  env: Record<string, string | undefined>
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  runTool?: ToolRunner
  jobDeps?: Partial<JobDeps> | null
  random?: () => number
}

type RunOptions = {
  inputs: string[]
  audio: string
  pick: string | null
  audioPick: string | null
  list: boolean
  sameAudio: boolean
  seed: number | null
  overrides: ConfigOverrides
}

function readString(opts: Record<string, unknown>, key: string): string | null {
  const value = opts[key]
  return typeof value === 'string' && value.trim() ? value.trim() : null
}

function readFlag(opts: Record<string, unknown>, key: string): boolean {
  return opts[key] === true
}

function parseRunOptions(opts: Record<string, unknown>, args: readonly string[]): RunOptions {
  const audio = readString(opts, 'audio')
  if (!audio) throw new Error('--audio is required')
  if (readFlag(opts, 'verbose') && readFlag(opts, 'quiet')) {
    throw new Error('--verbose and --quiet cannot be combined')
  }

  const fps = readString(opts, 'fps')
  const frameDuration = readString(opts, 'frameDuration')
  const fadeIn = readString(opts, 'fadeIn')
  const fadeOut = readString(opts, 'fadeOut')
  const workers = readString(opts, 'workers')
  const outputDir = readString(opts, 'outputDir')
  const seed = readString(opts, 'seed')

  const overrides: ConfigOverrides = {}
  if (fps) overrides.fps = parseFpsArg(fps)
  if (frameDuration) {
    overrides.frameDurationSeconds = parseSecondsArg(frameDuration, '--frame-duration', {
      allowZero: false,
    })
  }
  if (fadeIn) overrides.fadeInSeconds = parseSecondsArg(fadeIn, '--fade-in', { allowZero: true })
  if (fadeOut) overrides.fadeOutSeconds = parseSecondsArg(fadeOut, '--fade-out', { allowZero: true })
  if (workers) overrides.workers = parseWorkersArg(workers)
  if (outputDir) overrides.outputDir = outputDir
  // Negated options default to true; only an explicit --no-* changes the config.
  if (opts.reconstruct === false) overrides.reconstruct = false
  if (opts.relocate === false) overrides.relocate = false
  if (readFlag(opts, 'verbose')) overrides.logLevel = 'debug'
  if (readFlag(opts, 'quiet')) overrides.logLevel = 'warn'

  return {
    inputs: args.slice(),
    audio,
    pick: readString(opts, 'pick'),
    audioPick: readString(opts, 'audioPick'),
    list: readFlag(opts, 'list'),
    sameAudio: readFlag(opts, 'sameAudio'),
    seed: seed ? parseSeedArg(seed) : null,
    overrides,
  }
}

function loadConfig(env: Record<string, string | undefined>, overrides: ConfigOverrides): PipelineConfig {
  const { config } = loadPagereelConfig({ env })
  return resolvePipelineConfig({ file: config, env, overrides })
}

function logSettings(logging: PipelineLogging, config: PipelineConfig) {
  const { logger } = logging
  const { video, audio, images } = config
  const perPage = config.frameDurationSeconds.toFixed(2)
  logger.info(`fps ${video.fps}, ${perPage}s per page, ${images.workers} worker(s)`)
  if (audio.fadeInSeconds > 0 || audio.fadeOutSeconds > 0) {
    logger.info(
      `audio fades: in ${audio.fadeInSeconds.toFixed(2)}s, out ${audio.fadeOutSeconds.toFixed(2)}s`
    )
  } else {
    logger.info('audio fades disabled')
  }
}

export async function runCli(
  argv: string[],
  { env, stdout, stderr, runTool: runToolOverride, jobDeps, random }: RunEnv
): Promise<number> {
  const normalizedArgv = argv.filter((arg) => arg !== '--')
  const program = buildProgram()
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  program.exitOverride()
  attachRichHelp(program, env, stdout)

  try {
    program.parse(normalizedArgv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
      return EXIT_OK
    }
    if (error instanceof CommanderError) return EXIT_USAGE
    throw error
  }

  const usageError = (message: string) => {
    stderr.write(`pagereel: ${message}\n`)
    return EXIT_USAGE
  }

  let options: RunOptions
  let config: PipelineConfig
  try {
    const opts: Record<string, unknown> = program.opts()
    options = parseRunOptions(opts, program.args)
    config = loadConfig(env, options.overrides)
  } catch (error) {
    return usageError(describeError(error))
  }

  const logging = createPipelineLogging({ settings: config.logging, stderr, env })
  const { logger } = logging
  try {
    let archives: Awaited<ReturnType<typeof resolveArchiveInputs>>
    let audio: AudioSelection
    try {
      archives = await resolveArchiveInputs(options.inputs, { pick: options.pick })
      audio = await resolveAudioInput(options.audio, {
        extensions: config.audio.extensions,
        pick: options.audioPick,
      })
    } catch (error) {
      return usageError(describeError(error))
    }

    if (options.list) {
      stdout.write(`${formatListing('Archives', archives.listing.map((archive) => archive.name))}\n`)
      stdout.write(`${formatListing('Audio', audio.candidates)}\n`)
      return EXIT_OK
    }
    if (archives.selected.length === 0) {
      logger.warn('no archives selected; nothing to do')
      return EXIT_OK
    }

    const tools = await probeTools({
      env,
      runTool: runToolOverride ?? defaultRunTool,
      overrides: config.tools,
    })
    if (!tools.ffmpeg) {
      logger.error('ffmpeg not found; install it or set FFMPEG_PATH')
      return EXIT_FAILURE
    }
    logger.info(`ffmpeg: ${tools.ffmpeg}`)
    if (tools.magick) {
      logger.info(`ImageMagick: ${tools.magick}`)
    } else if (config.images.reconstruct) {
      logger.warn('ImageMagick (magick) not found; image reconstruction will be skipped')
    }
    logSettings(logging, config)
    logger.info(`${archives.selected.length} archive(s) selected`)
    if (options.audioPick && archives.selected.length > 1 && !options.sameAudio) {
      logger.warn('--audio-pick ignored for several archives; pass --same-audio to reuse one track')
    }

    let spinner: Spinner | null = null
    const result: BatchResult = await runBatch({
      archives: archives.selected,
      audioCandidates: audio.candidates,
      selectedAudio: audio.selected,
      sameAudio: options.sameAudio,
      random: options.seed === null ? random : createSeededRandom(options.seed),
      config,
      tools,
      logger,
      jobDeps: {
        ...jobDeps,
        ...(runToolOverride ? { runTool: runToolOverride } : {}),
      },
      hooks: {
        onJobStart: (archive, index, total) => {
          const active = startSpinner({
            text: `Processing ${archive.name} (${index + 1}/${total})…`,
            stream: stderr,
          })
          spinner = active
          logging.setBeforeWrite(() => active.clear())
          return createJobProgressRenderer({
            archiveName: archive.name,
            setText: (text) => active.setText(text),
          })
        },
        onJobEnd: (archive, outcome) => {
          logging.setBeforeWrite(null)
          if (outcome?.status === 'succeeded') {
            spinner?.succeed(`${archive.name} → ${outcome.outputPath}`)
          } else if (outcome) {
            spinner?.fail(`${archive.name} skipped (${outcome.stage}): ${outcome.reason}`)
          } else {
            spinner?.fail(`${archive.name} failed`)
          }
          spinner = null
        },
      },
    })

    stdout.write(`${formatBatchSummary(result)}\n`)
    return result.failed > 0 || result.aborted ? EXIT_FAILURE : EXIT_OK
  } finally {
    await logging.flush()
  }
}
