import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import type { Archive } from './archive/kind.js'
import { extractArchive } from './archive/extract.js'
import type { PipelineConfig } from './config.js'
import type { EncodeResult, RunEncoderArgs } from './encoder/driver.js'
import { runEncoder } from './encoder/driver.js'
import type { ProgressSink } from './encoder/progress.js'
import {
  describeError,
  isFatalPipelineError,
  isPipelineError,
  PipelineError,
  type PipelineErrorCode,
  type PipelineStage,
} from './errors.js'
import { reconstructImages, type StageName, type StageResult, verifyImages } from './images/stages.js'
import type { PipelineLogger } from './logging/logger.js'
import { writeManifest } from './manifest.js'
import { runTool, type ToolRunner } from './process.js'
import { relocateVideo } from './relocate.js'
import type { ToolAvailability } from './tools.js'

const FALLBACK_OUTPUT_NAME = 'output_video_sequence'

export type JobOutcome =
  | {
      status: 'succeeded'
      archive: Archive
      outputPath: string
      /** Non-fatal problems worth repeating in the summary (e.g. a failed relocation). */
      warnings: string[]
      imageCount: number
      droppedCount: number
    }
  | {
      status: 'skipped'
      archive: Archive
      stage: PipelineStage
      code: PipelineErrorCode
      reason: string
    }

export type JobProgress = {
  onCount?: ((phase: 'extract' | StageName, completed: number, total: number) => void) | null
  encodeSink?: ProgressSink | null
}

export type JobDeps = {
  runTool: ToolRunner
  encode: (args: RunEncoderArgs) => Promise<EncodeResult>
  tmpdir: () => string
}

const defaultDeps: JobDeps = {
  runTool,
  encode: runEncoder,
  tmpdir: os.tmpdir,
}

/** Keep word characters, whitespace, dots and hyphens. */
export function sanitizeOutputName(name: string): string {
  const cleaned = name.replace(/[^\w\s.-]/g, '').trim()
  return cleaned || FALLBACK_OUTPUT_NAME
}

export function outputFileName(archive: Pick<Archive, 'name'>): string {
  return `${sanitizeOutputName(path.parse(archive.name).name)}.mp4`
}

/** Hidden sibling ffmpeg writes to; renamed over the final name only after a clean exit. */
export function partialOutputPath(outputPath: string): string {
  const { dir, name } = path.parse(outputPath)
  return path.join(dir, `.${name}.partial.mp4`)
}

function skipped(archive: Archive, error: PipelineError, fallbackStage: PipelineStage): JobOutcome {
  return {
    status: 'skipped',
    archive,
    stage: error.stage ?? fallbackStage,
    code: error.code,
    reason: error.message,
  }
}

function noSurvivors(archive: Archive, result: StageResult): PipelineError {
  const code = result.dropped.every((item) => item.missingTool) ? 'VALIDATOR_MISSING' : 'NO_SURVIVORS'
  return new PipelineError(
    code,
    code === 'VALIDATOR_MISSING'
      ? `No images could be checked in ${archive.name}: ${result.dropped[0]?.reason ?? 'validator missing'}`
      : `No usable images left in ${archive.name} after ${result.stage}`,
    { stage: result.stage, archive: archive.name }
  )
}

/**
 * Turn one archive into one video: extract, reconstruct, verify, write the manifest,
 * encode, then relocate. Recoverable failures come back as a `skipped` outcome; a missing
 * encoder is rethrown so the batch can stop. The scratch directory is always removed.
 */
export async function runArchiveJob({
  archive,
  audioPath,
  config,
  tools,
  logger,
  progress,
  deps: depsOverride,
}: {
  archive: Archive
  audioPath: string
  config: PipelineConfig
  tools: ToolAvailability
  logger: PipelineLogger
  progress?: JobProgress | null
  deps?: Partial<JobDeps> | null
}): Promise<JobOutcome> {
  const deps: JobDeps = { ...defaultDeps, ...depsOverride }
  const log = logger.getSubLogger({ name: 'job' })
  const warnings: string[] = []

  const ffmpegPath = tools.ffmpeg
  if (!ffmpegPath) {
    throw new PipelineError('ENCODER_MISSING', 'ffmpeg not found; install it or set FFMPEG_PATH', {
      stage: 'encode',
      archive: archive.name,
    })
  }

  log.info(`processing ${archive.name} (${archive.kind})`)
  const scratch = await fs.mkdtemp(path.join(deps.tmpdir(), 'pagereel-'))
  try {
    let images: string[]
    try {
      const extracted = await extractArchive({
        archivePath: archive.path,
        destination: scratch,
        extensions: config.images.extensions,
        logger: logger.getSubLogger({ name: 'extract' }),
        onEntry: (completed, total) => progress?.onCount?.('extract', completed, total),
      })
      images = extracted.images
      for (const entry of extracted.skipped) {
        warnings.push(`${archive.name}: skipped unsafe entry ${entry}`)
      }
    } catch (error) {
      if (!isPipelineError(error) || isFatalPipelineError(error)) throw error
      log.error(`${archive.name}: ${error.message}`)
      return skipped(archive, error, 'extract')
    }
    log.info(`extracted ${images.length} image(s) from ${archive.name}`)

    const stageArgs = {
      root: scratch,
      workers: config.images.workers,
      runTool: deps.runTool,
      onProgress: (stage: StageName, completed: number, total: number) =>
        progress?.onCount?.(stage, completed, total),
    }
    const reconstructed = await reconstructImages({
      ...stageArgs,
      assets: images,
      enabled: config.images.reconstruct,
      magickPath: tools.magick,
      logger: logger.getSubLogger({ name: 'stage:reconstruct' }),
    })
    if (reconstructed.survivors.length === 0) {
      const error = noSurvivors(archive, reconstructed)
      log.error(error.message)
      return skipped(archive, error, 'reconstruct')
    }

    const verified = await verifyImages({
      ...stageArgs,
      assets: reconstructed.survivors,
      ffmpegPath,
      logger: logger.getSubLogger({ name: 'stage:verify' }),
    })
    if (verified.survivors.length === 0) {
      const error = noSurvivors(archive, verified)
      log.error(error.message)
      return skipped(archive, error, 'verify')
    }
    const droppedCount = reconstructed.dropped.length + verified.dropped.length
    if (droppedCount > 0) {
      log.warn(`${archive.name}: dropped ${droppedCount} of ${images.length} image(s)`)
    }

    const { manifestPath } = await writeManifest({
      assets: verified.survivors,
      root: scratch,
      durationSeconds: config.frameDurationSeconds,
    })

    const outputDir = config.output.dir ?? archive.sourceDir
    await fs.mkdir(outputDir, { recursive: true })
    let outputPath = path.join(outputDir, outputFileName(archive))
    const partialPath = partialOutputPath(outputPath)

    try {
      await deps.encode({
        ffmpegPath,
        manifestPath,
        audioPath,
        outputPath: partialPath,
        imageCount: verified.survivors.length,
        frameDurationSeconds: config.frameDurationSeconds,
        fadeInSeconds: config.audio.fadeInSeconds,
        fadeOutSeconds: config.audio.fadeOutSeconds,
        video: config.video,
        logger: logger.getSubLogger({ name: 'encoder' }),
        progress: progress?.encodeSink ?? null,
        stallTimeoutMs: config.encoder.stallTimeoutMs,
        killGraceMs: config.encoder.killGraceMs,
      })
      await fs.rename(partialPath, outputPath)
    } catch (error) {
      await fs.rm(partialPath, { force: true })
      if (!isPipelineError(error) || isFatalPipelineError(error)) throw error
      log.error(`${archive.name}: ${error.message}`)
      return skipped(archive, error, 'encode')
    }

    if (config.output.relocate && config.output.dir) {
      try {
        outputPath = await relocateVideo({
          videoPath: outputPath,
          targetDir: archive.sourceDir,
          archive: archive.name,
        })
        log.info(`moved ${path.basename(outputPath)} to ${archive.sourceDir}`)
      } catch (error) {
        const message = describeError(error)
        log.warn(message)
        warnings.push(message)
      }
    }

    return {
      status: 'succeeded',
      archive,
      outputPath,
      warnings,
      imageCount: verified.survivors.length,
      droppedCount,
    }
  } finally {
    try {
      await fs.rm(scratch, { recursive: true, force: true })
    } catch (error) {
      log.warn(`could not remove scratch directory ${scratch}: ${describeError(error)}`)
    }
  }
}
