import { randomUUID } from 'node:crypto'
import { promises as fs } from 'node:fs'
import path from 'node:path'

import { describeError } from '../errors.js'
import type { PipelineLogger } from '../logging/logger.js'
import type { ToolResult, ToolRunner } from '../process.js'
import { runWithConcurrency } from './concurrency.js'

export type StageName = 'reconstruct' | 'verify'

export type StageOutcome =
  | { ok: true; asset: string }
  | { ok: false; asset: string; reason: string; missingTool: boolean }

export type DroppedAsset = { asset: string; reason: string; missingTool: boolean }

export type StageResult = {
  stage: StageName
  /** Input order, minus the dropped assets. */
  survivors: string[]
  dropped: DroppedAsset[]
  /** True when the stage did not run at all (disabled, or its tool is unavailable). */
  skipped: boolean
}

export type StageCheck = (asset: string) => Promise<StageOutcome>

export type StageProgress = (stage: StageName, completed: number, total: number) => void

type CommonStageArgs = {
  assets: readonly string[]
  root: string
  workers: number
  runTool: ToolRunner
  logger: PipelineLogger
  onProgress?: StageProgress | null
}

function failed(asset: string, result: Extract<ToolResult, { ok: false }>): StageOutcome {
  return { ok: false, asset, reason: result.message, missingTool: result.reason === 'missing' }
}

/**
 * Fan `check` out over `assets` and keep the ones that pass. Never throws: a check that
 * throws counts as a drop for that asset only.
 */
export async function runStage({
  stage,
  assets,
  workers,
  check,
  logger,
  onProgress,
}: {
  stage: StageName
  assets: readonly string[]
  workers: number
  check: StageCheck
  logger: PipelineLogger
  onProgress?: StageProgress | null
}): Promise<StageResult> {
  const tasks = assets.map((asset) => async (): Promise<StageOutcome> => {
    try {
      return await check(asset)
    } catch (error) {
      return { ok: false, asset, reason: describeError(error), missingTool: false }
    }
  })
  const outcomes = await runWithConcurrency(tasks, workers, (completed, total) =>
    onProgress?.(stage, completed, total)
  )

  const survivors: string[] = []
  const dropped: DroppedAsset[] = []
  let missingToolDrops = 0
  let missingToolReason = ''
  for (const outcome of outcomes) {
    if (outcome.ok) {
      survivors.push(outcome.asset)
      continue
    }
    dropped.push({ asset: outcome.asset, reason: outcome.reason, missingTool: outcome.missingTool })
    if (outcome.missingTool) {
      missingToolDrops += 1
      missingToolReason = outcome.reason
      continue
    }
    logger.error(`${stage} failed for ${outcome.asset}: ${outcome.reason}`)
  }
  if (missingToolDrops > 0) {
    logger.error(`${stage} dropped ${missingToolDrops} image(s): ${missingToolReason}`)
  }
  return { stage, survivors, dropped, skipped: false }
}

function skippedStage(stage: StageName, assets: readonly string[]): StageResult {
  return { stage, survivors: assets.slice(), dropped: [], skipped: true }
}

export function createReconstructCheck({
  root,
  magickPath,
  runTool,
}: {
  root: string
  magickPath: string
  runTool: ToolRunner
}): StageCheck {
  return async (asset) => {
    const original = path.join(root, asset)
    const ext = path.extname(asset)
    // Same directory, so the final rename stays on one filesystem; same extension,
    // so magick keeps the image format.
    const temp = path.join(path.dirname(original), `.pagereel-${randomUUID()}${ext}`)
    const result = await runTool(magickPath, [original, '+profile', '*', temp])
    if (!result.ok) {
      await fs.rm(temp, { force: true })
      return failed(asset, result)
    }
    try {
      await fs.rename(temp, original)
    } catch (error) {
      await fs.rm(temp, { force: true })
      return { ok: false, asset, reason: describeError(error), missingTool: false }
    }
    return { ok: true, asset }
  }
}

export function createVerifyCheck({
  root,
  ffmpegPath,
  runTool,
}: {
  root: string
  ffmpegPath: string
  runTool: ToolRunner
}): StageCheck {
  return async (asset) => {
    const imagePath = path.join(root, asset)
    const result = await runTool(ffmpegPath, [
      '-v',
      'error',
      '-i',
      imagePath,
      '-vf',
      'scale=1:1',
      '-f',
      'null',
      '-',
    ])
    return result.ok ? { ok: true, asset } : failed(asset, result)
  }
}

/**
 * Rewrite every image through ImageMagick without metadata profiles. Images magick
 * cannot re-encode are dropped. Skipped as a whole when disabled or when `magick`
 * was not found by the tool probe.
 */
export async function reconstructImages({
  enabled,
  magickPath,
  ...args
}: CommonStageArgs & { enabled: boolean; magickPath: string | null }): Promise<StageResult> {
  if (!enabled) {
    args.logger.info('image reconstruction disabled; skipping')
    return skippedStage('reconstruct', args.assets)
  }
  if (!magickPath) {
    args.logger.debug('ImageMagick (magick) not available; skipping image reconstruction')
    return skippedStage('reconstruct', args.assets)
  }
  return await runStage({
    stage: 'reconstruct',
    assets: args.assets,
    workers: args.workers,
    logger: args.logger,
    onProgress: args.onProgress,
    check: createReconstructCheck({ root: args.root, magickPath, runTool: args.runTool }),
  })
}

/** Decode every image with ffmpeg and drop the ones it rejects. Always runs. */
export async function verifyImages({
  ffmpegPath,
  ...args
}: CommonStageArgs & { ffmpegPath: string | null }): Promise<StageResult> {
  const check: StageCheck = ffmpegPath
    ? createVerifyCheck({ root: args.root, ffmpegPath, runTool: args.runTool })
    : async (asset) => ({ ok: false, asset, reason: 'ffmpeg not available', missingTool: true })
  return await runStage({
    stage: 'verify',
    assets: args.assets,
    workers: args.workers,
    logger: args.logger,
    onProgress: args.onProgress,
    check,
  })
}
