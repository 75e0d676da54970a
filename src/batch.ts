import type { Archive } from './archive/kind.js'
import type { PipelineConfig } from './config.js'
import { describeError, isFatalPipelineError } from './errors.js'
import { type JobDeps, type JobOutcome, type JobProgress, runArchiveJob } from './job.js'
import type { PipelineLogger } from './logging/logger.js'
import type { ToolAvailability } from './tools.js'

export type BatchResult = {
  total: number
  succeeded: number
  failed: number
  /** Archive names, in processing order. */
  failedArchives: string[]
  warnings: string[]
  aborted: boolean
  abortReason: string | null
  outputs: string[]
}

export type BatchHooks = {
  /** Called before each job; the returned listener receives that job's progress. */
  onJobStart?: ((archive: Archive, index: number, total: number) => JobProgress | null) | null
  onJobEnd?: ((archive: Archive, outcome: JobOutcome | null, error: unknown) => void) | null
}

type RunJob = typeof runArchiveJob

/** mulberry32: a small deterministic generator for `--seed`. */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Draw one track per archive, uniformly and with replacement. `random` must return a
 * value in [0, 1).
 */
export function assignAudioTracks(
  archives: readonly Archive[],
  candidates: readonly string[],
  random: () => number = Math.random
): string[] {
  if (candidates.length === 0) throw new Error('No audio tracks to choose from')
  return archives.map(() => {
    const index = Math.min(candidates.length - 1, Math.floor(random() * candidates.length))
    return candidates[Math.max(0, index)] ?? candidates[0] ?? ''
  })
}

/**
 * One archive keeps the selected track. Several archives each draw from the whole pool,
 * unless `sameAudio` asks for one track for the batch: the selected one, or a single draw.
 */
export function chooseAudioTracks({
  archives,
  audioCandidates,
  selectedAudio,
  sameAudio = false,
  random,
}: {
  archives: readonly Archive[]
  audioCandidates: readonly string[]
  selectedAudio: string | null
  sameAudio?: boolean
  random?: () => number
}): string[] {
  if (archives.length === 0) return []
  if (selectedAudio && (sameAudio || archives.length === 1)) {
    return archives.map(() => selectedAudio)
  }
  if (sameAudio) {
    const [track] = assignAudioTracks(archives.slice(0, 1), audioCandidates, random)
    return archives.map(() => track ?? '')
  }
  return assignAudioTracks(archives, audioCandidates, random)
}

export async function runBatch({
  archives,
  audioCandidates,
  selectedAudio,
  sameAudio,
  random,
  config,
  tools,
  logger,
  hooks,
  jobDeps,
  runJob = runArchiveJob,
}: {
  archives: readonly Archive[]
  audioCandidates: readonly string[]
  selectedAudio: string | null
  sameAudio?: boolean
  random?: () => number
  config: PipelineConfig
  tools: ToolAvailability
  logger: PipelineLogger
  hooks?: BatchHooks | null
  jobDeps?: Partial<JobDeps> | null
  runJob?: RunJob
}): Promise<BatchResult> {
  const log = logger.getSubLogger({ name: 'batch' })
  const total = archives.length
  const result: BatchResult = {
    total,
    succeeded: 0,
    failed: 0,
    failedArchives: [],
    warnings: [],
    aborted: false,
    abortReason: null,
    outputs: [],
  }
  if (total === 0) return result

  const tracks = chooseAudioTracks({ archives, audioCandidates, selectedAudio, sameAudio, random })

  for (const [index, archive] of archives.entries()) {
    const audioPath = tracks[index] ?? tracks[0] ?? ''
    log.info(`[${index + 1}/${total}] ${archive.name} with audio ${audioPath}`)
    const progress = hooks?.onJobStart?.(archive, index, total) ?? null

    let outcome: JobOutcome
    try {
      outcome = await runJob({
        archive,
        audioPath,
        config,
        tools,
        logger,
        progress,
        deps: jobDeps ?? null,
      })
    } catch (error) {
      hooks?.onJobEnd?.(archive, null, error)
      if (isFatalPipelineError(error)) {
        const remaining = archives.slice(index).map((item) => item.name)
        result.aborted = true
        result.abortReason = describeError(error)
        result.failed += remaining.length
        result.failedArchives.push(...remaining)
        log.error(`aborting batch: ${result.abortReason}`)
        break
      }
      result.failed += 1
      result.failedArchives.push(archive.name)
      log.error(`${archive.name} failed: ${describeError(error)}`)
      continue
    }

    hooks?.onJobEnd?.(archive, outcome, null)
    if (outcome.status === 'succeeded') {
      result.succeeded += 1
      result.outputs.push(outcome.outputPath)
      result.warnings.push(...outcome.warnings)
    } else {
      result.failed += 1
      result.failedArchives.push(archive.name)
    }
  }

  return result
}

export function formatBatchSummary(result: BatchResult): string {
  const lines = [
    'Batch summary',
    `  Total archives: ${result.total}`,
    `  Succeeded: ${result.succeeded}`,
    `  Failed: ${result.failed}`,
  ]
  if (result.failedArchives.length > 0) {
    lines.push('  Failed archives:', ...result.failedArchives.map((name) => `    - ${name}`))
  }
  if (result.warnings.length > 0) {
    lines.push('  Warnings:', ...result.warnings.map((warning) => `    - ${warning}`))
  }
  if (result.aborted) {
    lines.push(`  Aborted: ${result.abortReason ?? 'unknown error'}`)
  }
  return lines.join('\n')
}
