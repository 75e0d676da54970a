export type { Archive, ArchiveKind } from './archive/kind.js'
export { detectArchiveKind, toArchive } from './archive/kind.js'
export { extractArchive } from './archive/extract.js'
export type { BatchHooks, BatchResult } from './batch.js'
export { assignAudioTracks, chooseAudioTracks, formatBatchSummary, runBatch } from './batch.js'
export type { PagereelConfig, PipelineConfig } from './config.js'
export { loadPagereelConfig, resolvePipelineConfig } from './config.js'
export {
  buildAudioFilter,
  buildEncoderArgs,
  computeAudioFades,
  expectedDurationSeconds,
} from './encoder/args.js'
export type { EncodeResult, EncoderState, RunEncoderArgs } from './encoder/driver.js'
export { runEncoder } from './encoder/driver.js'
export { parseTimestamp } from './encoder/progress.js'
export type { PipelineErrorCode } from './errors.js'
export { isFatalPipelineError, PipelineError } from './errors.js'
export type { StageOutcome, StageResult } from './images/stages.js'
export { reconstructImages, verifyImages } from './images/stages.js'
export type { JobOutcome } from './job.js'
export { runArchiveJob, sanitizeOutputName } from './job.js'
export { buildManifestEntries, renderManifest, writeManifest } from './manifest.js'
export { compareNatural, naturalKey, sortNatural } from './natural-sort.js'
export { runCli } from './run.js'
export { parseSelection } from './selection.js'
export type { ToolAvailability } from './tools.js'
export { probeTools } from './tools.js'
