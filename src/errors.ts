export type PipelineErrorCode =
  | 'ARCHIVE_NOT_FOUND'
  | 'CORRUPT_ARCHIVE'
  | 'EMPTY_ARCHIVE'
  | 'EXTRACTION_FAILED'
  | 'VALIDATOR_MISSING'
  | 'NO_SURVIVORS'
  | 'ENCODE_FAILED'
  | 'ENCODER_MISSING'
  | 'RELOCATION_FAILED'

export type PipelineStage = 'extract' | 'reconstruct' | 'verify' | 'manifest' | 'encode' | 'relocate'

export class PipelineError extends Error {
  readonly code: PipelineErrorCode
  readonly stage: PipelineStage | null
  readonly archive: string | null
  readonly exitCode: number | null

  constructor(
    code: PipelineErrorCode,
    message: string,
    options?: {
      cause?: unknown
      stage?: PipelineStage | null
      archive?: string | null
      exitCode?: number | null
    }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'PipelineError'
    this.code = code
    this.stage = options?.stage ?? null
    this.archive = options?.archive ?? null
    this.exitCode = options?.exitCode ?? null
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError
}

/** Only a missing encoder aborts a batch: every later job would fail the same way. */
export function isFatalPipelineError(error: unknown): boolean {
  return isPipelineError(error) && error.code === 'ENCODER_MISSING'
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
}
