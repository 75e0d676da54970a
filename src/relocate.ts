import { promises as fs } from 'node:fs'
import path from 'node:path'

import { describeError, isErrnoException, PipelineError } from './errors.js'

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to)
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') throw error
    // Different filesystem: copy, then drop the source.
    await fs.copyFile(from, to)
    await fs.rm(from, { force: true })
  }
}

/**
 * Move a finished video into `targetDir`, replacing a file of the same name. Returns the
 * new path; throws `RELOCATION_FAILED` and leaves the video where it was on failure.
 */
export async function relocateVideo({
  videoPath,
  targetDir,
  archive,
}: {
  videoPath: string
  targetDir: string
  archive?: string | null
}): Promise<string> {
  const destination = path.join(path.resolve(targetDir), path.basename(videoPath))
  if (destination === path.resolve(videoPath)) return destination
  try {
    await fs.mkdir(path.dirname(destination), { recursive: true })
    await moveFile(videoPath, destination)
  } catch (error) {
    throw new PipelineError(
      'RELOCATION_FAILED',
      `Could not move ${path.basename(videoPath)} to ${targetDir}: ${describeError(error)}`,
      { cause: error, stage: 'relocate', archive: archive ?? null }
    )
  }
  return destination
}
