import { promises as fs } from 'node:fs'
import path from 'node:path'

import JSZip from 'jszip'

import { describeError, isErrnoException, PipelineError } from '../errors.js'
import { hasAllowedExtension, listFilesRecursive } from '../files.js'
import type { PipelineLogger } from '../logging/logger.js'

export type ExtractArchiveArgs = {
  archivePath: string
  destination: string
  extensions: readonly string[]
  logger?: PipelineLogger | null
  onEntry?: ((completed: number, total: number) => void) | null
}

export type ExtractArchiveResult = {
  /** Forward-slash paths relative to `destination`, natural order. */
  images: string[]
  /** Entries that matched but were not written (unsafe paths). */
  skipped: string[]
}

/** Target path for `entryName` under `destination`, or `null` when it would land outside. */
export function resolveInside(destination: string, entryName: string): string | null {
  const target = path.resolve(destination, entryName)
  const root = path.resolve(destination)
  if (target === root || !target.startsWith(`${root}${path.sep}`)) return null
  return target
}

async function readArchive(archivePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(archivePath)
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw new PipelineError('ARCHIVE_NOT_FOUND', `Archive not found: ${archivePath}`, {
        cause: error,
        stage: 'extract',
      })
    }
    throw new PipelineError(
      'EXTRACTION_FAILED',
      `Failed to read archive ${archivePath}: ${describeError(error)}`,
      { cause: error, stage: 'extract' }
    )
  }
}

export async function extractArchive({
  archivePath,
  destination,
  extensions,
  logger,
  onEntry,
}: ExtractArchiveArgs): Promise<ExtractArchiveResult> {
  const bytes = await readArchive(archivePath)

  let zip: JSZip
  try {
    zip = await JSZip.loadAsync(bytes)
  } catch (error) {
    throw new PipelineError(
      'CORRUPT_ARCHIVE',
      `Invalid or corrupted archive ${archivePath}: ${describeError(error)}`,
      { cause: error, stage: 'extract' }
    )
  }

  const members = Object.values(zip.files).filter(
    (entry) => !entry.dir && hasAllowedExtension(entry.name, extensions)
  )
  if (members.length === 0) {
    throw new PipelineError(
      'EMPTY_ARCHIVE',
      `No image files (${extensions.join(', ')}) found in ${path.basename(archivePath)}`,
      { stage: 'extract' }
    )
  }
  logger?.debug(`archive lists ${members.length} image entries`)

  const skipped: string[] = []
  let completed = 0
  try {
    for (const entry of members) {
      const target = resolveInside(destination, entry.name)
      if (!target) {
        skipped.push(entry.name)
        logger?.warn(`skipping entry outside the extraction root: ${entry.name}`)
      } else {
        await fs.mkdir(path.dirname(target), { recursive: true })
        await fs.writeFile(target, await entry.async('nodebuffer'))
      }
      completed += 1
      onEntry?.(completed, members.length)
    }
  } catch (error) {
    throw new PipelineError(
      'EXTRACTION_FAILED',
      `Extraction of ${path.basename(archivePath)} failed: ${describeError(error)}`,
      { cause: error, stage: 'extract' }
    )
  }

  // The listing comes from the filesystem, not the zip directory: the written
  // names are what later stages and the manifest refer to.
  let images: string[]
  try {
    images = await listFilesRecursive(destination, extensions)
  } catch (error) {
    throw new PipelineError(
      'EXTRACTION_FAILED',
      `Could not scan extracted images in ${destination}: ${describeError(error)}`,
      { cause: error, stage: 'extract' }
    )
  }
  if (images.length === 0) {
    throw new PipelineError(
      'EMPTY_ARCHIVE',
      `No image files found in ${path.basename(archivePath)} after extraction`,
      { stage: 'extract' }
    )
  }

  return { images, skipped }
}
