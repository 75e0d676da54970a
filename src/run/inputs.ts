import { promises as fs } from 'node:fs'
import path from 'node:path'

import { ARCHIVE_EXTENSIONS, type Archive, isArchivePath, toArchive } from '../archive/kind.js'
import { isDirectory, listFiles, listFilesRecursive } from '../files.js'
import { parseSelection } from '../selection.js'

export type AudioSelection = {
  /** Every track found, natural order. */
  candidates: string[]
  /** The picked track, or the only one found; `null` when there is no pick among several. */
  selected: string | null
}

/**
 * Expand files and directories into one numbered archive listing (directories contribute
 * their `.cbz`/`.zip` files in natural order), then apply `--pick` to that listing.
 */
export async function resolveArchiveInputs(
  inputs: readonly string[],
  { pick }: { pick?: string | null } = {}
): Promise<{ listing: Archive[]; selected: Archive[] }> {
  if (inputs.length === 0) throw new Error('No inputs given (pass archive files or directories)')

  const listing: Archive[] = []
  const seen = new Set<string>()
  const add = (archive: Archive) => {
    if (seen.has(archive.path)) return
    seen.add(archive.path)
    listing.push(archive)
  }

  for (const input of inputs) {
    const resolved = path.resolve(input)
    if (await isDirectory(resolved)) {
      for (const file of await listFiles(resolved, ARCHIVE_EXTENSIONS)) add(toArchive(file))
      continue
    }
    if (!isArchivePath(resolved)) {
      throw new Error(`Not an archive or directory: ${input}`)
    }
    add(toArchive(resolved))
  }

  if (!pick) return { listing, selected: listing.slice() }
  if (listing.length === 0) throw new Error('--pick given but no archives were found')
  const indices = parseSelection(pick, listing.length)
  return {
    listing,
    selected: indices.flatMap((index) => {
      const archive = listing[index]
      return archive ? [archive] : []
    }),
  }
}

export async function resolveAudioInput(
  input: string,
  { extensions, pick }: { extensions: readonly string[]; pick?: string | null }
): Promise<AudioSelection> {
  const resolved = path.resolve(input)
  if (!(await isDirectory(resolved))) {
    try {
      await fs.access(resolved)
    } catch {
      throw new Error(`Audio file not found: ${input}`)
    }
    return { candidates: [resolved], selected: resolved }
  }

  const candidates = (await listFilesRecursive(resolved, extensions)).map((relative) =>
    path.join(resolved, relative)
  )
  if (candidates.length === 0) {
    throw new Error(`No audio files (${extensions.join(', ')}) found in ${input}`)
  }
  if (pick) {
    const [index] = parseSelection(pick, candidates.length, { allowRange: false })
    const selected = typeof index === 'number' ? (candidates[index] ?? null) : null
    return { candidates, selected }
  }
  return { candidates, selected: candidates.length === 1 ? (candidates[0] ?? null) : null }
}

export function formatListing(title: string, items: readonly string[]): string {
  if (items.length === 0) return `${title}: none`
  return [`${title}:`, ...items.map((item, index) => `  ${index + 1}. ${item}`)].join('\n')
}
