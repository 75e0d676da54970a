import path from 'node:path'

export type ArchiveKind = 'comic-archive' | 'generic-zip'

export type Archive = {
  path: string
  /** Base name including the extension, used in logs and the batch summary. */
  name: string
  /** Informational: shown in the job's log lines, never used to choose a path. */
  kind: ArchiveKind
  /** Directory the archive was selected from; finished videos are relocated here. */
  sourceDir: string
}

export const ARCHIVE_EXTENSIONS = ['.cbz', '.zip'] as const

export function detectArchiveKind(filePath: string): ArchiveKind {
  return path.extname(filePath).toLowerCase() === '.cbz' ? 'comic-archive' : 'generic-zip'
}

export function isArchivePath(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase()
  return ARCHIVE_EXTENSIONS.some((candidate) => candidate === ext)
}

export function toArchive(filePath: string): Archive {
  const resolved = path.resolve(filePath)
  return {
    path: resolved,
    name: path.basename(resolved),
    kind: detectArchiveKind(resolved),
    sourceDir: path.dirname(resolved),
  }
}
