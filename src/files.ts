import { promises as fs } from 'node:fs'
import path from 'node:path'

import { sortNatural } from './natural-sort.js'

export function normalizeExtensions(extensions: readonly string[]): string[] {
  const out: string[] = []
  for (const raw of extensions) {
    const trimmed = raw.trim().toLowerCase()
    if (!trimmed) continue
    const ext = trimmed.startsWith('.') ? trimmed : `.${trimmed}`
    if (!out.includes(ext)) out.push(ext)
  }
  return out
}

export function hasAllowedExtension(name: string, extensions: readonly string[]): boolean {
  const lower = name.toLowerCase()
  return extensions.some((ext) => lower.endsWith(ext))
}

export function toPosixPath(value: string): string {
  return value.split(path.sep).join('/').replaceAll('\\', '/')
}

/**
 * Walk `root` and return matching files as forward-slash paths relative to `root`,
 * in natural order.
 */
export async function listFilesRecursive(
  root: string,
  extensions: readonly string[]
): Promise<string[]> {
  const found: string[] = []
  const walk = async (dir: string) => {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    for (const entry of entries) {
      const full = path.join(dir, entry.name)
      if (entry.isDirectory()) {
        await walk(full)
        continue
      }
      if (entry.isFile() && hasAllowedExtension(entry.name, extensions)) {
        found.push(toPosixPath(path.relative(root, full)))
      }
    }
  }
  await walk(root)
  return sortNatural(found)
}

/** Non-recursive listing of matching files (absolute paths), in natural order of their names. */
export async function listFiles(dir: string, extensions: readonly string[]): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  const names = entries
    .filter((entry) => entry.isFile() && hasAllowedExtension(entry.name, extensions))
    .map((entry) => entry.name)
  return sortNatural(names).map((name) => path.join(dir, name))
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory()
  } catch {
    return false
  }
}
