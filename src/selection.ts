function parseIndex(raw: string, count: number, part: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Invalid selection "${part}": use numbers or ranges like 5-7`)
  }
  const value = Number(raw)
  if (value < 1 || value > count) {
    throw new Error(`Invalid selection "${part}": out of range 1-${count}`)
  }
  return value - 1
}

/**
 * Parse a 1-based selection like `1,3,5-7` against a listing of `count` items.
 * Returns sorted, de-duplicated, 0-based indices.
 */
export function parseSelection(
  input: string,
  count: number,
  { allowRange = true }: { allowRange?: boolean } = {}
): number[] {
  const parts = input
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
  if (parts.length === 0) throw new Error('Empty selection')

  const indices = new Set<number>()
  for (const part of parts) {
    if (part.includes('-')) {
      if (!allowRange) throw new Error(`Invalid selection "${part}": ranges are not allowed here`)
      const bounds = part.split('-')
      if (bounds.length !== 2) throw new Error(`Invalid range "${part}"`)
      const start = parseIndex(bounds[0]?.trim() ?? '', count, part)
      const end = parseIndex(bounds[1]?.trim() ?? '', count, part)
      if (start > end) throw new Error(`Invalid range "${part}": start is after end`)
      for (let i = start; i <= end; i += 1) indices.add(i)
      continue
    }
    indices.add(parseIndex(part, count, part))
  }

  if (!allowRange && indices.size > 1) {
    throw new Error('Select exactly one item')
  }
  return [...indices].sort((a, b) => a - b)
}
