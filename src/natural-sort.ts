export type NaturalKeyPart = { kind: 'text'; value: string } | { kind: 'number'; value: bigint }

const DIGIT_RUNS = /(\d+)/

/**
 * Split a name into alternating text/digit runs.
 *
 * Digit runs become integers so `img10` sorts after `img2`; text runs are lower-cased.
 * Empty runs produced by `split` are kept so that keys always alternate text/number.
 */
export function naturalKey(name: string): NaturalKeyPart[] {
  return name
    .split(DIGIT_RUNS)
    .map((run, index) =>
      index % 2 === 1
        ? { kind: 'number' as const, value: BigInt(run) }
        : { kind: 'text' as const, value: run.toLowerCase() }
    )
}

function compareParts(a: NaturalKeyPart, b: NaturalKeyPart): number {
  if (a.kind === 'number' && b.kind === 'number') {
    if (a.value === b.value) return 0
    return a.value < b.value ? -1 : 1
  }
  // Keys alternate text/number at the same positions, so this is a text/text compare.
  const left = String(a.value)
  const right = String(b.value)
  if (left === right) return 0
  return left < right ? -1 : 1
}

export function compareNatural(a: string, b: string): number {
  const left = naturalKey(a)
  const right = naturalKey(b)
  const len = Math.min(left.length, right.length)
  for (let i = 0; i < len; i += 1) {
    const l = left[i]
    const r = right[i]
    if (!l || !r) break
    const diff = compareParts(l, r)
    if (diff !== 0) return diff
  }
  return left.length - right.length
}

/** Stable natural sort. Returns a new array; the input is left untouched. */
export function sortNatural<T>(items: readonly T[], key?: (item: T) => string): T[] {
  const toKey = key ?? ((item: T) => String(item))
  return items.slice().sort((a, b) => compareNatural(toKey(a), toKey(b)))
}
