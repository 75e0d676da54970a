const NUMBER_PATTERN = /^\d+(?:\.\d+)?$|^\.\d+$/
const DURATION_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>ms|s)?$/i

export function parseFpsArg(raw: string): number {
  const value = raw.trim()
  const fps = NUMBER_PATTERN.test(value) ? Number(value) : Number.NaN
  if (!Number.isFinite(fps) || fps <= 0 || fps > 240) {
    throw new Error(`Unsupported --fps: ${raw} (use a number between 0 and 240)`)
  }
  return fps
}

/** Seconds, with an optional `s` or `ms` suffix: `0.25`, `250ms`, `2s`. */
export function parseSecondsArg(raw: string, flag: string, { allowZero }: { allowZero: boolean }): number {
  const match = DURATION_PATTERN.exec(raw.trim())
  const value = match?.groups?.value
  if (!value) throw new Error(`Unsupported ${flag}: ${raw}`)
  const unit = match.groups?.unit?.toLowerCase() ?? 's'
  const seconds = unit === 'ms' ? Number(value) / 1000 : Number(value)
  if (!Number.isFinite(seconds) || seconds < 0 || (!allowZero && seconds === 0)) {
    throw new Error(`Unsupported ${flag}: ${raw}`)
  }
  return seconds
}

export function parseWorkersArg(raw: string): number {
  const value = raw.trim()
  const workers = /^\d+$/.test(value) ? Number(value) : Number.NaN
  if (!Number.isSafeInteger(workers) || workers < 1 || workers > 256) {
    throw new Error(`Unsupported --workers: ${raw} (use 1-256)`)
  }
  return workers
}

export function parseSeedArg(raw: string): number {
  const value = raw.trim()
  if (!/^-?\d+$/.test(value)) throw new Error(`Unsupported --seed: ${raw} (use an integer)`)
  const seed = Number(value)
  if (!Number.isSafeInteger(seed)) throw new Error(`Unsupported --seed: ${raw}`)
  return seed
}
