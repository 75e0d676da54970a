const DURATION_PATTERN = /Duration: (\d{2}:\d{2}:\d{2}\.\d{2})/
const PROGRESS_PATTERN = /frame=\s*\d+\s+.*?time=(\d{2}:\d{2}:\d{2}\.\d{2})/
const LINE_BREAK = /\r\n|\r|\n/

export type EncoderLine =
  | { kind: 'duration'; seconds: number; raw: string }
  | { kind: 'progress'; seconds: number; raw: string }
  | { kind: 'other'; raw: string }

/** `HH:MM:SS.ff` → seconds, or `null` when the value is not in that shape. */
export function parseTimestamp(value: string): number | null {
  const parts = value.trim().split(':')
  if (parts.length !== 3) return null
  const [h, m, s] = parts.map((part) => (/^\d+(\.\d+)?$/.test(part) ? Number(part) : Number.NaN))
  if (h === undefined || m === undefined || s === undefined) return null
  if (!Number.isFinite(h) || !Number.isFinite(m) || !Number.isFinite(s)) return null
  return h * 3600 + m * 60 + s
}

export function classifyEncoderLine(line: string): EncoderLine {
  const duration = DURATION_PATTERN.exec(line)
  if (duration?.[1]) {
    const seconds = parseTimestamp(duration[1])
    if (seconds !== null) return { kind: 'duration', seconds, raw: line }
  }
  const progress = PROGRESS_PATTERN.exec(line)
  if (progress?.[1]) {
    const seconds = parseTimestamp(progress[1])
    if (seconds !== null) return { kind: 'progress', seconds, raw: line }
  }
  return { kind: 'other', raw: line }
}

/**
 * Incremental splitter for ffmpeg's stderr. ffmpeg ends its stats lines with `\r`,
 * so carriage returns count as line breaks too. Empty lines are dropped.
 */
export function createLineSplitter(onLine: (line: string) => void): {
  push: (chunk: string) => void
  end: () => void
} {
  let pending = ''
  return {
    push: (chunk) => {
      pending += chunk
      const lines = pending.split(LINE_BREAK)
      pending = lines.pop() ?? ''
      for (const line of lines) {
        if (line.trim()) onLine(line)
      }
    },
    end: () => {
      const rest = pending
      pending = ''
      if (rest.trim()) onLine(rest)
    },
  }
}

export type ProgressSink = {
  start: (totalSeconds: number) => void
  advance: (positionSeconds: number, totalSeconds: number) => void
  finish: (totalSeconds: number) => void
  close: () => void
}

export type ProgressTracker = {
  readonly started: boolean
  readonly position: number
  readonly total: number
  /** Apply a reported elapsed time. Returns whether the position moved forward. */
  update: (seconds: number) => boolean
  /** Snap to 100% and close. A tracker that never started just closes. */
  complete: () => void
  close: () => void
}

/**
 * Monotonic progress against a fixed total. The sink is started lazily by the first
 * update; reports at or behind the current position are ignored.
 */
export function createProgressTracker({
  totalSeconds,
  sink,
}: {
  totalSeconds: number
  sink?: ProgressSink | null
}): ProgressTracker {
  let started = false
  let closed = false
  let position = 0

  const close = () => {
    if (closed) return
    closed = true
    if (started) sink?.close()
  }

  return {
    get started() {
      return started
    },
    get position() {
      return position
    },
    get total() {
      return totalSeconds
    },
    update: (seconds) => {
      if (closed) return false
      if (!started) {
        started = true
        sink?.start(totalSeconds)
      }
      if (!(seconds > position)) return false
      position = seconds
      sink?.advance(position, totalSeconds)
      return true
    },
    complete: () => {
      if (closed || !started) {
        close()
        return
      }
      position = Math.max(position, totalSeconds)
      sink?.finish(totalSeconds)
      close()
    },
    close,
  }
}
