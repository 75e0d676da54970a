import type { ProgressSink } from '../../encoder/progress.js'
import type { StageName } from '../../images/stages.js'
import { formatDurationSeconds, formatElapsedMs, formatPercent } from '../format.js'

export type JobPhase = 'extract' | StageName | 'encode'

const PHASE_LABELS: Record<JobPhase, string> = {
  extract: 'Extracting pages',
  reconstruct: 'Reconstructing images',
  verify: 'Verifying images',
  encode: 'Encoding',
}

export type JobProgressRenderer = {
  onCount: (phase: Exclude<JobPhase, 'encode'>, completed: number, total: number) => void
  encodeSink: ProgressSink
}

/**
 * Renders per-archive progress into a single status line: item counts for extraction
 * and the validation stages, then percent/seconds for the encode.
 */
export function createJobProgressRenderer({
  archiveName,
  setText,
  now = Date.now,
}: {
  archiveName: string
  setText: (text: string) => void
  now?: () => number
}): JobProgressRenderer {
  const state: {
    phase: JobPhase | null
    startedAtMs: number
    lastText: string
    lastUpdateAtMs: number
  } = { phase: null, startedAtMs: now(), lastText: '', lastUpdateAtMs: 0 }

  const render = (text: string, options?: { force?: boolean }) => {
    const at = now()
    if (text === state.lastText) return
    if (!options?.force && at - state.lastUpdateAtMs < 100) return
    state.lastText = text
    state.lastUpdateAtMs = at
    setText(text)
  }

  const enterPhase = (phase: JobPhase) => {
    if (state.phase === phase) return false
    state.phase = phase
    state.startedAtMs = now()
    return true
  }

  return {
    onCount: (phase, completed, total) => {
      const entered = enterPhase(phase)
      render(`${PHASE_LABELS[phase]} (${archiveName}, ${completed}/${total})…`, {
        force: entered || completed === total,
      })
    },
    encodeSink: {
      start: (totalSeconds) => {
        enterPhase('encode')
        render(`${PHASE_LABELS.encode} (${archiveName}, 0%, 0.0s/${formatDurationSeconds(totalSeconds)})…`, {
          force: true,
        })
      },
      advance: (position, totalSeconds) => {
        const elapsed = formatElapsedMs(now() - state.startedAtMs)
        render(
          `${PHASE_LABELS.encode} (${archiveName}, ${formatPercent(position, totalSeconds)}%, ${formatDurationSeconds(
            position
          )}/${formatDurationSeconds(totalSeconds)}, ${elapsed})…`
        )
      },
      finish: (totalSeconds) => {
        render(
          `${PHASE_LABELS.encode} (${archiveName}, 100%, ${formatDurationSeconds(totalSeconds)}/${formatDurationSeconds(
            totalSeconds
          )})`,
          { force: true }
        )
      },
      close: () => {
        state.phase = null
      },
    },
  }
}
