import { spawn } from 'node:child_process'
import path from 'node:path'

import { describeError, isErrnoException, PipelineError } from '../errors.js'
import type { PipelineLogger } from '../logging/logger.js'
import {
  buildAudioFilter,
  buildEncoderArgs,
  computeAudioFades,
  expectedDurationSeconds,
  type VideoSettings,
} from './args.js'
import {
  classifyEncoderLine,
  createLineSplitter,
  createProgressTracker,
  type EncoderLine,
  type ProgressSink,
} from './progress.js'

export type EncoderState = 'not-started' | 'running' | 'succeeded' | 'failed'

const DEFAULT_STALL_TIMEOUT_MS = 120_000
const DEFAULT_KILL_GRACE_MS = 2_000
const STDERR_TAIL_LINES = 20

export type RunEncoderArgs = {
  ffmpegPath: string
  manifestPath: string
  audioPath: string
  outputPath: string
  imageCount: number
  frameDurationSeconds: number
  fadeInSeconds: number
  fadeOutSeconds: number
  video: VideoSettings
  logger: PipelineLogger
  progress?: ProgressSink | null
  /** Fail when ffmpeg writes nothing to stderr for this long. 0 disables. */
  stallTimeoutMs?: number
  /** Delay between SIGTERM and SIGKILL when the driver has to stop ffmpeg. */
  killGraceMs?: number
  onStateChange?: ((state: EncoderState) => void) | null
  onLine?: ((line: EncoderLine) => void) | null
}

export type EncodeResult = {
  outputPath: string
  expectedSeconds: number
  /** Input duration ffmpeg announced (informational), if any. */
  announcedSeconds: number | null
  args: string[]
}

export async function runEncoder({
  ffmpegPath,
  manifestPath,
  audioPath,
  outputPath,
  imageCount,
  frameDurationSeconds,
  fadeInSeconds,
  fadeOutSeconds,
  video,
  logger,
  progress,
  stallTimeoutMs = DEFAULT_STALL_TIMEOUT_MS,
  killGraceMs = DEFAULT_KILL_GRACE_MS,
  onStateChange,
  onLine,
}: RunEncoderArgs): Promise<EncodeResult> {
  const expectedSeconds = expectedDurationSeconds(imageCount, frameDurationSeconds)
  const fades = computeAudioFades({ expectedSeconds, fadeInSeconds, fadeOutSeconds })
  const audioFilter = buildAudioFilter(fades)
  const args = buildEncoderArgs({ manifestPath, audioPath, outputPath, video, audioFilter })
  if (audioFilter) logger.info(`audio filters: ${audioFilter}`)
  logger.debug(`ffmpeg ${args.join(' ')}`)

  const setState = (next: EncoderState) => {
    onStateChange?.(next)
  }
  setState('not-started')

  const tracker = createProgressTracker({ totalSeconds: expectedSeconds, sink: progress })
  const tail: string[] = []
  let announcedSeconds: number | null = null

  return await new Promise<EncodeResult>((resolve, reject) => {
    const proc = spawn(ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] })
    setState('running')

    let settled = false
    let abortError: Error | null = null
    let stallTimer: ReturnType<typeof setTimeout> | null = null
    let killTimer: ReturnType<typeof setTimeout> | null = null

    const clearTimers = () => {
      if (stallTimer) clearTimeout(stallTimer)
      if (killTimer) clearTimeout(killTimer)
      stallTimer = null
      killTimer = null
    }

    const fail = (error: Error) => {
      if (settled) return
      settled = true
      clearTimers()
      tracker.close()
      setState('failed')
      reject(error)
    }

    // Stop a still-running ffmpeg before reporting `error`: SIGTERM first, SIGKILL if it
    // has not exited after the grace period. The promise settles on `close`.
    const abort = (error: Error) => {
      if (abortError || settled) return
      abortError = error
      if (stallTimer) clearTimeout(stallTimer)
      stallTimer = null
      tracker.close()
      logger.warn(`stopping ffmpeg: ${error.message}`)
      proc.kill('SIGTERM')
      killTimer = setTimeout(() => {
        proc.kill('SIGKILL')
      }, killGraceMs)
    }

    const armStallTimer = () => {
      if (stallTimeoutMs <= 0 || abortError) return
      if (stallTimer) clearTimeout(stallTimer)
      stallTimer = setTimeout(() => {
        abort(
          new PipelineError(
            'ENCODE_FAILED',
            `ffmpeg produced no output for ${Math.round(stallTimeoutMs / 1000)}s`,
            { stage: 'encode' }
          )
        )
      }, stallTimeoutMs)
    }

    const handleLine = (raw: string) => {
      const line = classifyEncoderLine(raw)
      onLine?.(line)
      if (line.kind === 'duration') {
        if (announcedSeconds === null) {
          announcedSeconds = line.seconds
          logger.info(`input duration ${line.seconds.toFixed(2)}s`)
        }
        return
      }
      if (line.kind === 'progress') {
        if (!tracker.started) logger.info(`encoding ${expectedSeconds.toFixed(2)}s of video`)
        tracker.update(line.seconds)
        return
      }
      tail.push(line.raw.trim())
      if (tail.length > STDERR_TAIL_LINES) tail.shift()
    }

    const splitter = createLineSplitter((raw) => {
      if (abortError) return
      try {
        handleLine(raw)
      } catch (error) {
        abort(error instanceof Error ? error : new Error(describeError(error)))
      }
    })

    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        armStallTimer()
        splitter.push(chunk)
      })
    }
    armStallTimer()

    proc.on('error', (error) => {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        fail(
          new PipelineError('ENCODER_MISSING', `ffmpeg not found at ${ffmpegPath}`, {
            cause: error,
            stage: 'encode',
          })
        )
        return
      }
      fail(
        new PipelineError('ENCODE_FAILED', `ffmpeg failed to run: ${error.message}`, {
          cause: error,
          stage: 'encode',
        })
      )
    })

    proc.on('close', (code, signal) => {
      if (settled) return
      if (!abortError) {
        try {
          splitter.end()
        } catch (error) {
          abortError = error instanceof Error ? error : new Error(describeError(error))
        }
      }
      if (abortError) {
        fail(abortError)
        return
      }
      if (code === 0) {
        if (!tracker.started) logger.warn('ffmpeg reported no progress')
        tracker.complete()
        settled = true
        clearTimers()
        setState('succeeded')
        logger.info(`wrote ${path.basename(outputPath)}`)
        resolve({ outputPath, expectedSeconds, announcedSeconds, args })
        return
      }
      const detail = tail.join('\n')
      const how = code === null ? `was terminated by ${signal ?? 'a signal'}` : `exited with code ${code}`
      fail(
        new PipelineError('ENCODE_FAILED', `ffmpeg ${how}${detail ? `:\n${detail}` : ''}`, {
          stage: 'encode',
          exitCode: code,
        })
      )
    })
  })
}
