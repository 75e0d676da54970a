import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import type { EncoderState, RunEncoderArgs } from '../src/encoder/driver.js'
import { runEncoder } from '../src/encoder/driver.js'
import type { ProgressSink } from '../src/encoder/progress.js'
import { createSilentLogger } from '../src/logging/logger.js'

class FakeProcess extends EventEmitter {
  stderr = new PassThrough()
  kill = vi.fn<(signal?: NodeJS.Signals) => boolean>(() => true)
}

function mockEncoder({
  chunks,
  exitCode,
}: {
  chunks: string[]
  exitCode: number | null
}): { processes: FakeProcess[] } {
  const processes: FakeProcess[] = []
  spawnMock.mockImplementation(() => {
    const proc = new FakeProcess()
    processes.push(proc)
    proc.stderr.on('end', () => proc.emit('close', exitCode, exitCode === null ? 'SIGKILL' : null))
    setImmediate(() => {
      for (const chunk of chunks) proc.stderr.write(chunk)
      proc.stderr.end()
    })
    return proc
  })
  return { processes }
}

const video = {
  fps: 4,
  width: 1280,
  height: 720,
  blur: '10:1',
  codec: 'libx264',
  pixelFormat: 'yuv420p',
}

function encoderArgs(overrides: Partial<RunEncoderArgs> = {}): RunEncoderArgs {
  return {
    ffmpegPath: '/usr/bin/ffmpeg',
    manifestPath: '/scratch/ffmpeg_input.txt',
    audioPath: '/music/theme.mp3',
    outputPath: '/out/Book.mp4',
    imageCount: 2,
    frameDurationSeconds: 0.5,
    fadeInSeconds: 0,
    fadeOutSeconds: 0,
    video,
    logger: createSilentLogger(),
    ...overrides,
  }
}

describe('encoder driver', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  it('tracks progress and resolves on exit 0', async () => {
    mockEncoder({
      chunks: [
        '  Duration: 00:00:01.50, start: 0.000000, bitrate: N/A\n',
        'frame=    2 fps=0.0 q=28.0 size=       0kB time=00:00:00.50 bitrate=N/A\r',
        'frame=    1 fps=0.0 q=28.0 size=       0kB time=00:00:00.25 bitrate=N/A\r',
      ],
      exitCode: 0,
    })
    const progress = {
      start: vi.fn<ProgressSink['start']>(),
      advance: vi.fn<ProgressSink['advance']>(),
      finish: vi.fn<ProgressSink['finish']>(),
      close: vi.fn<ProgressSink['close']>(),
    }
    const states: EncoderState[] = []

    const result = await runEncoder(
      encoderArgs({ progress, onStateChange: (state) => states.push(state) })
    )

    expect(result.expectedSeconds).toBe(1.5)
    expect(result.announcedSeconds).toBe(1.5)
    expect(progress.start).toHaveBeenCalledWith(1.5)
    expect(progress.advance.mock.calls).toEqual([[0.5, 1.5]])
    expect(progress.finish).toHaveBeenCalledWith(1.5)
    expect(progress.close).toHaveBeenCalledTimes(1)
    expect(states).toEqual(['not-started', 'running', 'succeeded'])
    expect(spawnMock).toHaveBeenCalledWith('/usr/bin/ffmpeg', result.args, {
      stdio: ['ignore', 'ignore', 'pipe'],
    })
  })

  it('passes the fade filter through to ffmpeg', async () => {
    mockEncoder({ chunks: [], exitCode: 0 })
    const result = await runEncoder(encoderArgs({ fadeInSeconds: 2, fadeOutSeconds: 2 }))
    const afIndex = result.args.indexOf('-af')
    expect(result.args[afIndex + 1]).toBe('afade=t=in:st=0:d=1.5000,afade=t=out:st=0.0000:d=1.5000')
  })

  it('fails with the exit code and the stderr tail', async () => {
    mockEncoder({
      chunks: ['Input #0, concat, from ffmpeg_input.txt:\n', 'Error opening output file\n'],
      exitCode: 1,
    })
    const states: EncoderState[] = []

    await expect(
      runEncoder(encoderArgs({ onStateChange: (state) => states.push(state) }))
    ).rejects.toMatchObject({
      code: 'ENCODE_FAILED',
      exitCode: 1,
      message: 'ffmpeg exited with code 1:\nInput #0, concat, from ffmpeg_input.txt:\nError opening output file',
    })
    expect(states.at(-1)).toBe('failed')
  })

  it('reports a missing binary as ENCODER_MISSING', async () => {
    spawnMock.mockImplementation(() => {
      const proc = new FakeProcess()
      setImmediate(() =>
        proc.emit('error', Object.assign(new Error('spawn /usr/bin/ffmpeg ENOENT'), { code: 'ENOENT' }))
      )
      return proc
    })
    await expect(runEncoder(encoderArgs())).rejects.toMatchObject({ code: 'ENCODER_MISSING' })
  })

  it('stops ffmpeg with SIGTERM then SIGKILL when a listener throws', async () => {
    const processes: FakeProcess[] = []
    spawnMock.mockImplementation(() => {
      const proc = new FakeProcess()
      proc.kill.mockImplementation((signal) => {
        if (signal === 'SIGKILL') setImmediate(() => proc.emit('close', null, 'SIGKILL'))
        return true
      })
      processes.push(proc)
      setImmediate(() => {
        proc.stderr.write('frame=    1 fps=0.0 q=28.0 size=       0kB time=00:00:00.25 bitrate=N/A\r')
      })
      return proc
    })

    await expect(
      runEncoder(
        encoderArgs({
          killGraceMs: 10,
          onLine: (line) => {
            if (line.kind === 'progress') throw new Error('progress listener failed')
          },
        })
      )
    ).rejects.toThrow('progress listener failed')
    expect(processes[0]?.kill.mock.calls).toEqual([['SIGTERM'], ['SIGKILL']])
  })

  it('fails a stalled encode without waiting for SIGKILL when SIGTERM is enough', async () => {
    const processes: FakeProcess[] = []
    spawnMock.mockImplementation(() => {
      const proc = new FakeProcess()
      proc.kill.mockImplementation((signal) => {
        if (signal === 'SIGTERM') setImmediate(() => proc.emit('close', null, 'SIGTERM'))
        return true
      })
      processes.push(proc)
      return proc
    })

    await expect(
      runEncoder(encoderArgs({ stallTimeoutMs: 20, killGraceMs: 1_000 }))
    ).rejects.toMatchObject({ code: 'ENCODE_FAILED', message: expect.stringMatching(/produced no output/) })
    expect(processes[0]?.kill.mock.calls).toEqual([['SIGTERM']])
  })
})
