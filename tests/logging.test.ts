import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'

import { createLogFileWriter, rotationPaths } from '../src/logging/log-file.js'
import { createPipelineLogging, type LoggingSettings } from '../src/logging/logger.js'

function collectStream() {
  let text = ''
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })
  return { stream, getLines: () => text.split('\n').filter(Boolean) }
}

const settings = (overrides: Partial<LoggingSettings> = {}): LoggingSettings => ({
  level: 'info',
  format: 'pretty',
  file: null,
  maxBytes: 1024 * 1024,
  maxFiles: 2,
  ...overrides,
})

describe('log file writer', () => {
  it('lists rotation paths newest first', () => {
    expect(rotationPaths('/logs/run.log', 3)).toEqual([
      '/logs/run.log',
      '/logs/run.log.1',
      '/logs/run.log.2',
    ])
  })

  it('rotates when the next line would exceed max bytes', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pagereel-log-'))
    const filePath = join(dir, 'run.log')
    const writer = createLogFileWriter({ filePath, maxBytes: 1024, maxFiles: 2 })

    writer.write('a'.repeat(600))
    writer.write('b'.repeat(600))
    await writer.flush()

    expect(readFileSync(filePath, 'utf8')).toBe(`${'b'.repeat(600)}\n`)
    expect(readFileSync(`${filePath}.1`, 'utf8')).toBe(`${'a'.repeat(600)}\n`)
  })

  it('reports a directory that cannot be created to onError once', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pagereel-log-'))
    const blocker = join(dir, 'blocker')
    writeFileSync(blocker, 'not a directory')
    const onError = vi.fn<(error: unknown) => void>()
    const writer = createLogFileWriter(
      { filePath: join(blocker, 'logs', 'run.log'), maxBytes: 1024, maxFiles: 2 },
      onError
    )

    writer.write('first')
    writer.write('second')
    await writer.flush()

    expect(onError).toHaveBeenCalledTimes(1)
    expect(onError.mock.calls[0]?.[0]).toMatchObject({ code: 'ENOTDIR' })
  })

  it('settles quietly when nothing is written to an unwritable path', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pagereel-log-'))
    const blocker = join(dir, 'blocker')
    writeFileSync(blocker, 'not a directory')
    const onError = vi.fn<(error: unknown) => void>()
    const writer = createLogFileWriter(
      { filePath: join(blocker, 'logs', 'run.log'), maxBytes: 1024, maxFiles: 2 },
      onError
    )

    await new Promise((resolve) => setTimeout(resolve, 20))
    await writer.flush()

    expect(onError).not.toHaveBeenCalled()
  })
})

describe('pipeline logging', () => {
  it('writes pretty lines to stderr and honours the level', () => {
    const { stream, getLines } = collectStream()
    const { logger } = createPipelineLogging({
      settings: settings({ level: 'warn' }),
      stderr: stream,
      env: {},
    })

    logger.info('hidden')
    logger.warn('disk is almost full')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    expect(lines[0]).toContain('WARN')
    expect(lines[0]?.endsWith('disk is almost full')).toBe(true)
  })

  it('writes JSON lines in json format', () => {
    const { stream, getLines } = collectStream()
    const { logger } = createPipelineLogging({
      settings: settings({ format: 'json' }),
      stderr: stream,
      env: {},
    })

    logger.info('encoded')

    const parsed: unknown = JSON.parse(getLines()[0] ?? '{}')
    expect(parsed).toMatchObject({ 0: 'encoded' })
  })

  it('runs the before-write hook for every console line', () => {
    const { stream } = collectStream()
    const logging = createPipelineLogging({ settings: settings(), stderr: stream, env: {} })
    const hook = vi.fn()

    logging.setBeforeWrite(hook)
    logging.logger.info('one')
    logging.logger.error('two')
    logging.setBeforeWrite(null)
    logging.logger.info('three')

    expect(hook).toHaveBeenCalledTimes(2)
  })

  it('copies entries to the log file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pagereel-log-'))
    const file = join(dir, 'pagereel.jsonl')
    const { stream } = collectStream()
    const logging = createPipelineLogging({
      settings: settings({ file }),
      stderr: stream,
      env: {},
    })

    logging.logger.getSubLogger({ name: 'job' }).info('processing Book.cbz')
    await logging.flush()

    const [line] = readFileSync(file, 'utf8').split('\n')
    const parsed: unknown = JSON.parse(line ?? '{}')
    expect(parsed).toMatchObject({ 0: 'processing Book.cbz' })
  })
})
