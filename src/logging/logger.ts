import { Logger } from 'tslog'

import { createLogFileWriter, type LogFileWriter } from './log-file.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogFormat = 'pretty' | 'json'

export type PipelineLogger = Logger<Record<string, unknown>>

export type LoggingSettings = {
  level: LogLevel
  format: LogFormat
  file: string | null
  maxBytes: number
  maxFiles: number
}

export type PipelineLogging = {
  logger: PipelineLogger
  fileWriter: LogFileWriter | null
  /** Runs before every console line, e.g. to clear a spinner frame. */
  setBeforeWrite: (hook: (() => void) | null) => void
  flush: () => Promise<void>
}

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

const PRETTY_TEMPLATE = '{{hh}}:{{MM}}:{{ss}} {{logLevelName}} {{nameWithDelimiterSuffix}}'

export function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return { name: val.name, message: val.message, stack: val.stack, cause: val.cause }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

export function formatPrettyLine({
  metaMarkup,
  args,
  errors,
}: {
  metaMarkup: string
  args: unknown[]
  errors: string[]
}): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(args.map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg))).join(' '))
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

function isTty(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true
}

export function createPipelineLogging({
  settings,
  stderr,
  env,
}: {
  settings: LoggingSettings
  stderr: NodeJS.WritableStream
  env: Record<string, string | undefined>
}): PipelineLogging {
  const minLevel = LOG_LEVEL_MAP[settings.level]
  const color = isTty(stderr) && !env.NO_COLOR
  let beforeWrite: (() => void) | null = null
  const writeLine = (line: string) => {
    beforeWrite?.()
    stderr.write(`${line}\n`)
  }

  const logger =
    settings.format === 'json'
      ? new Logger<Record<string, unknown>>({
          name: 'pagereel',
          type: 'json',
          minLevel,
          hideLogPositionForProduction: true,
          overwrite: {
            transportJSON: (json) => {
              writeLine(safeJsonStringify(json))
            },
          },
        })
      : new Logger<Record<string, unknown>>({
          name: 'pagereel',
          type: 'pretty',
          minLevel,
          hideLogPositionForProduction: true,
          stylePrettyLogs: color,
          prettyLogTemplate: PRETTY_TEMPLATE,
          overwrite: {
            transportFormatted: (metaMarkup, args, errors) => {
              writeLine(formatPrettyLine({ metaMarkup, args, errors }))
            },
          },
        })

  const fileWriter = settings.file
    ? createLogFileWriter(
        { filePath: settings.file, maxBytes: settings.maxBytes, maxFiles: settings.maxFiles },
        (error) => {
          stderr.write(`pagereel: log file ${settings.file} is not writable: ${String(error)}\n`)
        }
      )
    : null
  if (fileWriter) {
    logger.attachTransport((logObj) => {
      fileWriter.write(safeJsonStringify(logObj))
    })
  }

  return {
    logger,
    fileWriter,
    setBeforeWrite: (hook) => {
      beforeWrite = hook
    },
    flush: async () => {
      await fileWriter?.flush()
    },
  }
}

/** Logger that drops everything; used by library callers and tests that pass no logger. */
export function createSilentLogger(): PipelineLogger {
  return new Logger<Record<string, unknown>>({ name: 'pagereel', type: 'hidden' })
}
