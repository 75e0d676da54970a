import ora from 'ora'

export type Spinner = {
  readonly active: boolean
  setText: (text: string) => void
  /** Clear the current frame (e.g. before writing a log line); the next tick redraws it. */
  clear: () => void
  stop: () => void
  succeed: (text: string) => void
  fail: (text: string) => void
}

const noopSpinner: Spinner = {
  active: false,
  setText: () => {},
  clear: () => {},
  stop: () => {},
  succeed: () => {},
  fail: () => {},
}

export function isInteractiveStream(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true
}

/**
 * Spinner on `stream` when it is a TTY; otherwise a no-op so redirected stderr only
 * carries log lines.
 */
export function startSpinner({
  text,
  stream,
  enabled = true,
}: {
  text: string
  stream: NodeJS.WritableStream
  enabled?: boolean
}): Spinner {
  if (!enabled || !isInteractiveStream(stream)) return noopSpinner
  const spinner = ora({ text, stream, discardStdin: false, hideCursor: true }).start()
  let active = true
  return {
    get active() {
      return active
    },
    setText: (next) => {
      if (!active) return
      spinner.text = next
    },
    clear: () => {
      if (active) spinner.clear()
    },
    stop: () => {
      if (!active) return
      active = false
      spinner.stop()
    },
    succeed: (message) => {
      if (!active) return
      active = false
      spinner.succeed(message)
    },
    fail: (message) => {
      if (!active) return
      active = false
      spinner.fail(message)
    },
  }
}
