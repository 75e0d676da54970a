#!/usr/bin/env node
import { describeError } from './errors.js'
import { EXIT_FAILURE, runCli } from './run.js'

runCli(process.argv.slice(2), {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
})
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    process.stderr.write(`pagereel: ${describeError(error)}\n`)
    process.exitCode = EXIT_FAILURE
  })
