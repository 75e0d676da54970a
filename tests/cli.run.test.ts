import { existsSync, mkdirSync, mkdtempSync, readdirSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'
import JSZip from 'jszip'
import { describe, expect, it, vi } from 'vitest'

import type { EncodeResult, RunEncoderArgs } from '../src/encoder/driver.js'
import type { ToolRunner } from '../src/process.js'
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from '../src/run.js'
import { buildProgram } from '../src/run/help.js'

function collectStream() {
  let text = ''
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })
  return { stream, getText: () => text }
}

function createWorkspace() {
  const root = mkdtempSync(join(tmpdir(), 'pagereel-cli-'))
  const library = join(root, 'library')
  const music = join(root, 'music')
  mkdirSync(library)
  mkdirSync(music)
  const ffmpeg = join(root, 'ffmpeg')
  writeFileSync(ffmpeg, '', { mode: 0o755 })
  const env = {
    PAGEREEL_CONFIG: join(root, 'missing-config.json'),
    FFMPEG_PATH: ffmpeg,
    PATH: '',
  }
  return { root, library, music, ffmpeg, env }
}

const okTool: ToolRunner = async () => ({ ok: true, stdout: '', stderr: '' })

describe('cli run', () => {
  it('prints help and exits 0', async () => {
    const stdout = collectStream()
    const stderr = collectStream()
    const code = await runCli(['--help'], { env: {}, stdout: stdout.stream, stderr: stderr.stream })
    expect(code).toBe(EXIT_OK)
    expect(stdout.getText()).toContain('Usage: pagereel [options] [inputs...]')
    expect(stdout.getText()).toContain('PAGEREEL_CONFIG     config file path')
  })

  it('describes --output-dir together with relocation', () => {
    const option = buildProgram().options.find((candidate) => candidate.long === '--output-dir')
    expect(option?.description).toBe(
      'Encode videos here; they are moved next to each archive afterwards unless --no-relocate.'
    )
  })

  it('exits 2 when --audio is missing', async () => {
    const stdout = collectStream()
    const stderr = collectStream()
    const code = await runCli(['book.cbz'], { env: {}, stdout: stdout.stream, stderr: stderr.stream })
    expect(code).toBe(EXIT_USAGE)
    expect(stderr.getText()).toContain("required option '--audio <path>' not specified")
  })

  it('exits 2 on an invalid flag value', async () => {
    const { env } = createWorkspace()
    const stdout = collectStream()
    const stderr = collectStream()
    const code = await runCli(['book.cbz', '--audio', 'a.mp3', '--fps', '0'], {
      env,
      stdout: stdout.stream,
      stderr: stderr.stream,
    })
    expect(code).toBe(EXIT_USAGE)
    expect(stderr.getText()).toBe('pagereel: Unsupported --fps: 0 (use a number between 0 and 240)\n')
  })

  it('exits 2 when --verbose and --quiet are combined', async () => {
    const stderr = collectStream()
    const code = await runCli(['book.cbz', '--audio', 'a.mp3', '--verbose', '--quiet'], {
      env: {},
      stdout: collectStream().stream,
      stderr: stderr.stream,
    })
    expect(code).toBe(EXIT_USAGE)
    expect(stderr.getText()).toBe('pagereel: --verbose and --quiet cannot be combined\n')
  })

  it('lists archives and audio tracks in natural order', async () => {
    const { library, music, env } = createWorkspace()
    for (const name of ['b.cbz', 'a10.cbz', 'a2.zip', 'notes.txt']) {
      writeFileSync(join(library, name), '')
    }
    for (const name of ['two.mp3', 'one.mp3', 'cover.jpg']) writeFileSync(join(music, name), '')
    const stdout = collectStream()

    const code = await runCli([library, '--audio', music, '--list'], {
      env,
      stdout: stdout.stream,
      stderr: collectStream().stream,
    })

    expect(code).toBe(EXIT_OK)
    expect(stdout.getText()).toBe(
      [
        'Archives:',
        '  1. a2.zip',
        '  2. a10.cbz',
        '  3. b.cbz',
        'Audio:',
        `  1. ${join(music, 'one.mp3')}`,
        `  2. ${join(music, 'two.mp3')}`,
        '',
      ].join('\n')
    )
  })

  it('lists inputs when the configured log directory cannot be created', async () => {
    const { root, library, music, env } = createWorkspace()
    writeFileSync(join(library, 'Book.cbz'), '')
    writeFileSync(join(music, 'theme.mp3'), '')
    const blocker = join(root, 'blocker')
    writeFileSync(blocker, 'not a directory')
    const configPath = join(root, 'config.json')
    writeFileSync(configPath, JSON.stringify({ logging: { file: join(blocker, 'logs', 'run.log') } }))
    const stdout = collectStream()

    const code = await runCli([library, '--audio', music, '--list'], {
      env: { ...env, PAGEREEL_CONFIG: configPath },
      stdout: stdout.stream,
      stderr: collectStream().stream,
    })

    expect(code).toBe(EXIT_OK)
    expect(stdout.getText()).toBe(
      `Archives:\n  1. Book.cbz\nAudio:\n  1. ${join(music, 'theme.mp3')}\n`
    )
  })

  it('exits 1 when ffmpeg cannot be probed', async () => {
    const { library, music, env } = createWorkspace()
    writeFileSync(join(library, 'Book.cbz'), '')
    writeFileSync(join(music, 'theme.mp3'), '')
    const stdout = collectStream()
    const stderr = collectStream()
    const runTool: ToolRunner = async () => ({
      ok: false,
      reason: 'exit',
      exitCode: 1,
      stderr: '',
      message: 'broken',
    })

    const code = await runCli([join(library, 'Book.cbz'), '--audio', join(music, 'theme.mp3')], {
      env,
      stdout: stdout.stream,
      stderr: stderr.stream,
      runTool,
    })

    expect(code).toBe(EXIT_FAILURE)
    expect(stdout.getText()).toBe('')
    expect(stderr.getText()).toContain('ffmpeg not found; install it or set FFMPEG_PATH')
  })

  it('turns an archive into a video next to it and prints the summary', async () => {
    const { root, library, music, ffmpeg, env } = createWorkspace()
    const zip = new JSZip()
    zip.file('001.png', 'page one')
    zip.file('002.png', 'page two')
    writeFileSync(join(library, 'Book.cbz'), await zip.generateAsync({ type: 'nodebuffer' }))
    writeFileSync(join(music, 'theme.mp3'), '')
    const scratchRoot = join(root, 'scratch')
    mkdirSync(scratchRoot)
    const encode = vi.fn(async (args: RunEncoderArgs): Promise<EncodeResult> => {
      writeFileSync(args.outputPath, 'video')
      return { outputPath: args.outputPath, expectedSeconds: 0, announcedSeconds: null, args: [] }
    })
    const stdout = collectStream()

    const code = await runCli([library, '--audio', music, '--fps', '2', '--quiet'], {
      env,
      stdout: stdout.stream,
      stderr: collectStream().stream,
      runTool: okTool,
      jobDeps: { encode, tmpdir: () => scratchRoot },
    })

    expect(code).toBe(EXIT_OK)
    expect(stdout.getText()).toBe('Batch summary\n  Total archives: 1\n  Succeeded: 1\n  Failed: 0\n')
    expect(encode.mock.calls[0]?.[0]).toMatchObject({
      ffmpegPath: ffmpeg,
      audioPath: join(music, 'theme.mp3'),
      outputPath: join(library, '.Book.partial.mp4'),
      imageCount: 2,
      frameDurationSeconds: 0.5,
    })
    expect(existsSync(join(library, 'Book.mp4'))).toBe(true)
    expect(readdirSync(scratchRoot)).toEqual([])
  })
})
