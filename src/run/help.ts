import { Command } from 'commander'

import { isInteractiveStream } from '../tty/spinner.js'

function ansi(code: string, text: string, enabled: boolean): string {
  return enabled ? `\u001b[${code}m${text}\u001b[0m` : text
}

export function buildProgram() {
  return new Command()
    .name('pagereel')
    .description('Turn comic (.cbz) and zip archives of page images into slideshow videos.')
    .argument('[inputs...]', 'Archive files, or directories holding .cbz/.zip archives')
    .requiredOption('--audio <path>', 'Audio file, or a directory searched recursively for tracks')
    .option('--pick <list>', 'Select archives from the numbered listing, e.g. "1,3,5-7"')
    .option('--audio-pick <n>', 'Select one track from the numbered audio listing')
    .option('--list', 'Print the numbered archive and audio listings and exit.', false)
    .option('--fps <n>', 'Output frame rate (default: 4).')
    .option('--frame-duration <seconds>', 'Seconds each page stays on screen (default: 1/fps).')
    .option('--fade-in <seconds>', 'Audio fade-in length; 0 disables (default: 2).')
    .option('--fade-out <seconds>', 'Audio fade-out length; 0 disables (default: 2).')
    .option('--no-reconstruct', 'Skip the ImageMagick re-encode of every page.')
    .option('--workers <n>', 'Parallel image checks per stage.')
    .option(
      '--output-dir <dir>',
      'Encode videos here; they are moved next to each archive afterwards unless --no-relocate.'
    )
    .option('--no-relocate', 'Keep videos in --output-dir instead of moving them to the archive directory.')
    .option('--same-audio', 'Use one track for every archive instead of a draw per archive.', false)
    .option('--seed <n>', 'Seed for the per-archive track draws (repeatable runs).')
    .option('--verbose', 'Debug logging.', false)
    .option('--quiet', 'Only warnings and errors.', false)
}

export function attachRichHelp(
  program: Command,
  env: Record<string, string | undefined>,
  stdout: NodeJS.WritableStream
) {
  const color = isInteractiveStream(stdout) && !env.NO_COLOR
  const heading = (text: string) => ansi('1;36', text, color)
  const cmd = (text: string) => ansi('1', text, color)
  const dim = (text: string) => ansi('2', text, color)

  program.addHelpText(
    'after',
    () => `
${heading('Examples')}
  ${cmd('pagereel ~/comics --audio ~/music --list')} ${dim('# numbered listings')}
  ${cmd('pagereel ~/comics --pick 1,3,5-7 --audio ~/music --audio-pick 2 --same-audio')}
  ${cmd('pagereel book.cbz --audio theme.mp3 --fps 2 --fade-out 4')}
  ${cmd('pagereel ~/comics --audio ~/music --seed 7 --output-dir /tmp/out --no-relocate')}

${heading('Config')}
  ~/.pagereel/config.json (JSON, no comments), or the file named by PAGEREEL_CONFIG

${heading('Env Vars')}
  PAGEREEL_CONFIG     config file path
  PAGEREEL_FPS        default frame rate
  PAGEREEL_WORKERS    default worker count
  PAGEREEL_LOG_LEVEL  debug|info|warn|error
  FFMPEG_PATH         ffmpeg binary
  MAGICK_PATH         ImageMagick binary
`
  )
}
