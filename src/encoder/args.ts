import { formatSeconds } from '../manifest.js'

export type VideoSettings = {
  fps: number
  width: number
  height: number
  blur: string
  codec: string
  pixelFormat: string
}

export type AudioFades = {
  fadeInSeconds: number
  fadeOutSeconds: number
  fadeOutStartSeconds: number
}

/** The manifest repeats the last image, hence `count + 1` frames of screen time. */
export function expectedDurationSeconds(imageCount: number, frameDurationSeconds: number): number {
  if (imageCount <= 0) return 0
  return (imageCount + 1) * frameDurationSeconds
}

export function computeAudioFades({
  expectedSeconds,
  fadeInSeconds,
  fadeOutSeconds,
}: {
  expectedSeconds: number
  fadeInSeconds: number
  fadeOutSeconds: number
}): AudioFades {
  const cap = Math.max(0, expectedSeconds)
  const fadeIn = Math.min(Math.max(0, fadeInSeconds), cap)
  const fadeOut = Math.min(Math.max(0, fadeOutSeconds), cap)
  return {
    fadeInSeconds: fadeIn,
    fadeOutSeconds: fadeOut,
    fadeOutStartSeconds: Math.max(0, cap - fadeOut),
  }
}

/** Combined `-af` value, or `null` when both fades are zero. */
export function buildAudioFilter(fades: AudioFades): string | null {
  const filters: string[] = []
  if (fades.fadeInSeconds > 0) {
    filters.push(`afade=t=in:st=0:d=${formatSeconds(fades.fadeInSeconds)}`)
  }
  if (fades.fadeOutSeconds > 0) {
    filters.push(
      `afade=t=out:st=${formatSeconds(fades.fadeOutStartSeconds)}:d=${formatSeconds(fades.fadeOutSeconds)}`
    )
  }
  return filters.length > 0 ? filters.join(',') : null
}

/**
 * Blurred full-frame background with the sharp page scaled to the output height and
 * centered on top.
 */
export function buildVideoFilterGraph(video: Pick<VideoSettings, 'width' | 'height' | 'blur'>): string {
  return [
    '[0:v]split=2[bg][fg]',
    `[bg]scale=${video.width}:${video.height},boxblur=${video.blur}[blurred]`,
    `[fg]scale=-1:${video.height}[fgscaled]`,
    '[blurred][fgscaled]overlay=(W-w)/2:(H-h)/2,setdar=16/9[v]',
  ].join(';')
}

export function buildEncoderArgs({
  manifestPath,
  audioPath,
  outputPath,
  video,
  audioFilter,
}: {
  manifestPath: string
  audioPath: string
  outputPath: string
  video: VideoSettings
  audioFilter: string | null
}): string[] {
  const args = [
    '-y',
    '-hide_banner',
    '-loglevel',
    'info',
    '-f',
    'concat',
    '-safe',
    '0',
    '-i',
    manifestPath,
    '-stream_loop',
    '-1',
    '-i',
    audioPath,
    '-filter_complex',
    buildVideoFilterGraph(video),
    '-map',
    '[v]',
    '-map',
    '1:a',
    '-c:v',
    video.codec,
    '-r',
    String(video.fps),
    '-pix_fmt',
    video.pixelFormat,
    '-shortest',
  ]
  if (audioFilter) args.push('-af', audioFilter)
  args.push(outputPath)
  return args
}
