import { describe, expect, it } from 'vitest'
import { buildFfmpegArgs, buildVideoFilter, selectSubtitleTracks } from '../composeVideo'
import { buildYtDlpArgs } from '../download'

describe('selectSubtitleTracks', () => {
  const original = [{ start: 0, end: 1, text: 'hola' }]
  const translated = [{ start: 0, end: 1, text: 'hello' }]

  it('picks tracks by subtitle mode', () => {
    expect(selectSubtitleTracks('none', original, translated)).toEqual([])
    expect(selectSubtitleTracks('orig', original, translated).map((track) => track.key)).toEqual(['orig'])
    expect(selectSubtitleTracks('en', original, translated)).toEqual([
      { key: 'en', title: 'Translated', segments: translated },
    ])
    expect(selectSubtitleTracks('both', original, translated).map((track) => track.key)).toEqual(['orig', 'en'])
  })
})

describe('buildFfmpegArgs', () => {
  it('crops to the aspect ratio', () => {
    expect(buildVideoFilter('9:16')).toBe(
      'scale=1080:1920:force_original_aspect_ratio=increase,crop=1080:1920,fps=30,format=yuv420p',
    )
  })

  it('maps every subtitle input as a soft track', () => {
    expect(
      buildFfmpegArgs({
        concatPath: 'slides.txt',
        audioPath: 'audio.mp3',
        subtitlePaths: [
          { path: 'orig.srt', title: 'Original' },
          { path: 'en.srt', title: 'Translated' },
        ],
        aspectRatio: '1:1',
        durationSec: 30,
        outputPath: 'out.mp4',
      }),
    ).toEqual([
      '-y', '-f', 'concat', '-safe', '0', '-i', 'slides.txt', '-i', 'audio.mp3',
      '-i', 'orig.srt', '-i', 'en.srt',
      '-map', '0:v', '-map', '1:a', '-map', '2:s', '-map', '3:s',
      '-vf', 'scale=1080:1080:force_original_aspect_ratio=increase,crop=1080:1080,fps=30,format=yuv420p',
      '-c:v', 'libx264', '-c:a', 'aac',
      '-c:s', 'mov_text', '-metadata:s:s:0', 'title=Original', '-metadata:s:s:1', 'title=Translated',
      '-t', '30', '-shortest', '-progress', 'pipe:1', '-nostats', 'out.mp4',
    ])
  })
})

describe('buildYtDlpArgs', () => {
  it('trims the download to the target duration', () => {
    const args = buildYtDlpArgs(
      {
        sourceUrl: 'https://video.example/watch?v=1',
        targetDurationSec: 45,
        subtitleMode: 'none',
        aspectRatio: '9:16',
        targetLanguage: 'en',
      },
      '/work',
      'ffmpeg',
    )

    expect(args).toContain('ExtractAudio:-ss 0 -t 45')
    expect(args).not.toContain('--ffmpeg-location')
    expect(args.at(-1)).toBe('https://video.example/watch?v=1')
  })
})
