import path from 'node:path'
import fs from 'node:fs/promises'
import type { ArtifactRecord, AspectRatio, EditableSpec, InputSpec, SubtitleMode } from '../../db/types'
import { runCommand } from '../command'
import { VIDEO_FPS, VIDEO_RESOLUTION_BY_ASPECT } from '../constants'
import { FatalError, ResourceError, toErrorMessage } from '../errors'
import type { TranscriptSegment } from '../providers/openai'
import type { PriorArtifacts, Stage, StageContext, StageResult } from '../types'
import { findPriorArtifact, listPriorArtifacts, loadTranscript, loadTranslation, stageSucceeded } from './shared'
import { buildConcatScript, buildSceneTimeline, buildSrt } from './subtitles'
import { sceneImageName } from './synthesizeImages'

export interface SubtitleTrack {
  key: 'orig' | 'en'
  title: string
  segments: TranscriptSegment[]
}

export function selectSubtitleTracks(
  mode: SubtitleMode,
  original: TranscriptSegment[],
  translated: TranscriptSegment[],
): SubtitleTrack[] {
  const tracks: SubtitleTrack[] = []
  if (mode === 'orig' || mode === 'both') {
    tracks.push({ key: 'orig', title: 'Original', segments: original })
  }
  if (mode === 'en' || mode === 'both') {
    tracks.push({ key: 'en', title: 'Translated', segments: translated })
  }
  return tracks
}

export function buildVideoFilter(aspectRatio: AspectRatio): string {
  const { width, height } = VIDEO_RESOLUTION_BY_ASPECT[aspectRatio]
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=increase`,
    `crop=${width}:${height}`,
    `fps=${VIDEO_FPS}`,
    'format=yuv420p',
  ].join(',')
}

export function buildFfmpegArgs(input: {
  concatPath: string
  audioPath: string
  subtitlePaths: Array<{ path: string; title: string }>
  aspectRatio: AspectRatio
  durationSec: number
  outputPath: string
}): string[] {
  const args = ['-y', '-f', 'concat', '-safe', '0', '-i', input.concatPath, '-i', input.audioPath]
  for (const subtitle of input.subtitlePaths) {
    args.push('-i', subtitle.path)
  }
  args.push('-map', '0:v', '-map', '1:a')
  input.subtitlePaths.forEach((_subtitle, position) => {
    args.push('-map', `${position + 2}:s`)
  })
  args.push('-vf', buildVideoFilter(input.aspectRatio), '-c:v', 'libx264', '-c:a', 'aac')
  if (input.subtitlePaths.length > 0) {
    args.push('-c:s', 'mov_text')
    input.subtitlePaths.forEach((subtitle, position) => {
      args.push(`-metadata:s:s:${position}`, `title=${subtitle.title}`)
    })
  }
  args.push('-t', String(input.durationSec), '-shortest', '-progress', 'pipe:1', '-nostats', input.outputPath)
  return args
}

/**
 * Lay the scene images on the audio timeline, attach the selected subtitle
 * tracks and encode an mp4 with ffmpeg.
 */
export class ComposeVideoStage implements Stage {
  readonly name = 'compose_video'

  async execute(
    ctx: StageContext,
    inputSpec: InputSpec,
    editableSpec: EditableSpec | null,
    prior: PriorArtifacts,
  ): Promise<StageResult> {
    if (!editableSpec) {
      throw new FatalError('Video composition needs a reviewed scene list')
    }

    const audio = findPriorArtifact(prior, 'download', 'audio')
    const images = new Map<string, ArtifactRecord>()
    for (const image of listPriorArtifacts(prior, 'synthesize_images', 'image')) {
      images.set(image.name, image)
    }
    const entries = buildSceneTimeline(editableSpec.scenes, inputSpec.targetDurationSec).map((entry) => {
      const image = images.get(sceneImageName(entry.sceneIndex))
      if (!image) {
        throw new FatalError(`Missing image for scene ${entry.sceneIndex}`)
      }
      return { filePath: ctx.artifactPath(image.locator), durationSec: entry.durationSec }
    })

    const subtitlePaths: Array<{ path: string; title: string }> = []
    if (inputSpec.subtitleMode !== 'none') {
      const transcript = await loadTranscript(ctx, prior)
      const translation = await loadTranslation(ctx, prior)
      for (const track of selectSubtitleTracks(inputSpec.subtitleMode, transcript.segments, translation.segments)) {
        const record = await ctx.artifacts.write({
          artifactType: 'subtitles',
          name: `subtitles.${track.key}.srt`,
          data: buildSrt(track.segments, inputSpec.targetDurationSec),
          mimeType: 'application/x-subrip',
        })
        subtitlePaths.push({ path: ctx.artifactPath(record.locator), title: track.title })
      }
    }

    const concatPath = path.join(ctx.workDir, 'slideshow.txt')
    try {
      await fs.writeFile(concatPath, buildConcatScript(entries), 'utf-8')
    } catch (error) {
      throw new ResourceError(`Failed to write concat script: ${toErrorMessage(error)}`, { cause: error })
    }

    ctx.throwIfCancelled()
    const outputPath = path.join(ctx.workDir, 'final.mp4')
    const totalUs = inputSpec.targetDurationSec * 1_000_000
    await runCommand({
      command: ctx.settings.ffmpegPath,
      args: buildFfmpegArgs({
        concatPath,
        audioPath: ctx.artifactPath(audio.locator),
        subtitlePaths,
        aspectRatio: inputSpec.aspectRatio,
        durationSec: inputSpec.targetDurationSec,
        outputPath,
      }),
      cwd: ctx.workDir,
      signal: ctx.signal,
      jobId: ctx.jobId,
      onStdoutLine: (line) => {
        const match = line.match(/^out_time_(?:ms|us)=(\d+)$/)
        if (match) {
          ctx.progress(Math.min(99, (Number(match[1]) / totalUs) * 100), 'Encoding video')
        }
      },
    })
    ctx.throwIfCancelled()

    await ctx.artifacts.adopt({
      artifactType: 'final_video',
      name: 'final.mp4',
      filePath: outputPath,
      mimeType: 'video/mp4',
    })
    return stageSucceeded(ctx, { summary: `${entries.length} scenes, subtitles: ${inputSpec.subtitleMode}` })
  }
}
