import fs from 'node:fs/promises'
import path from 'node:path'
import type { InputSpec } from '../../db/types'
import { runCommand } from '../command'
import { ResourceError } from '../errors'
import type { Stage, StageContext, StageResult } from '../types'
import { parsePercent } from '../utils'
import { stageSucceeded } from './shared'

const AUDIO_BASENAME = 'source-audio'

export function buildYtDlpArgs(inputSpec: InputSpec, outputDir: string, ffmpegPath: string): string[] {
  const args = [
    '--newline',
    '--progress',
    '--no-playlist',
    '-f',
    'bestaudio/best',
    '-x',
    '--audio-format',
    'mp3',
    '--audio-quality',
    '192K',
    '--postprocessor-args',
    `ExtractAudio:-ss 0 -t ${inputSpec.targetDurationSec}`,
    '-o',
    path.join(outputDir, `${AUDIO_BASENAME}.%(ext)s`),
  ]
  if (path.isAbsolute(ffmpegPath)) {
    args.push('--ffmpeg-location', ffmpegPath)
  }
  args.push(inputSpec.sourceUrl)
  return args
}

/** Fetch the source with yt-dlp and keep the first `targetDurationSec` seconds as mp3. */
export class DownloadStage implements Stage {
  readonly name = 'download'

  async execute(ctx: StageContext, inputSpec: InputSpec): Promise<StageResult> {
    ctx.throwIfCancelled()
    const { stderrTail } = await runCommand({
      command: ctx.settings.ytDlpPath,
      args: buildYtDlpArgs(inputSpec, ctx.workDir, ctx.settings.ffmpegPath),
      cwd: ctx.workDir,
      signal: ctx.signal,
      jobId: ctx.jobId,
      onStdoutLine: (line) => {
        const percent = parsePercent(line)
        if (percent !== null) {
          ctx.progress(percent, line)
        }
      },
      onStderrLine: (line) => ctx.log('info', line),
    })
    ctx.throwIfCancelled()

    const audioPath = path.join(ctx.workDir, `${AUDIO_BASENAME}.mp3`)
    try {
      await fs.access(audioPath)
    } catch (error) {
      const detail = stderrTail.slice(-5).join('\n')
      throw new ResourceError(`yt-dlp finished without producing ${path.basename(audioPath)}${detail ? `\n${detail}` : ''}`, {
        cause: error,
      })
    }

    await ctx.artifacts.adopt({
      artifactType: 'audio',
      name: 'audio.mp3',
      filePath: audioPath,
      mimeType: 'audio/mpeg',
    })
    return stageSucceeded(ctx, { summary: `Downloaded ${inputSpec.targetDurationSec}s of audio` })
  }
}
