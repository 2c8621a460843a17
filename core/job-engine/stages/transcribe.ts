import type { EditableSpec, InputSpec } from '../../db/types'
import type { PriorArtifacts, Stage, StageContext, StageResult } from '../types'
import { createProviderClient, findPriorArtifact, stageSucceeded, type StageDeps } from './shared'

export class TranscribeStage implements Stage {
  readonly name = 'transcribe'

  constructor(private readonly deps: StageDeps = {}) {}

  async execute(
    ctx: StageContext,
    _inputSpec: InputSpec,
    _editableSpec: EditableSpec | null,
    prior: PriorArtifacts,
  ): Promise<StageResult> {
    const client = createProviderClient(ctx, this.deps)
    const audioArtifact = findPriorArtifact(prior, 'download', 'audio')
    const audio = await ctx.readArtifact(audioArtifact.locator)
    ctx.throwIfCancelled()
    ctx.progress(10, 'Uploading audio for transcription')

    const transcript = await client.transcribe({
      audio,
      fileName: audioArtifact.name,
      mimeType: audioArtifact.mimeType ?? 'audio/mpeg',
      signal: ctx.signal,
      jobId: ctx.jobId,
    })
    ctx.throwIfCancelled()

    ctx.log('info', `Transcribed ${transcript.segments.length} segments (language: ${transcript.language ?? 'unknown'})`)
    await ctx.artifacts.writeJson('transcript', 'transcript.json', transcript)
    return stageSucceeded(ctx, { summary: `${transcript.segments.length} segments` })
  }
}
