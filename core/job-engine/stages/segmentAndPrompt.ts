import type { EditableSpec, InputSpec, Scene } from '../../db/types'
import { PROMPT_TEMPERATURE } from '../constants'
import { FatalError } from '../errors'
import type { PriorArtifacts, Stage, StageContext, StageResult } from '../types'
import { buildImagePromptInstruction, cleanImagePrompt, IMAGE_PROMPT_SYSTEM } from './prompts'
import { splitIntoScenes } from './sceneSplitter'
import { createProviderClient, loadTranscript, stageSucceeded, type StageDeps } from './shared'

const IMAGE_PROMPT_MAX_TOKENS = 100

/**
 * Chunk the transcript into scenes and ask the chat model for one English
 * image prompt per scene. The scene list becomes the job's editable snapshot.
 */
export class SegmentAndPromptStage implements Stage {
  readonly name = 'segment_and_prompt'

  constructor(private readonly deps: StageDeps = {}) {}

  async execute(
    ctx: StageContext,
    _inputSpec: InputSpec,
    _editableSpec: EditableSpec | null,
    prior: PriorArtifacts,
  ): Promise<StageResult> {
    const transcript = await loadTranscript(ctx, prior)
    const chunks = splitIntoScenes(transcript.segments, ctx.settings.wordsPerScene)
    if (chunks.length === 0) {
      throw new FatalError('Transcript has no speech to split into scenes')
    }

    const client = createProviderClient(ctx, this.deps)
    const scenes: Scene[] = []
    for (const [index, chunk] of chunks.entries()) {
      ctx.throwIfCancelled()
      const raw = await client.chat({
        system: IMAGE_PROMPT_SYSTEM,
        user: buildImagePromptInstruction(chunk.text, transcript.language),
        temperature: PROMPT_TEMPERATURE,
        maxTokens: IMAGE_PROMPT_MAX_TOKENS,
        signal: ctx.signal,
        jobId: ctx.jobId,
      })
      const imagePrompt = cleanImagePrompt(raw)
      scenes.push({
        index,
        text: chunk.text,
        startTime: chunk.startTime,
        endTime: chunk.endTime,
        // An empty reply still yields an editable scene; the chunk text stands in.
        imagePrompt: imagePrompt || chunk.text,
      })
      ctx.progress(((index + 1) / chunks.length) * 100, `Prompted scene ${index + 1}/${chunks.length}`)
    }
    ctx.throwIfCancelled()

    await ctx.artifacts.writeJson('scenes', 'scenes.json', { language: transcript.language, scenes })
    return stageSucceeded(ctx, { scenes, summary: `${scenes.length} scenes` })
  }
}
