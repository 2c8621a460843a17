import type { EditableSpec, InputSpec } from '../../db/types'
import { IMAGE_SIZE_BY_ASPECT } from '../constants'
import { FatalError } from '../errors'
import type { Stage, StageContext, StageResult } from '../types'
import { createProviderClient, stageSucceeded, type StageDeps } from './shared'
import { buildStyledPrompt } from './stylePrompt'

export function sceneImageName(sceneIndex: number): string {
  return `scene_${sceneIndex}.png`
}

export class SynthesizeImagesStage implements Stage {
  readonly name = 'synthesize_images'

  constructor(private readonly deps: StageDeps = {}) {}

  async execute(ctx: StageContext, inputSpec: InputSpec, editableSpec: EditableSpec | null): Promise<StageResult> {
    if (!editableSpec || editableSpec.scenes.length === 0) {
      throw new FatalError('Image synthesis needs a reviewed scene list')
    }

    const client = createProviderClient(ctx, this.deps)
    const size = IMAGE_SIZE_BY_ASPECT[inputSpec.aspectRatio]
    const total = editableSpec.scenes.length

    for (const scene of editableSpec.scenes) {
      ctx.throwIfCancelled()
      const styled = buildStyledPrompt(scene.imagePrompt, editableSpec)
      const image = await client.generateImage({
        prompt: styled.prompt,
        negativePrompt: styled.negativePrompt || undefined,
        size,
        signal: ctx.signal,
        jobId: ctx.jobId,
      })
      await ctx.artifacts.write({
        artifactType: 'image',
        name: sceneImageName(scene.index),
        data: image,
        mimeType: 'image/png',
      })
      ctx.progress(((scene.index + 1) / total) * 100, `Image ${scene.index + 1}/${total}`)
    }

    return stageSucceeded(ctx, { summary: `${total} images` })
  }
}
