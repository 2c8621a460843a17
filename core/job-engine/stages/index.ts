import type { StageName } from '../../db/types'
import type { Stage, StageRegistry } from '../types'
import { ComposeVideoStage } from './composeVideo'
import { DownloadStage } from './download'
import { SegmentAndPromptStage } from './segmentAndPrompt'
import type { StageDeps } from './shared'
import { SynthesizeImagesStage } from './synthesizeImages'
import { TranscribeStage } from './transcribe'
import { TranslateStage } from './translate'

export type { StageDeps } from './shared'

/** Registry of the production stages, optionally with some replaced. */
export function createDefaultStages(
  deps: StageDeps = {},
  overrides: Partial<Record<StageName, Stage>> = {},
): StageRegistry {
  const stages: Stage[] = [
    new DownloadStage(),
    new TranscribeStage(deps),
    new TranslateStage(deps),
    new SegmentAndPromptStage(deps),
    new SynthesizeImagesStage(deps),
    new ComposeVideoStage(),
  ]
  return new Map(stages.map((stage): [StageName, Stage] => [stage.name, overrides[stage.name] ?? stage]))
}
