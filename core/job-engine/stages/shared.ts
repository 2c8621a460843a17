import type { ArtifactRecord, ArtifactType, StageName } from '../../db/types'
import { FatalError, toErrorMessage } from '../errors'
import { type FetchLike, OpenAIClient, parseTranscript, type Transcript, type TranscriptSegment } from '../providers/openai'
import type { PriorArtifacts, StageContext, StageOutput, StageResult } from '../types'
import { isRecord } from '../utils'

export interface StageDeps {
  /** Replaces global fetch for provider calls. */
  fetchImpl?: FetchLike
}

/** Translation artifact body. `translated: false` marks a pass-through copy. */
export interface TranslationDocument {
  translated: boolean
  sourceLanguage: string | null
  targetLanguage: string
  segments: TranscriptSegment[]
}

export function stageSucceeded(ctx: StageContext, output: StageOutput = {}): StageResult {
  return { success: true, output, artifactRefs: ctx.artifacts.written() }
}

export function createProviderClient(ctx: StageContext, deps: StageDeps): OpenAIClient {
  if (!ctx.settings.openaiApiKey.trim()) {
    throw new FatalError('openaiApiKey is required')
  }
  if (!ctx.settings.openaiApiBaseUrl.trim()) {
    throw new FatalError('openaiApiBaseUrl is required')
  }
  return new OpenAIClient(ctx.settings, deps.fetchImpl)
}

export function findPriorArtifact(prior: PriorArtifacts, stage: StageName, type: ArtifactType): ArtifactRecord {
  const artifact = prior[stage]?.find((item) => item.artifactType === type)
  if (!artifact) {
    throw new FatalError(`Missing ${type} artifact from ${stage}`)
  }
  return artifact
}

export function listPriorArtifacts(prior: PriorArtifacts, stage: StageName, type: ArtifactType): ArtifactRecord[] {
  return (prior[stage] ?? []).filter((item) => item.artifactType === type)
}

export async function readJsonArtifact(ctx: StageContext, artifact: ArtifactRecord): Promise<unknown> {
  const bytes = await ctx.readArtifact(artifact.locator)
  try {
    const parsed: unknown = JSON.parse(bytes.toString('utf-8'))
    return parsed
  } catch (error) {
    throw new FatalError(`Artifact ${artifact.locator} is not valid JSON: ${toErrorMessage(error)}`, { cause: error })
  }
}

export async function loadTranscript(ctx: StageContext, prior: PriorArtifacts): Promise<Transcript> {
  return parseTranscript(await readJsonArtifact(ctx, findPriorArtifact(prior, 'transcribe', 'transcript')))
}

export async function loadTranslation(ctx: StageContext, prior: PriorArtifacts): Promise<TranslationDocument> {
  const value = await readJsonArtifact(ctx, findPriorArtifact(prior, 'translate', 'translation'))
  if (!isRecord(value) || typeof value.translated !== 'boolean' || typeof value.targetLanguage !== 'string') {
    throw new FatalError('Translation artifact is malformed')
  }
  const transcript = parseTranscript({ segments: value.segments })
  return {
    translated: value.translated,
    sourceLanguage: typeof value.sourceLanguage === 'string' ? value.sourceLanguage : null,
    targetLanguage: value.targetLanguage,
    segments: transcript.segments,
  }
}
