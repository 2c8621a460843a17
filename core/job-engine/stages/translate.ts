import type { EditableSpec, InputSpec, SubtitleMode } from '../../db/types'
import { TRANSLATE_TEMPERATURE } from '../constants'
import type { TranscriptSegment } from '../providers/openai'
import type { PriorArtifacts, Stage, StageContext, StageResult } from '../types'
import { runWithConcurrency } from '../utils'
import { buildTranslateInstruction, TRANSLATE_SYSTEM } from './prompts'
import { createProviderClient, loadTranscript, stageSucceeded, type StageDeps, type TranslationDocument } from './shared'

const TRANSLATE_CONCURRENCY = 3

// Transcription reports languages by name; specs use ISO-639-1 codes.
const LANGUAGE_CODES: Readonly<Record<string, string>> = {
  english: 'en',
  spanish: 'es',
  french: 'fr',
  german: 'de',
  italian: 'it',
  portuguese: 'pt',
  dutch: 'nl',
  russian: 'ru',
  chinese: 'zh',
  japanese: 'ja',
  korean: 'ko',
  arabic: 'ar',
  hindi: 'hi',
  turkish: 'tr',
  polish: 'pl',
}

export function normalizeLanguage(value: string | null): string | null {
  if (!value) return null
  const lowered = value.trim().toLowerCase()
  if (/^[a-z]{2,3}$/.test(lowered)) return lowered
  return LANGUAGE_CODES[lowered] ?? lowered
}

/**
 * A translation runs only when a translated subtitle track is requested and
 * the source is not already in the target language.
 */
export function needsTranslation(
  subtitleMode: SubtitleMode,
  detectedLanguage: string | null,
  targetLanguage: string,
): boolean {
  if (subtitleMode !== 'en' && subtitleMode !== 'both') {
    return false
  }
  return normalizeLanguage(detectedLanguage) !== normalizeLanguage(targetLanguage)
}

export class TranslateStage implements Stage {
  readonly name = 'translate'

  constructor(private readonly deps: StageDeps = {}) {}

  async execute(
    ctx: StageContext,
    inputSpec: InputSpec,
    _editableSpec: EditableSpec | null,
    prior: PriorArtifacts,
  ): Promise<StageResult> {
    const transcript = await loadTranscript(ctx, prior)
    const sourceLanguage = normalizeLanguage(transcript.language)

    if (!needsTranslation(inputSpec.subtitleMode, transcript.language, inputSpec.targetLanguage)) {
      const passThrough: TranslationDocument = {
        translated: false,
        sourceLanguage,
        targetLanguage: inputSpec.targetLanguage,
        segments: transcript.segments,
      }
      await ctx.artifacts.writeJson('translation', 'translation.json', passThrough)
      ctx.log('info', 'Translation not required; recorded pass-through copy')
      return stageSucceeded(ctx, { summary: 'pass-through' })
    }

    const client = createProviderClient(ctx, this.deps)
    let done = 0
    const segments = await runWithConcurrency(
      transcript.segments,
      TRANSLATE_CONCURRENCY,
      async (segment): Promise<TranscriptSegment> => {
        ctx.throwIfCancelled()
        const text = await client.chat({
          system: TRANSLATE_SYSTEM,
          user: buildTranslateInstruction(segment.text, inputSpec.targetLanguage, sourceLanguage),
          temperature: TRANSLATE_TEMPERATURE,
          maxTokens: Math.max(64, Math.ceil(segment.text.length * 2.5)),
          signal: ctx.signal,
          jobId: ctx.jobId,
        })
        done += 1
        ctx.progress((done / transcript.segments.length) * 100, `Translated ${done}/${transcript.segments.length}`)
        return { ...segment, text }
      },
    )
    ctx.throwIfCancelled()

    const translation: TranslationDocument = {
      translated: true,
      sourceLanguage,
      targetLanguage: inputSpec.targetLanguage,
      segments,
    }
    await ctx.artifacts.writeJson('translation', 'translation.json', translation)
    return stageSucceeded(ctx, { summary: `${segments.length} segments translated` })
  }
}
