import type {
  AspectRatio,
  EditableSpec,
  ImageStyle,
  InputSpec,
  Scene,
  StageName,
  SubtitleMode,
} from '../core/db/types'

/** Execution order of the pipeline. */
export const PIPELINE_STAGES: readonly StageName[] = [
  'download',
  'transcribe',
  'translate',
  'segment_and_prompt',
  'synthesize_images',
  'compose_video',
]

export const SUBTITLE_MODES: readonly SubtitleMode[] = ['none', 'orig', 'en', 'both']
export const ASPECT_RATIOS: readonly AspectRatio[] = ['9:16', '16:9', '1:1']
export const IMAGE_STYLES: readonly ImageStyle[] = [
  'default',
  'photorealistic',
  'cartoon',
  'abstract',
  'pixel_art',
  'line_art',
  'fantasy',
  'anime',
]

export const MIN_TARGET_DURATION_SEC = 5
export const MAX_TARGET_DURATION_SEC = 600
export const DEFAULT_TARGET_DURATION_SEC = 60
export const DEFAULT_TARGET_LANGUAGE = 'en'

export type SpecParseResult<T> = { ok: true; value: T } | { ok: false; reason: string }

export interface InputSpecDraft {
  sourceUrl?: unknown
  targetDurationSec?: unknown
  subtitleMode?: unknown
  aspectRatio?: unknown
  targetLanguage?: unknown
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isSubtitleMode(value: unknown): value is SubtitleMode {
  return SUBTITLE_MODES.some((mode) => mode === value)
}

function isAspectRatio(value: unknown): value is AspectRatio {
  return ASPECT_RATIOS.some((ratio) => ratio === value)
}

function isImageStyle(value: unknown): value is ImageStyle {
  return IMAGE_STYLES.some((style) => style === value)
}

function normalizeSourceUrl(value: string): string | null {
  try {
    const parsed = new URL(value.trim())
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return null
    }
    return parsed.toString()
  } catch {
    return null
  }
}

function parseKeywordList(value: unknown, field: string): SpecParseResult<string[]> {
  if (value === undefined) return { ok: true, value: [] }
  if (typeof value === 'string') {
    // Comma-separated form, as typed into a single text box.
    return {
      ok: true,
      value: value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean),
    }
  }
  if (!Array.isArray(value)) {
    return { ok: false, reason: `${field} must be a list of strings` }
  }
  const keywords: string[] = []
  for (const item of value) {
    if (typeof item !== 'string') {
      return { ok: false, reason: `${field} must be a list of strings` }
    }
    const trimmed = item.trim()
    if (trimmed) keywords.push(trimmed)
  }
  return { ok: true, value: keywords }
}

/**
 * Validate submission parameters and fill in defaults.
 */
export function parseInputSpec(draft: unknown): SpecParseResult<InputSpec> {
  if (!isRecord(draft)) {
    return { ok: false, reason: 'inputSpec must be an object' }
  }

  if (typeof draft.sourceUrl !== 'string' || !draft.sourceUrl.trim()) {
    return { ok: false, reason: 'sourceUrl is required' }
  }
  const sourceUrl = normalizeSourceUrl(draft.sourceUrl)
  if (!sourceUrl) {
    return { ok: false, reason: 'sourceUrl must be an http(s) URL' }
  }

  const rawDuration = draft.targetDurationSec ?? DEFAULT_TARGET_DURATION_SEC
  if (typeof rawDuration !== 'number' || !Number.isInteger(rawDuration)) {
    return { ok: false, reason: 'targetDurationSec must be an integer' }
  }
  if (rawDuration < MIN_TARGET_DURATION_SEC || rawDuration > MAX_TARGET_DURATION_SEC) {
    return {
      ok: false,
      reason: `targetDurationSec must be between ${MIN_TARGET_DURATION_SEC} and ${MAX_TARGET_DURATION_SEC}`,
    }
  }

  const subtitleMode = draft.subtitleMode ?? 'none'
  if (!isSubtitleMode(subtitleMode)) {
    return { ok: false, reason: `subtitleMode must be one of ${SUBTITLE_MODES.join(', ')}` }
  }

  const aspectRatio = draft.aspectRatio ?? '9:16'
  if (!isAspectRatio(aspectRatio)) {
    return { ok: false, reason: `aspectRatio must be one of ${ASPECT_RATIOS.join(', ')}` }
  }

  const targetLanguage = draft.targetLanguage ?? DEFAULT_TARGET_LANGUAGE
  if (typeof targetLanguage !== 'string' || !/^[a-z]{2,3}$/i.test(targetLanguage.trim())) {
    return { ok: false, reason: 'targetLanguage must be an ISO-639 language code' }
  }

  return {
    ok: true,
    value: {
      sourceUrl,
      targetDurationSec: rawDuration,
      subtitleMode,
      aspectRatio,
      targetLanguage: targetLanguage.trim().toLowerCase(),
    },
  }
}

function parseScene(value: unknown, position: number): SpecParseResult<Scene> {
  if (!isRecord(value)) {
    return { ok: false, reason: `scenes[${position}] must be an object` }
  }
  const { index, text, startTime, endTime, imagePrompt } = value
  if (index !== position) {
    return { ok: false, reason: `scenes[${position}].index must be ${position}` }
  }
  if (typeof text !== 'string') {
    return { ok: false, reason: `scenes[${position}].text must be a string` }
  }
  if (typeof imagePrompt !== 'string' || !imagePrompt.trim()) {
    return { ok: false, reason: `scenes[${position}].imagePrompt cannot be empty` }
  }
  if (
    typeof startTime !== 'number' ||
    typeof endTime !== 'number' ||
    !Number.isFinite(startTime) ||
    !Number.isFinite(endTime) ||
    startTime < 0 ||
    endTime < startTime
  ) {
    return { ok: false, reason: `scenes[${position}] has an invalid time range` }
  }
  return {
    ok: true,
    value: { index: position, text, startTime, endTime, imagePrompt: imagePrompt.trim() },
  }
}

/**
 * Validate a full editable snapshot. Scene timing must stay monotonic because
 * the composer lays images out on the audio timeline in scene order.
 */
export function parseEditableSpec(draft: unknown): SpecParseResult<EditableSpec> {
  if (!isRecord(draft)) {
    return { ok: false, reason: 'editableSpec must be an object' }
  }
  if (!Array.isArray(draft.scenes) || draft.scenes.length === 0) {
    return { ok: false, reason: 'scenes must be a non-empty list' }
  }

  const scenes: Scene[] = []
  for (const [position, raw] of draft.scenes.entries()) {
    const parsed = parseScene(raw, position)
    if (!parsed.ok) return parsed
    const previous = scenes[scenes.length - 1]
    if (previous && parsed.value.startTime < previous.startTime) {
      return { ok: false, reason: `scenes[${position}] starts before the previous scene` }
    }
    scenes.push(parsed.value)
  }

  const imageStyle = draft.imageStyle ?? 'default'
  if (!isImageStyle(imageStyle)) {
    return { ok: false, reason: `imageStyle must be one of ${IMAGE_STYLES.join(', ')}` }
  }

  const positiveKeywords = parseKeywordList(draft.positiveKeywords, 'positiveKeywords')
  if (!positiveKeywords.ok) return positiveKeywords
  const negativeKeywords = parseKeywordList(draft.negativeKeywords, 'negativeKeywords')
  if (!negativeKeywords.ok) return negativeKeywords
  const artistInfluences = parseKeywordList(draft.artistInfluences, 'artistInfluences')
  if (!artistInfluences.ok) return artistInfluences

  return {
    ok: true,
    value: {
      scenes,
      imageStyle,
      positiveKeywords: positiveKeywords.value,
      negativeKeywords: negativeKeywords.value,
      artistInfluences: artistInfluences.value,
    },
  }
}

/**
 * Build the first editable snapshot from freshly generated scenes.
 */
export function createEditableSpec(scenes: Scene[]): EditableSpec {
  return {
    scenes: scenes.map((scene) => ({ ...scene })),
    imageStyle: 'default',
    positiveKeywords: [],
    negativeKeywords: [],
    artistInfluences: [],
  }
}
