export const IMAGE_PROMPT_SYSTEM =
  'You are an expert prompt generator for AI image creation, specializing in modern flat-style illustrations. Ensure all output prompts are in English.'

export const TRANSLATE_SYSTEM = 'You are a helpful translation assistant. Reply with the translation only.'

export function buildImagePromptInstruction(text: string, language: string | null): string {
  const lang = (language ?? 'en').toLowerCase()
  if (lang === 'en' || lang === 'english') {
    return (
      'Based on the following English text, generate a concise and visually descriptive English prompt for an AI image generator. ' +
      'The prompt should be suitable for creating a modern flat-style illustration. ' +
      `Text: '${text}'`
    )
  }
  return (
    `Based on the following text (which is in ${language}), generate a concise and visually descriptive English prompt for an AI image generator. ` +
    'The prompt should be suitable for creating a modern flat-style illustration. ' +
    'If the text is not in English, understand its meaning and generate an English prompt that captures the essence for the illustration. ' +
    `Text: '${text}'`
  )
}

/** Drop a leading `Prompt:` label some models add. */
export function cleanImagePrompt(raw: string): string {
  const trimmed = raw.trim()
  return /^prompt:/i.test(trimmed) ? trimmed.slice('prompt:'.length).trim() : trimmed
}

export function buildTranslateInstruction(text: string, targetLanguage: string, sourceLanguage: string | null): string {
  return sourceLanguage
    ? `Translate the following ${sourceLanguage} text to ${targetLanguage}:\n\n${text}`
    : `Translate the following text to ${targetLanguage}:\n\n${text}`
}
