import type { EditableSpec, ImageStyle } from '../../db/types'

export const STYLE_PREFIXES: Readonly<Record<ImageStyle, string>> = {
  default: '',
  photorealistic: 'A photorealistic, high-detail image of: ',
  cartoon: 'A cartoon style illustration of: ',
  abstract: 'An abstract artistic interpretation of: ',
  pixel_art: 'Pixel art of: ',
  line_art: 'A black and white line art drawing of: ',
  fantasy: 'A fantasy art painting of: ',
  anime: 'An anime style drawing of: ',
}

export interface StyledPrompt {
  prompt: string
  negativePrompt: string
}

export function buildStyledPrompt(
  scenePrompt: string,
  style: Pick<EditableSpec, 'imageStyle' | 'positiveKeywords' | 'negativeKeywords' | 'artistInfluences'>,
): StyledPrompt {
  let prompt = `${STYLE_PREFIXES[style.imageStyle]}${scenePrompt.trim()}`
  if (style.positiveKeywords.length > 0) {
    prompt += `, ${style.positiveKeywords.join(', ')}`
  }
  if (style.artistInfluences.length > 0) {
    prompt += `, art by ${style.artistInfluences.join(', ')}`
  }
  return {
    prompt,
    negativePrompt: style.negativeKeywords.join(', '),
  }
}
