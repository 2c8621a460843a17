import { describe, expect, it } from 'vitest'
import { buildStyledPrompt } from '../stylePrompt'

describe('buildStyledPrompt', () => {
  it('applies the style prefix, keywords and artists', () => {
    expect(
      buildStyledPrompt(' a fox in the snow ', {
        imageStyle: 'anime',
        positiveKeywords: ['vivid', 'soft light'],
        negativeKeywords: ['blurry', 'text'],
        artistInfluences: ['Hiroshige'],
      }),
    ).toEqual({
      prompt: 'An anime style drawing of: a fox in the snow, vivid, soft light, art by Hiroshige',
      negativePrompt: 'blurry, text',
    })
  })

  it('leaves the prompt alone for the default style', () => {
    expect(
      buildStyledPrompt('a fox', {
        imageStyle: 'default',
        positiveKeywords: [],
        negativeKeywords: [],
        artistInfluences: [],
      }),
    ).toEqual({ prompt: 'a fox', negativePrompt: '' })
  })
})
