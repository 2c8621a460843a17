import { describe, expect, it } from 'vitest'
import { needsTranslation, normalizeLanguage } from '../translate'

describe('normalizeLanguage', () => {
  it('maps language names to codes', () => {
    expect(normalizeLanguage('Japanese')).toBe('ja')
    expect(normalizeLanguage('  FR ')).toBe('fr')
    expect(normalizeLanguage('esperanto')).toBe('esperanto')
    expect(normalizeLanguage(null)).toBeNull()
  })
})

describe('needsTranslation', () => {
  it('only translates when a translated track is requested', () => {
    expect(needsTranslation('none', 'es', 'en')).toBe(false)
    expect(needsTranslation('orig', 'es', 'en')).toBe(false)
    expect(needsTranslation('en', 'Spanish', 'en')).toBe(true)
    expect(needsTranslation('both', 'es', 'en')).toBe(true)
  })

  it('skips sources already in the target language', () => {
    expect(needsTranslation('both', 'English', 'en')).toBe(false)
    expect(needsTranslation('en', 'de', 'DE')).toBe(false)
  })

  it('translates when the source language is unknown', () => {
    expect(needsTranslation('en', null, 'en')).toBe(true)
  })
})
