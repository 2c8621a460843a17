import { DEFAULT_WORDS_PER_SCENE, LONG_SEGMENT_FACTOR, SCENE_WORD_SLACK } from '../constants'
import type { TranscriptSegment } from '../providers/openai'

export interface SceneChunk {
  text: string
  startTime: number
  endTime: number
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length
}

/**
 * Group transcript segments into scene-sized chunks of roughly
 * `wordsPerScene` words without splitting a segment.
 *
 * A chunk closes when the next segment would push it past the target plus
 * slack. A segment that alone reaches the long-segment threshold while no
 * chunk is open becomes a scene of its own.
 */
export function splitIntoScenes(
  segments: readonly TranscriptSegment[],
  wordsPerScene: number = DEFAULT_WORDS_PER_SCENE,
): SceneChunk[] {
  const target = Math.max(1, Math.floor(wordsPerScene))
  const chunks: SceneChunk[] = []
  let texts: string[] = []
  let words = 0
  let startTime = 0
  let endTime = 0

  const flush = (): void => {
    if (texts.length === 0) return
    chunks.push({ text: texts.join(' '), startTime, endTime })
    texts = []
    words = 0
  }

  for (const segment of segments) {
    const text = segment.text.trim()
    if (!text) continue
    const segmentWords = countWords(text)

    if (words === 0 && segmentWords >= target * LONG_SEGMENT_FACTOR) {
      chunks.push({ text, startTime: segment.start, endTime: segment.end })
      continue
    }

    if (words > 0 && words + segmentWords > target + SCENE_WORD_SLACK) {
      flush()
    }

    if (texts.length === 0) {
      startTime = segment.start
    }
    texts.push(text)
    words += segmentWords
    endTime = segment.end
  }

  flush()
  return chunks
}
