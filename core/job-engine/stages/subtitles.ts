import type { Scene } from '../../db/types'
import type { TranscriptSegment } from '../providers/openai'

/** Seconds to an SRT timestamp, `HH:MM:SS,mmm`. */
export function formatSrtTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000))
  const ms = totalMs % 1000
  const totalSeconds = Math.floor(totalMs / 1000)
  const secs = totalSeconds % 60
  const minutes = Math.floor(totalSeconds / 60) % 60
  const hours = Math.floor(totalSeconds / 3600)
  const pad = (value: number, width = 2): string => String(value).padStart(width, '0')
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(ms, 3)}`
}

/**
 * Render segments as SRT cues. Empty segments and those starting after
 * `maxDurationSec` are dropped; cue ends are clipped to it.
 */
export function buildSrt(segments: readonly TranscriptSegment[], maxDurationSec?: number): string {
  const cues: string[] = []
  for (const segment of segments) {
    const text = segment.text.trim()
    if (!text) continue
    if (maxDurationSec !== undefined && segment.start >= maxDurationSec) continue
    const end = maxDurationSec !== undefined ? Math.min(segment.end, maxDurationSec) : segment.end
    cues.push(`${cues.length + 1}\n${formatSrtTimestamp(segment.start)} --> ${formatSrtTimestamp(end)}\n${text}\n`)
  }
  return cues.join('\n')
}

export interface TimelineEntry {
  sceneIndex: number
  durationSec: number
}

const MIN_SCENE_DURATION_SEC = 0.1

/**
 * How long each scene image stays on screen. Images are back to back: the
 * first covers the lead-in from zero and each runs until the next scene
 * starts. The last one runs to `totalDurationSec` when known.
 */
export function buildSceneTimeline(scenes: readonly Scene[], totalDurationSec?: number): TimelineEntry[] {
  return scenes.map((scene, position) => {
    const start = position === 0 ? 0 : scene.startTime
    const next = scenes[position + 1]
    const end = next
      ? next.startTime
      : Math.max(scene.endTime, totalDurationSec ?? scene.endTime)
    return {
      sceneIndex: scene.index,
      durationSec: Math.max(MIN_SCENE_DURATION_SEC, Number((end - start).toFixed(3))),
    }
  })
}

/** ffmpeg concat-demuxer script for a still-image slideshow. */
export function buildConcatScript(entries: ReadonlyArray<{ filePath: string; durationSec: number }>): string {
  const quote = (filePath: string): string => `'${filePath.replace(/'/g, `'\\''`)}'`
  const lines: string[] = []
  for (const entry of entries) {
    lines.push(`file ${quote(entry.filePath)}`)
    lines.push(`duration ${entry.durationSec}`)
  }
  // The demuxer ignores the last duration unless the final file is listed again.
  const last = entries[entries.length - 1]
  if (last) {
    lines.push(`file ${quote(last.filePath)}`)
  }
  return `${lines.join('\n')}\n`
}
