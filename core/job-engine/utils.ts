import { randomUUID } from 'node:crypto'

/**
 * Check if value is a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function nowIso(): string {
  return new Date().toISOString()
}

/** Identifier for one dispatcher in one process. */
export function buildWorkerId(prefix = 'worker'): string {
  return `${prefix}-${process.pid}-${randomUUID().slice(0, 8)}`
}

/**
 * Run async workers over items with bounded concurrency; results keep item order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let cursor = 0
  const limit = Math.max(1, Math.min(items.length, Math.floor(concurrency)))

  const runners = Array.from({ length: limit }, async () => {
    while (cursor < items.length) {
      const index = cursor
      cursor += 1
      results[index] = await worker(items[index], index)
    }
  })

  await Promise.all(runners)
  return results
}

/** Extract a percentage from a progress line such as yt-dlp's `[download]  42.0%`. */
export function parsePercent(line: string): number | null {
  const match = line.match(/(\d{1,3}(?:\.\d+)?)%/)
  if (!match) return null
  const value = Number(match[1])
  if (Number.isNaN(value)) return null
  return Math.max(0, Math.min(100, Math.round(value)))
}
