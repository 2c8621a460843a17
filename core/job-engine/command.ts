import { spawn } from 'node:child_process'
import { ResourceError, StageCancelledError } from './errors'

export interface RunCommandOptions {
  command: string
  args: string[]
  cwd?: string
  env?: NodeJS.ProcessEnv
  onStdoutLine?: (line: string) => void
  onStderrLine?: (line: string) => void
  /** Aborting sends SIGTERM, then SIGKILL after `killGraceMs`. */
  signal?: AbortSignal
  killGraceMs?: number
  /** Job reported in the cancellation error. */
  jobId?: string
}

export interface CommandResult {
  code: number
  /** Last non-empty stderr lines, oldest first. */
  stderrTail: string[]
}

const TAIL_LINES = 40
const DEFAULT_KILL_GRACE_MS = 5_000

/** Keeps the last `limit` lines seen. */
class LineTail {
  private readonly lines: string[] = []

  constructor(private readonly limit: number) {}

  push(line: string): void {
    this.lines.push(line)
    if (this.lines.length > this.limit) {
      this.lines.shift()
    }
  }

  toArray(): string[] {
    return [...this.lines]
  }
}

/** Splits a byte stream into trimmed, non-empty lines. */
class LineSplitter {
  private pending = ''

  constructor(private readonly onLine: (line: string) => void) {}

  write(chunk: Buffer): void {
    const parts = `${this.pending}${chunk.toString()}`.split(/\r?\n|\r/)
    this.pending = parts.pop() ?? ''
    parts.forEach((part) => this.emit(part))
  }

  end(): void {
    this.emit(this.pending)
    this.pending = ''
  }

  private emit(raw: string): void {
    const line = raw.trim()
    if (line) this.onLine(line)
  }
}

/**
 * Run a tool such as yt-dlp or ffmpeg to completion. A spawn failure or a
 * non-zero exit rejects with a ResourceError carrying the stderr tail; an
 * abort rejects with a StageCancelledError once the child is gone.
 */
export async function runCommand(options: RunCommandOptions): Promise<CommandResult> {
  const jobId = options.jobId ?? ''
  if (options.signal?.aborted) {
    throw new StageCancelledError(jobId)
  }

  const commandLine = [options.command, ...options.args].join(' ')
  const stderrTail = new LineTail(TAIL_LINES)
  const stdout = new LineSplitter((line) => options.onStdoutLine?.(line))
  const stderr = new LineSplitter((line) => {
    stderrTail.push(line)
    options.onStderrLine?.(line)
  })

  const child = spawn(options.command, options.args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: ['ignore', 'pipe', 'pipe'],
  })
  child.stdout.on('data', (chunk: Buffer) => stdout.write(chunk))
  child.stderr.on('data', (chunk: Buffer) => stderr.write(chunk))

  return await new Promise<CommandResult>((resolve, reject) => {
    let aborted = false
    let killTimer: NodeJS.Timeout | null = null

    const onAbort = (): void => {
      if (aborted) return
      aborted = true
      child.kill('SIGTERM')
      killTimer = setTimeout(() => child.kill('SIGKILL'), options.killGraceMs ?? DEFAULT_KILL_GRACE_MS)
      killTimer.unref()
    }
    options.signal?.addEventListener('abort', onAbort, { once: true })

    const settle = (): void => {
      options.signal?.removeEventListener('abort', onAbort)
      if (killTimer) clearTimeout(killTimer)
    }

    child.once('error', (error) => {
      settle()
      reject(new ResourceError(`Failed to start ${options.command}: ${error.message}`, { cause: error }))
    })

    child.once('close', (code, signal) => {
      stdout.end()
      stderr.end()
      settle()
      if (aborted) {
        reject(new StageCancelledError(jobId))
        return
      }
      const tail = stderrTail.toArray()
      if (code !== 0) {
        const exit = code === null ? `signal ${signal ?? 'unknown'}` : `code ${code}`
        const detail = tail.length > 0 ? `\n${tail.slice(-10).join('\n')}` : ''
        reject(new ResourceError(`${options.command} exited with ${exit}: ${commandLine}${detail}`))
        return
      }
      resolve({ code, stderrTail: tail })
    })
  })
}
