import type { AppSettings } from '../../db/types'
import {
  FatalError,
  isPipelineError,
  type PipelineError,
  StageCancelledError,
  toErrorMessage,
  TransientError,
  ValidationError,
} from '../errors'
import { isRecord } from '../utils'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface TranscriptSegment {
  start: number
  end: number
  text: string
}

export interface Transcript {
  language: string | null
  text: string
  duration: number | null
  segments: TranscriptSegment[]
}

interface RequestScope {
  signal?: AbortSignal
  jobId?: string
}

export interface ChatRequest extends RequestScope {
  system: string
  user: string
  temperature: number
  maxTokens?: number
}

export interface TranscriptionRequest extends RequestScope {
  audio: Buffer
  fileName: string
  mimeType?: string
}

export interface ImageRequest extends RequestScope {
  prompt: string
  negativePrompt?: string
  size: string
}

interface OpenAIChatResponse {
  choices?: Array<{
    finish_reason?: string | null
    message?: {
      content?: string | Array<{ type?: string; text?: string }> | null
    }
  }>
}

interface OpenAIImageResponse {
  data?: Array<{
    b64_json?: string
    url?: string
    revised_prompt?: string
  }>
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '')
}

/** Resolve an endpoint below a base URL that may or may not carry a `/v1` suffix. */
export function resolveEndpoint(baseUrl: string, resource: string): string {
  const normalized = normalizeBaseUrl(baseUrl)
  if (normalized.endsWith(`/${resource}`)) {
    return normalized
  }
  if (/\/v\d+$/i.test(normalized)) {
    return `${normalized}/${resource}`
  }
  return `${normalized}/v1/${resource}`
}

function extractChoiceContent(
  content: string | Array<{ type?: string; text?: string }> | null | undefined,
): string {
  if (typeof content === 'string') return content.trim()
  if (!Array.isArray(content)) return ''
  return content
    .map((item) => item.text ?? '')
    .join('')
    .trim()
}

function readErrorDetail(bodyText: string): string {
  try {
    const parsed: unknown = JSON.parse(bodyText)
    if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === 'string') {
      return parsed.error.message
    }
  } catch {
    // Plain-text error body.
  }
  return bodyText.trim().slice(0, 300)
}

/**
 * Map an HTTP failure onto the pipeline error taxonomy.
 */
export function classifyHttpError(status: number, detail: string): PipelineError {
  const message = `OpenAI request failed (${status})${detail ? `: ${detail}` : ''}`
  if (status === 429) {
    return new TransientError('rate_limit', message)
  }
  if (status === 408) {
    return new TransientError('timeout', message)
  }
  if (status >= 500) {
    return new TransientError('unavailable', message)
  }
  if (status === 401 || status === 403) {
    return new FatalError(`${message}. Check the API key configuration`)
  }
  return new ValidationError(message)
}

function toNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

/** Normalize a verbose_json transcription body. */
export function parseTranscript(value: unknown): Transcript {
  if (!isRecord(value)) {
    throw new FatalError('Transcription response is not an object')
  }
  const segments: TranscriptSegment[] = []
  const rawSegments = Array.isArray(value.segments) ? value.segments : []
  for (const raw of rawSegments) {
    if (!isRecord(raw)) continue
    const text = typeof raw.text === 'string' ? raw.text.trim() : ''
    const start = toNumber(raw.start) ?? 0
    const end = toNumber(raw.end) ?? start
    if (!text) continue
    segments.push({ start, end: Math.max(start, end), text })
  }
  const language = typeof value.language === 'string' && value.language.trim() ? value.language.trim() : null
  return {
    language,
    text: typeof value.text === 'string' ? value.text.trim() : segments.map((segment) => segment.text).join(' '),
    duration: toNumber(value.duration),
    segments,
  }
}

/**
 * Minimal client for an OpenAI-compatible API: chat completions, audio
 * transcription and image generation.
 */
export class OpenAIClient {
  private readonly fetchImpl: FetchLike

  constructor(
    private readonly settings: Pick<
      AppSettings,
      'openaiApiKey' | 'openaiApiBaseUrl' | 'chatModelId' | 'transcribeModelId' | 'imageModelId' | 'requestTimeoutMs'
    >,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init))
  }

  async chat(request: ChatRequest): Promise<string> {
    const body = await this.requestJson<OpenAIChatResponse>(
      'chat/completions',
      {
        method: 'POST',
        headers: this.buildHeaders(true),
        body: JSON.stringify({
          model: this.settings.chatModelId,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: request.temperature,
          ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
        }),
      },
      request,
    )

    const content = extractChoiceContent(body.choices?.[0]?.message?.content)
    if (!content) {
      throw new TransientError('unavailable', 'Chat completion returned no content')
    }
    return content
  }

  async transcribe(request: TranscriptionRequest): Promise<Transcript> {
    const form = new FormData()
    form.append('model', this.settings.transcribeModelId)
    form.append('response_format', 'verbose_json')
    form.append('file', new Blob([new Uint8Array(request.audio)], { type: request.mimeType ?? 'audio/mpeg' }), request.fileName)

    const body = await this.requestJson<unknown>(
      'audio/transcriptions',
      {
        method: 'POST',
        headers: this.buildHeaders(false),
        body: form,
      },
      request,
    )
    return parseTranscript(body)
  }

  /** Generate one image and return its bytes. */
  async generateImage(request: ImageRequest): Promise<Buffer> {
    // The image endpoint has no negative prompt field; exclusions ride in the prompt text.
    const prompt = request.negativePrompt
      ? `${request.prompt}. Avoid: ${request.negativePrompt}`
      : request.prompt

    const body = await this.requestJson<OpenAIImageResponse>(
      'images/generations',
      {
        method: 'POST',
        headers: this.buildHeaders(true),
        body: JSON.stringify({
          model: this.settings.imageModelId,
          prompt,
          size: request.size,
          n: 1,
          response_format: 'b64_json',
        }),
      },
      request,
    )

    const image = body.data?.[0]
    if (image?.b64_json) {
      return Buffer.from(image.b64_json, 'base64')
    }
    if (image?.url) {
      const response = await this.send(image.url, { method: 'GET' }, request)
      return Buffer.from(await response.arrayBuffer())
    }
    throw new TransientError('unavailable', 'Image generation returned no image')
  }

  private buildHeaders(json: boolean): Record<string, string> {
    const headers: Record<string, string> = {}
    if (json) {
      headers['Content-Type'] = 'application/json'
    }
    const apiKey = this.settings.openaiApiKey.trim()
    if (apiKey) {
      headers.Authorization = `Bearer ${apiKey}`
    }
    return headers
  }

  private async requestJson<T>(resource: string, init: RequestInit, scope: RequestScope): Promise<T> {
    const endpoint = resolveEndpoint(this.settings.openaiApiBaseUrl, resource)
    const response = await this.send(endpoint, init, scope)
    try {
      return (await response.json()) as T
    } catch (error) {
      throw new TransientError('unavailable', `Invalid JSON from ${resource}: ${toErrorMessage(error)}`, {
        cause: error,
      })
    }
  }

  private async send(url: string, init: RequestInit, scope: RequestScope): Promise<Response> {
    if (scope.signal?.aborted) {
      throw new StageCancelledError(scope.jobId ?? '')
    }

    const timeoutMs = this.settings.requestTimeoutMs
    const controller = new AbortController()
    let timedOut = false
    const onAbort = (): void => controller.abort()
    scope.signal?.addEventListener('abort', onAbort, { once: true })
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal })
      if (!response.ok) {
        throw classifyHttpError(response.status, readErrorDetail(await response.text()))
      }
      return response
    } catch (error) {
      if (isPipelineError(error)) {
        throw error
      }
      if (timedOut) {
        throw new TransientError('timeout', `Request timeout after ${timeoutMs}ms`, { cause: error })
      }
      if (scope.signal?.aborted) {
        throw new StageCancelledError(scope.jobId ?? '')
      }
      throw new TransientError('network', `Request failed: ${toErrorMessage(error)}`, { cause: error })
    } finally {
      clearTimeout(timer)
      scope.signal?.removeEventListener('abort', onAbort)
    }
  }
}
