import { NetworkError, errorMessage } from '../core/errors.js'
import type { JsonObject, Logger } from '../core/types.js'

/**
 * Provider-specific HTTP request produced by an adapter.
 */
export interface WireRequest {
  method: 'GET' | 'POST'
  url: string
  headers: Record<string, string>
  body?: JsonObject
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export interface HttpTransportOptions {
  fetch?: FetchLike
  timeoutMs?: number
  logger?: Logger
}

function truncate(value: string, max = 500): string {
  if (value.length <= max) return value
  return `${value.slice(0, max)}...(truncated)`
}

/**
 * Thin fetch wrapper that maps transport failures onto `NetworkError`.
 *
 * Caller aborts are rethrown untouched so the agent loop can tell an
 * interrupt apart from a failed request.
 */
export class HttpTransport {
  private readonly fetchImpl: FetchLike
  private readonly timeoutMs: number | undefined
  private readonly logger: Logger | undefined

  constructor(options: HttpTransportOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.timeoutMs = options.timeoutMs
    this.logger = options.logger
  }

  /** Sends a request and returns the parsed JSON body; the timeout covers reading it. */
  async sendJson(request: WireRequest, signal?: AbortSignal): Promise<unknown> {
    const { response, clearTimer } = await this.send(request, signal)
    let text: string
    try {
      text = await response.text()
    } catch (error) {
      if (signal?.aborted || error instanceof NetworkError) throw error
      throw new NetworkError(`reading response from ${request.url} failed: ${errorMessage(error)}`, response.status, {
        cause: error
      })
    } finally {
      clearTimer()
    }
    try {
      return JSON.parse(text)
    } catch (error) {
      throw new NetworkError(`invalid JSON from ${request.url}: ${errorMessage(error)}`, response.status, {
        cause: error
      })
    }
  }

  /**
   * Sends a request and returns its body as a byte stream.
   *
   * The timeout only covers the wait for response headers; a long reply keeps
   * streaming for as long as the server sends it.
   */
  async sendStream(request: WireRequest, signal?: AbortSignal): Promise<AsyncIterable<Uint8Array>> {
    const { response, clearTimer } = await this.send(request, signal)
    clearTimer()
    if (!response.body) {
      throw new NetworkError(`empty response body from ${request.url}`, response.status)
    }
    return readBody(response.body, request.url, signal)
  }

  private async send(
    request: WireRequest,
    signal?: AbortSignal
  ): Promise<{ response: Response; clearTimer: () => void }> {
    const timeout = new AbortController()
    const timer = this.timeoutMs
      ? setTimeout(() => {
          timeout.abort(new NetworkError(`request to ${request.url} timed out after ${this.timeoutMs}ms`))
        }, this.timeoutMs)
      : undefined
    const clearTimer = (): void => clearTimeout(timer)
    const combined = signal ? AbortSignal.any([signal, timeout.signal]) : timeout.signal

    this.logger?.debug('provider.request', { method: request.method, url: request.url })

    let response: Response
    try {
      response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        ...(request.body ? { body: JSON.stringify(request.body) } : {}),
        signal: combined
      })
    } catch (error) {
      clearTimer()
      if (signal?.aborted) throw error
      if (timeout.signal.aborted && timeout.signal.reason instanceof NetworkError) throw timeout.signal.reason
      throw new NetworkError(`request to ${request.url} failed: ${errorMessage(error)}`, undefined, {
        cause: error
      })
    }

    if (!response.ok) {
      clearTimer()
      const detail = await response.text().catch((error: unknown) => `(unreadable body: ${errorMessage(error)})`)
      this.logger?.warn('provider.http_error', { url: request.url, status: response.status })
      throw new NetworkError(
        `${request.url} returned HTTP ${response.status}: ${truncate(detail.trim())}`,
        response.status
      )
    }
    return { response, clearTimer }
  }
}

/** Maps mid-body failures (reset, timeout) onto `NetworkError`; caller aborts pass through. */
async function* readBody(
  body: AsyncIterable<Uint8Array>,
  url: string,
  signal: AbortSignal | undefined
): AsyncGenerator<Uint8Array> {
  try {
    for await (const chunk of body) yield chunk
  } catch (error) {
    if (signal?.aborted) throw error
    throw new NetworkError(`reading response from ${url} failed: ${errorMessage(error)}`, undefined, { cause: error })
  }
}

/**
 * Splits a chunked byte stream into lines, carrying partial lines across chunks.
 */
export async function* readLines(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder()
  let buffer = ''
  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true })
    let newlineIndex = buffer.indexOf('\n')
    while (newlineIndex >= 0) {
      yield buffer.slice(0, newlineIndex).replace(/\r$/, '')
      buffer = buffer.slice(newlineIndex + 1)
      newlineIndex = buffer.indexOf('\n')
    }
  }
  buffer += decoder.decode()
  if (buffer) yield buffer.replace(/\r$/, '')
}

/**
 * Yields the `data:` payload of each server-sent event.
 *
 * Multi-line data fields are joined with newlines; comments and other fields are ignored.
 */
export async function* readSseData(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  let data: string[] = []
  for await (const line of readLines(chunks)) {
    if (line === '') {
      if (data.length > 0) yield data.join('\n')
      data = []
      continue
    }
    if (line.startsWith(':')) continue
    if (line.startsWith('data:')) {
      const value = line.slice('data:'.length)
      data.push(value.startsWith(' ') ? value.slice(1) : value)
    }
  }
  if (data.length > 0) yield data.join('\n')
}
