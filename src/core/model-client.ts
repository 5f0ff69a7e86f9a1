import type { ProviderAdapter, RequestOptions } from '../providers/types.js'
import type { WireRequest } from '../providers/transport.js'
import { CapabilityUnsupportedError, NetworkError, errorMessage } from './errors.js'
import { StreamAssembler } from './stream-assembler.js'
import type { Logger, Message, Mode, NormalizedResponse, ToolSpec } from './types.js'
import { estimateCost, type Pricing } from './usage.js'

export interface ModelRequest {
  messages: readonly Message[]
  tools: readonly ToolSpec[]
  mode: Mode
  signal?: AbortSignal
  /** Receives assistant text as soon as it is available. */
  onText?: (text: string) => Promise<void> | void
}

/**
 * Shared LLM runtime contract used by the agent loop.
 */
export interface ModelClient {
  readonly provider: string
  complete(request: ModelRequest): Promise<NormalizedResponse>
}

/** Transport surface the provider client needs. */
export interface ProviderTransport {
  sendJson(request: WireRequest, signal?: AbortSignal): Promise<unknown>
  sendStream(request: WireRequest, signal?: AbortSignal): Promise<AsyncIterable<Uint8Array>>
}

export type ProviderClientOptions = RequestOptions & {
  /** Attaches an estimated cost to reported usage. */
  pricing?: Pricing
}

/**
 * Runs one model invocation through an adapter, buffered or streamed.
 *
 * Both paths produce the same `NormalizedResponse`; streamed text is forwarded
 * to `onText` per delta, buffered text once.
 */
export class ProviderClient implements ModelClient {
  readonly provider: string

  constructor(
    private readonly adapter: ProviderAdapter,
    private readonly transport: ProviderTransport,
    private readonly options: ProviderClientOptions,
    private readonly logger: Logger
  ) {
    this.provider = adapter.name
  }

  get model(): string {
    return this.options.model ?? this.adapter.defaultModel
  }

  async complete(request: ModelRequest): Promise<NormalizedResponse> {
    const { pricing, ...requestOptions } = this.options
    const wire = this.adapter.buildRequest(request.messages, request.tools, request.mode, requestOptions)
    this.logger.info('provider.request', {
      provider: this.provider,
      stream: this.options.stream,
      messages: request.messages.length,
      tools: request.tools.length
    })

    const response = this.options.stream
      ? await this.completeStreamed(wire, request)
      : await this.completeBuffered(wire, request)

    if (!response.usage) return response
    const usage = pricing
      ? { ...response.usage, costUsd: estimateCost(pricing, this.provider, this.model, response.usage) }
      : response.usage
    this.logger.info('provider.usage', { provider: this.provider, model: this.model, ...usage })
    return { ...response, usage }
  }

  private async completeBuffered(wire: WireRequest, request: ModelRequest): Promise<NormalizedResponse> {
    const body = await this.transport.sendJson(wire, request.signal)
    const response = this.adapter.parseResponse(body)
    if (response.text) await request.onText?.(response.text)
    return response
  }

  private async completeStreamed(wire: WireRequest, request: ModelRequest): Promise<NormalizedResponse> {
    const chunks = await this.transport.sendStream(wire, request.signal)
    const assembler = new StreamAssembler()

    for await (const event of this.adapter.parseStream(chunks)) {
      for (const effect of assembler.push(event)) {
        if (effect.type === 'text') {
          await request.onText?.(effect.text)
        } else if (effect.type === 'tool_call_failed') {
          this.logger.warn('provider.tool_call_malformed', {
            provider: this.provider,
            toolCallId: effect.error.callId,
            error: effect.error.message
          })
        }
      }
    }

    const [failure] = assembler.failures
    if (failure) throw failure
    return assembler.finish()
  }
}

/**
 * Tries each client in order until one answers.
 *
 * Only network failures move on to the next provider, and only while no text
 * has been forwarded yet. A fallback that cannot serve the request (no tool
 * support) is skipped. When every client fails the primary's error is thrown.
 */
export class FallbackClient implements ModelClient {
  readonly provider: string

  constructor(
    private readonly clients: readonly [ModelClient, ...ModelClient[]],
    private readonly logger: Logger
  ) {
    this.provider = clients[0].provider
  }

  async complete(request: ModelRequest): Promise<NormalizedResponse> {
    let emitted = false
    const tracked: ModelRequest = {
      ...request,
      onText: async (text) => {
        emitted = true
        await request.onText?.(text)
      }
    }

    let primaryError: unknown
    for (const [index, client] of this.clients.entries()) {
      try {
        const response = await client.complete(tracked)
        if (index > 0) this.logger.info('provider.fallback_succeeded', { provider: client.provider })
        return response
      } catch (error) {
        const retryable =
          error instanceof NetworkError || (index > 0 && error instanceof CapabilityUnsupportedError)
        if (request.signal?.aborted || emitted || !retryable) throw error
        if (index === 0) primaryError = error
        const next = this.clients[index + 1]
        if (next) {
          this.logger.warn('provider.fallback', { from: client.provider, to: next.provider, error: errorMessage(error) })
        }
      }
    }
    throw primaryError
  }
}
