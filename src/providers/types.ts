import type { z } from 'zod/v4'

import { ProtocolError, errorMessage } from '../core/errors.js'
import type { Message, Mode, NormalizedResponse, StreamEvent, ToolSpec } from '../core/types.js'
import type { WireRequest } from './transport.js'

export type ProtocolFamily = 'openai' | 'anthropic' | 'ollama'

export type ProviderName = 'openai' | 'anthropic' | 'ollama' | 'grok' | 'deepseek'

/**
 * Resolved, read-only settings for one backend.
 */
export interface ProviderSettings {
  name: ProviderName
  family: ProtocolFamily
  apiKey?: string
  baseUrl: string
  defaultModel: string
  /** Anthropic `anthropic-version` header. */
  apiVersion?: string
}

export interface RequestOptions {
  stream: boolean
  model?: string
  temperature?: number
  maxTokens?: number
}

/**
 * Translation layer between the normalized conversation and one backend's wire protocol.
 */
export interface ProviderAdapter {
  readonly name: ProviderName
  readonly family: ProtocolFamily
  readonly defaultModel: string
  /** Whether the protocol has native structured tool calling. */
  readonly supportsTools: boolean

  buildRequest(
    messages: readonly Message[],
    tools: readonly ToolSpec[],
    mode: Mode,
    options: RequestOptions
  ): WireRequest
  parseResponse(body: unknown): NormalizedResponse
  parseStream(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<StreamEvent>

  /** Returns null when the backend has no model listing endpoint. */
  buildListModelsRequest(): WireRequest | null
  parseListModels(body: unknown): string[]
}

/** Tools that may be advertised under `mode`. */
export function advertisedTools(tools: readonly ToolSpec[], mode: Mode): ToolSpec[] {
  return tools.filter((tool) => mode === 'building' || tool.read_only)
}

export function trimBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '')
}

/** Parses one JSON frame of a streamed response. */
export function parseFrame(provider: ProviderName, raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch (error) {
    throw new ProtocolError(`${provider} sent a malformed stream frame: ${errorMessage(error)}`, undefined, {
      cause: error
    })
  }
}

/** Validates a payload against the wire schema, failing with `ProtocolError`. */
export function expectShape<T>(provider: ProviderName, schema: z.ZodType<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.map(String).join('.')}` : ''
    throw new ProtocolError(`${provider} ${what} has an unexpected shape${where}: ${issue?.message ?? 'invalid'}`)
  }
  return parsed.data
}
