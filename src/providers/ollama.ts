import { z } from 'zod/v4'

import { CapabilityUnsupportedError, NetworkError } from '../core/errors.js'
import type { Message, Mode, NormalizedResponse, StreamEvent, ToolSpec } from '../core/types.js'
import { readLines, type WireRequest } from './transport.js'
import {
  advertisedTools,
  expectShape,
  parseFrame,
  trimBaseUrl,
  type ProviderAdapter,
  type ProviderName,
  type ProviderSettings,
  type RequestOptions
} from './types.js'

const frameSchema = z.object({
  message: z.object({ content: z.string().nullish() }).nullish(),
  response: z.string().nullish(),
  done: z.boolean().default(false),
  error: z.string().nullish(),
  prompt_eval_count: z.number().nullish(),
  eval_count: z.number().nullish()
})

const tagsSchema = z.object({ models: z.array(z.object({ name: z.string() })) })

type OllamaFrame = z.infer<typeof frameSchema>

function frameText(frame: OllamaFrame): string {
  return frame.message?.content ?? frame.response ?? ''
}

/**
 * Ollama NDJSON protocol.
 *
 * There is no native structured tool calling here, so advertising any tool
 * is rejected with `CapabilityUnsupportedError` instead of guessing at a
 * prompt convention.
 */
export class OllamaAdapter implements ProviderAdapter {
  readonly family = 'ollama' as const
  readonly supportsTools = false
  readonly name: ProviderName
  readonly defaultModel: string

  constructor(private readonly settings: ProviderSettings) {
    this.name = settings.name
    this.defaultModel = settings.defaultModel
  }

  buildRequest(
    messages: readonly Message[],
    tools: readonly ToolSpec[],
    mode: Mode,
    options: RequestOptions
  ): WireRequest {
    if (advertisedTools(tools, mode).length > 0) {
      throw new CapabilityUnsupportedError(this.name, 'structured tool calling')
    }

    const tuning = {
      ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      ...(options.maxTokens !== undefined ? { num_predict: options.maxTokens } : {})
    }
    return {
      method: 'POST',
      url: `${trimBaseUrl(this.settings.baseUrl)}/api/chat`,
      headers: { 'Content-Type': 'application/json' },
      body: {
        model: options.model ?? this.defaultModel,
        messages: messages.map((message) => ({ role: message.role, content: message.content ?? '' })),
        stream: options.stream,
        ...(Object.keys(tuning).length > 0 ? { options: tuning } : {})
      }
    }
  }

  parseResponse(body: unknown): NormalizedResponse {
    const frame = expectShape(this.name, frameSchema, body, 'response')
    if (frame.error) throw new NetworkError(`${this.name} error: ${frame.error}`)
    const text = frameText(frame)
    const input = frame.prompt_eval_count ?? undefined
    const output = frame.eval_count ?? undefined
    return {
      ...(text ? { text } : {}),
      toolCalls: [],
      ...(input !== undefined && output !== undefined
        ? { usage: { inputTokens: input, outputTokens: output, totalTokens: input + output } }
        : {})
    }
  }

  /** One JSON object per line; the line with `done: true` ends the response. */
  async *parseStream(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<StreamEvent> {
    for await (const line of readLines(chunks)) {
      if (!line.trim()) continue
      const frame = expectShape(this.name, frameSchema, parseFrame(this.name, line), 'stream frame')
      if (frame.error) throw new NetworkError(`${this.name} error: ${frame.error}`)
      const text = frameText(frame)
      if (text) yield { type: 'text_delta', text }
      if (frame.done) break
    }
    yield { type: 'done' }
  }

  buildListModelsRequest(): WireRequest {
    return {
      method: 'GET',
      url: `${trimBaseUrl(this.settings.baseUrl)}/api/tags`,
      headers: {}
    }
  }

  parseListModels(body: unknown): string[] {
    return expectShape(this.name, tagsSchema, body, 'tag list').models.map((model) => model.name)
  }
}
