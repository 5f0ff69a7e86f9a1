import { randomUUID } from 'node:crypto'

import { z } from 'zod/v4'

import { ProtocolError } from '../core/errors.js'
import { parseToolArguments } from '../core/stream-assembler.js'
import type { JsonObject, Message, Mode, NormalizedResponse, StreamEvent, ToolSpec } from '../core/types.js'
import { readSseData, type WireRequest } from './transport.js'
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

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() })
              })
            )
            .nullish()
        })
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number()
    })
    .nullish()
})

const chunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                index: z.number().int().nonnegative(),
                id: z.string().nullish(),
                function: z
                  .object({ name: z.string().nullish(), arguments: z.string().nullish() })
                  .nullish()
              })
            )
            .nullish()
        })
        .nullish(),
      finish_reason: z.string().nullish()
    })
  )
})

const modelsSchema = z.object({ data: z.array(z.object({ id: z.string() })) })

function toWireMessage(message: Message): JsonObject {
  switch (message.role) {
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content ?? null,
        ...(message.tool_calls && message.tool_calls.length > 0
          ? {
              tool_calls: message.tool_calls.map((call) => ({
                id: call.id,
                type: 'function',
                function: { name: call.name, arguments: JSON.stringify(call.arguments) }
              }))
            }
          : {})
      }
    case 'tool':
      return {
        role: 'tool',
        tool_call_id: message.tool_call_id,
        content: message.content ?? ''
      }
    default:
      return { role: message.role, content: message.content ?? '' }
  }
}

/**
 * OpenAI Chat Completions protocol, shared by Grok and DeepSeek.
 */
export class OpenAiCompatibleAdapter implements ProviderAdapter {
  readonly family = 'openai' as const
  readonly supportsTools = true
  readonly name: ProviderName
  readonly defaultModel: string

  constructor(private readonly settings: ProviderSettings) {
    this.name = settings.name
    this.defaultModel = settings.defaultModel
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      ...(this.settings.apiKey ? { Authorization: `Bearer ${this.settings.apiKey}` } : {})
    }
  }

  buildRequest(
    messages: readonly Message[],
    tools: readonly ToolSpec[],
    mode: Mode,
    options: RequestOptions
  ): WireRequest {
    const advertised = advertisedTools(tools, mode)
    return {
      method: 'POST',
      url: `${trimBaseUrl(this.settings.baseUrl)}/chat/completions`,
      headers: this.headers(),
      body: {
        model: options.model ?? this.defaultModel,
        messages: messages.map(toWireMessage),
        ...(advertised.length > 0
          ? {
              tools: advertised.map((tool) => ({
                type: 'function',
                function: {
                  name: tool.name,
                  description: tool.description,
                  parameters: tool.parameters
                }
              })),
              tool_choice: 'auto'
            }
          : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
        stream: options.stream
      }
    }
  }

  parseResponse(body: unknown): NormalizedResponse {
    const parsed = expectShape(this.name, completionSchema, body, 'completion')
    const first = parsed.choices[0]
    if (!first) throw new ProtocolError(`${this.name} completion has no choices`)
    const { content, tool_calls: toolCalls } = first.message

    return {
      ...(content ? { text: content } : {}),
      toolCalls: (toolCalls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: parseToolArguments(call.function.arguments, call.id)
      })),
      ...(parsed.usage
        ? {
            usage: {
              inputTokens: parsed.usage.prompt_tokens,
              outputTokens: parsed.usage.completion_tokens,
              totalTokens: parsed.usage.total_tokens
            }
          }
        : {})
    }
  }

  /**
   * Reads `data:` frames until `[DONE]`.
   *
   * Tool call deltas are keyed by index; the first delta for an index carries
   * the name and usually the id. An open call completes when a higher index starts, when
   * the choice reports a finish reason, or when the stream ends.
   */
  async *parseStream(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<StreamEvent> {
    const ids = new Map<number, string>()
    const open: number[] = []

    function* closeOpen(): Generator<StreamEvent> {
      while (open.length > 0) {
        const index = open.shift()
        const id = index === undefined ? undefined : ids.get(index)
        if (id) yield { type: 'tool_call_completed', id }
      }
    }

    for await (const data of readSseData(chunks)) {
      if (data.trim() === '[DONE]') break
      const chunk = expectShape(this.name, chunkSchema, parseFrame(this.name, data), 'stream chunk')

      for (const choice of chunk.choices) {
        const delta = choice.delta
        if (delta?.content) yield { type: 'text_delta', text: delta.content }

        for (const toolDelta of delta?.tool_calls ?? []) {
          const knownId = ids.get(toolDelta.index)
          if (knownId) {
            const fragment = toolDelta.function?.arguments
            if (fragment) yield { type: 'tool_call_arg_delta', id: knownId, fragment }
            continue
          }

          const name = toolDelta.function?.name
          if (!name) {
            throw new ProtocolError(`${this.name} tool call at index ${toolDelta.index} started without a name`)
          }
          yield* closeOpen()
          // Some compatible servers omit the id; the one made up here must not repeat across turns.
          const id = toolDelta.id ?? `call_${randomUUID()}`
          ids.set(toolDelta.index, id)
          open.push(toolDelta.index)
          yield { type: 'tool_call_started', id, name }
          const fragment = toolDelta.function?.arguments
          if (fragment) yield { type: 'tool_call_arg_delta', id, fragment }
        }

        if (choice.finish_reason) yield* closeOpen()
      }
    }

    yield* closeOpen()
    yield { type: 'done' }
  }

  buildListModelsRequest(): WireRequest {
    return {
      method: 'GET',
      url: `${trimBaseUrl(this.settings.baseUrl)}/models`,
      headers: this.headers()
    }
  }

  parseListModels(body: unknown): string[] {
    return expectShape(this.name, modelsSchema, body, 'model list').data.map((model) => model.id)
  }
}
