import { z } from 'zod/v4'

import { NetworkError, ProtocolError } from '../core/errors.js'
import type { JsonObject, Message, Mode, NormalizedResponse, StreamEvent, ToolCall, ToolSpec } from '../core/types.js'
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

export const DEFAULT_ANTHROPIC_VERSION = '2023-06-01'
export const DEFAULT_ANTHROPIC_MAX_TOKENS = 1024

type WireBlock = JsonObject & { type: string }
interface WireMessage {
  role: 'user' | 'assistant'
  content: WireBlock[]
}

const messageSchema = z.object({
  content: z.array(z.object({ type: z.string() }).loose()),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).nullish()
})

const textBlockSchema = z.object({ type: z.literal('text'), text: z.string() })
const toolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.record(z.string(), z.unknown())
})

const streamEventSchema = z.object({ type: z.string() }).loose()
const blockStartSchema = z.object({
  index: z.number(),
  content_block: z.object({ type: z.string(), id: z.string().optional(), name: z.string().optional(), text: z.string().optional() })
})
const blockDeltaSchema = z.object({
  index: z.number(),
  delta: z.object({ type: z.string(), text: z.string().optional(), partial_json: z.string().optional() })
})
const blockStopSchema = z.object({ index: z.number() })
const streamErrorSchema = z.object({ error: z.object({ type: z.string().optional(), message: z.string() }) })

function blocksFor(message: Message): WireBlock[] {
  switch (message.role) {
    case 'tool':
      return [{ type: 'tool_result', tool_use_id: message.tool_call_id, content: message.content ?? '' }]
    case 'assistant': {
      const blocks: WireBlock[] = []
      if (message.content) blocks.push({ type: 'text', text: message.content })
      for (const call of message.tool_calls ?? []) {
        blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments })
      }
      return blocks
    }
    default:
      return message.content ? [{ type: 'text', text: message.content }] : []
  }
}

/**
 * Anthropic Messages protocol.
 *
 * System messages are lifted into the top-level `system` field, and tool
 * results travel back as `tool_result` blocks inside a user message, keyed by
 * the originating `tool_use` id. Adjacent messages of the same role are merged
 * because the API requires strictly alternating roles.
 */
export class AnthropicAdapter implements ProviderAdapter {
  readonly family = 'anthropic' as const
  readonly supportsTools = true
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
    const system = messages
      .filter((message) => message.role === 'system' && message.content)
      .map((message) => message.content)
      .join('\n\n')

    const wire: WireMessage[] = []
    for (const message of messages) {
      if (message.role === 'system') continue
      const role = message.role === 'assistant' ? 'assistant' : 'user'
      const content = blocksFor(message)
      if (content.length === 0) continue
      const last = wire[wire.length - 1]
      if (last && last.role === role) {
        last.content.push(...content)
      } else {
        wire.push({ role, content })
      }
    }

    const advertised = advertisedTools(tools, mode)
    return {
      method: 'POST',
      url: `${trimBaseUrl(this.settings.baseUrl)}/v1/messages`,
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.settings.apiKey ?? '',
        'anthropic-version': this.settings.apiVersion ?? DEFAULT_ANTHROPIC_VERSION
      },
      body: {
        model: options.model ?? this.defaultModel,
        max_tokens: options.maxTokens ?? DEFAULT_ANTHROPIC_MAX_TOKENS,
        ...(system ? { system } : {}),
        messages: wire.map((message) => ({ role: message.role, content: message.content })),
        ...(advertised.length > 0
          ? {
              tools: advertised.map((tool) => ({
                name: tool.name,
                description: tool.description,
                input_schema: tool.parameters
              }))
            }
          : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        stream: options.stream
      }
    }
  }

  /** Reduces typed content blocks: text joined in order, tool_use blocks become calls. */
  parseResponse(body: unknown): NormalizedResponse {
    const parsed = expectShape(this.name, messageSchema, body, 'message')
    let text = ''
    const toolCalls: ToolCall[] = []

    for (const block of parsed.content) {
      if (block.type === 'text') {
        text += expectShape(this.name, textBlockSchema, block, 'text block').text
      } else if (block.type === 'tool_use') {
        const toolUse = expectShape(this.name, toolUseBlockSchema, block, 'tool_use block')
        toolCalls.push({ id: toolUse.id, name: toolUse.name, arguments: toolUse.input })
      }
    }

    return {
      ...(text ? { text } : {}),
      toolCalls,
      ...(parsed.usage
        ? {
            usage: {
              inputTokens: parsed.usage.input_tokens,
              outputTokens: parsed.usage.output_tokens,
              totalTokens: parsed.usage.input_tokens + parsed.usage.output_tokens
            }
          }
        : {})
    }
  }

  async *parseStream(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<StreamEvent> {
    const toolBlocks = new Map<number, string>()

    for await (const data of readSseData(chunks)) {
      const frame = parseFrame(this.name, data)
      const event = expectShape(this.name, streamEventSchema, frame, 'stream event')

      switch (event.type) {
        case 'content_block_start': {
          const { index, content_block: block } = expectShape(this.name, blockStartSchema, frame, 'content_block_start')
          if (block.type === 'tool_use') {
            if (!block.id || !block.name) {
              throw new ProtocolError(`${this.name} tool_use block ${index} is missing id or name`)
            }
            toolBlocks.set(index, block.id)
            yield { type: 'tool_call_started', id: block.id, name: block.name }
          } else if (block.type === 'text' && block.text) {
            yield { type: 'text_delta', text: block.text }
          }
          break
        }
        case 'content_block_delta': {
          const { index, delta } = expectShape(this.name, blockDeltaSchema, frame, 'content_block_delta')
          if (delta.type === 'text_delta' && delta.text) {
            yield { type: 'text_delta', text: delta.text }
          } else if (delta.type === 'input_json_delta' && delta.partial_json) {
            const id = toolBlocks.get(index)
            if (!id) throw new ProtocolError(`${this.name} input_json_delta for unknown block ${index}`)
            yield { type: 'tool_call_arg_delta', id, fragment: delta.partial_json }
          }
          break
        }
        case 'content_block_stop': {
          const { index } = expectShape(this.name, blockStopSchema, frame, 'content_block_stop')
          const id = toolBlocks.get(index)
          if (id) {
            toolBlocks.delete(index)
            yield { type: 'tool_call_completed', id }
          }
          break
        }
        case 'message_stop':
          yield { type: 'done' }
          return
        case 'error': {
          const { error } = expectShape(this.name, streamErrorSchema, frame, 'error event')
          throw new NetworkError(`${this.name} stream error: ${error.message}`)
        }
        default:
          // message_start, message_delta, ping
          break
      }
    }

    for (const id of toolBlocks.values()) yield { type: 'tool_call_completed', id }
    yield { type: 'done' }
  }

  /** The Messages API has no public listing endpoint; only the default model is reported. */
  buildListModelsRequest(): null {
    return null
  }

  parseListModels(_body: unknown): string[] {
    return [this.defaultModel]
  }
}
