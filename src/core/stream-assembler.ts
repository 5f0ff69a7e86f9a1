import { ProtocolError, errorMessage } from './errors.js'
import type { JsonObject, NormalizedResponse, StreamEvent, ToolCall } from './types.js'

export type AssemblerState = 'idle' | 'text' | 'tool_args' | 'complete'

export type AssemblerEffect =
  | { type: 'text'; text: string }
  | { type: 'tool_call'; call: ToolCall }
  | { type: 'tool_call_failed'; error: ProtocolError }

interface PendingCall {
  id: string
  name: string
  fragments: string[]
}

/**
 * Parses a complete tool-argument document.
 *
 * An empty document means "no arguments"; anything other than a JSON object fails.
 */
export function parseToolArguments(raw: string, callId: string): JsonObject {
  if (raw.trim() === '') return {}
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ProtocolError(`tool call ${callId} has malformed arguments: ${errorMessage(error)}`, callId, {
      cause: error
    })
  }
  if (!isJsonObject(parsed)) {
    throw new ProtocolError(`tool call ${callId} arguments must be a JSON object`, callId)
  }
  return parsed
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Reduces normalized stream events into text and complete tool calls.
 *
 * Argument fragments are buffered per call id and only parsed once the call
 * completes. A call whose arguments fail to parse is reported on its own;
 * the remaining calls keep assembling.
 */
export class StreamAssembler {
  private current: AssemblerState = 'idle'
  private readonly textParts: string[] = []
  private readonly open = new Map<string, PendingCall>()
  private readonly seen = new Set<string>()
  private readonly calls: ToolCall[] = []
  private readonly errors: ProtocolError[] = []

  get state(): AssemblerState {
    return this.current
  }

  /** Calls whose arguments could not be parsed. */
  get failures(): readonly ProtocolError[] {
    return this.errors
  }

  push(event: StreamEvent): AssemblerEffect[] {
    if (this.current === 'complete') {
      throw new ProtocolError(`stream event '${event.type}' arrived after completion`)
    }

    switch (event.type) {
      case 'text_delta': {
        if (!event.text) return []
        this.textParts.push(event.text)
        if (this.open.size === 0) this.current = 'text'
        return [{ type: 'text', text: event.text }]
      }
      case 'tool_call_started': {
        if (this.seen.has(event.id)) {
          throw new ProtocolError(`tool call ${event.id} started twice`, event.id)
        }
        this.seen.add(event.id)
        this.open.set(event.id, { id: event.id, name: event.name, fragments: [] })
        this.current = 'tool_args'
        return []
      }
      case 'tool_call_arg_delta': {
        const pending = this.open.get(event.id)
        if (!pending) {
          throw new ProtocolError(`argument fragment for unknown tool call ${event.id}`, event.id)
        }
        pending.fragments.push(event.fragment)
        return []
      }
      case 'tool_call_completed':
        return [this.complete(event.id)]
      case 'done': {
        const effects = [...this.open.keys()].map((id) => this.complete(id))
        this.current = 'complete'
        return effects
      }
    }
  }

  /** Returns the assembled response. Only valid once `done` has been observed. */
  finish(): NormalizedResponse {
    if (this.current !== 'complete') {
      throw new ProtocolError('stream ended before completion')
    }
    const text = this.textParts.join('')
    return {
      ...(text ? { text } : {}),
      toolCalls: [...this.calls]
    }
  }

  private complete(id: string): AssemblerEffect {
    const pending = this.open.get(id)
    if (!pending) throw new ProtocolError(`completion for unknown tool call ${id}`, id)
    this.open.delete(id)
    if (this.open.size === 0) this.current = 'text'

    try {
      const call: ToolCall = {
        id: pending.id,
        name: pending.name,
        arguments: parseToolArguments(pending.fragments.join(''), pending.id)
      }
      this.calls.push(call)
      return { type: 'tool_call', call }
    } catch (error) {
      const failure =
        error instanceof ProtocolError ? error : new ProtocolError(errorMessage(error), pending.id)
      this.errors.push(failure)
      return { type: 'tool_call_failed', error: failure }
    }
  }
}
