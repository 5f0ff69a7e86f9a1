import { ProtocolError } from './errors.js'
import type { ConversationRecord, Message, ToolCall } from './types.js'

/**
 * Append-only message log for one session.
 *
 * Every tool message must answer exactly one earlier, still unanswered,
 * assistant tool call, and tool call ids never repeat.
 */
export class Conversation {
  private readonly log: Message[] = []
  private readonly callIds = new Set<string>()
  private readonly pendingCalls = new Set<string>()
  private turns = 0

  constructor(readonly sessionId: string) {}

  /** Rebuilds a conversation from its persisted record, re-checking every invariant. */
  static fromRecord(record: ConversationRecord): Conversation {
    const conversation = new Conversation(record.session_id)
    for (const message of record.messages) conversation.append(message)
    conversation.turns = record.turn_count
    return conversation
  }

  get messages(): readonly Message[] {
    return this.log
  }

  get turnCount(): number {
    return this.turns
  }

  get length(): number {
    return this.log.length
  }

  append(message: Message): void {
    if (message.role === 'tool') {
      const id = message.tool_call_id
      if (!id) throw new ProtocolError('tool message is missing tool_call_id')
      if (!this.pendingCalls.has(id)) {
        throw new ProtocolError(`tool result '${id}' does not answer a pending tool call`, id)
      }
      this.pendingCalls.delete(id)
    }

    if (message.tool_calls && message.role !== 'assistant') {
      throw new ProtocolError(`${message.role} message cannot carry tool calls`)
    }

    for (const call of message.tool_calls ?? []) {
      if (this.callIds.has(call.id)) {
        throw new ProtocolError(`duplicate tool call id '${call.id}'`, call.id)
      }
    }
    for (const call of message.tool_calls ?? []) {
      this.callIds.add(call.id)
      this.pendingCalls.add(call.id)
    }

    this.log.push(freezeMessage(message))
  }

  /** Counts one provider invocation. */
  recordTurn(): void {
    this.turns += 1
  }

  /** Captures the current position so a failed or aborted turn can be undone. */
  checkpoint(): { length: number; turns: number } {
    return { length: this.log.length, turns: this.turns }
  }

  /**
   * Drops everything appended after `checkpoint`.
   *
   * Only the agent loop calls this, and only for a turn that never completed,
   * so nothing that was ever persisted is removed.
   */
  rollback(checkpoint: { length: number; turns: number }): void {
    const removed = this.log.splice(checkpoint.length)
    for (const message of removed) {
      if (message.role === 'tool' && message.tool_call_id) {
        this.pendingCalls.add(message.tool_call_id)
      }
    }
    for (const message of removed) {
      for (const call of message.tool_calls ?? []) {
        this.callIds.delete(call.id)
        this.pendingCalls.delete(call.id)
      }
    }
    this.turns = checkpoint.turns
  }

  toRecord(): ConversationRecord {
    return {
      session_id: this.sessionId,
      turn_count: this.turns,
      messages: this.log.map(canonicalMessage)
    }
  }
}

function freezeCall(call: ToolCall): ToolCall {
  return Object.freeze({ ...call, arguments: Object.freeze({ ...call.arguments }) })
}

function freezeMessage(message: Message): Message {
  const copy: Message = { ...message }
  if (message.tool_calls) copy.tool_calls = message.tool_calls.map(freezeCall)
  return Object.freeze(copy)
}

/** Fixed key order so a load-then-save round trip is byte-identical. */
export function canonicalMessage(message: Message): Message {
  const out: Message = { role: message.role }
  if (message.content !== undefined) out.content = message.content
  if (message.tool_calls !== undefined) {
    out.tool_calls = message.tool_calls.map((call) => ({
      id: call.id,
      name: call.name,
      arguments: call.arguments
    }))
  }
  if (message.tool_call_id !== undefined) out.tool_call_id = message.tool_call_id
  if (message.name !== undefined) out.name = message.name
  return out
}
