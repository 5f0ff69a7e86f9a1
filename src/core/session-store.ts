import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { z } from 'zod/v4'

import { Conversation } from './conversation.js'
import { ProtocolError, SessionIOError, errorMessage, isNotFound } from './errors.js'
import type { ConversationRecord, Logger } from './types.js'

const SESSION_NAME = /^[A-Za-z0-9._-]+$/

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.string(), z.unknown())
})

const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string().optional(),
  tool_calls: z.array(toolCallSchema).optional(),
  tool_call_id: z.string().optional(),
  name: z.string().optional()
})

const recordSchema = z.object({
  session_id: z.string(),
  turn_count: z.number().int().nonnegative().default(0),
  messages: z.array(messageSchema)
})

/** Serializes a conversation record the way it is stored on disk. */
export function serializeRecord(record: ConversationRecord): string {
  return `${JSON.stringify(record, null, 2)}\n`
}

/** Persistence surface the agent loop needs. */
export interface ConversationStore {
  load(sessionId: string): Promise<Conversation>
  save(conversation: Conversation): Promise<void>
}

/**
 * File-backed conversation store, one JSON document per session.
 *
 * Writes go to a temporary file that is renamed over the target, so `load`
 * never observes a half-written document.
 */
export class SessionStore implements ConversationStore {
  constructor(
    private readonly dir: string,
    private readonly logger?: Logger
  ) {}

  /** Path of the document for `sessionId`. */
  pathFor(sessionId: string): string {
    if (!SESSION_NAME.test(sessionId) || sessionId === '.' || sessionId === '..') {
      throw new SessionIOError(sessionId, `invalid session name '${sessionId}'`)
    }
    return join(this.dir, `${sessionId}.json`)
  }

  /** Loads a session, or returns an empty conversation when none exists yet. */
  async load(sessionId: string): Promise<Conversation> {
    const path = this.pathFor(sessionId)
    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (error) {
      if (isNotFound(error)) return new Conversation(sessionId)
      throw new SessionIOError(sessionId, `reading session ${sessionId}: ${errorMessage(error)}`, {
        cause: error
      })
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      throw new SessionIOError(sessionId, `parsing session ${sessionId}: ${errorMessage(error)}`, {
        cause: error
      })
    }

    const parsed = recordSchema.safeParse(json)
    if (!parsed.success) {
      throw new SessionIOError(sessionId, `session ${sessionId} has an invalid shape: ${parsed.error.message}`)
    }
    if (parsed.data.session_id !== sessionId) {
      throw new SessionIOError(
        sessionId,
        `session file ${sessionId}.json belongs to '${parsed.data.session_id}'`
      )
    }

    try {
      return Conversation.fromRecord(parsed.data)
    } catch (error) {
      if (error instanceof ProtocolError) {
        throw new SessionIOError(sessionId, `session ${sessionId} is inconsistent: ${error.message}`, {
          cause: error
        })
      }
      throw error
    }
  }

  /** Persists the conversation atomically. */
  async save(conversation: Conversation): Promise<void> {
    const path = this.pathFor(conversation.sessionId)
    const tmp = `${path}.${process.pid}.tmp`
    try {
      await mkdir(this.dir, { recursive: true })
      await writeFile(tmp, serializeRecord(conversation.toRecord()), 'utf-8')
      await rename(tmp, path)
    } catch (error) {
      await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        this.logger?.warn('session.tmp_cleanup_failed', { path: tmp, error: errorMessage(cleanupError) })
      })
      throw new SessionIOError(
        conversation.sessionId,
        `writing session ${conversation.sessionId}: ${errorMessage(error)}`,
        { cause: error }
      )
    }
    this.logger?.debug('session.saved', {
      sessionId: conversation.sessionId,
      messages: conversation.length
    })
  }

  /** Lists stored session names, sorted. */
  async list(): Promise<string[]> {
    let entries: string[]
    try {
      entries = await readdir(this.dir)
    } catch (error) {
      if (isNotFound(error)) return []
      throw new SessionIOError('*', `listing sessions: ${errorMessage(error)}`, { cause: error })
    }
    return entries
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort()
  }

  /** Removes a stored session if present. */
  async delete(sessionId: string): Promise<void> {
    try {
      await rm(this.pathFor(sessionId), { force: true })
    } catch (error) {
      throw new SessionIOError(sessionId, `deleting session ${sessionId}: ${errorMessage(error)}`, {
        cause: error
      })
    }
  }

  /** Removes every stored session and returns how many there were. */
  async clearAll(): Promise<number> {
    const names = await this.list()
    for (const name of names) await this.delete(name)
    this.logger?.info('session.cleared_all', { count: names.length })
    return names.length
  }
}

/**
 * Process-local store for runs without a named session.
 *
 * Records are kept in their serialized form so a load goes through the same
 * replay path as a file.
 */
export class InMemorySessionStore implements ConversationStore {
  private readonly records = new Map<string, string>()

  async load(sessionId: string): Promise<Conversation> {
    const raw = this.records.get(sessionId)
    if (raw === undefined) return new Conversation(sessionId)
    return Conversation.fromRecord(recordSchema.parse(JSON.parse(raw)))
  }

  async save(conversation: Conversation): Promise<void> {
    this.records.set(conversation.sessionId, serializeRecord(conversation.toRecord()))
  }
}
