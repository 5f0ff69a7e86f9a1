import { createHash } from 'node:crypto'
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { z } from 'zod/v4'

import { canonicalMessage } from './conversation.js'
import { errorMessage, isNotFound } from './errors.js'
import type { ModelClient, ModelRequest } from './model-client.js'
import type { Logger, Message, NormalizedResponse } from './types.js'

/** Everything besides the messages that changes what the model would answer. */
export interface CacheIdentity {
  provider: string
  model: string
  temperature?: number
  maxTokens?: number
}

const entrySchema = z.object({
  value: z.object({
    text: z.string().optional(),
    toolCalls: z.array(z.object({ id: z.string(), name: z.string(), arguments: z.record(z.string(), z.unknown()) }))
  })
})

/** SHA-256 over an explicitly ordered payload, so equal requests hash equally across runs. */
export function cacheKey(identity: CacheIdentity, messages: readonly Message[]): string {
  const canonical = {
    provider: identity.provider,
    model: identity.model,
    messages: messages.map(canonicalMessage),
    temperature: identity.temperature ?? null,
    max_tokens: identity.maxTokens ?? null
  }
  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex')
}

/**
 * Responses on disk, one `<key>.json` document per request.
 *
 * Unreadable or invalid entries count as misses and are logged.
 */
export class ResponseCache {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger
  ) {}

  async get(key: string): Promise<NormalizedResponse | undefined> {
    const path = join(this.dir, `${key}.json`)
    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (error) {
      if (!isNotFound(error)) this.logger.warn('cache.read_failed', { path, error: errorMessage(error) })
      return undefined
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      this.logger.warn('cache.entry_invalid', { path, error: errorMessage(error) })
      return undefined
    }
    const parsed = entrySchema.safeParse(json)
    if (!parsed.success) {
      this.logger.warn('cache.entry_invalid', { path, error: parsed.error.message })
      return undefined
    }
    return parsed.data.value
  }

  async put(key: string, response: NormalizedResponse): Promise<void> {
    const path = join(this.dir, `${key}.json`)
    const tmp = `${path}.${process.pid}.tmp`
    const value = { ...(response.text !== undefined ? { text: response.text } : {}), toolCalls: response.toolCalls }
    await mkdir(this.dir, { recursive: true })
    await writeFile(tmp, `${JSON.stringify({ value }, null, 2)}\n`, 'utf-8')
    await rename(tmp, path)
  }
}

/**
 * Replays identical tool-less requests from a `ResponseCache`.
 *
 * Requests that advertise tools always reach the model. A hit carries no
 * usage, since nothing was spent on it.
 */
export class CachingClient implements ModelClient {
  readonly provider: string

  constructor(
    private readonly inner: ModelClient,
    private readonly cache: ResponseCache,
    private readonly identity: CacheIdentity,
    private readonly logger: Logger
  ) {
    this.provider = inner.provider
  }

  async complete(request: ModelRequest): Promise<NormalizedResponse> {
    if (request.tools.length > 0) return this.inner.complete(request)

    const key = cacheKey(this.identity, request.messages)
    const cached = await this.cache.get(key)
    if (cached) {
      this.logger.info('cache.hit', { provider: this.provider, key })
      if (cached.text) await request.onText?.(cached.text)
      return cached
    }

    this.logger.debug('cache.miss', { provider: this.provider, key })
    const response = await this.inner.complete(request)
    if (response.toolCalls.length === 0) {
      try {
        await this.cache.put(key, response)
        this.logger.debug('cache.stored', { key })
      } catch (error) {
        this.logger.warn('cache.store_failed', { key, error: errorMessage(error) })
      }
    }
    return response
  }
}
