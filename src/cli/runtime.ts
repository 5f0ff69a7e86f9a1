import type { RelayConfig } from '../config/schema.js'
import { resolveProvider } from '../config/load.js'
import { AgentLoop } from '../core/agent-loop.js'
import { ConfigError } from '../core/errors.js'
import { FallbackClient, ProviderClient, type ModelClient, type ProviderClientOptions } from '../core/model-client.js'
import { createToolRegistry } from '../core/register-tools.js'
import { CachingClient, ResponseCache } from '../core/response-cache.js'
import { InMemorySessionStore, SessionStore, type ConversationStore } from '../core/session-store.js'
import type { Logger } from '../core/types.js'
import { createAdapter } from '../providers/registry.js'
import { HttpTransport, type FetchLike } from '../providers/transport.js'
import type { ProviderAdapter, ProviderName, ProviderSettings } from '../providers/types.js'

export interface RuntimeOptions {
  /** Named session to persist under; without one the run stays in memory. */
  session?: string
  fetch?: FetchLike
}

export interface Runtime {
  adapter: ProviderAdapter
  transport: HttpTransport
  store: ConversationStore
  sessionId: string
  loop: AgentLoop
}

/** Name used for conversations that are not persisted. */
export const SCRATCH_SESSION = 'scratch'

function clientOptions(config: Readonly<RelayConfig>, model: string | undefined): ProviderClientOptions {
  return {
    stream: config.stream,
    ...(model ? { model } : {}),
    ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
    ...(config.maxTokens !== undefined ? { maxTokens: config.maxTokens } : {}),
    ...(config.pricing ? { pricing: config.pricing } : {})
  }
}

function resolveFallback(config: Readonly<RelayConfig>, name: ProviderName, logger: Logger): ProviderSettings | undefined {
  try {
    return resolveProvider(config, name)
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    logger.warn('provider.fallback_skipped', { provider: name, error: error.message })
    return undefined
  }
}

/** Clients for the configured fallback providers; ones without credentials are skipped. */
function fallbackClients(config: Readonly<RelayConfig>, transport: HttpTransport, logger: Logger): ModelClient[] {
  const clients: ModelClient[] = []
  for (const name of config.fallback) {
    if (name === config.provider) continue
    const settings = resolveFallback(config, name, logger)
    if (!settings) continue
    // The primary's --model names a model of the primary; fallbacks use their own default.
    clients.push(new ProviderClient(createAdapter(settings), transport, clientOptions(config, undefined), logger))
  }
  return clients
}

/** Wires adapter, transport, tools, store and loop from a loaded config. */
export function createRuntime(config: Readonly<RelayConfig>, logger: Logger, options: RuntimeOptions = {}): Runtime {
  const adapter = createAdapter(resolveProvider(config))
  const transport = new HttpTransport({
    timeoutMs: config.requestTimeoutMs,
    logger,
    ...(options.fetch ? { fetch: options.fetch } : {})
  })
  const model = config.model ?? adapter.defaultModel
  const primary = new ProviderClient(adapter, transport, clientOptions(config, config.model), logger)
  const alternates = fallbackClients(config, transport, logger)
  let client: ModelClient = alternates.length > 0 ? new FallbackClient([primary, ...alternates], logger) : primary
  if (config.cache && !config.stream) {
    client = new CachingClient(
      client,
      new ResponseCache(config.cacheDir, logger),
      {
        provider: adapter.name,
        model,
        ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
        ...(config.maxTokens !== undefined ? { maxTokens: config.maxTokens } : {})
      },
      logger
    )
  }
  const toolsEnabled = config.toolsEnabled ?? adapter.supportsTools
  const registry = createToolRegistry({ allow: config.allowTools })
  const store = options.session ? new SessionStore(config.sessionDir, logger) : new InMemorySessionStore()
  const loop = new AgentLoop(
    client,
    registry,
    store,
    {
      mode: config.mode,
      maxTurns: config.maxTurns,
      workspace: config.workspace,
      toolsEnabled,
      context: config.context
    },
    logger
  )

  logger.info('startup.config', {
    provider: adapter.name,
    model,
    mode: config.mode,
    stream: config.stream,
    tools: toolsEnabled,
    fallback: alternates.map((alternate) => alternate.provider),
    cache: config.cache && !config.stream
  })

  return { adapter, transport, store, sessionId: options.session ?? SCRATCH_SESSION, loop }
}
