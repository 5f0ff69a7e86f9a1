import { config as loadEnv } from 'dotenv'
import * as path from 'node:path'

import { ConfigError } from '../core/errors.js'
import { PROVIDER_NAMES, PROVIDER_PRESETS } from '../providers/registry.js'
import type { ProviderName, ProviderSettings } from '../providers/types.js'
import { getConfigDir, getSettingsPath, readSettings, settingsExist } from './settings.js'
import { configSchema, type ProviderBlock, type RelayConfig } from './schema.js'

/** Per-invocation values that win over the settings file and the environment. */
export interface ConfigOverrides {
  provider?: string
  model?: string
  mode?: string
  stream?: boolean
  toolsEnabled?: boolean
  cache?: boolean
  allowTools?: string[]
  maxTurns?: number
  temperature?: number
  maxTokens?: number
  maxContextTokens?: number
  reserveOutput?: number
}

export interface LoadConfigOptions {
  /** Explicit settings file; defaults to `~/.llm-relay/settings.json` when present. */
  configPath?: string
  env?: NodeJS.ProcessEnv
  overrides?: ConfigOverrides
  /** Skip reading `.env` files, for tests. */
  skipDotenv?: boolean
}

/** Parses comma-separated allow-list env values. */
function parseCsv(input: string | undefined): string[] | undefined {
  if (!input) return undefined
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

function parseNumber(input: string | undefined): number | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return Number(input)
}

function parseBoolean(input: string | undefined): boolean | undefined {
  if (input === undefined) return undefined
  return input === 'true' || input === '1'
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined))
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Fills provider API keys and the Ollama host from the environment when the file leaves them out. */
function providerBlocksFromEnv(fileProviders: unknown, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const blocks: Record<string, unknown> = isRecord(fileProviders) ? { ...fileProviders } : {}
  for (const name of PROVIDER_NAMES) {
    const existing = blocks[name]
    const block: Record<string, unknown> = isRecord(existing) ? { ...existing } : {}
    if (block.apiKey === undefined) {
      const key = PROVIDER_PRESETS[name].apiKeyEnv.map((variable) => env[variable]).find(Boolean)
      if (key) block.apiKey = key
    }
    if (name === 'ollama' && block.baseUrl === undefined && env.OLLAMA_BASE_URL) {
      block.baseUrl = env.OLLAMA_BASE_URL
    }
    if (Object.keys(block).length > 0) blocks[name] = block
  }
  return blocks
}

/**
 * Loads runtime configuration once for the whole process.
 *
 * Precedence, lowest first: built-in defaults, settings file, environment
 * (including `.env` files), per-invocation overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<RelayConfig> {
  const env = options.env ?? process.env

  if (!options.skipDotenv) {
    // Load env from ~/.llm-relay/.env first, then local .env as a fallback.
    loadEnv({ path: path.join(getConfigDir(env), '.env'), processEnv: env, quiet: true })
    loadEnv({ processEnv: env, quiet: true })
  }

  const configDir = getConfigDir(env)
  const settingsPath = options.configPath ?? getSettingsPath(env)
  if (options.configPath && !settingsExist(settingsPath)) {
    throw new ConfigError(`settings file not found: ${settingsPath}`)
  }
  const file = settingsExist(settingsPath) ? readSettings(settingsPath) : {}

  const fromEnv = definedOnly({
    provider: env.LLMRELAY_PROVIDER,
    model: env.LLMRELAY_MODEL,
    mode: env.LLMRELAY_MODE,
    stream: parseBoolean(env.LLMRELAY_STREAM),
    toolsEnabled: parseBoolean(env.LLMRELAY_TOOLS),
    cache: parseBoolean(env.LLMRELAY_CACHE),
    fallback: parseCsv(env.LLMRELAY_FALLBACK),
    allowTools: parseCsv(env.LLMRELAY_ALLOW_TOOLS),
    maxTurns: parseNumber(env.LLMRELAY_MAX_TURNS),
    workspace: env.LLMRELAY_WORKSPACE,
    sessionDir: env.LLMRELAY_SESSION_DIR,
    cacheDir: env.LLMRELAY_CACHE_DIR,
    logLevel: env.LLMRELAY_LOG_LEVEL
  })

  const { maxContextTokens, reserveOutput, ...overrides } = options.overrides ?? {}
  const context = {
    ...(isRecord(file.context) ? file.context : {}),
    ...definedOnly({ maxTokens: parseNumber(env.LLMRELAY_MAX_CONTEXT) }),
    ...definedOnly({ maxTokens: maxContextTokens, reserveOutput })
  }

  const merged = {
    workspace: process.cwd(),
    sessionDir: path.join(configDir, 'sessions'),
    cacheDir: path.join(configDir, 'cache'),
    templateDir: path.join(configDir, 'templates'),
    ...file,
    ...fromEnv,
    ...definedOnly({ ...overrides }),
    context,
    providers: providerBlocksFromEnv(file.providers, env)
  }

  const parsed = configSchema.safeParse(merged)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`invalid configuration: ${issues}`)
  }
  return Object.freeze(parsed.data)
}

/**
 * Resolves the settings for one backend, applying preset defaults.
 *
 * Throws `ConfigError` when the provider needs an API key and none is configured.
 */
export function resolveProvider(config: Readonly<RelayConfig>, name: ProviderName = config.provider): ProviderSettings {
  const preset = PROVIDER_PRESETS[name]
  const block: ProviderBlock = config.providers[name] ?? {}

  if (preset.requiresApiKey && !block.apiKey) {
    const hint = preset.apiKeyEnv.join(' or ')
    throw new ConfigError(`missing API key for provider '${name}' (set ${hint} or providers.${name}.apiKey)`)
  }

  return {
    name,
    family: preset.family,
    baseUrl: block.baseUrl ?? preset.baseUrl,
    defaultModel: block.defaultModel ?? preset.defaultModel,
    ...(block.apiKey ? { apiKey: block.apiKey } : {}),
    ...(block.apiVersion ? { apiVersion: block.apiVersion } : {})
  }
}
