import { z } from 'zod'

const providerBlockSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  defaultModel: z.string().min(1).optional(),
  // Anthropic only: value of the `anthropic-version` header.
  apiVersion: z.string().optional()
})

const providerName = z.enum(['openai', 'anthropic', 'ollama', 'grok', 'deepseek'])

/**
 * Runtime configuration schema for llm-relay.
 */
export const configSchema = z.object({
  provider: providerName.default('openai'),
  model: z.string().min(1).optional(),
  providers: z
    .object({
      openai: providerBlockSchema.optional(),
      anthropic: providerBlockSchema.optional(),
      ollama: providerBlockSchema.optional(),
      grok: providerBlockSchema.optional(),
      deepseek: providerBlockSchema.optional()
    })
    .default({}),
  mode: z.enum(['planning', 'building']).default('planning'),
  // Unset: tools are on for backends with native tool calling, off otherwise.
  toolsEnabled: z.boolean().optional(),
  // Empty means every registered tool the mode permits.
  allowTools: z.array(z.string()).default([]),
  maxTurns: z.number().int().positive().default(8),
  stream: z.boolean().default(false),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  // Tried in order when the primary provider fails with a network error.
  fallback: z.array(providerName).default([]),
  // USD per 1k tokens, keyed by `provider:model` or by `provider`.
  pricing: z
    .object({
      inputUsdPer1k: z.record(z.string(), z.number().nonnegative()).default({}),
      outputUsdPer1k: z.record(z.string(), z.number().nonnegative()).default({})
    })
    .optional(),
  // Replays identical tool-less, non-streamed requests from disk.
  cache: z.boolean().default(true),
  requestTimeoutMs: z.number().int().positive().default(120_000),
  context: z
    .object({
      maxTokens: z.number().int().nonnegative().default(16_000),
      reserveOutput: z.number().int().nonnegative().default(1_024)
    })
    .default({ maxTokens: 16_000, reserveOutput: 1_024 }),
  workspace: z.string(),
  sessionDir: z.string(),
  cacheDir: z.string(),
  templateDir: z.string(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info')
})

export type RelayConfig = z.infer<typeof configSchema>
export type ProviderBlock = z.infer<typeof providerBlockSchema>
