import { AnthropicAdapter } from './anthropic.js'
import { OllamaAdapter } from './ollama.js'
import { OpenAiCompatibleAdapter } from './openai.js'
import type { ProtocolFamily, ProviderAdapter, ProviderName, ProviderSettings } from './types.js'

export interface ProviderPreset {
  family: ProtocolFamily
  baseUrl: string
  defaultModel: string
  /** Environment variables consulted for the API key, in order. */
  apiKeyEnv: readonly string[]
  requiresApiKey: boolean
}

export const PROVIDER_PRESETS: Readonly<Record<ProviderName, ProviderPreset>> = {
  openai: {
    family: 'openai',
    baseUrl: 'https://api.openai.com/v1',
    defaultModel: 'gpt-4o-mini',
    apiKeyEnv: ['OPENAI_API_KEY'],
    requiresApiKey: true
  },
  anthropic: {
    family: 'anthropic',
    baseUrl: 'https://api.anthropic.com',
    defaultModel: 'claude-3-5-sonnet-latest',
    apiKeyEnv: ['ANTHROPIC_API_KEY'],
    requiresApiKey: true
  },
  ollama: {
    family: 'ollama',
    baseUrl: 'http://localhost:11434',
    defaultModel: 'llama3.1',
    apiKeyEnv: [],
    requiresApiKey: false
  },
  grok: {
    family: 'openai',
    baseUrl: 'https://api.x.ai/v1',
    defaultModel: 'grok-2-latest',
    apiKeyEnv: ['XAI_API_KEY', 'GROK_API_KEY'],
    requiresApiKey: true
  },
  deepseek: {
    family: 'openai',
    baseUrl: 'https://api.deepseek.com',
    defaultModel: 'deepseek-chat',
    apiKeyEnv: ['DEEPSEEK_API_KEY'],
    requiresApiKey: true
  }
}

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'anthropic', 'ollama', 'grok', 'deepseek']

/** Selects the adapter variant for a protocol family. */
export function createAdapter(settings: ProviderSettings): ProviderAdapter {
  switch (settings.family) {
    case 'openai':
      return new OpenAiCompatibleAdapter(settings)
    case 'anthropic':
      return new AnthropicAdapter(settings)
    case 'ollama':
      return new OllamaAdapter(settings)
  }
}
