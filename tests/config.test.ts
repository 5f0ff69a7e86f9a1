import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import { loadConfig, resolveProvider } from '../src/config/load.js'
import { getSettingsPath } from '../src/config/settings.js'
import { ConfigError } from '../src/core/errors.js'

async function home(settings?: unknown): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'llm-relay-config-'))
  if (settings !== undefined) await writeFile(join(dir, 'settings.json'), JSON.stringify(settings), 'utf-8')
  return dir
}

describe('loadConfig', () => {
  it('applies defaults under the config home', async () => {
    const dir = await home()

    const config = loadConfig({ env: { LLMRELAY_HOME: dir }, skipDotenv: true })

    expect(config.provider).toBe('openai')
    expect(config.mode).toBe('planning')
    expect(config.maxTurns).toBe(8)
    expect(config.stream).toBe(false)
    expect(config.toolsEnabled).toBeUndefined()
    expect(config.cache).toBe(true)
    expect(config.fallback).toEqual([])
    expect(config.pricing).toBeUndefined()
    expect(config.cacheDir).toBe(join(dir, 'cache'))
    expect(config.context).toEqual({ maxTokens: 16000, reserveOutput: 1024 })
    expect(config.sessionDir).toBe(join(dir, 'sessions'))
    expect(config.templateDir).toBe(join(dir, 'templates'))
    expect(Object.isFrozen(config)).toBe(true)
  })

  it('layers settings file, environment and overrides', async () => {
    const dir = await home({ provider: 'anthropic', maxTurns: 4, mode: 'building', context: { reserveOutput: 256 } })

    const fromFile = loadConfig({ env: { LLMRELAY_HOME: dir }, skipDotenv: true })
    const fromEnv = loadConfig({
      env: { LLMRELAY_HOME: dir, LLMRELAY_MAX_TURNS: '6', LLMRELAY_ALLOW_TOOLS: 'read_file, echo' },
      skipDotenv: true
    })
    const overridden = loadConfig({
      env: { LLMRELAY_HOME: dir, LLMRELAY_MAX_TURNS: '6' },
      skipDotenv: true,
      overrides: { maxTurns: 2, provider: 'ollama', maxContextTokens: 500 }
    })

    expect(fromFile).toMatchObject({ provider: 'anthropic', maxTurns: 4, mode: 'building' })
    expect(fromFile.context).toEqual({ maxTokens: 16000, reserveOutput: 256 })
    expect(fromEnv.maxTurns).toBe(6)
    expect(fromEnv.allowTools).toEqual(['read_file', 'echo'])
    expect(overridden.maxTurns).toBe(2)
    expect(overridden.provider).toBe('ollama')
    expect(overridden.context).toEqual({ maxTokens: 500, reserveOutput: 256 })
  })

  it('reads tools, cache and fallback switches from the environment', async () => {
    const dir = await home()

    const config = loadConfig({
      env: { LLMRELAY_HOME: dir, LLMRELAY_TOOLS: 'false', LLMRELAY_CACHE: '0', LLMRELAY_FALLBACK: 'deepseek, ollama' },
      skipDotenv: true
    })

    expect(config.toolsEnabled).toBe(false)
    expect(config.cache).toBe(false)
    expect(config.fallback).toEqual(['deepseek', 'ollama'])
  })

  it('reads pricing tables from the settings file', async () => {
    const dir = await home({ pricing: { inputUsdPer1k: { openai: 0.5 } } })

    const config = loadConfig({ env: { LLMRELAY_HOME: dir }, skipDotenv: true })

    expect(config.pricing).toEqual({ inputUsdPer1k: { openai: 0.5 }, outputUsdPer1k: {} })
  })

  it('reads provider credentials from the environment', async () => {
    const dir = await home({ providers: { openai: { baseUrl: 'https://proxy.test/v1' } } })

    const config = loadConfig({
      env: { LLMRELAY_HOME: dir, OPENAI_API_KEY: 'test-secret', GROK_API_KEY: 'test-grok' },
      skipDotenv: true
    })

    expect(config.providers.openai).toEqual({ baseUrl: 'https://proxy.test/v1', apiKey: 'test-secret' })
    expect(config.providers.grok).toEqual({ apiKey: 'test-grok' })
  })

  it('rejects invalid values with a ConfigError naming the field', async () => {
    const dir = await home({ maxTurns: 0 })

    expect(() => loadConfig({ env: { LLMRELAY_HOME: dir }, skipDotenv: true })).toThrow(/^invalid configuration: maxTurns: /)
    expect(() =>
      loadConfig({ env: { LLMRELAY_HOME: dir }, skipDotenv: true, overrides: { provider: 'mystery', maxTurns: 1 } })
    ).toThrow(ConfigError)
  })

  it('fails when an explicit settings file is missing or not an object', async () => {
    const dir = await home()
    const listFile = join(dir, 'list.json')
    await writeFile(listFile, '[]', 'utf-8')

    expect(() => loadConfig({ configPath: join(dir, 'nope.json'), env: {}, skipDotenv: true })).toThrow(
      `settings file not found: ${join(dir, 'nope.json')}`
    )
    expect(() => loadConfig({ configPath: listFile, env: {}, skipDotenv: true })).toThrow(
      `settings file ${listFile} must contain a JSON object`
    )
  })

  it('places the settings file under the config home', () => {
    expect(getSettingsPath({ LLMRELAY_HOME: '/tmp/relay-home' })).toBe('/tmp/relay-home/settings.json')
  })
})

describe('resolveProvider', () => {
  it('fills preset defaults and the API key', async () => {
    const config = loadConfig({ env: { LLMRELAY_HOME: await home(), DEEPSEEK_API_KEY: 'test-secret' }, skipDotenv: true })

    expect(resolveProvider(config, 'deepseek')).toEqual({
      name: 'deepseek',
      family: 'openai',
      baseUrl: 'https://api.deepseek.com',
      defaultModel: 'deepseek-chat',
      apiKey: 'test-secret'
    })
  })

  it('requires an API key for hosted providers', async () => {
    const config = loadConfig({ env: { LLMRELAY_HOME: await home() }, skipDotenv: true })

    expect(() => resolveProvider(config, 'anthropic')).toThrow(
      "missing API key for provider 'anthropic' (set ANTHROPIC_API_KEY or providers.anthropic.apiKey)"
    )
    expect(() => resolveProvider(config, 'grok')).toThrow('set XAI_API_KEY or GROK_API_KEY')
  })

  it('lets Ollama run without a key and honours OLLAMA_BASE_URL', async () => {
    const config = loadConfig({
      env: { LLMRELAY_HOME: await home(), OLLAMA_BASE_URL: 'http://gpu-box.test:11434' },
      skipDotenv: true
    })

    expect(resolveProvider(config, 'ollama')).toEqual({
      name: 'ollama',
      family: 'ollama',
      baseUrl: 'http://gpu-box.test:11434',
      defaultModel: 'llama3.1'
    })
  })
})
