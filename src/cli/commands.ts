import { readFile } from 'node:fs/promises'

import { loadConfig, resolveProvider, type ConfigOverrides } from '../config/load.js'
import type { RelayConfig } from '../config/schema.js'
import { getSettingsPath } from '../config/settings.js'
import type { Attachment } from '../core/agent-loop.js'
import { ConfigError, RelayError, errorMessage } from '../core/errors.js'
import { exportTranscript, toMarkdown } from '../core/export.js'
import { logger as defaultLogger, setLogLevel } from '../core/logger.js'
import { listTemplates, loadTemplate, parseTemplateVars, renderTemplate } from '../core/prompt-template.js'
import { SessionStore } from '../core/session-store.js'
import type { Logger } from '../core/types.js'
import { PROVIDER_NAMES, PROVIDER_PRESETS, createAdapter } from '../providers/registry.js'
import { HttpTransport, type FetchLike } from '../providers/transport.js'
import { USAGE, type ChatArgs, type CliCommand } from './args.js'
import { UpdateRenderer, reportResult, type CliIo } from './render.js'
import { runRepl } from './repl.js'
import { createRuntime } from './runtime.js'

export interface CommandDeps {
  io: CliIo
  env?: NodeJS.ProcessEnv
  fetch?: FetchLike
  /** Aborts the in-flight request of a one-shot chat. */
  signal?: AbortSignal
  logger?: Logger
  /** Skip `.env` files, for tests. */
  skipDotenv?: boolean
}

function configFor(
  command: { configPath?: string },
  deps: CommandDeps,
  overrides: ConfigOverrides = {}
): Readonly<RelayConfig> {
  const config = loadConfig({
    ...(command.configPath ? { configPath: command.configPath } : {}),
    ...(deps.env ? { env: deps.env } : {}),
    ...(deps.skipDotenv ? { skipDotenv: true } : {}),
    overrides
  })
  setLogLevel(config.logLevel)
  return config
}

function chatOverrides(chat: ChatArgs): ConfigOverrides {
  return {
    provider: chat.provider,
    model: chat.model,
    mode: chat.mode,
    stream: chat.stream,
    toolsEnabled: chat.noTools ? false : chat.tools ? true : undefined,
    cache: chat.noCache ? false : undefined,
    allowTools: chat.allowTools.length > 0 ? chat.allowTools : undefined,
    maxTurns: chat.maxTurns,
    temperature: chat.temperature,
    maxTokens: chat.maxTokens,
    maxContextTokens: chat.maxContext,
    reserveOutput: chat.reserveOutput
  }
}

/** Builds the user prompt from `--prompt` and/or `--template`; undefined means interactive. */
async function resolvePrompt(chat: ChatArgs, config: Readonly<RelayConfig>): Promise<string | undefined> {
  if (!chat.template) {
    if (chat.vars.length > 0) throw new ConfigError('--var requires --template')
    return chat.prompt
  }
  const template = await loadTemplate(config.templateDir, chat.template)
  const vars = parseTemplateVars(chat.vars)
  return renderTemplate(template, chat.prompt !== undefined ? { prompt: chat.prompt, ...vars } : vars)
}

async function readAttachments(files: readonly string[]): Promise<Attachment[]> {
  return Promise.all(
    files.map(async (path) => {
      try {
        return { path, content: await readFile(path, 'utf-8') }
      } catch (error) {
        throw new ConfigError(`cannot read attached file ${path}: ${errorMessage(error)}`, { cause: error })
      }
    })
  )
}

async function runChat(command: Extract<CliCommand, { kind: 'chat' }>, deps: CommandDeps, logger: Logger): Promise<number> {
  const { chat } = command
  const config = configFor(command, deps, chatOverrides(chat))
  const prompt = await resolvePrompt(chat, config)
  const attachments = await readAttachments(chat.files)
  const runtime = createRuntime(config, logger, {
    ...(chat.session ? { session: chat.session } : {}),
    ...(deps.fetch ? { fetch: deps.fetch } : {})
  })
  const context = {
    ...(chat.system ? { system: chat.system } : {}),
    attachments
  }

  if (prompt === undefined) return runRepl(runtime, deps.io, logger, context)

  const renderer = new UpdateRenderer(deps.io)
  const result = await runtime.loop.run(runtime.sessionId, prompt, {
    ...context,
    ...(deps.signal ? { signal: deps.signal } : {}),
    onUpdate: renderer.onUpdate
  })
  renderer.finish()

  if (chat.exportPath && (result.status === 'final' || result.status === 'turn_limit_exceeded')) {
    const conversation = await runtime.store.load(runtime.sessionId)
    const format = await exportTranscript(chat.exportPath, conversation.messages)
    deps.io.stderr.write(`exported ${conversation.length} messages to ${chat.exportPath} (${format})\n`)
  }
  return reportResult(result, deps.io)
}

function runProviders(io: CliIo): number {
  for (const name of PROVIDER_NAMES) {
    const preset = PROVIDER_PRESETS[name]
    io.stdout.write(`${name}\t${preset.family}\t${preset.defaultModel}\t${preset.baseUrl}\n`)
  }
  return 0
}

async function runListModels(
  command: Extract<CliCommand, { kind: 'list-models' }>,
  deps: CommandDeps,
  logger: Logger
): Promise<number> {
  const config = configFor(command, deps, { provider: command.provider })
  const adapter = createAdapter(resolveProvider(config))
  const request = adapter.buildListModelsRequest()
  let models: string[]
  if (request) {
    const transport = new HttpTransport({
      timeoutMs: config.requestTimeoutMs,
      logger,
      ...(deps.fetch ? { fetch: deps.fetch } : {})
    })
    models = adapter.parseListModels(await transport.sendJson(request, deps.signal))
  } else {
    models = adapter.parseListModels(undefined)
  }
  for (const model of models) deps.io.stdout.write(`${model}\n`)
  return 0
}

function requireSession(session: string | undefined, action: string): string {
  if (!session) throw new ConfigError(`history ${action} requires --session`)
  return session
}

async function runHistory(
  command: Extract<CliCommand, { kind: 'history' }>,
  deps: CommandDeps,
  logger: Logger
): Promise<number> {
  const config = configFor(command, deps)
  const store = new SessionStore(config.sessionDir, logger)
  const { io } = deps

  switch (command.action) {
    case 'list':
      for (const name of await store.list()) io.stdout.write(`${name}\n`)
      return 0
    case 'show': {
      const conversation = await store.load(requireSession(command.session, 'show'))
      io.stdout.write(toMarkdown(conversation.messages))
      return 0
    }
    case 'clear': {
      const session = requireSession(command.session, 'clear')
      await store.delete(session)
      io.stdout.write(`cleared ${session}\n`)
      return 0
    }
    case 'clear-all': {
      const count = await store.clearAll()
      io.stdout.write(`cleared ${count} sessions\n`)
      return 0
    }
    case 'export': {
      const conversation = await store.load(requireSession(command.session, 'export'))
      if (!command.out) throw new ConfigError('history export requires --out')
      const format = await exportTranscript(command.out, conversation.messages)
      io.stdout.write(`exported ${conversation.length} messages to ${command.out} (${format})\n`)
      return 0
    }
  }
}

async function runTemplates(command: Extract<CliCommand, { kind: 'templates' }>, deps: CommandDeps): Promise<number> {
  const config = configFor(command, deps)
  if (command.action === 'show') {
    if (!command.name) throw new ConfigError('templates show requires --name')
    const template = await loadTemplate(config.templateDir, command.name)
    deps.io.stdout.write(template.endsWith('\n') ? template : `${template}\n`)
    return 0
  }
  for (const name of await listTemplates(config.templateDir)) deps.io.stdout.write(`${name}\n`)
  return 0
}

/**
 * Executes a parsed command and returns the process exit code.
 *
 * Relay errors are printed as `error: <message>` with exit code 1; anything
 * else propagates.
 */
export async function runCommand(command: CliCommand, deps: CommandDeps): Promise<number> {
  const logger = deps.logger ?? defaultLogger
  try {
    switch (command.kind) {
      case 'chat':
        return await runChat(command, deps, logger)
      case 'providers':
        return runProviders(deps.io)
      case 'list-models':
        return await runListModels(command, deps, logger)
      case 'history':
        return await runHistory(command, deps, logger)
      case 'templates':
        return await runTemplates(command, deps)
      case 'config-path':
        deps.io.stdout.write(`${getSettingsPath(deps.env)}\n`)
        return 0
      case 'help':
        deps.io.stdout.write(USAGE)
        return 0
    }
  } catch (error) {
    if (!(error instanceof RelayError)) throw error
    logger.error('command.failed', { command: command.kind, code: error.code, error: error.message })
    deps.io.stderr.write(`error: ${error.message}\n`)
    return 1
  }
}
