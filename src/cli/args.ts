import { parseArgs } from 'node:util'

import { ConfigError } from '../core/errors.js'

export interface ChatArgs {
  provider?: string
  model?: string
  prompt?: string
  session?: string
  mode?: string
  stream?: boolean
  tools: boolean
  noTools: boolean
  noCache: boolean
  allowTools: string[]
  files: string[]
  system?: string
  template?: string
  vars: string[]
  maxTurns?: number
  temperature?: number
  maxTokens?: number
  maxContext?: number
  reserveOutput?: number
  exportPath?: string
}

export type HistoryAction = 'list' | 'show' | 'clear' | 'clear-all' | 'export'

export type TemplatesAction = 'list' | 'show'

export type CliCommand =
  | { kind: 'chat'; configPath?: string; chat: ChatArgs }
  | { kind: 'providers' }
  | { kind: 'list-models'; configPath?: string; provider?: string }
  | { kind: 'history'; configPath?: string; action: HistoryAction; session?: string; out?: string }
  | { kind: 'templates'; configPath?: string; action: TemplatesAction; name?: string }
  | { kind: 'config-path' }
  | { kind: 'help' }

export const USAGE = `Usage: llm-relay <command> [options]

Commands:
  chat                 Send a prompt (or start an interactive session without --prompt)
  providers            List known providers
  list-models          List models offered by --provider
  history <action>     list | show | clear | clear-all | export (--session, --out)
  templates [action]   list | show (--name)
  config-path          Print the settings file path

Chat options:
  -p, --provider <name>    openai | anthropic | ollama | grok | deepseek
  -m, --model <name>       Model; the provider default when omitted
      --prompt <text>      User message
  -s, --session <name>     Load and persist history under this name
      --mode <mode>        planning (read-only tools) | building
      --stream             Stream the reply as it arrives
      --tools              Advertise tools even to a backend without native tool calling
      --no-tools           Do not advertise or run tools
      --no-cache           Always ask the model, even for a repeated request
      --allow-tool <name>  Restrict tools to this list (repeatable)
      --file <path>        Attach a text file as context (repeatable)
      --system <text>      System prompt for a new session
      --template <name>    Render the prompt from <templates>/<name>.tmpl
      --var <key=value>    Template variable (repeatable)
      --max-turns <n>      Model invocations per prompt
      --temperature <t>    Sampling temperature
      --max-tokens <n>     Output token limit
      --max-context <n>    Request history budget in tokens, 0 disables trimming
      --reserve-output <n> Tokens kept free for the reply
      --export <path>      Write the transcript (.md, .json or .html) after the run
  -c, --config <path>      Settings file
`

function toNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`--${flag} expects a number, got '${raw}'`)
  }
  return value
}

function isHistoryAction(value: string | undefined): value is HistoryAction {
  return value === 'list' || value === 'show' || value === 'clear' || value === 'clear-all' || value === 'export'
}

/** Parses process arguments (without the node and script entries) into a command. */
export function parseCli(argv: readonly string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: 'string', short: 'c' },
      provider: { type: 'string', short: 'p' },
      model: { type: 'string', short: 'm' },
      prompt: { type: 'string' },
      session: { type: 'string', short: 's' },
      mode: { type: 'string' },
      stream: { type: 'boolean' },
      tools: { type: 'boolean' },
      'no-tools': { type: 'boolean' },
      'no-cache': { type: 'boolean' },
      'allow-tool': { type: 'string', multiple: true },
      file: { type: 'string', multiple: true },
      system: { type: 'string' },
      template: { type: 'string' },
      var: { type: 'string', multiple: true },
      'max-turns': { type: 'string' },
      temperature: { type: 'string' },
      'max-tokens': { type: 'string' },
      'max-context': { type: 'string' },
      'reserve-output': { type: 'string' },
      export: { type: 'string' },
      out: { type: 'string' },
      name: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    }
  })

  const [name, action] = positionals
  if (values.help || name === undefined || name === 'help') return { kind: 'help' }
  const configPath = values.config !== undefined ? { configPath: values.config } : {}

  switch (name) {
    case 'chat':
      if (values.tools && values['no-tools']) throw new ConfigError('--tools and --no-tools cannot be combined')
      return {
        kind: 'chat',
        ...configPath,
        chat: {
          provider: values.provider,
          model: values.model,
          prompt: values.prompt,
          session: values.session,
          mode: values.mode,
          stream: values.stream,
          tools: values.tools ?? false,
          noTools: values['no-tools'] ?? false,
          noCache: values['no-cache'] ?? false,
          allowTools: values['allow-tool'] ?? [],
          files: values.file ?? [],
          system: values.system,
          template: values.template,
          vars: values.var ?? [],
          maxTurns: toNumber('max-turns', values['max-turns']),
          temperature: toNumber('temperature', values.temperature),
          maxTokens: toNumber('max-tokens', values['max-tokens']),
          maxContext: toNumber('max-context', values['max-context']),
          reserveOutput: toNumber('reserve-output', values['reserve-output']),
          exportPath: values.export
        }
      }
    case 'providers':
      return { kind: 'providers' }
    case 'list-models':
      return { kind: 'list-models', ...configPath, provider: values.provider }
    case 'history':
      if (!isHistoryAction(action)) {
        throw new ConfigError(`history expects one of list, show, clear, clear-all, export; got '${action ?? ''}'`)
      }
      return { kind: 'history', ...configPath, action, session: values.session, out: values.out }
    case 'templates': {
      const templatesAction = action ?? 'list'
      if (templatesAction !== 'list' && templatesAction !== 'show') {
        throw new ConfigError(`templates expects list or show; got '${templatesAction}'`)
      }
      return { kind: 'templates', ...configPath, action: templatesAction, name: values.name }
    }
    case 'config-path':
      return { kind: 'config-path' }
    default:
      throw new ConfigError(`unknown command '${name}'`)
  }
}
