import { z } from 'zod/v4'

import { trimToBudget } from './context.js'
import type { Conversation } from './conversation.js'
import {
  PolicyViolationError,
  RelayError,
  SessionIOError,
  ToolExecutionError,
  UnknownToolError,
  errorMessage
} from './errors.js'
import type { ModelClient } from './model-client.js'
import type { ConversationStore } from './session-store.js'
import type { ToolRegistry } from './tool-registry.js'
import type { AgentTurnUpdate, Logger, Mode, ToolCall, ToolContext, ToolSpec, Usage } from './types.js'
import { addUsage } from './usage.js'

export interface AgentLoopSettings {
  mode: Mode
  maxTurns: number
  workspace: string
  /** When false no tools are advertised and requested calls are refused. */
  toolsEnabled: boolean
  /** Request history budget; `maxTokens: 0` disables trimming. */
  context: { maxTokens: number; reserveOutput: number }
}

export interface Attachment {
  path: string
  content: string
}

export interface RunOptions {
  /** Leading system prompt, applied only to a conversation that is still empty. */
  system?: string
  attachments?: readonly Attachment[]
  signal?: AbortSignal
  onUpdate?: (update: AgentTurnUpdate) => Promise<void> | void
}

export type RunResult =
  | { status: 'final'; text: string; turns: number; usage?: Usage; persistError?: SessionIOError }
  | { status: 'turn_limit_exceeded'; turns: number; usage?: Usage; persistError?: SessionIOError }
  | { status: 'fatal'; error: RelayError; turns: number }
  | { status: 'aborted'; turns: number }

export type RunStatus = RunResult['status']

type ToolErrorKind = 'PolicyViolation' | 'UnknownTool' | 'ToolExecutionError'

/** Renders a recovered tool failure as tool-result content the model can read. */
export function formatToolError(error: PolicyViolationError | UnknownToolError | ToolExecutionError): string {
  const kind: ToolErrorKind =
    error instanceof PolicyViolationError
      ? 'PolicyViolation'
      : error instanceof UnknownToolError
        ? 'UnknownTool'
        : 'ToolExecutionError'
  return JSON.stringify({ error: kind, message: error.message })
}

function isAbort(error: unknown, signal: AbortSignal | undefined): boolean {
  if (signal?.aborted) return true
  return error instanceof Error && error.name === 'AbortError'
}

/**
 * Drives the request / tool-execution cycle for one user input.
 *
 * Each iteration sends the conversation to the model, executes the returned
 * tool calls sequentially in the order given, appends their results and
 * repeats until the model answers without tool calls or `maxTurns` model
 * invocations have been made.
 */
export class AgentLoop {
  private mode: Mode

  constructor(
    private readonly client: ModelClient,
    private readonly registry: ToolRegistry,
    private readonly store: ConversationStore,
    private readonly settings: AgentLoopSettings,
    private readonly logger: Logger
  ) {
    this.mode = settings.mode
  }

  get currentMode(): Mode {
    return this.mode
  }

  setMode(mode: Mode): void {
    this.mode = mode
    this.logger.info('agent.mode_changed', { mode })
  }

  /** Loads `sessionId`, runs one user input against it and persists the result. */
  async run(sessionId: string, userText: string, options: RunOptions = {}): Promise<RunResult> {
    let conversation: Conversation
    try {
      conversation = await this.store.load(sessionId)
    } catch (error) {
      if (error instanceof SessionIOError) {
        this.logger.error('session.load_failed', { sessionId, error: error.message })
        return { status: 'fatal', error, turns: 0 }
      }
      throw error
    }
    return this.runConversation(conversation, userText, options)
  }

  /**
   * Runs one user input against an already loaded conversation.
   *
   * On a fatal error or abort the conversation is rolled back to its last
   * persisted state, so memory and disk agree and a retry starts clean.
   */
  async runConversation(conversation: Conversation, userText: string, options: RunOptions = {}): Promise<RunResult> {
    const sessionId = conversation.sessionId
    const mode = this.mode
    let committed = conversation.checkpoint()
    let turn = 0
    let persistError: SessionIOError | undefined
    let usage: Usage | undefined

    const publish = async (update: Omit<AgentTurnUpdate, 'sessionId' | 'turn'>): Promise<void> => {
      await options.onUpdate?.({ sessionId, turn, ...update })
    }

    const tools: ToolSpec[] = this.settings.toolsEnabled ? this.registry.list(mode) : []

    try {
      if (options.system && conversation.length === 0) {
        conversation.append({ role: 'system', content: options.system })
      }
      for (const attachment of options.attachments ?? []) {
        conversation.append({ role: 'system', content: `Attached file '${attachment.path}':\n${attachment.content}` })
      }
      conversation.append({ role: 'user', content: userText })

      while (turn < this.settings.maxTurns) {
        options.signal?.throwIfAborted()
        turn += 1
        conversation.recordTurn()
        this.logger.info('agent.turn_started', { sessionId, turn, mode })
        await publish({ kind: 'turn_started', message: `turn ${turn}` })

        const request = trimToBudget(
          conversation.messages,
          this.settings.context.maxTokens,
          this.settings.context.reserveOutput
        )
        if (request.length < conversation.length) {
          this.logger.debug('agent.context_trimmed', { sessionId, kept: request.length, total: conversation.length })
        }

        const response = await this.client.complete({
          messages: request,
          tools,
          mode,
          ...(options.signal ? { signal: options.signal } : {}),
          onText: (text) => publish({ kind: 'text_delta', message: 'text', text })
        })
        if (response.usage) usage = addUsage(usage, response.usage)

        if (response.toolCalls.length === 0) {
          const text = response.text ?? ''
          conversation.append({ role: 'assistant', content: text })
          persistError = await this.persist(conversation)
          committed = conversation.checkpoint()
          this.logger.info('agent.turn_finished', { sessionId, turn, status: 'final' })
          await publish({ kind: 'turn_finished', message: 'final' })
          return {
            status: 'final',
            text,
            turns: turn,
            ...(usage ? { usage } : {}),
            ...(persistError ? { persistError } : {})
          }
        }

        conversation.append({
          role: 'assistant',
          ...(response.text ? { content: response.text } : {}),
          tool_calls: response.toolCalls
        })

        const context: ToolContext = {
          workspace: this.settings.workspace,
          sessionId,
          mode,
          ...(options.signal ? { signal: options.signal } : {})
        }
        for (const call of response.toolCalls) {
          options.signal?.throwIfAborted()
          const content = await this.executeCall(call, context, publish)
          conversation.append({ role: 'tool', tool_call_id: call.id, name: call.name, content })
        }

        persistError = await this.persist(conversation)
        committed = conversation.checkpoint()
        await publish({ kind: 'turn_finished', message: `${response.toolCalls.length} tool call(s)` })
      }

      this.logger.warn('agent.turn_limit_exceeded', { sessionId, turns: turn, maxTurns: this.settings.maxTurns })
      return {
        status: 'turn_limit_exceeded',
        turns: turn,
        ...(usage ? { usage } : {}),
        ...(persistError ? { persistError } : {})
      }
    } catch (error) {
      conversation.rollback(committed)
      if (isAbort(error, options.signal)) {
        this.logger.warn('agent.aborted', { sessionId, turn })
        return { status: 'aborted', turns: turn }
      }
      if (error instanceof RelayError) {
        this.logger.error('agent.turn_failed', { sessionId, turn, code: error.code, error: error.message })
        return { status: 'fatal', error, turns: turn }
      }
      throw error
    }
  }

  /** Saves the conversation; a save failure is logged and returned, not thrown. */
  private async persist(conversation: Conversation): Promise<SessionIOError | undefined> {
    try {
      await this.store.save(conversation)
      return undefined
    } catch (error) {
      if (!(error instanceof SessionIOError)) throw error
      this.logger.error('session.save_failed', { sessionId: conversation.sessionId, error: error.message })
      return error
    }
  }

  /**
   * Resolves, validates and executes one call. Policy and tool failures are
   * returned as content; only an abort propagates.
   */
  private async executeCall(
    call: ToolCall,
    context: ToolContext,
    publish: (update: Omit<AgentTurnUpdate, 'sessionId' | 'turn'>) => Promise<void>
  ): Promise<string> {
    const base = { toolName: call.name, toolCallId: call.id }
    try {
      if (!this.settings.toolsEnabled) {
        throw new PolicyViolationError(call.name, context.mode, 'tools are disabled for this session')
      }
      const tool = this.registry.resolve(call.name, context.mode)
      const parsed = z.object(tool.inputSchema).safeParse(call.arguments)
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
          .join('; ')
        throw new ToolExecutionError(call.name, `invalid arguments: ${issues}`)
      }

      await publish({ kind: 'tool_call_started', message: `running ${call.name}`, ...base })
      const output = await tool.execute(parsed.data, context)
      this.logger.info('tool.executed', { sessionId: context.sessionId, tool: call.name, toolCallId: call.id })
      await publish({ kind: 'tool_call_finished', message: `${call.name} finished`, ...base })
      return output
    } catch (error) {
      if (context.signal?.aborted) throw error
      const recovered =
        error instanceof PolicyViolationError ||
        error instanceof UnknownToolError ||
        error instanceof ToolExecutionError
          ? error
          : new ToolExecutionError(call.name, errorMessage(error), { cause: error })
      this.logger.warn('tool.failed', {
        sessionId: context.sessionId,
        tool: call.name,
        toolCallId: call.id,
        code: recovered.code,
        error: recovered.message
      })
      await publish({ kind: 'tool_call_failed', message: recovered.message, ...base })
      return formatToolError(recovered)
    }
  }
}
