export type Role = 'system' | 'user' | 'assistant' | 'tool'

/** Tool policy setting: planning only runs read-only tools, building runs everything. */
export type Mode = 'planning' | 'building'

export type JsonObject = Record<string, unknown>

/**
 * Structured request, emitted by the model, to invoke a named local tool.
 */
export interface ToolCall {
  id: string
  name: string
  arguments: JsonObject
}

/**
 * Normalized conversation message shared by every provider adapter.
 */
export interface Message {
  role: Role
  content?: string
  /** Present only on assistant messages that request tool execution. */
  tool_calls?: ToolCall[]
  /** Present only on tool messages; references the originating call. */
  tool_call_id?: string
  /** Tool name carried on tool messages. */
  name?: string
}

/**
 * Persisted conversation document for one session.
 */
export interface ConversationRecord {
  session_id: string
  turn_count: number
  messages: Message[]
}

/**
 * Tool descriptor advertised to the provider.
 */
export interface ToolSpec {
  name: string
  description: string
  /** JSON Schema of the expected arguments. */
  parameters: JsonObject
  read_only: boolean
}

export interface Usage {
  inputTokens: number
  outputTokens: number
  totalTokens: number
  /** Estimated spend, present when pricing is configured. */
  costUsd?: number
}

/**
 * Provider-independent result of one model invocation.
 */
export interface NormalizedResponse {
  text?: string
  toolCalls: ToolCall[]
  usage?: Usage
}

export type StreamEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'tool_call_started'; id: string; name: string }
  | { type: 'tool_call_arg_delta'; id: string; fragment: string }
  | { type: 'tool_call_completed'; id: string }
  | { type: 'done' }

/**
 * Per-turn execution context passed to tools.
 */
export interface ToolContext {
  workspace: string
  sessionId: string
  mode: Mode
  signal?: AbortSignal
}

export type AgentTurnUpdateKind =
  | 'turn_started'
  | 'text_delta'
  | 'tool_call_started'
  | 'tool_call_finished'
  | 'tool_call_failed'
  | 'turn_finished'

export interface AgentTurnUpdate {
  kind: AgentTurnUpdateKind
  sessionId: string
  turn: number
  message: string
  toolName?: string
  toolCallId?: string
  /** Raw text fragment for `text_delta` updates. */
  text?: string
}

/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}
