import type { Mode } from './types.js'

export type RelayErrorCode =
  | 'config'
  | 'network'
  | 'protocol'
  | 'capability_unsupported'
  | 'duplicate_tool'
  | 'unknown_tool'
  | 'policy_violation'
  | 'tool_execution'
  | 'session_io'

/**
 * Base class for every error raised by the relay core.
 *
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class RelayError extends Error {
  constructor(
    readonly code: RelayErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Missing credentials or unknown provider. Fatal before any turn starts. */
export class ConfigError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options)
  }
}

/** Connection failure, timeout or non-success HTTP status. */
export class NetworkError extends RelayError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('network', message, options)
  }
}

/** Payload did not match the adapter's expected shape. */
export class ProtocolError extends RelayError {
  constructor(
    message: string,
    readonly callId?: string,
    options?: { cause?: unknown }
  ) {
    super('protocol', message, options)
  }
}

export class CapabilityUnsupportedError extends RelayError {
  constructor(
    readonly provider: string,
    readonly capability: string
  ) {
    super('capability_unsupported', `provider '${provider}' does not support ${capability}`)
  }
}

export class DuplicateToolError extends RelayError {
  constructor(readonly tool: string) {
    super('duplicate_tool', `tool '${tool}' is already registered`)
  }
}

export class UnknownToolError extends RelayError {
  constructor(readonly tool: string) {
    super('unknown_tool', `unknown tool '${tool}'`)
  }
}

export class PolicyViolationError extends RelayError {
  constructor(
    readonly tool: string,
    readonly mode: Mode,
    reason = `tool '${tool}' is disabled in ${mode} mode`
  ) {
    super('policy_violation', reason)
  }
}

export class ToolExecutionError extends RelayError {
  constructor(
    readonly tool: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('tool_execution', message, options)
  }
}

export class SessionIOError extends RelayError {
  constructor(
    readonly sessionId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('session_io', message, options)
  }
}

/** Returns a printable message for any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** True for a filesystem error saying the path does not exist. */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
