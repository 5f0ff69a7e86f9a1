import type { Logger } from './types.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return
  const payload = {
    ts: new Date().toISOString(),
    level: level.toUpperCase(),
    event,
    ...(data ?? {})
  }
  // stdout carries model output; logs go to stderr.
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(payload))
}

/** Simple JSON logger used across runtime modules. */
export const logger: Logger = {
  debug(event, data) {
    emit('debug', event, data)
  },
  info(event, data) {
    emit('info', event, data)
  },
  warn(event, data) {
    emit('warn', event, data)
  },
  error(event, data) {
    emit('error', event, data)
  }
}
