import type { RunResult } from '../core/agent-loop.js'
import type { AgentTurnUpdate } from '../core/types.js'
import { formatUsage } from '../core/usage.js'

export interface CliIo {
  stdin: NodeJS.ReadableStream
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
}

/** Process exit codes per run outcome. */
export const EXIT_CODES: Readonly<Record<RunResult['status'], number>> = {
  final: 0,
  fatal: 1,
  turn_limit_exceeded: 2,
  aborted: 130
}

/**
 * Writes assistant text to stdout and tool progress to stderr.
 *
 * `finish()` terminates a reply that did not end with a newline.
 */
export class UpdateRenderer {
  private lastChar = '\n'

  constructor(private readonly io: Pick<CliIo, 'stdout' | 'stderr'>) {}

  readonly onUpdate = (update: AgentTurnUpdate): void => {
    switch (update.kind) {
      case 'text_delta':
        if (!update.text) return
        this.io.stdout.write(update.text)
        this.lastChar = update.text.slice(-1)
        return
      case 'tool_call_started':
        this.finish()
        this.io.stderr.write(`progress> ${update.message}\n`)
        return
      case 'tool_call_failed':
        this.finish()
        this.io.stderr.write(`progress> ${update.toolName ?? 'tool'} failed: ${update.message}\n`)
        return
      default:
        return
    }
  }

  finish(): void {
    if (this.lastChar !== '\n') this.io.stdout.write('\n')
    this.lastChar = '\n'
  }
}

/** Reports a run outcome on stderr and returns the matching exit code. */
export function reportResult(result: RunResult, io: Pick<CliIo, 'stderr'>): number {
  switch (result.status) {
    case 'final':
    case 'turn_limit_exceeded':
      if (result.persistError) {
        io.stderr.write(`warning: session not saved: ${result.persistError.message}\n`)
      }
      if (result.usage) io.stderr.write(`${formatUsage(result.usage)}\n`)
      if (result.status === 'turn_limit_exceeded') {
        io.stderr.write(`stopped after ${result.turns} turns without a final answer\n`)
      }
      break
    case 'fatal':
      io.stderr.write(`error: ${result.error.message}\n`)
      break
    case 'aborted':
      io.stderr.write('interrupted\n')
      break
  }
  return EXIT_CODES[result.status]
}
