import readline from 'node:readline'

import type { Attachment } from '../core/agent-loop.js'
import type { Logger } from '../core/types.js'
import type { CliIo } from './render.js'
import { UpdateRenderer, reportResult } from './render.js'
import type { Runtime } from './runtime.js'

export interface ReplOptions {
  system?: string
  attachments?: readonly Attachment[]
}

/**
 * Interactive chat over stdin/stdout against one session.
 *
 * Ctrl-C aborts the request in flight; with nothing in flight it ends the session.
 * Failed prompts are reported inline and the session continues.
 */
export async function runRepl(runtime: Runtime, io: CliIo, logger: Logger, options: ReplOptions = {}): Promise<number> {
  const rl = readline.createInterface({ input: io.stdin, output: io.stdout, prompt: 'you> ' })
  let inFlight: AbortController | null = null
  let pendingContext = true

  rl.on('SIGINT', () => {
    if (inFlight) inFlight.abort()
    else rl.close()
  })

  io.stdout.write('Interactive chat. /mode planning|building switches tool policy, /exit quits.\n')
  logger.info('repl.start', { sessionId: runtime.sessionId })
  rl.prompt()

  for await (const raw of rl) {
    const line = raw.trim()
    if (line === '/exit' || line === '/quit') break
    if (!line) {
      rl.prompt()
      continue
    }

    if (line.startsWith('/mode')) {
      const mode = line.slice('/mode'.length).trim()
      if (mode === 'planning' || mode === 'building') {
        runtime.loop.setMode(mode)
        io.stdout.write(`mode: ${mode}\n`)
      } else {
        io.stdout.write(`mode: ${runtime.loop.currentMode} (use /mode planning|building)\n`)
      }
      rl.prompt()
      continue
    }

    const controller = new AbortController()
    inFlight = controller
    const renderer = new UpdateRenderer(io)
    const result = await runtime.loop.run(runtime.sessionId, line, {
      ...(pendingContext ? options : {}),
      signal: controller.signal,
      onUpdate: renderer.onUpdate
    })
    inFlight = null
    renderer.finish()
    // Attachments and the system prompt belong to the first exchange that sticks.
    if (result.status === 'final' || result.status === 'turn_limit_exceeded') pendingContext = false
    reportResult(result, io)
    rl.prompt()
  }

  rl.close()
  logger.info('repl.closed', { sessionId: runtime.sessionId })
  return 0
}
