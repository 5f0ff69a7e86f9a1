#!/usr/bin/env node
import { USAGE, parseCli, type CliCommand } from './cli/args.js'
import { runCommand } from './cli/commands.js'
import { errorMessage } from './core/errors.js'
import { logger } from './core/logger.js'

/** Parses argv, runs one command and sets the exit code. */
async function main(): Promise<void> {
  let command: CliCommand
  try {
    command = parseCli(process.argv.slice(2))
  } catch (error) {
    process.stderr.write(`error: ${errorMessage(error)}\n\n${USAGE}`)
    process.exitCode = 1
    return
  }

  const controller = new AbortController()
  // The interactive session installs its own Ctrl-C handling on readline.
  const onSignal = (signal: string): void => {
    logger.info('shutdown.signal', { signal })
    controller.abort()
  }
  process.once('SIGINT', () => onSignal('SIGINT'))
  process.once('SIGTERM', () => onSignal('SIGTERM'))

  process.exitCode = await runCommand(command, {
    io: { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
    signal: controller.signal
  })
}

main().catch((error: unknown) => {
  logger.error('fatal', {
    error: error instanceof Error ? error.message : String(error)
  })
  process.exitCode = 1
})
