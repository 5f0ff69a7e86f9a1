import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'

import { ConfigError, errorMessage } from '../core/errors.js'

function defaultConfigDir(env: NodeJS.ProcessEnv): string {
  return env.LLMRELAY_HOME?.trim() || path.join(os.homedir(), '.llm-relay')
}

/** Returns the resolved path to the settings directory. */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return defaultConfigDir(env)
}

/** Returns the resolved path to the settings file. */
export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(defaultConfigDir(env), 'settings.json')
}

/** Returns true when a settings file already exists. */
export function settingsExist(file: string): boolean {
  return fs.existsSync(file)
}

/**
 * Reads and parses a settings file into a plain object.
 *
 * Shape validation happens later, once file values are merged with the environment.
 */
export function readSettings(file: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'))
  } catch (error) {
    throw new ConfigError(`cannot read settings file ${file}: ${errorMessage(error)}`, { cause: error })
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`settings file ${file} must contain a JSON object`)
  }
  return { ...parsed }
}
