import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { ConfigError, errorMessage, isNotFound } from './errors.js'

const TEMPLATE_NAME = /^[A-Za-z0-9._-]+$/

/**
 * Replaces `{{name}}` placeholders with values from `vars`.
 *
 * Unknown placeholders are left as written so a missing `--var` is visible in the prompt.
 */
export function renderTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g, (match, key: string) =>
    Object.hasOwn(vars, key) ? (vars[key] ?? match) : match
  )
}

/** Parses `key=value` pairs; entries without `=` are rejected. */
export function parseTemplateVars(pairs: readonly string[]): Record<string, string> {
  const vars: Record<string, string> = {}
  for (const pair of pairs) {
    const eq = pair.indexOf('=')
    if (eq <= 0) throw new ConfigError(`template variable must look like key=value: '${pair}'`)
    vars[pair.slice(0, eq)] = pair.slice(eq + 1)
  }
  return vars
}

/** Loads `<dir>/<name>.tmpl`. */
export async function loadTemplate(dir: string, name: string): Promise<string> {
  if (!TEMPLATE_NAME.test(name)) throw new ConfigError(`invalid template name '${name}'`)
  try {
    return await readFile(join(dir, `${name}.tmpl`), 'utf-8')
  } catch (error) {
    throw new ConfigError(`cannot read template '${name}': ${errorMessage(error)}`, { cause: error })
  }
}

/** Lists template names in `dir`, sorted. */
export async function listTemplates(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir)
    return entries
      .filter((entry) => entry.endsWith('.tmpl'))
      .map((entry) => entry.slice(0, -'.tmpl'.length))
      .sort()
  } catch (error) {
    if (isNotFound(error)) return []
    throw new ConfigError(`cannot list templates in ${dir}: ${errorMessage(error)}`, { cause: error })
  }
}
