import { readFile, writeFile } from 'node:fs/promises'
import { resolve } from 'node:path'

import { z } from 'zod/v4'

import { ToolExecutionError } from '../core/errors.js'
import type { ToolDefinition } from '../core/tool-registry.js'

const editFileInput = {
  path: z.string().min(1),
  old_text: z.string().min(1),
  new_text: z.string()
}

/** Performs a guarded single-occurrence text replacement inside a file. */
export const editFileTool: ToolDefinition = {
  name: 'edit_file',
  description: 'Replace old_text with new_text in a file. old_text must occur exactly once.',
  inputSchema: editFileInput,
  readOnly: false,
  async execute(input, ctx) {
    const parsed = z.object(editFileInput).parse(input)

    const target = resolve(ctx.workspace, parsed.path)
    const current = await readFile(target, 'utf-8')
    const count = current.split(parsed.old_text).length - 1

    if (count === 0) throw new ToolExecutionError('edit_file', `old_text not found in ${parsed.path}`)
    if (count > 1) throw new ToolExecutionError('edit_file', `old_text appears ${count} times in ${parsed.path}`)

    const at = current.indexOf(parsed.old_text)
    const updated = current.slice(0, at) + parsed.new_text + current.slice(at + parsed.old_text.length)
    await writeFile(target, updated, 'utf-8')
    return `Edited ${parsed.path}`
  }
}
