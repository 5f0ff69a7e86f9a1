import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'

import { z } from 'zod/v4'

import type { ToolDefinition } from '../core/tool-registry.js'

export const DEFAULT_READ_BYTES = 65536
const MAX_READ_BYTES = 1048576

const readFileInput = {
  path: z.string().min(1).describe('Path relative to workspace or absolute path'),
  max_bytes: z.number().int().min(1).max(MAX_READ_BYTES).optional().describe('Byte limit, 65536 when omitted')
}

/** Reads a text file from the workspace root, truncated to `max_bytes`. */
export const readFileTool: ToolDefinition = {
  name: 'read_file',
  description: 'Read a small text file from the workspace and return its contents.',
  inputSchema: readFileInput,
  readOnly: true,
  async execute(input, ctx) {
    const parsed = z.object(readFileInput).parse(input)
    const max = parsed.max_bytes ?? DEFAULT_READ_BYTES
    const target = resolve(ctx.workspace, parsed.path)
    const data = await readFile(target)
    const slice = data.subarray(0, max)
    return JSON.stringify({
      path: parsed.path,
      bytes: slice.length,
      truncated: data.length > max,
      content: slice.toString('utf-8')
    })
  }
}
