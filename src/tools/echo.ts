import { z } from 'zod/v4'

import type { ToolDefinition } from '../core/tool-registry.js'

/** Returns its input unchanged; handy for checking a provider's tool wiring. */
export const echoTool: ToolDefinition = {
  name: 'echo',
  description: 'Return the provided input for debugging.',
  inputSchema: {
    text: z.string()
  },
  readOnly: true,
  async execute(input) {
    return JSON.stringify({ echo: input })
  }
}
