import { z, type ZodRawShape } from 'zod/v4'

import { DuplicateToolError, PolicyViolationError, UnknownToolError } from './errors.js'
import type { JsonObject, Mode, ToolContext, ToolSpec } from './types.js'

/**
 * Contract for a tool exposed to the model.
 *
 * Tools are string-result based to keep the model feedback channel simple
 * and easy to inspect in logs. Local tools and future remote bridges are
 * treated the same way through this interface.
 */
export interface ToolDefinition {
  /** Unique tool identifier used by the model. */
  name: string
  /** Human-readable usage description for model selection. */
  description: string
  /** Zod raw shape used for input validation and the advertised JSON Schema. */
  inputSchema: ZodRawShape
  /** Whether the tool is safe to run in planning mode. */
  readOnly: boolean
  /**
   * Executes the tool and returns a textual result.
   * Throwing is allowed; the agent loop converts thrown errors to tool output.
   */
  execute(input: JsonObject, ctx: ToolContext): Promise<string>
}

export interface ToolRegistryOptions {
  /** Optional allow-list applied after mode filtering. */
  allow?: readonly string[]
}

/** Builds the provider-facing spec for a tool definition. */
export function toToolSpec(tool: ToolDefinition): ToolSpec {
  const parameters: JsonObject = { ...z.toJSONSchema(z.object(tool.inputSchema)) }
  delete parameters.$schema
  return {
    name: tool.name,
    description: tool.description,
    parameters,
    read_only: tool.readOnly
  }
}

/**
 * In-memory registry of all model-callable tools.
 *
 * Registration happens once at startup; the set is treated as immutable afterwards.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>()
  private readonly allow: ReadonlySet<string> | null

  constructor(options: ToolRegistryOptions = {}) {
    this.allow = options.allow && options.allow.length > 0 ? new Set(options.allow) : null
  }

  /** Registers a tool. Names are unique within a registry. */
  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) throw new DuplicateToolError(tool.name)
    this.tools.set(tool.name, tool)
  }

  /**
   * Resolves a tool for execution under `mode`.
   *
   * Throws `UnknownToolError` for unregistered names and `PolicyViolationError`
   * when the mode or the allow-list forbids the tool.
   */
  resolve(name: string, mode: Mode): ToolDefinition {
    const tool = this.tools.get(name)
    if (!tool) throw new UnknownToolError(name)
    if (mode === 'planning' && !tool.readOnly) {
      throw new PolicyViolationError(name, mode)
    }
    if (this.allow && !this.allow.has(name)) {
      throw new PolicyViolationError(name, mode, `tool '${name}' is not in the allowed tool list`)
    }
    return tool
  }

  /** Returns specs of tools callable under `mode`, in registration order. */
  list(mode: Mode): ToolSpec[] {
    return [...this.tools.values()]
      .filter((tool) => mode === 'building' || tool.readOnly)
      .filter((tool) => !this.allow || this.allow.has(tool.name))
      .map(toToolSpec)
  }
}
