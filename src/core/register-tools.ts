import { echoTool } from '../tools/echo.js'
import { editFileTool } from '../tools/edit-file.js'
import { readFileTool } from '../tools/read-file.js'
import { ToolRegistry, type ToolRegistryOptions } from './tool-registry.js'

/** Registers all built-in tools in deterministic order. */
export function registerTools(registry: ToolRegistry): void {
  registry.register(readFileTool)
  registry.register(echoTool)
  registry.register(editFileTool)
}

/** Creates a registry holding the built-in tools. */
export function createToolRegistry(options: ToolRegistryOptions = {}): ToolRegistry {
  const registry = new ToolRegistry(options)
  registerTools(registry)
  return registry
}
