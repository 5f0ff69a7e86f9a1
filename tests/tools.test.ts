import { mkdtemp, readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import { ToolExecutionError } from '../src/core/errors.js'
import { toToolSpec } from '../src/core/tool-registry.js'
import type { ToolContext } from '../src/core/types.js'
import { echoTool } from '../src/tools/echo.js'
import { editFileTool } from '../src/tools/edit-file.js'
import { readFileTool } from '../src/tools/read-file.js'

async function workspace(): Promise<ToolContext> {
  const dir = await mkdtemp(join(tmpdir(), 'llm-relay-tools-'))
  return { workspace: dir, sessionId: 'test', mode: 'building' }
}

describe('read_file', () => {
  it('returns the file content with its size', async () => {
    const ctx = await workspace()
    await writeFile(join(ctx.workspace, 'notes.txt'), 'hello world', 'utf-8')

    const output = await readFileTool.execute({ path: 'notes.txt' }, ctx)

    expect(JSON.parse(output)).toEqual({ path: 'notes.txt', bytes: 11, truncated: false, content: 'hello world' })
  })

  it('truncates to max_bytes', async () => {
    const ctx = await workspace()
    await writeFile(join(ctx.workspace, 'notes.txt'), 'hello world', 'utf-8')

    const output = await readFileTool.execute({ path: 'notes.txt', max_bytes: 5 }, ctx)

    expect(JSON.parse(output)).toEqual({ path: 'notes.txt', bytes: 5, truncated: true, content: 'hello' })
  })

  it('is read-only and advertises max_bytes as optional', () => {
    expect(readFileTool.readOnly).toBe(true)
    expect(toToolSpec(readFileTool).parameters.required).toEqual(['path'])
  })
})

describe('echo', () => {
  it('returns its input', async () => {
    expect(await echoTool.execute({ text: 'hi' }, await workspace())).toBe('{"echo":{"text":"hi"}}')
  })
})

describe('edit_file', () => {
  it('replaces a single occurrence', async () => {
    const ctx = await workspace()
    const file = join(ctx.workspace, 'a.ts')
    await writeFile(file, 'const a = 1\nconst b = 2\n', 'utf-8')

    const output = await editFileTool.execute({ path: 'a.ts', old_text: 'a = 1', new_text: 'a = 10' }, ctx)

    expect(output).toBe('Edited a.ts')
    expect(await readFile(file, 'utf-8')).toBe('const a = 10\nconst b = 2\n')
  })

  it('refuses missing and ambiguous matches', async () => {
    const ctx = await workspace()
    await writeFile(join(ctx.workspace, 'a.ts'), 'x x', 'utf-8')

    await expect(editFileTool.execute({ path: 'a.ts', old_text: 'y', new_text: 'z' }, ctx)).rejects.toThrow(
      ToolExecutionError
    )
    await expect(editFileTool.execute({ path: 'a.ts', old_text: 'x', new_text: 'z' }, ctx)).rejects.toThrow(
      'old_text appears 2 times in a.ts'
    )
  })

  it('is not available in planning mode', () => {
    expect(editFileTool.readOnly).toBe(false)
  })
})
