import { describe, expect, it, vi, type Mock } from 'vitest'
import { z } from 'zod/v4'

import { AgentLoop, type AgentLoopSettings } from '../src/core/agent-loop.js'
import { Conversation } from '../src/core/conversation.js'
import { NetworkError, SessionIOError } from '../src/core/errors.js'
import { ProviderClient, type ModelClient, type ProviderTransport } from '../src/core/model-client.js'
import { InMemorySessionStore, type ConversationStore } from '../src/core/session-store.js'
import { ToolRegistry, type ToolDefinition } from '../src/core/tool-registry.js'
import type { AgentTurnUpdate, NormalizedResponse } from '../src/core/types.js'
import { OpenAiCompatibleAdapter } from '../src/providers/openai.js'
import { echoTool } from '../src/tools/echo.js'
import { chunksOf, makeLogger, sse } from './helpers.js'

const settings: AgentLoopSettings = {
  mode: 'planning',
  maxTurns: 8,
  workspace: '/tmp/workspace',
  toolsEnabled: true,
  context: { maxTokens: 0, reserveOutput: 0 }
}

function makeClient(): ModelClient & { complete: Mock<ModelClient['complete']> } {
  return { provider: 'fake', complete: vi.fn<ModelClient['complete']>() }
}

function final(text: string): NormalizedResponse {
  return { text, toolCalls: [] }
}

function callTool(id: string, name: string, args: Record<string, unknown> = {}): NormalizedResponse {
  return { toolCalls: [{ id, name, arguments: args }] }
}

const writeNote = {
  name: 'write_note',
  description: 'Write a note',
  inputSchema: { text: z.string() },
  readOnly: false,
  execute: vi.fn(async () => 'written')
} satisfies ToolDefinition

function makeRegistry(...extra: ToolDefinition[]): ToolRegistry {
  const registry = new ToolRegistry()
  registry.register(echoTool)
  registry.register(writeNote)
  for (const tool of extra) registry.register(tool)
  return registry
}

function makeLoop(
  client: ModelClient,
  options: { store?: ConversationStore; registry?: ToolRegistry; overrides?: Partial<AgentLoopSettings> } = {}
) {
  const store = options.store ?? new InMemorySessionStore()
  const logger = makeLogger()
  const loop = new AgentLoop(
    client,
    options.registry ?? makeRegistry(),
    store,
    { ...settings, ...options.overrides },
    logger
  )
  return { loop, store, logger }
}

describe('AgentLoop', () => {
  it('returns the final answer and persists the exchange', async () => {
    const client = makeClient()
    client.complete.mockResolvedValueOnce(final('hello there'))
    const { loop, store } = makeLoop(client)

    const result = await loop.run('s1', 'hi')

    expect(result).toEqual({ status: 'final', text: 'hello there', turns: 1 })
    const saved = await store.load('s1')
    expect(saved.messages).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello there' }
    ])
    expect(saved.turnCount).toBe(1)
  })

  it('executes requested tools and feeds their results back', async () => {
    const client = makeClient()
    client.complete
      .mockResolvedValueOnce(callTool('call_1', 'echo', { text: 'ping' }))
      .mockResolvedValueOnce(final('done'))
    const { loop, store } = makeLoop(client)
    const updates: AgentTurnUpdate[] = []

    const result = await loop.run('s1', 'echo ping', { onUpdate: (update) => void updates.push(update) })

    expect(result).toEqual({ status: 'final', text: 'done', turns: 2 })
    const secondRequest = client.complete.mock.calls[1]?.[0]
    expect(secondRequest?.messages).toEqual([
      { role: 'user', content: 'echo ping' },
      { role: 'assistant', tool_calls: [{ id: 'call_1', name: 'echo', arguments: { text: 'ping' } }] },
      { role: 'tool', tool_call_id: 'call_1', name: 'echo', content: '{"echo":{"text":"ping"}}' }
    ])
    expect((await store.load('s1')).length).toBe(4)
    expect(updates.map((update) => update.kind)).toEqual([
      'turn_started',
      'tool_call_started',
      'tool_call_finished',
      'turn_finished',
      'turn_started',
      'turn_finished'
    ])
  })

  it('advertises only the tools the mode allows', async () => {
    const client = makeClient()
    client.complete.mockResolvedValue(final('ok'))
    const { loop } = makeLoop(client)

    await loop.run('s1', 'hi')
    loop.setMode('building')
    await loop.run('s2', 'hi')

    expect(client.complete.mock.calls[0]?.[0].tools.map((tool) => tool.name)).toEqual(['echo'])
    expect(client.complete.mock.calls[1]?.[0].tools.map((tool) => tool.name)).toEqual(['echo', 'write_note'])
    expect(client.complete.mock.calls[1]?.[0].mode).toBe('building')
  })

  it('stops at the turn limit when the model keeps calling tools', async () => {
    const client = makeClient()
    let n = 0
    client.complete.mockImplementation(async () => {
      n += 1
      return callTool(`call_${n}`, 'echo', { text: 'again' })
    })
    const { loop, store } = makeLoop(client, { overrides: { maxTurns: 3 } })

    const result = await loop.run('s1', 'loop forever')

    expect(result).toEqual({ status: 'turn_limit_exceeded', turns: 3 })
    expect(client.complete).toHaveBeenCalledTimes(3)
    const saved = await store.load('s1')
    expect(saved.turnCount).toBe(3)
    expect(saved.length).toBe(7)
  })

  it('runs read-only tools in planning mode and finishes with the model reply', async () => {
    const client = makeClient()
    client.complete
      .mockResolvedValueOnce(callTool('call_1', 'echo', { text: 'look' }))
      .mockResolvedValueOnce(final('done'))
    const { loop } = makeLoop(client)

    const result = await loop.run('s1', 'inspect')

    expect(result.status).toBe('final')
    expect(result).toMatchObject({ text: 'done' })
  })

  it('reports a policy violation as tool output and keeps going', async () => {
    const client = makeClient()
    client.complete
      .mockResolvedValueOnce(callTool('call_1', 'write_note', { text: 'x' }))
      .mockResolvedValueOnce(final('understood'))
    const { loop, store } = makeLoop(client)
    writeNote.execute.mockClear()

    const result = await loop.run('s1', 'write a note')

    expect(result).toEqual({ status: 'final', text: 'understood', turns: 2 })
    expect(writeNote.execute).not.toHaveBeenCalled()
    const toolMessage = (await store.load('s1')).messages[2]
    expect(toolMessage).toEqual({
      role: 'tool',
      tool_call_id: 'call_1',
      name: 'write_note',
      content: '{"error":"PolicyViolation","message":"tool \'write_note\' is disabled in planning mode"}'
    })
  })

  it('reports unknown tools, invalid arguments and tool failures as tool output', async () => {
    const failing: ToolDefinition = {
      name: 'explode',
      description: 'Always fails',
      inputSchema: {},
      readOnly: true,
      async execute() {
        throw new Error('disk on fire')
      }
    }
    const client = makeClient()
    client.complete
      .mockResolvedValueOnce({
        toolCalls: [
          { id: 'c1', name: 'nope', arguments: {} },
          { id: 'c2', name: 'echo', arguments: { text: 42 } },
          { id: 'c3', name: 'explode', arguments: {} }
        ]
      })
      .mockResolvedValueOnce(final('ok'))
    const { loop, store } = makeLoop(client, { registry: makeRegistry(failing) })

    await loop.run('s1', 'try things')

    const contents = (await store.load('s1')).messages.filter((m) => m.role === 'tool').map((m) => m.content)
    expect(contents).toEqual([
      '{"error":"UnknownTool","message":"unknown tool \'nope\'"}',
      '{"error":"ToolExecutionError","message":"invalid arguments: text: Invalid input: expected string, received number"}',
      '{"error":"ToolExecutionError","message":"disk on fire"}'
    ])
  })

  it('refuses calls when tools are disabled', async () => {
    const client = makeClient()
    client.complete.mockResolvedValueOnce(callTool('c1', 'echo', { text: 'x' })).mockResolvedValueOnce(final('ok'))
    const { loop, store } = makeLoop(client, { overrides: { toolsEnabled: false } })

    await loop.run('s1', 'hi')

    expect(client.complete.mock.calls[0]?.[0].tools).toEqual([])
    expect((await store.load('s1')).messages[2]?.content).toBe(
      '{"error":"PolicyViolation","message":"tools are disabled for this session"}'
    )
  })

  it('rolls back to the last saved state on a network failure', async () => {
    const client = makeClient()
    client.complete
      .mockResolvedValueOnce(callTool('call_1', 'echo', { text: 'a' }))
      .mockRejectedValueOnce(new NetworkError('connection reset'))
    const { loop, store } = makeLoop(client)
    const conversation = new Conversation('s1')

    const result = await loop.runConversation(conversation, 'go')

    expect(result).toMatchObject({ status: 'fatal', turns: 2 })
    expect(result.status === 'fatal' && result.error).toBeInstanceOf(NetworkError)
    expect(conversation.length).toBe(3)
    expect(conversation.turnCount).toBe(1)
    expect((await store.load('s1')).toRecord()).toEqual(conversation.toRecord())
  })

  it('leaves a session untouched when the first turn fails', async () => {
    const client = makeClient()
    client.complete.mockRejectedValueOnce(new NetworkError('timeout'))
    const store = new InMemorySessionStore()
    const { loop } = makeLoop(client, { store })

    const result = await loop.run('s1', 'hi')

    expect(result.status).toBe('fatal')
    expect((await store.load('s1')).length).toBe(0)
  })

  it('treats duplicate tool call ids from the provider as fatal', async () => {
    const client = makeClient()
    client.complete.mockResolvedValueOnce({
      toolCalls: [
        { id: 'dup', name: 'echo', arguments: { text: 'a' } },
        { id: 'dup', name: 'echo', arguments: { text: 'b' } }
      ]
    })
    const { loop } = makeLoop(client)
    const conversation = new Conversation('s1')

    const result = await loop.runConversation(conversation, 'hi')

    expect(result.status === 'fatal' && result.error.code).toBe('protocol')
    expect(conversation.length).toBe(0)
  })

  it('aborts the in-flight request without committing anything', async () => {
    const controller = new AbortController()
    const client = makeClient()
    client.complete.mockImplementationOnce(async () => {
      controller.abort()
      throw new DOMException('This operation was aborted', 'AbortError')
    })
    const store = new InMemorySessionStore()
    const { loop } = makeLoop(client, { store })
    const conversation = new Conversation('s1')

    const result = await loop.runConversation(conversation, 'hi', { signal: controller.signal })

    expect(result).toEqual({ status: 'aborted', turns: 1 })
    expect(conversation.length).toBe(0)
    expect(conversation.turnCount).toBe(0)
    expect((await store.load('s1')).length).toBe(0)
  })

  it('stops before the next tool once aborted', async () => {
    const controller = new AbortController()
    const abortingEcho: ToolDefinition = {
      ...echoTool,
      name: 'stop_now',
      async execute() {
        controller.abort()
        return 'stopping'
      }
    }
    const client = makeClient()
    client.complete.mockResolvedValueOnce({
      toolCalls: [
        { id: 'c1', name: 'stop_now', arguments: { text: 'x' } },
        { id: 'c2', name: 'echo', arguments: { text: 'y' } }
      ]
    })
    const { loop } = makeLoop(client, { registry: makeRegistry(abortingEcho) })
    const conversation = new Conversation('s1')

    const result = await loop.runConversation(conversation, 'hi', { signal: controller.signal })

    expect(result.status).toBe('aborted')
    expect(conversation.length).toBe(0)
  })

  it('reports a failed save and still returns the answer', async () => {
    const client = makeClient()
    client.complete.mockResolvedValueOnce(final('ok'))
    const failure = new SessionIOError('s1', 'disk full')
    const store: ConversationStore = {
      load: async (sessionId) => new Conversation(sessionId),
      save: async () => {
        throw failure
      }
    }
    const { loop, logger } = makeLoop(client, { store })

    const result = await loop.run('s1', 'hi')

    expect(result).toEqual({ status: 'final', text: 'ok', turns: 1, persistError: failure })
    expect(logger.error).toHaveBeenCalledWith('session.save_failed', { sessionId: 's1', error: 'disk full' })
  })

  it('fails the run when the session cannot be loaded', async () => {
    const client = makeClient()
    const failure = new SessionIOError('s1', 'corrupt')
    const store: ConversationStore = {
      load: async () => {
        throw failure
      },
      save: async () => undefined
    }
    const { loop } = makeLoop(client, { store })

    expect(await loop.run('s1', 'hi')).toEqual({ status: 'fatal', error: failure, turns: 0 })
    expect(client.complete).not.toHaveBeenCalled()
  })

  it('adds the system prompt once and attachments before the user message', async () => {
    const client = makeClient()
    client.complete.mockResolvedValue(final('ok'))
    const { loop, store } = makeLoop(client)

    await loop.run('s1', 'summarize', {
      system: 'be brief',
      attachments: [{ path: 'notes.txt', content: 'alpha' }]
    })
    await loop.run('s1', 'again', { system: 'be brief' })

    const roles = (await store.load('s1')).messages.map((m) => `${m.role}:${m.content ?? ''}`)
    expect(roles).toEqual([
      'system:be brief',
      "system:Attached file 'notes.txt':\nalpha",
      'user:summarize',
      'assistant:ok',
      'user:again',
      'assistant:ok'
    ])
  })

  it('sends a trimmed history but stores the full one', async () => {
    const client = makeClient()
    client.complete.mockResolvedValue(final('ok'))
    const { loop, store } = makeLoop(client, { overrides: { context: { maxTokens: 10, reserveOutput: 0 } } })

    await loop.run('s1', 'first question')
    await loop.run('s1', 'second question')

    expect(client.complete.mock.calls[1]?.[0].messages).toEqual([{ role: 'user', content: 'second question' }])
    expect((await store.load('s1')).length).toBe(4)
  })
  it('sums token usage and cost across turns', async () => {
    const client = makeClient()
    client.complete
      .mockResolvedValueOnce({
        ...callTool('c1', 'echo', { text: 'a' }),
        usage: { inputTokens: 10, outputTokens: 2, totalTokens: 12, costUsd: 0.25 }
      })
      .mockResolvedValueOnce({ ...final('done'), usage: { inputTokens: 20, outputTokens: 3, totalTokens: 23 } })
    const { loop } = makeLoop(client)

    const result = await loop.run('s1', 'go')

    expect(result).toEqual({
      status: 'final',
      text: 'done',
      turns: 2,
      usage: { inputTokens: 30, outputTokens: 5, totalTokens: 35, costUsd: 0.25 }
    })
  })

  it('keeps streamed tool calls without provider ids distinct across turns', async () => {
    const toolTurn = sse(
      { choices: [{ delta: { tool_calls: [{ index: 0, function: { name: 'echo', arguments: '{"text":"a"}' } }] } }] },
      { choices: [{ delta: {}, finish_reason: 'tool_calls' }] },
      '[DONE]'
    )
    const turns = [toolTurn, toolTurn, sse({ choices: [{ delta: { content: 'done' } }] }, '[DONE]')]
    const transport: ProviderTransport = {
      sendJson: vi.fn(),
      sendStream: vi.fn(async () => chunksOf(...(turns.shift() ?? [])))
    }
    const adapter = new OpenAiCompatibleAdapter({
      name: 'openai',
      family: 'openai',
      apiKey: 'test-secret',
      baseUrl: 'https://llm.test/v1',
      defaultModel: 'gpt-test'
    })
    const client = new ProviderClient(adapter, transport, { stream: true }, makeLogger())
    const { loop, store } = makeLoop(client)

    const result = await loop.run('s1', 'echo twice')

    expect(result).toEqual({ status: 'final', text: 'done', turns: 3 })
    const messages = (await store.load('s1')).messages
    const ids = messages.flatMap((message) => message.tool_calls ?? []).map((call) => call.id)
    expect(ids).toHaveLength(2)
    expect(new Set(ids).size).toBe(2)
    expect(ids[0]).toMatch(/^call_/)
  })
})
