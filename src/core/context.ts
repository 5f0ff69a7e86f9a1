import type { Message } from './types.js'

const MESSAGE_OVERHEAD = 6

/** Rough token estimate: about four characters per token, never less than one. */
export function estimateTokens(text: string): number {
  return Math.max(1, Math.floor([...text].length / 4))
}

function messageText(message: Message): string {
  const calls = message.tool_calls?.map((call) => `${call.name}${JSON.stringify(call.arguments)}`) ?? []
  return [message.content ?? '', ...calls].join('')
}

export function estimateMessageTokens(message: Message): number {
  return MESSAGE_OVERHEAD + estimateTokens(messageText(message))
}

export function estimateMessagesTokens(messages: readonly Message[]): number {
  return messages.reduce((total, message) => total + estimateMessageTokens(message), 0)
}

/**
 * Keeps the newest messages that fit in `maxContextTokens - reserveOutput`.
 *
 * A leading system message is always kept. The kept tail never starts with a
 * tool message, so each tool result stays with the assistant message that
 * requested it. A budget of zero disables trimming.
 */
export function trimToBudget(
  messages: readonly Message[],
  maxContextTokens: number,
  reserveOutput: number
): Message[] {
  if (maxContextTokens === 0) return [...messages]
  const budget = Math.max(0, maxContextTokens - reserveOutput)

  const [first, ...others] = messages
  if (!first) return []
  const pinned = first.role === 'system' ? [first] : []
  const rest = first.role === 'system' ? others : [...messages]

  const pinnedCost = estimateMessagesTokens(pinned)

  let used = pinnedCost
  let start = rest.length
  for (let i = rest.length - 1; i >= 0; i -= 1) {
    const message = rest[i]
    if (!message) break
    const cost = estimateMessageTokens(message)
    if (used + cost > budget) break
    used += cost
    start = i
  }

  while (start < rest.length && rest[start]?.role === 'tool') start += 1
  // Over budget even for the newest exchange: send it anyway rather than nothing.
  if (start >= rest.length) start = Math.max(0, rest.findLastIndex((message) => message.role === 'user'))
  return [...pinned, ...rest.slice(start)]
}
