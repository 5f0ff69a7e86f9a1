import { writeFile } from 'node:fs/promises'
import { extname } from 'node:path'

import { canonicalMessage } from './conversation.js'
import type { Message } from './types.js'

export type ExportFormat = 'markdown' | 'json' | 'html'

export function formatForPath(file: string): ExportFormat {
  const ext = extname(file).toLowerCase()
  if (ext === '.json') return 'json'
  if (ext === '.html' || ext === '.htm') return 'html'
  return 'markdown'
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;')
}

function heading(message: Message): string {
  if (message.role === 'tool') return `### tool (${message.name ?? 'unknown'} · ${message.tool_call_id ?? '?'})`
  return `### ${message.role}`
}

/** Renders a transcript as Markdown, one section per message. */
export function toMarkdown(messages: readonly Message[]): string {
  return messages
    .map((message) => {
      const parts = [heading(message), '']
      if (message.content) parts.push(message.content, '')
      for (const call of message.tool_calls ?? []) {
        parts.push(`- call \`${call.name}\` (${call.id}): \`${JSON.stringify(call.arguments)}\``)
      }
      if (message.tool_calls?.length) parts.push('')
      return parts.join('\n')
    })
    .join('\n')
}

/** Renders a standalone HTML page with one `<section>` per message. */
export function toHtml(messages: readonly Message[]): string {
  const sections = messages.map((message) => {
    const title = escapeHtml(heading(message).slice('### '.length))
    const lines = [`<section class="${message.role}">`, `<h3>${title}</h3>`]
    if (message.content) lines.push(`<pre>${escapeHtml(message.content)}</pre>`)
    for (const call of message.tool_calls ?? []) {
      const args = escapeHtml(JSON.stringify(call.arguments))
      lines.push(`<p>call <code>${escapeHtml(call.name)}</code> (${escapeHtml(call.id)}): <code>${args}</code></p>`)
    }
    lines.push('</section>')
    return lines.join('\n')
  })
  const head = '<head><meta charset="utf-8"><title>transcript</title></head>'
  return ['<!doctype html>', '<html>', head, '<body>', ...sections, '</body>', '</html>', ''].join('\n')
}

export function renderExport(messages: readonly Message[], format: ExportFormat): string {
  if (format === 'json') return `${JSON.stringify(messages.map(canonicalMessage), null, 2)}\n`
  if (format === 'html') return toHtml(messages)
  return toMarkdown(messages)
}

/** Writes a transcript to `file`, choosing the format from its extension. */
export async function exportTranscript(file: string, messages: readonly Message[]): Promise<ExportFormat> {
  const format = formatForPath(file)
  await writeFile(file, renderExport(messages, format), 'utf-8')
  return format
}
