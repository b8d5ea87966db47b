import { formatTime, formatTimestamp } from './timestamp'
import { currentScreen } from './navigator'
import type { NavState } from './navigator'
import type { DisplayConfig } from './config'
import type { AnalysisStats } from './analyzer'
import type { ContextDocument, Conversation, Message } from './history-types'

// --- Helpers ---

function header(title: string, display: DisplayConfig): string[] {
  const rule = '='.repeat(display.ruleWidth)
  return ['', rule, title, rule]
}

function index(n: number): string {
  return String(n).padStart(2, ' ')
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`
}

/**
 * Single-line preview, cut to `maxChars` with a trailing ellipsis.
 */
export function preview(text: string, maxChars: number): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  return flat.length > maxChars ? `${flat.slice(0, maxChars)}...` : flat
}

// --- Screens ---

export function renderOverview(conversations: readonly Conversation[], display: DisplayConfig): string {
  const lines = header('CONVERSATIONS OVERVIEW', display)

  if (conversations.length === 0) {
    lines.push('No conversations found.')
    return lines.join('\n')
  }

  conversations.forEach((conv, i) => {
    lines.push(`${index(i + 1)}. [${formatTimestamp(conv.startTime)}] (${plural(conv.messageCount, 'message')})`)
    lines.push(`    First message: ${preview(conv.firstMessage, display.previewChars)}`)
    lines.push(`    Chat ID: ${conv.id}`)
    lines.push('')
  })

  return lines.join('\n')
}

export function renderConversation(conversation: Conversation, display: DisplayConfig): string {
  const lines = header(`CONVERSATION DETAILS - ${conversation.id}`, display)
  lines.push(`Start: ${formatTimestamp(conversation.startTime)}`)
  lines.push(`Messages: ${conversation.messageCount}`)
  lines.push('')

  conversation.messages.forEach((message, i) => {
    lines.push(`${index(i + 1)}. [${formatTime(message.timestamp)}] USER:`)
    lines.push(`    ${message.userMessage}`)
    if (message.contextDocuments.length > 0) {
      lines.push(`    Context documents: ${message.contextDocuments.length}`)
      for (const doc of message.contextDocuments) {
        lines.push(`      - ${doc.title} (ID: ${doc.id})`)
      }
    }
    lines.push('-'.repeat(60))
  })

  return lines.join('\n')
}

export function renderMessage(message: Message, display: DisplayConfig): string {
  const lines = header('MESSAGE CONTEXT', display)
  lines.push(`Time: ${formatTimestamp(message.timestamp)}`)
  lines.push(`User: ${message.userMessage}`)
  lines.push(`Assistant: ${message.assistantResponse ?? display.noResponseText}`)
  lines.push('')

  if (message.contextDocuments.length === 0) {
    lines.push('No context documents found.')
    return lines.join('\n')
  }

  lines.push(`Context documents (${message.contextDocuments.length}):`)
  message.contextDocuments.forEach((doc, i) => {
    lines.push(`${index(i + 1)}. ${doc.title} (ID: ${doc.id})`)
  })

  return lines.join('\n')
}

export function renderDocument(document: ContextDocument, display: DisplayConfig): string {
  const lines = header(`DOCUMENT: ${document.title}`, display)
  lines.push(`ID: ${document.id}`)
  lines.push('')
  lines.push(document.content)
  return lines.join('\n')
}

/**
 * Renders whatever screen is on top of the navigation stack.
 */
export function renderScreen(
  state: NavState,
  conversations: readonly Conversation[],
  display: DisplayConfig
): string {
  const screen = currentScreen(state)
  if (screen.kind === 'overview') return renderOverview(conversations, display)

  const conversation = conversations[screen.conversation]
  if (!conversation) return renderOverview(conversations, display)
  if (screen.kind === 'conversation') return renderConversation(conversation, display)

  const message = conversation.messages[screen.message]
  if (!message) return renderConversation(conversation, display)
  if (screen.kind === 'message') return renderMessage(message, display)

  const document = message.contextDocuments[screen.document]
  return document ? renderDocument(document, display) : renderMessage(message, display)
}

// --- Run summaries ---

export function renderStats(stats: AnalysisStats): string {
  return [
    `Log has ${plural(stats.lines, 'line')}`,
    `HISTORY blocks: ${stats.blocks} (${stats.decoded} decoded, ${stats.skipped} skipped, ${stats.absorbed} absorbed)`,
    `Conversations: ${stats.conversations}`
  ].join('\n')
}

export function renderNoConversationsHelp(): string {
  return [
    '',
    'No conversations could be reconstructed.',
    'Possible reasons:',
    '- HISTORY blocks lack a leading timestamp or are split across entries',
    '- JSON in HISTORY blocks is malformed',
    '- Unexpected log format'
  ].join('\n')
}
