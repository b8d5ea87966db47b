import type { ContextDocument, Conversation, ConversationSet, Message } from './history-types'

/**
 * Read-only lookups over one analysis result. Unknown ids and out-of-range
 * indexes return null.
 */

export function listConversations(set: ConversationSet): Conversation[] {
  return [...set.values()].sort((a, b) => a.startTime.getTime() - b.startTime.getTime())
}

export function getConversation(set: ConversationSet, id: string): Conversation | null {
  return set.get(id) ?? null
}

export function getMessages(set: ConversationSet, id: string): readonly Message[] | null {
  return getConversation(set, id)?.messages ?? null
}

export function getContextDocuments(
  set: ConversationSet,
  id: string,
  messageIndex: number
): readonly ContextDocument[] | null {
  return getMessages(set, id)?.[messageIndex]?.contextDocuments ?? null
}

export function getDocumentContent(
  set: ConversationSet,
  id: string,
  messageIndex: number,
  documentIndex: number
): string | null {
  return getContextDocuments(set, id, messageIndex)?.[documentIndex]?.content ?? null
}
