/**
 * Shared types for HISTORY log mining.
 *
 * A HISTORY block is one log entry carrying a JSON array snapshot of a
 * conversation so far. Snapshots of one conversation grow over time, so the
 * longest snapshot contains every shorter one as a prefix.
 *
 * segment.ts, history-json.ts, reconstruct.ts and query.ts import from here.
 */

export const HISTORY_MARKER = '[HISTORY]['

/**
 * A raw HISTORY block cut out of the log by the segmenter.
 */
export interface TimestampedBlock {
  readonly timestamp: Date
  readonly rawTimestamp: string
  readonly text: string
  readonly lineOffset: number // 0-based line of the marker
}

export type TurnRole = 'user' | 'assistant' | 'system' | 'other'

export interface Turn {
  readonly role: TurnRole
  readonly content: string
}

export interface ContextDocument {
  readonly id: string
  readonly title: string
  readonly content: string
}

/**
 * One user turn with the reply that followed it.
 * assistantResponse is null when the snapshot holds no reply after the turn;
 * an empty string is an actual empty reply.
 */
export interface Message {
  readonly timestamp: Date
  readonly userMessage: string
  readonly assistantResponse: string | null
  readonly contextDocuments: readonly ContextDocument[]
}

export interface Conversation {
  readonly id: string
  readonly firstMessage: string
  readonly startTime: Date
  readonly messageCount: number
  readonly messages: readonly Message[]
}

/**
 * conversation_N → Conversation, in start-time order. Built once per
 * analysis run and replaced wholesale by the next one.
 */
export type ConversationSet = ReadonlyMap<string, Conversation>
