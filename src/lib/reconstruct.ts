import { decodeHistoryBlock, userContents } from './history-json'
import { extractContextDocuments } from './documents'
import { formatCompactTimestamp } from './timestamp'
import { HISTORY_MARKER } from './history-types'
import type { Conversation, ConversationSet, Message, TimestampedBlock, Turn } from './history-types'

// --- Types ---

export interface ClaimInfo {
  claimId: string        // conv_<n>_<YYYYMMDD_HHMMSS>, dropped once final ids are assigned
  userTurns: number
  rawTimestamp: string
  lineOffset: number
}

export interface ReconstructOptions {
  marker?: string
  onClaim?: (claim: ClaimInfo) => void
}

export interface ReconstructStats {
  decoded: number   // snapshots with at least one user turn
  skipped: number   // blocks whose JSON could not be recovered
  absorbed: number  // snapshots that were a prefix of a claimed conversation
  claimed: number
}

export interface ReconstructResult {
  conversations: ConversationSet
  warnings: string[]
  stats: ReconstructStats
}

interface Snapshot {
  block: TimestampedBlock
  turns: Turn[]
  users: string[]
}

interface Claim {
  snapshot: Snapshot
  startTime: Date
  messages: Message[]
}

// --- Ordering ---

/**
 * Newest first. Equal timestamps fall back to the line offset, so a later
 * line counts as the newer snapshot.
 */
function newestFirst(a: Snapshot, b: Snapshot): number {
  return (b.block.timestamp.getTime() - a.block.timestamp.getTime()) ||
    (b.block.lineOffset - a.block.lineOffset)
}

function byStartTime(a: Claim, b: Claim): number {
  return (a.startTime.getTime() - b.startTime.getTime()) ||
    (a.snapshot.block.lineOffset - b.snapshot.block.lineOffset)
}

// --- Matching ---

/**
 * True when `users` equals the first users.length entries of `claimed`.
 */
export function isPrefixOf(users: readonly string[], claimed: readonly string[]): boolean {
  if (users.length > claimed.length) return false
  return users.every((content, i) => content === claimed[i])
}

/**
 * Documents are printed with the log entry written when the turn was the
 * newest one, i.e. the snapshot that ends at this turn. That is usually a
 * shorter snapshot than the one carrying the whole conversation.
 */
function findTurnSnapshot(ordered: readonly Snapshot[], position: number, content: string): Snapshot | null {
  for (const snapshot of ordered) {
    if (snapshot.users.length === position && snapshot.users[position - 1] === content) {
      return snapshot
    }
  }
  return null
}

function findResponse(turns: readonly Turn[], userIdx: number): string | null {
  for (let k = userIdx + 1; k < turns.length; k++) {
    if (turns[k].role === 'assistant') return turns[k].content.trim()
  }
  return null
}

function buildMessages(snapshot: Snapshot, ordered: readonly Snapshot[]): Message[] {
  const messages: Message[] = []

  snapshot.turns.forEach((turn, idx) => {
    if (turn.role !== 'user') return

    const userMessage = turn.content.trim()
    const source = findTurnSnapshot(ordered, messages.length + 1, userMessage)

    messages.push({
      timestamp: snapshot.block.timestamp,
      userMessage,
      assistantResponse: findResponse(snapshot.turns, idx),
      contextDocuments: source ? extractContextDocuments(source.block.text) : []
    })
  })

  return messages
}

// --- Reconstruction ---

/**
 * Deduplicates HISTORY snapshots into the minimal set of conversations.
 *
 * Walking newest first, a snapshot whose user turns are a prefix of an
 * already claimed conversation is absorbed by it (and may move its start
 * time earlier); any other snapshot is claimed as a new conversation. Blocks
 * whose JSON cannot be recovered are skipped with a warning.
 *
 * All messages of a conversation carry the claimed snapshot's timestamp.
 */
export function reconstructConversations(
  blocks: readonly TimestampedBlock[],
  options: ReconstructOptions = {}
): ReconstructResult {
  const marker = options.marker ?? HISTORY_MARKER
  const warnings: string[] = []
  const stats: ReconstructStats = { decoded: 0, skipped: 0, absorbed: 0, claimed: 0 }

  const snapshots: Snapshot[] = []
  for (const block of blocks) {
    const decoded = decodeHistoryBlock(block.text, marker)
    if (!decoded.ok) {
      stats.skipped++
      warnings.push(`Skipped block at line ${block.lineOffset + 1} (${block.rawTimestamp}): ${decoded.reason}`)
      continue
    }

    const users = userContents(decoded.turns)
    if (users.length === 0) continue

    stats.decoded++
    snapshots.push({ block, turns: decoded.turns, users })
  }

  const ordered = [...snapshots].sort(newestFirst)
  const claims: Claim[] = []

  for (const snapshot of ordered) {
    const owner = claims.find(c => isPrefixOf(snapshot.users, c.snapshot.users))
    if (owner) {
      stats.absorbed++
      if (snapshot.block.timestamp < owner.startTime) owner.startTime = snapshot.block.timestamp
      continue
    }

    const claimId = `conv_${claims.length + 1}_${formatCompactTimestamp(snapshot.block.timestamp)}`
    claims.push({
      snapshot,
      startTime: snapshot.block.timestamp,
      messages: buildMessages(snapshot, ordered)
    })
    options.onClaim?.({
      claimId,
      userTurns: snapshot.users.length,
      rawTimestamp: snapshot.block.rawTimestamp,
      lineOffset: snapshot.block.lineOffset
    })
  }
  stats.claimed = claims.length

  const conversations = new Map<string, Conversation>()
  claims.sort(byStartTime).forEach((claim, i) => {
    const id = `conversation_${i + 1}`
    conversations.set(id, {
      id,
      firstMessage: claim.snapshot.users[0],
      startTime: claim.startTime,
      messageCount: claim.messages.length,
      messages: claim.messages
    })
  })

  return { conversations, warnings, stats }
}
