import { HISTORY_MARKER } from './history-types'
import type { Turn, TurnRole } from './history-types'

// --- Types ---

export type ExtractFailure = 'no-marker' | 'no-payload' | 'unbalanced' | 'invalid-json'

export type ExtractResult =
  | { ok: true; json: string; value: unknown[] }
  | { ok: false; reason: ExtractFailure }

export type DecodeResult =
  | { ok: true; turns: Turn[] }
  | { ok: false; reason: ExtractFailure }

// --- Bracket scan ---

/**
 * Returns the length of the leading balanced `[...]` run of `payload`, or -1
 * if depth never returns to zero. Brackets inside string literals do not
 * count; a backslash inside a string escapes the next character.
 */
export function balancedArrayLength(payload: string): number {
  let depth = 0
  let inString = false
  let escapeNext = false

  for (let k = 0; k < payload.length; k++) {
    const char = payload[k]

    if (escapeNext) {
      escapeNext = false
      continue
    }
    if (char === '\\' && inString) {
      escapeNext = true
      continue
    }
    if (char === '"') {
      inString = !inString
      continue
    }
    if (inString) continue

    if (char === '[') {
      depth++
    } else if (char === ']') {
      depth--
      if (depth === 0) return k + 1
    }
  }

  return -1
}

/**
 * Recovers the JSON array that follows the first marker in a block.
 *
 * The marker's trailing `[` is normally the array's own opening bracket, so a
 * payload that starts with `{` gets it back. Anything after the balanced
 * array (log noise, a second block glued on) is dropped.
 */
export function extractHistoryJson(text: string, marker: string = HISTORY_MARKER): ExtractResult {
  const markerIdx = text.indexOf(marker)
  if (markerIdx === -1) return { ok: false, reason: 'no-marker' }

  let payload = text.slice(markerIdx + marker.length).trim()
  if (!payload.startsWith('[')) {
    if (!payload.startsWith('{')) return { ok: false, reason: 'no-payload' }
    payload = '[' + payload
  }

  const end = balancedArrayLength(payload)
  if (end === -1) return { ok: false, reason: 'unbalanced' }

  const json = payload.slice(0, end)
  let value: unknown
  try {
    value = JSON.parse(json)
  } catch {
    return { ok: false, reason: 'invalid-json' }
  }

  // Balanced text starting with [ only ever parses to an array
  if (!Array.isArray(value)) return { ok: false, reason: 'invalid-json' }
  return { ok: true, json, value }
}

// --- Turns ---

function toRole(value: unknown): TurnRole {
  return value === 'user' || value === 'assistant' || value === 'system' ? value : 'other'
}

/**
 * Maps decoded array elements to turns. Non-object elements are skipped and
 * non-string content becomes ''.
 */
export function decodeTurns(value: unknown[]): Turn[] {
  const turns: Turn[] = []
  for (const item of value) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) continue

    const record = item as Record<string, unknown>
    turns.push({
      role: toRole(record.role),
      content: typeof record.content === 'string' ? record.content : ''
    })
  }
  return turns
}

export function decodeHistoryBlock(text: string, marker: string = HISTORY_MARKER): DecodeResult {
  const extracted = extractHistoryJson(text, marker)
  if (!extracted.ok) return extracted
  return { ok: true, turns: decodeTurns(extracted.value) }
}

/**
 * Ordered, trimmed contents of the user turns: the identity of a snapshot
 * for deduplication and document matching.
 */
export function userContents(turns: readonly Turn[]): string[] {
  return turns.filter(t => t.role === 'user').map(t => t.content.trim())
}
