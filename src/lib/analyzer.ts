import { readFileSync } from 'fs'
import { countLines, segmentBlocks } from './segment'
import { reconstructConversations } from './reconstruct'
import type { ClaimInfo } from './reconstruct'
import { HISTORY_MARKER } from './history-types'
import type { ConversationSet } from './history-types'

export interface AnalyzeOptions {
  marker?: string
  now?: () => Date        // fallback clock for unparseable timestamps
  onClaim?: (claim: ClaimInfo) => void
}

export interface AnalysisStats {
  lines: number
  blocks: number
  decoded: number
  skipped: number
  absorbed: number
  conversations: number
}

export type AnalysisResult =
  | { status: 'ok' | 'empty'; conversations: ConversationSet; stats: AnalysisStats; warnings: string[] }
  | { status: 'file-not-found'; path: string; error: string }

/**
 * One full pass over a log snapshot: segment → decode → reconstruct.
 * Pure; every call builds a fresh ConversationSet.
 */
export function analyzeLogText(text: string, options: AnalyzeOptions = {}): AnalysisResult {
  const marker = options.marker ?? HISTORY_MARKER
  const blocks = segmentBlocks(text, marker, options.now)
  const { conversations, warnings, stats } = reconstructConversations(blocks, {
    marker,
    onClaim: options.onClaim
  })

  return {
    status: conversations.size > 0 ? 'ok' : 'empty',
    conversations,
    warnings,
    stats: {
      lines: countLines(text),
      blocks: blocks.length,
      decoded: stats.decoded,
      skipped: stats.skipped,
      absorbed: stats.absorbed,
      conversations: conversations.size
    }
  }
}

/**
 * Reads the log once and analyzes it. A missing or unreadable file is
 * reported as 'file-not-found' rather than thrown.
 */
export function analyzeLogFile(path: string, options: AnalyzeOptions = {}): AnalysisResult {
  let content: string
  try {
    content = readFileSync(path, 'utf-8')
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code
    return { status: 'file-not-found', path, error: code ? `${code}: cannot read ${path}` : `cannot read ${path}` }
  }

  return analyzeLogText(content, options)
}
