import { parseLogTimestamp } from './timestamp'
import { HISTORY_MARKER } from './history-types'
import type { TimestampedBlock } from './history-types'

const BLOCK_TIMESTAMP = /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2},\d{3})/
const ENTRY_START = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}/

// CRLF and bare CR logs split the same as LF ones
const LINE_BREAK = /\r\n?|\n/

function splitLines(text: string): string[] {
  return text.split(LINE_BREAK)
}

export function countLines(text: string): number {
  return splitLines(text).length
}

/**
 * Cuts every HISTORY block out of the raw log.
 *
 * A block starts at a line containing the marker and a leading
 * `YYYY-MM-DD HH:MM:SS,mmm` timestamp, and takes every following line up to
 * the next line that starts with a timestamp (that line is not consumed).
 * Marker lines without a timestamp are skipped. A block with no later
 * timestamped line runs to the end of the log.
 */
export function segmentBlocks(
  text: string,
  marker: string = HISTORY_MARKER,
  now?: () => Date
): TimestampedBlock[] {
  const lines = splitLines(text)
  const blocks: TimestampedBlock[] = []

  let i = 0
  while (i < lines.length) {
    const line = lines[i]
    const match = line.includes(marker) ? BLOCK_TIMESTAMP.exec(line) : null
    if (!match) {
      i++
      continue
    }

    let j = i + 1
    while (j < lines.length && !ENTRY_START.test(lines[j])) j++

    const rawTimestamp = match[1]
    blocks.push({
      timestamp: parseLogTimestamp(rawTimestamp, now),
      rawTimestamp,
      text: lines.slice(i, j).join('\n'),
      lineOffset: i
    })
    i = j
  }

  return blocks
}
