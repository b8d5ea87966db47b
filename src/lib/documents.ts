import type { ContextDocument } from './history-types'

/**
 * Retrieved document records as the RAG prompt prints them:
 *
 *   ID: 12
 *   ├── Title: Some title
 *   └── Content: text that may span lines
 *
 * Content runs until a `------` separator line, the next `ID:` record, a
 * JSON closer (`},` or `]}`) at the start of a line, or the end of the text.
 */
const DOCUMENT_PATTERN =
  /ID:\s*(\d+)\s*├──\s*Title:\s*([^\n]+)\s*└──\s*Content:\s*([\s\S]*?)(?=\n\s*------|\nID:|\n\s*\}\s*,|\n\s*\]\s*\}|$)/g

// Stray JSON closers left at the end of the last record of a prompt
const TRAILING_CLOSERS = /\s*\}\s*,?\s*\]\s*\}?\s*$/

/**
 * Extracts the context documents printed inside a block.
 * Escaped `\n` sequences (documents embedded in a JSON string) are
 * unescaped first. No match is an empty list, not an error.
 */
export function extractContextDocuments(text: string): ContextDocument[] {
  const source = text.includes('\\n') ? text.split('\\n').join('\n') : text
  const documents: ContextDocument[] = []

  for (const match of source.matchAll(DOCUMENT_PATTERN)) {
    documents.push({
      id: match[1].trim(),
      title: match[2].trim(),
      content: match[3].trim().replace(TRAILING_CLOSERS, '')
    })
  }

  return documents
}
