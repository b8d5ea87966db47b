#!/usr/bin/env node

/**
 * Conversation browser for RAG server logs.
 *
 * Reconstructs the conversations recorded in the log's HISTORY blocks and
 * lets you walk them: conversation → message → retrieved context documents.
 *
 * Usage:
 *   tsx src/analyze-log.ts [logfile] [--config <path>] [--list] [--verbose]
 */

import { existsSync } from 'fs'
import { loadConfig } from './lib/config'
import type { DisplayConfig } from './lib/config'
import { analyzeLogFile } from './lib/analyzer'
import { listConversations } from './lib/query'
import { initialState, navigate, promptFor } from './lib/navigator'
import { createLineReader } from './lib/line-reader'
import type { LineReader } from './lib/line-reader'
import { renderNoConversationsHelp, renderOverview, renderScreen, renderStats } from './lib/render'
import type { Conversation } from './lib/history-types'

// --- Types ---

export interface CliOptions {
  logPath: string | null
  configPath: string | null
  list: boolean
  verbose: boolean
  help: boolean
}

export interface CliIO {
  out: (text: string) => void
  err: (text: string) => void
  interactive: boolean
  createReader: () => LineReader
}

const defaultIO: CliIO = {
  out: text => { process.stdout.write(text) },
  err: text => { process.stderr.write(text) },
  interactive: process.stdin.isTTY === true,
  createReader: () => createLineReader()
}

// --- Arguments ---

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { logPath: null, configPath: null, list: false, verbose: false, help: false }

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--help':
      case '-h':
        options.help = true
        break
      case '--list':
        options.list = true
        break
      case '--verbose':
        options.verbose = true
        break
      case '--config':
        if (args[i + 1]) options.configPath = args[++i]
        break
      default:
        if (!args[i].startsWith('-') && options.logPath === null) options.logPath = args[i]
    }
  }

  return options
}

function printUsage(io: CliIO): void {
  io.err(
    'Usage: analyze-log [logfile] [--config <path>] [--list] [--verbose]\n' +
    '\nReconstructs chat conversations from the HISTORY blocks of a RAG server log.\n' +
    '  --config <path>  Config file (default: ~/.chatlog-miner/config.json)\n' +
    '  --list           Print the conversation overview and exit\n' +
    '  --verbose        Report skipped blocks and claimed conversations on stderr\n'
  )
}

// --- Interactive ---

/**
 * Explicit loop over the navigation stack: render, ask, apply.
 * Ends on 'q' at the overview or when input runs out.
 */
export async function runInteractive(
  conversations: readonly Conversation[],
  display: DisplayConfig,
  reader: LineReader,
  out: (text: string) => void
): Promise<void> {
  let state = initialState()

  for (;;) {
    out(`${renderScreen(state, conversations, display)}\n`)

    const input = await reader.ask(promptFor(state, conversations))
    if (input === null) break

    const step = navigate(state, input, conversations)
    if (step.notice) out(`${step.notice}\n`)
    if (step.done) break
    state = step.state
  }
}

// --- CLI ---

export async function main(args: string[] = process.argv.slice(2), io: CliIO = defaultIO): Promise<number> {
  const options = parseArgs(args)
  if (options.help) {
    printUsage(io)
    return 0
  }

  const config = loadConfig(options.configPath ?? undefined)
  const logPath = options.logPath ?? config.logPath

  if (!existsSync(logPath)) {
    io.err(`Error: file not found: ${logPath}\n`)
    return 1
  }

  io.out(`Log file: ${logPath}\n`)

  const result = analyzeLogFile(logPath, {
    marker: config.extraction.marker,
    onClaim: options.verbose
      ? claim => io.err(`✓ ${claim.claimId}: ${claim.userTurns} user turns (line ${claim.lineOffset + 1})\n`)
      : undefined
  })

  if (result.status === 'file-not-found') {
    io.err(`Error: ${result.error}\n`)
    return 1
  }

  if (options.verbose) {
    for (const warning of result.warnings) io.err(`  ⚠ ${warning}\n`)
  }
  io.out(`${renderStats(result.stats)}\n`)

  if (result.status === 'empty') {
    io.out(`${renderNoConversationsHelp()}\n`)
    return 0
  }

  const conversations = listConversations(result.conversations)

  if (options.list || !io.interactive) {
    io.out(`${renderOverview(conversations, config.display)}\n`)
    return 0
  }

  const reader = io.createReader()
  try {
    await runInteractive(conversations, config.display, reader, io.out)
  } finally {
    reader.close()
  }
  return 0
}

// Run if executed directly
const isDirectExecution = process.argv[1]?.endsWith('analyze-log.ts') ||
  process.argv[1]?.endsWith('analyze-log.js')
if (isDirectExecution) {
  main().then(
    code => process.exit(code),
    (err: unknown) => {
      process.stderr.write(`analyze-log failed: ${err instanceof Error ? err.message : String(err)}\n`)
      process.exit(1)
    }
  )
}
