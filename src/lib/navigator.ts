import type { Conversation } from './history-types'

/**
 * Interactive browsing as an explicit screen stack:
 * overview → conversation → message → document.
 *
 * Indexes are 0-based into the start-time ordered conversation list.
 * "Next message" replaces the top of the stack instead of nesting, so going
 * back from any message always lands on its conversation.
 */
export type Screen =
  | { kind: 'overview' }
  | { kind: 'conversation'; conversation: number }
  | { kind: 'message'; conversation: number; message: number }
  | { kind: 'document'; conversation: number; message: number; document: number }

export interface NavState {
  readonly stack: readonly Screen[]
}

export interface NavStep {
  state: NavState
  done: boolean
  notice?: string
}

const OVERVIEW: Screen = { kind: 'overview' }

export const INVALID_SELECTION = 'Invalid selection.'
export const INVALID_INPUT = 'Invalid input.'

export function initialState(): NavState {
  return { stack: [OVERVIEW] }
}

export function currentScreen(state: NavState): Screen {
  return state.stack[state.stack.length - 1] ?? OVERVIEW
}

function push(state: NavState, screen: Screen): NavStep {
  return { state: { stack: [...state.stack, screen] }, done: false }
}

function pop(state: NavState): NavStep {
  const stack = state.stack.length > 1 ? state.stack.slice(0, -1) : [OVERVIEW]
  return { state: { stack }, done: false }
}

function replaceTop(state: NavState, screen: Screen): NavStep {
  return { state: { stack: [...state.stack.slice(0, -1), screen] }, done: false }
}

function stay(state: NavState, notice: string): NavStep {
  return { state, done: false, notice }
}

/**
 * Parses a 1-based menu choice. Returns the 0-based index, 'range' for a
 * number outside 1..count, or 'nan' for anything that is not a number.
 */
export function parseChoice(input: string, count: number): number | 'range' | 'nan' {
  if (!/^\d+$/.test(input)) return 'nan'
  const n = parseInt(input, 10)
  return n >= 1 && n <= count ? n - 1 : 'range'
}

function choose(
  state: NavState,
  input: string,
  count: number,
  open: (index: number) => Screen
): NavStep {
  const choice = parseChoice(input, count)
  if (choice === 'nan') return stay(state, INVALID_INPUT)
  if (choice === 'range') return stay(state, INVALID_SELECTION)
  return push(state, open(choice))
}

/**
 * Applies one line of user input to the navigation state.
 */
export function navigate(state: NavState, rawInput: string, conversations: readonly Conversation[]): NavStep {
  const input = rawInput.trim()
  const command = input.toLowerCase()
  const screen = currentScreen(state)

  switch (screen.kind) {
    case 'overview':
      if (command === 'q') return { state, done: true }
      return choose(state, input, conversations.length, conversation => ({ kind: 'conversation', conversation }))

    case 'conversation': {
      if (command === 'b') return pop(state)
      const conversation = conversations[screen.conversation]
      if (!conversation) return pop(state)
      return choose(state, input, conversation.messages.length, message => ({
        kind: 'message',
        conversation: screen.conversation,
        message
      }))
    }

    case 'message': {
      const conversation = conversations[screen.conversation]
      const message = conversation?.messages[screen.message]
      if (!conversation || !message) return pop(state)

      const hasNext = screen.message < conversation.messages.length - 1
      const documents = message.contextDocuments.length

      // Nothing to pick: any input returns
      if (documents === 0 && !hasNext) return pop(state)
      if (command === 'b') return pop(state)
      if (command === 'n' && hasNext) {
        return replaceTop(state, { ...screen, message: screen.message + 1 })
      }
      return choose(state, input, documents, document => ({
        kind: 'document',
        conversation: screen.conversation,
        message: screen.message,
        document
      }))
    }

    case 'document':
      return pop(state)
  }
}

/**
 * Input prompt for the current screen.
 */
export function promptFor(state: NavState, conversations: readonly Conversation[]): string {
  const screen = currentScreen(state)

  switch (screen.kind) {
    case 'overview':
      return "\nSelect conversation (number) or 'q' to quit: "

    case 'conversation':
      return "\nSelect message (number), 'b' to go back: "

    case 'message': {
      const conversation = conversations[screen.conversation]
      const message = conversation?.messages[screen.message]
      const hasNext = conversation !== undefined && screen.message < conversation.messages.length - 1
      const hasDocuments = message !== undefined && message.contextDocuments.length > 0

      if (!hasDocuments && !hasNext) return '\nPress Enter to return...'

      const parts: string[] = []
      if (hasDocuments) parts.push('Select document (number)')
      if (hasNext) parts.push("'n' for next message")
      parts.push("'b' to go back")
      return `\n${parts.join(', ')}: `
    }

    case 'document':
      return '\nPress Enter to return...'
  }
}
