import { describe, test, expect } from 'vitest'
import { reconstructConversations, isPrefixOf } from '../src/lib/reconstruct'
import type { ClaimInfo } from '../src/lib/reconstruct'
import { segmentBlocks } from '../src/lib/segment'
import { parseLogTimestamp } from '../src/lib/timestamp'
import { historyLine, documentLines, user, assistant, system } from './log-fixtures'

const T1 = '2024-05-01 10:00:00,000'
const T2 = '2024-05-01 10:01:00,000'
const T3 = '2024-05-01 10:02:00,000'
const T4 = '2024-05-01 10:03:00,000'

function reconstruct(lines: string[]) {
  return reconstructConversations(segmentBlocks(lines.join('\n')))
}

function at(timestamp: string): number {
  return parseLogTimestamp(timestamp).getTime()
}

describe('isPrefixOf', () => {
  test('compares element-wise against the same-length prefix', () => {
    expect(isPrefixOf([], ['a'])).toBe(true)
    expect(isPrefixOf(['a'], ['a', 'b'])).toBe(true)
    expect(isPrefixOf(['a', 'b'], ['a', 'b'])).toBe(true)
    expect(isPrefixOf(['a', 'b'], ['a'])).toBe(false)
    expect(isPrefixOf(['b'], ['a', 'b'])).toBe(false)
  })
})

describe('reconstructConversations', () => {
  test('merges growing snapshots of one conversation', () => {
    const turns = [user('hi'), assistant('hello'), user('bye')]
    const { conversations, stats } = reconstruct([
      historyLine(T1, [user('hi')]),
      historyLine(T2, turns),
      historyLine(T3, turns)
    ])

    expect(conversations.size).toBe(1)
    const conv = conversations.get('conversation_1')
    expect(conv?.id).toBe('conversation_1')
    expect(conv?.firstMessage).toBe('hi')
    expect(conv?.messageCount).toBe(2)
    expect(conv?.messages).toHaveLength(2)
    expect(conv?.startTime.getTime()).toBe(at(T1))
    expect(stats).toEqual({ decoded: 3, skipped: 0, absorbed: 2, claimed: 1 })
  })

  test('pairs each user turn with the next assistant turn', () => {
    const { conversations } = reconstruct([
      historyLine(T1, [system('rules'), user('hi'), assistant(' hello '), user('bye')])
    ])
    const messages = conversations.get('conversation_1')?.messages ?? []

    expect(messages.map(m => m.userMessage)).toEqual(['hi', 'bye'])
    expect(messages[0].assistantResponse).toBe('hello')
    expect(messages[1].assistantResponse).toBeNull()
  })

  test('keeps an empty reply distinct from a missing one', () => {
    const { conversations } = reconstruct([
      historyLine(T1, [user('q'), assistant('   ')])
    ])
    expect(conversations.get('conversation_1')?.messages[0].assistantResponse).toBe('')
  })

  test('finds replies by turn position when user turns repeat', () => {
    const { conversations } = reconstruct([
      historyLine(T1, [user('same'), assistant('first'), user('same'), assistant('second')])
    ])
    const messages = conversations.get('conversation_1')?.messages ?? []
    expect(messages.map(m => m.assistantResponse)).toEqual(['first', 'second'])
  })

  test('stamps every message with the claimed snapshot time', () => {
    const turns = [user('hi'), assistant('hello'), user('bye')]
    const { conversations } = reconstruct([
      historyLine(T1, [user('hi')]),
      historyLine(T3, turns)
    ])
    const messages = conversations.get('conversation_1')?.messages ?? []
    expect(messages.map(m => m.timestamp.getTime())).toEqual([at(T3), at(T3)])
  })

  test('attaches documents from the snapshot that ended at each turn', () => {
    const { conversations } = reconstruct([
      historyLine(T1, [user('What is X?')]),
      ...documentLines([
        { id: '11', title: 'X overview', content: 'X is a thing' },
        { id: '12', title: 'X details', content: 'More about X' }
      ]),
      historyLine(T2, [user('What is X?'), assistant('X is a thing.'), user('And Y?')])
    ])
    const messages = conversations.get('conversation_1')?.messages ?? []

    expect(messages[0].contextDocuments).toEqual([
      { id: '11', title: 'X overview', content: 'X is a thing' },
      { id: '12', title: 'X details', content: 'More about X' }
    ])
    expect(messages[1].contextDocuments).toEqual([])
  })

  test('separates interleaved conversations and orders them by start time', () => {
    const { conversations, stats } = reconstruct([
      historyLine(T1, [user('a1')]),
      historyLine(T2, [user('b1')]),
      historyLine(T3, [user('a1'), assistant('ra'), user('a2')]),
      historyLine(T4, [user('b1'), assistant('rb'), user('b2')])
    ])

    expect([...conversations.keys()]).toEqual(['conversation_1', 'conversation_2'])
    expect(conversations.get('conversation_1')?.firstMessage).toBe('a1')
    expect(conversations.get('conversation_1')?.startTime.getTime()).toBe(at(T1))
    expect(conversations.get('conversation_2')?.firstMessage).toBe('b1')
    expect(conversations.get('conversation_2')?.startTime.getTime()).toBe(at(T2))
    expect(stats.absorbed).toBe(2)
  })

  test('never claims a prefix of a claimed conversation', () => {
    const { conversations } = reconstruct([
      historyLine(T1, [user('x')]),
      historyLine(T2, [user('x'), assistant('r'), user('y')]),
      historyLine(T3, [user('x'), assistant('r'), user('y'), assistant('s'), user('z')])
    ])

    expect(conversations.size).toBe(1)
    expect(conversations.get('conversation_1')?.messages.map(m => m.userMessage)).toEqual(['x', 'y', 'z'])
  })

  test('a shorter snapshot newer than a longer one is its own conversation', () => {
    const { conversations } = reconstruct([
      historyLine(T1, [user('x'), assistant('r'), user('y')]),
      historyLine(T2, [user('x')])
    ])

    expect(conversations.size).toBe(2)
    expect(conversations.get('conversation_1')?.messageCount).toBe(2)
    expect(conversations.get('conversation_2')?.messageCount).toBe(1)
  })

  test('breaks timestamp ties by line offset', () => {
    const { conversations } = reconstruct([
      historyLine(T1, [user('p'), assistant('r'), user('q')]),
      historyLine(T1, [user('p')])
    ])

    // The later line counts as newer, so [p] is claimed before [p, q] is seen
    expect(conversations.size).toBe(2)
    expect(conversations.get('conversation_1')?.messageCount).toBe(2)
    expect(conversations.get('conversation_2')?.messageCount).toBe(1)

    const reversed = reconstruct([
      historyLine(T1, [user('p')]),
      historyLine(T1, [user('p'), assistant('r'), user('q')])
    ])
    expect(reversed.conversations.size).toBe(1)
  })

  test('skips malformed blocks with a warning', () => {
    const { conversations, warnings, stats } = reconstruct([
      `${T1} INFO chat_model [HISTORY][{"role": "user", "content": broken}]`,
      historyLine(T2, [user('fine')])
    ])

    expect(conversations.size).toBe(1)
    expect(warnings).toEqual([`Skipped block at line 1 (${T1}): invalid-json`])
    expect(stats.skipped).toBe(1)
  })

  test('ignores snapshots without user turns', () => {
    const { conversations, warnings, stats } = reconstruct([
      historyLine(T1, [system('boot')])
    ])

    expect(conversations.size).toBe(0)
    expect(warnings).toEqual([])
    expect(stats).toEqual({ decoded: 0, skipped: 0, absorbed: 0, claimed: 0 })
  })

  test('reports each claim', () => {
    const claims: ClaimInfo[] = []
    const turns = [user('hi'), assistant('hello'), user('bye')]
    reconstructConversations(
      segmentBlocks([historyLine(T1, [user('hi')]), historyLine(T3, turns)].join('\n')),
      { onClaim: claim => claims.push(claim) }
    )

    expect(claims).toEqual([
      { claimId: 'conv_1_20240501_100200', userTurns: 2, rawTimestamp: T3, lineOffset: 1 }
    ])
  })

  test('is idempotent', () => {
    const lines = [
      historyLine(T1, [user('a1')]),
      ...documentLines([{ id: '1', title: 'Doc', content: 'body' }]),
      historyLine(T2, [user('b1')]),
      historyLine(T3, [user('a1'), assistant('ra'), user('a2')])
    ]

    expect(reconstruct(lines)).toEqual(reconstruct(lines))
  })
})
