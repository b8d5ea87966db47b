import { createInterface } from 'readline'
import type { Readable, Writable } from 'stream'

export interface LineReader {
  /** Writes the prompt and resolves with the next line, or null once input has ended */
  ask(prompt: string): Promise<string | null>
  close(): void
}

/**
 * Line-at-a-time reader for the interactive browser.
 * Lines that arrive before they are asked for are buffered, so piped input
 * is consumed in order; end of input resolves pending and later asks with null.
 */
export function createLineReader(
  input: Readable = process.stdin,
  output: Writable = process.stdout
): LineReader {
  const rl = createInterface({ input, terminal: false })
  const buffered: string[] = []
  const waiting: Array<(line: string | null) => void> = []
  let closed = false

  const onLine = (line: string) => {
    const next = waiting.shift()
    if (next) {
      next(line)
    } else {
      buffered.push(line)
    }
  }
  const onClose = () => {
    closed = true
    rl.removeListener('line', onLine)
    for (const resolve of waiting.splice(0)) resolve(null)
  }

  rl.on('line', onLine)
  rl.on('close', onClose)

  return {
    ask(prompt: string): Promise<string | null> {
      output.write(prompt)
      const line = buffered.shift()
      if (line !== undefined) return Promise.resolve(line)
      if (closed) return Promise.resolve(null)
      return new Promise(resolve => { waiting.push(resolve) })
    },
    close(): void {
      rl.close()
    }
  }
}
