import { readFileSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import { HISTORY_MARKER } from './history-types'

export interface ExtractionConfig {
  marker: string
}

export interface DisplayConfig {
  previewChars: number    // first-message preview length in the overview (default: 80)
  ruleWidth: number       // width of the ==== header rules (default: 80)
  noResponseText: string  // shown when a turn has no assistant reply
}

export interface MinerConfig {
  logPath: string
  extraction: ExtractionConfig
  display: DisplayConfig
}

export const DEFAULT_CONFIG_PATH = join(homedir(), '.chatlog-miner', 'config.json')

export const DEFAULT_CONFIG: MinerConfig = {
  logPath: join('logs', 'server.log'),
  extraction: {
    marker: HISTORY_MARKER,
  },
  display: {
    previewChars: 80,
    ruleWidth: 80,
    noResponseText: '[No assistant response found]',
  },
}

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Nested section of a raw config, or {} when absent or not an object
 */
function section(raw: RawConfig, key: string): RawConfig {
  const value = raw[key]
  return isRecord(value) ? value : {}
}

/**
 * Coerces a value to a positive integer, returning fallback if invalid.
 * Only accepts actual numbers and numeric strings: null, arrays, objects and the like,
 * which Number() would coerce to 0, fall back.
 */
export function validCount(value: unknown, fallback: number): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN
  return Number.isInteger(n) && n > 0 ? n : fallback
}

function validText(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback
}

/**
 * Merges a parsed config file over the defaults field by field. Missing or
 * invalid values (e.g. "previewChars": "wide") fall back to their default
 * without discarding the rest of the file.
 */
function resolveConfig(raw: RawConfig): MinerConfig {
  const d = DEFAULT_CONFIG
  const extraction = section(raw, 'extraction')
  const display = section(raw, 'display')

  return {
    logPath: validText(raw.logPath, d.logPath),
    extraction: {
      marker: validText(extraction.marker, d.extraction.marker),
    },
    display: {
      previewChars: validCount(display.previewChars, d.display.previewChars),
      ruleWidth: validCount(display.ruleWidth, d.display.ruleWidth),
      noResponseText: validText(display.noResponseText, d.display.noResponseText),
    },
  }
}

/**
 * Load config from ~/.chatlog-miner/config.json
 * Falls back to defaults if file missing or invalid
 * @param configPath Optional override for testing
 */
export function loadConfig(configPath?: string): MinerConfig {
  const path = configPath ?? DEFAULT_CONFIG_PATH

  try {
    const content = readFileSync(path, 'utf-8')
    const parsed: unknown = JSON.parse(content)
    if (!isRecord(parsed)) {
      throw new Error('config root must be an object')
    }
    return resolveConfig(parsed)
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      // Log parse/read errors to stderr, but still return defaults
      console.error(`chatlog-miner config error (using defaults): ${err}`)
    }
    return DEFAULT_CONFIG
  }
}
