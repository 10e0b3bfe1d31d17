import { readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

import { isSpeechProviderId, type SpeechProviderId } from '@clipsift/core'
import JSON5 from 'json5'

export type ClipsiftConfig = {
  cache?: {
    enabled?: boolean
    /** Cache root; `~` expands to the home directory. */
    path?: string
    memory?: boolean
  }
  media?: {
    maxFrames?: number
  }
  transcription?: {
    /** Subset and order of the fallback chain. */
    providers?: SpeechProviderId[]
    language?: string
  }
  network?: {
    timeoutMs?: number
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function assertNoComments(raw: string, path: string): void {
  let inString: '"' | "'" | null = null
  let escaped = false
  let line = 1
  let col = 1

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i] ?? ''
    const next = raw[i + 1] ?? ''

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === inString) {
        inString = null
      }
    } else if (ch === '"' || ch === "'") {
      inString = ch
    } else if (ch === '/' && (next === '/' || next === '*')) {
      throw new Error(
        `Invalid config file ${path}: comments are not allowed (found /${next} at ${line}:${col}).`
      )
    }

    if (ch === '\n') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
}

function readSection(
  parsed: Record<string, unknown>,
  key: string,
  path: string
): Record<string, unknown> | undefined {
  const value = parsed[key]
  if (typeof value === 'undefined') return undefined
  if (!isRecord(value)) {
    throw new Error(`Invalid config file ${path}: "${key}" must be an object.`)
  }
  return value
}

function readOptional<T>(
  section: Record<string, unknown>,
  key: string,
  path: string,
  label: string,
  guard: (value: unknown) => value is T,
  expectation: string
): T | undefined {
  const value = section[key]
  if (typeof value === 'undefined') return undefined
  if (!guard(value)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be ${expectation}.`)
  }
  return value
}

const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean'
const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0
const isPositiveInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value > 0

function parseProviders(value: unknown, path: string): SpeechProviderId[] | undefined {
  if (typeof value === 'undefined') return undefined
  if (!Array.isArray(value)) {
    throw new Error(`Invalid config file ${path}: "transcription.providers" must be an array.`)
  }
  const providers: SpeechProviderId[] = []
  for (const entry of value) {
    if (typeof entry !== 'string' || !isSpeechProviderId(entry)) {
      throw new Error(
        `Invalid config file ${path}: unknown transcription provider "${String(entry)}".`
      )
    }
    if (!providers.includes(entry)) providers.push(entry)
  }
  return providers
}

export function resolveHomeDir(env: Record<string, string | undefined>): string {
  return env.HOME?.trim() || homedir()
}

export function loadClipsiftConfig({ env }: { env: Record<string, string | undefined> }): {
  config: ClipsiftConfig | null
  path: string | null
} {
  const home = resolveHomeDir(env)
  if (!home) return { config: null, path: null }
  const path = join(home, '.clipsift', 'config.json')

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  let parsed: unknown
  assertNoComments(raw, path)
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const config: ClipsiftConfig = {}

  const cache = readSection(parsed, 'cache', path)
  if (cache) {
    const enabled = readOptional(cache, 'enabled', path, 'cache.enabled', isBoolean, 'a boolean')
    const cachePath = readOptional(
      cache,
      'path',
      path,
      'cache.path',
      isNonEmptyString,
      'a non-empty string'
    )
    const memory = readOptional(cache, 'memory', path, 'cache.memory', isBoolean, 'a boolean')
    config.cache = {
      ...(enabled !== undefined ? { enabled } : {}),
      ...(cachePath !== undefined ? { path: cachePath } : {}),
      ...(memory !== undefined ? { memory } : {}),
    }
  }

  const media = readSection(parsed, 'media', path)
  if (media) {
    const maxFrames = readOptional(
      media,
      'maxFrames',
      path,
      'media.maxFrames',
      isPositiveInteger,
      'a positive integer'
    )
    config.media = maxFrames !== undefined ? { maxFrames } : {}
  }

  const transcription = readSection(parsed, 'transcription', path)
  if (transcription) {
    const providers = parseProviders(transcription.providers, path)
    const language = readOptional(
      transcription,
      'language',
      path,
      'transcription.language',
      isNonEmptyString,
      'a non-empty string'
    )
    config.transcription = {
      ...(providers !== undefined ? { providers } : {}),
      ...(language !== undefined ? { language } : {}),
    }
  }

  const network = readSection(parsed, 'network', path)
  if (network) {
    const timeoutMs = readOptional(
      network,
      'timeoutMs',
      path,
      'network.timeoutMs',
      isPositiveInteger,
      'a positive integer'
    )
    config.network = timeoutMs !== undefined ? { timeoutMs } : {}
  }

  return { config, path }
}
