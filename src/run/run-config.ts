import { isAbsolute, join, resolve } from 'node:path'

import {
  DEFAULT_MAX_FRAMES,
  DEFAULT_TRANSCRIPTION_LANGUAGE,
  SPEECH_PROVIDER_IDS,
  type SpeechProviderId,
} from '@clipsift/core'

import { type ClipsiftConfig, loadClipsiftConfig, resolveHomeDir } from '../config.js'

export const CACHE_DIR_ENV = 'CLIPSIFT_CACHE_DIR'

export type RunSettings = {
  configPath: string | null
  cacheEnabled: boolean
  cacheDir: string
  cacheMemory: boolean
  maxFrames: number
  providers: SpeechProviderId[]
  language: string
  /** Redirect and page fetch timeout; `null` keeps the library defaults. */
  networkTimeoutMs: number | null
}

export type RunFlags = {
  cache?: boolean
  maxFrames?: string
  language?: string
}

export function parseMaxFramesFlag(raw: string): number {
  const trimmed = raw.trim()
  const value = Number(trimmed)
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`Invalid --max-frames: ${raw} (expected a positive integer)`)
  }
  return value
}

function expandHome(path: string, home: string): string {
  if (path === '~') return home
  if (path.startsWith('~/')) return join(home, path.slice(2))
  return isAbsolute(path) ? path : resolve(path)
}

/** Flag > env > config file > default. */
export function resolveRunSettings({
  env,
  flags,
  loaded = loadClipsiftConfig({ env }),
}: {
  env: Record<string, string | undefined>
  flags: RunFlags
  loaded?: { config: ClipsiftConfig | null; path: string | null }
}): RunSettings {
  const { config, path: configPath } = loaded
  const home = resolveHomeDir(env)

  const envCacheDir = env[CACHE_DIR_ENV]?.trim()
  const cacheDir = expandHome(
    envCacheDir || config?.cache?.path || join(home, '.clipsift', 'cache'),
    home
  )

  const language = flags.language?.trim() || config?.transcription?.language
  const providers = config?.transcription?.providers

  return {
    configPath,
    cacheEnabled: flags.cache !== false && config?.cache?.enabled !== false,
    cacheDir,
    cacheMemory: config?.cache?.memory === true,
    maxFrames:
      typeof flags.maxFrames === 'string'
        ? parseMaxFramesFlag(flags.maxFrames)
        : (config?.media?.maxFrames ?? DEFAULT_MAX_FRAMES),
    providers: providers ? [...providers] : [...SPEECH_PROVIDER_IDS],
    language: language || DEFAULT_TRANSCRIPTION_LANGUAGE,
    networkTimeoutMs: config?.network?.timeoutMs ?? null,
  }
}
