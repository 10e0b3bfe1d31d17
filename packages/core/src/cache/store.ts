import { copyFile, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import { basename, isAbsolute, join, relative, resolve } from 'node:path'

import { isJsonRecord } from '../content/page/json.js'
import {
  type ExtractionResult,
  isMediaAssetKind,
  isMediaType,
  type MediaAsset,
  type VideoInfo,
} from '../content/types.js'
import { type OnProgress, ProgressKind } from '../progress.js'

export const CACHE_FORMAT_VERSION = 1
export const RESULT_FILENAME = 'result.json'

const CONTENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/

export type CacheStoreOptions = {
  root: string
  /** Keep parsed entries in process; files are still checked on every read. */
  memory?: boolean
  onProgress?: OnProgress
}

export type CacheStore = {
  readonly root: string
  entryDir(contentId: string): string
  lookup(contentId: string): Promise<ExtractionResult | null>
  save(contentId: string, result: ExtractionResult): Promise<void>
  evict(contentId: string): Promise<boolean>
}

type CacheFile = {
  version: typeof CACHE_FORMAT_VERSION
  savedAt: string
  result: ExtractionResult
}

type Miss = { result: null; reason: string }
type Hit = { result: ExtractionResult; reason: null }

export function isSafeContentId(contentId: string): boolean {
  return CONTENT_ID_PATTERN.test(contentId)
}

/**
 * One directory per content id under `root`. `result.json` stores asset paths relative to the
 * entry directory, so a cache root can be moved or mounted elsewhere and still hit.
 */
export function createCacheStore({
  root,
  memory = false,
  onProgress = null,
}: CacheStoreOptions): CacheStore {
  const cacheRoot = resolve(root)
  const memoryEntries = memory ? new Map<string, ExtractionResult>() : null

  const entryDir = (contentId: string): string => {
    if (!isSafeContentId(contentId)) {
      throw new Error(`Unsafe content id for cache entry: ${JSON.stringify(contentId)}`)
    }
    return join(cacheRoot, contentId)
  }

  const readStored = async (contentId: string): Promise<Hit | Miss> => {
    const remembered = memoryEntries?.get(contentId)
    if (remembered) return { result: remembered, reason: null }

    let raw: string
    try {
      raw = await readFile(join(entryDir(contentId), RESULT_FILENAME), 'utf8')
    } catch (error) {
      const code = isJsonRecord(error) ? error.code : null
      return { result: null, reason: code === 'ENOENT' ? 'not cached' : 'unreadable entry' }
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      return { result: null, reason: 'malformed result.json' }
    }
    if (!isJsonRecord(parsed) || parsed.version !== CACHE_FORMAT_VERSION) {
      return { result: null, reason: 'unsupported cache format' }
    }
    const result = parseStoredResult(parsed.result)
    if (!result) return { result: null, reason: 'malformed result.json' }
    if (result.contentId !== contentId) return { result: null, reason: 'content id mismatch' }
    memoryEntries?.set(contentId, result)
    return { result, reason: null }
  }

  const lookup = async (contentId: string): Promise<ExtractionResult | null> => {
    const miss = (reason: string) => {
      onProgress?.({ kind: ProgressKind.CacheMiss, contentId, reason })
      return null
    }
    if (!isSafeContentId(contentId)) return miss('unsafe content id')

    const stored = await readStored(contentId)
    if (!stored.result) return miss(stored.reason)

    const dir = entryDir(contentId)
    const assets: MediaAsset[] = []
    for (const asset of stored.result.assets) {
      if (!isContainedRelativePath(asset.path)) {
        memoryEntries?.delete(contentId)
        return miss(`unsafe asset path ${asset.path}`)
      }
      const absolute = join(dir, asset.path)
      const exists = await stat(absolute)
        .then((info) => info.isFile())
        .catch(() => false)
      if (!exists) {
        memoryEntries?.delete(contentId)
        return miss(`missing asset ${asset.path}`)
      }
      assets.push({ ...asset, path: absolute })
    }

    onProgress?.({ kind: ProgressKind.CacheHit, contentId })
    return { ...stored.result, assets, fromCache: true }
  }

  const save = async (contentId: string, result: ExtractionResult): Promise<void> => {
    const dir = entryDir(contentId)
    await mkdir(dir, { recursive: true })

    const assets: MediaAsset[] = []
    for (const asset of result.assets) {
      const absolute = resolve(asset.path)
      let relativePath = relative(dir, absolute)
      if (!isContainedRelativePath(relativePath)) {
        relativePath = basename(absolute)
        await copyFile(absolute, join(dir, relativePath))
      }
      assets.push({ ...asset, path: relativePath })
    }

    const stored: ExtractionResult = { ...result, contentId, assets, fromCache: false }
    const file: CacheFile = {
      version: CACHE_FORMAT_VERSION,
      savedAt: new Date().toISOString(),
      result: stored,
    }
    const target = join(dir, RESULT_FILENAME)
    const tempPath = `${target}.${process.pid}.${Date.now()}.tmp`
    await writeFile(tempPath, `${JSON.stringify(file, null, 2)}\n`, 'utf8')
    await rename(tempPath, target)
    memoryEntries?.set(contentId, stored)
  }

  const evict = async (contentId: string): Promise<boolean> => {
    memoryEntries?.delete(contentId)
    if (!isSafeContentId(contentId)) return false
    const dir = entryDir(contentId)
    const existed = await stat(dir)
      .then(() => true)
      .catch(() => false)
    await rm(dir, { recursive: true, force: true })
    return existed
  }

  return { root: cacheRoot, entryDir, lookup, save, evict }
}

function isContainedRelativePath(path: string): boolean {
  if (!path || isAbsolute(path)) return false
  return !path.split(/[\\/]/).some((segment) => segment === '..')
}

function parseStoredResult(value: unknown): ExtractionResult | null {
  if (!isJsonRecord(value)) return null
  const { contentId, sourceUrl, transcript, success, error } = value
  if (typeof contentId !== 'string') return null
  if (!isNullableString(sourceUrl) || !isNullableString(error)) return null
  const mediaType = parseNullable(value.mediaType, isMediaType)
  if (mediaType === undefined) return null
  if (typeof transcript !== 'string' || typeof success !== 'boolean') return null
  if (!Array.isArray(value.assets)) return null

  const assets: MediaAsset[] = []
  for (const entry of value.assets) {
    const asset = parseAsset(entry)
    if (!asset) return null
    assets.push(asset)
  }

  let videoInfo: VideoInfo | null = null
  if (value.videoInfo !== null) {
    videoInfo = parseVideoInfo(value.videoInfo)
    if (!videoInfo) return null
  }

  return {
    contentId,
    sourceUrl,
    videoInfo,
    mediaType,
    assets,
    transcript,
    success,
    error,
    fromCache: false,
  }
}

function parseAsset(value: unknown): MediaAsset | null {
  if (!isJsonRecord(value)) return null
  const { kind, path } = value
  if (!isMediaAssetKind(kind) || typeof path !== 'string') return null
  const ordinal = parseNullable(value.ordinal, isInteger)
  if (ordinal === undefined) return null
  return { kind, path, ordinal }
}

function parseVideoInfo(value: unknown): VideoInfo | null {
  if (!isJsonRecord(value)) return null
  const { contentId, title, author, videoUrl, audioUrl, coverUrl } = value
  if (!isNullableString(contentId) || typeof title !== 'string' || typeof author !== 'string') {
    return null
  }
  if (!isNullableString(videoUrl) || !isNullableString(audioUrl) || !isNullableString(coverUrl)) {
    return null
  }
  if (!Array.isArray(value.imageUrls)) return null
  const imageUrls = value.imageUrls.filter((url): url is string => typeof url === 'string')
  if (imageUrls.length !== value.imageUrls.length) return null
  return { contentId, title, author, videoUrl, audioUrl, coverUrl, imageUrls }
}

/** `undefined` signals an invalid value; `null` is a valid stored null. */
function parseNullable<T>(
  value: unknown,
  guard: (value: unknown) => value is T
): T | null | undefined {
  if (value === null) return null
  return guard(value) ? value : undefined
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value)
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string'
}
