import { promises as fs } from 'node:fs'
import { dirname, join } from 'node:path'

import { MOBILE_USER_AGENT, PLATFORM_REFERER } from '../content/page/constants.js'
import { describeError, type OnProgress, ProgressKind } from '../progress.js'
import { DEFAULT_DOWNLOAD_TIMEOUT_MS } from './constants.js'

export type DownloadDeps = {
  fetch: typeof fetch
  timeoutMs?: number
  onProgress?: OnProgress
}

export type DownloadedMediaKind = 'video' | 'audio'

export type DownloadedMedia = {
  path: string
  kind: DownloadedMediaKind
}

const DOWNLOAD_HEADERS: Record<string, string> = {
  'User-Agent': MOBILE_USER_AGENT,
  Referer: PLATFORM_REFERER,
}

/**
 * Streams `url` into `destination`. Returns false on transport errors, non-2xx responses and
 * empty bodies; the cause goes out as a `download-done` event and partial files are removed.
 */
export async function downloadFile(
  url: string,
  destination: string,
  deps: DownloadDeps
): Promise<boolean> {
  const onProgress = deps.onProgress ?? null
  onProgress?.({ kind: ProgressKind.DownloadStart, url, destination })

  let downloadedBytes = 0
  const fail = async (message: string): Promise<boolean> => {
    await fs.unlink(destination).catch(() => {})
    onProgress?.({
      kind: ProgressKind.DownloadDone,
      url,
      destination,
      ok: false,
      downloadedBytes,
      error: message,
    })
    return false
  }

  try {
    await fs.mkdir(dirname(destination), { recursive: true })
    const response = await deps.fetch(url, {
      headers: DOWNLOAD_HEADERS,
      redirect: 'follow',
      signal: AbortSignal.timeout(deps.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS),
    })
    if (!response.ok) {
      await response.body?.cancel().catch(() => {})
      return await fail(`HTTP ${response.status}`)
    }
    if (!response.body) return await fail('empty response body')

    const reader = response.body.getReader()
    const handle = await fs.open(destination, 'w').catch(async (error: unknown) => {
      await reader.cancel().catch(() => {})
      throw error
    })
    try {
      while (true) {
        const { value, done } = await reader.read()
        if (done) break
        if (!value || value.byteLength === 0) continue
        await handle.write(value)
        downloadedBytes += value.byteLength
      }
    } catch (error) {
      await reader.cancel().catch(() => {})
      throw error
    } finally {
      await handle.close()
    }

    if (downloadedBytes === 0) return await fail('downloaded 0 bytes')
  } catch (error) {
    return await fail(describeError(error))
  }

  onProgress?.({
    kind: ProgressKind.DownloadDone,
    url,
    destination,
    ok: true,
    downloadedBytes,
    error: null,
  })
  return true
}

/**
 * Picks a local name from the URL's extension hints. The platform serves both video and audio-only
 * tracks in the same mp4 family container, so anything not clearly mp3 counts as video.
 */
export function classifyMediaUrl(url: string): { kind: DownloadedMediaKind; filename: string } {
  let pathname = url
  let query = ''
  try {
    const parsed = new URL(url)
    pathname = parsed.pathname
    query = parsed.search
  } catch {
    // keep raw string
  }
  const lowerPath = pathname.toLowerCase()
  const lowerQuery = query.toLowerCase()

  if (
    lowerPath.endsWith('.mp3') ||
    lowerQuery.includes('mime_type=audio_mpeg') ||
    lowerQuery.includes('mime_type=audio_mp3')
  ) {
    return { kind: 'audio', filename: 'audio.mp3' }
  }
  if (lowerPath.endsWith('.m4a') || lowerQuery.includes('mime_type=audio_mp4')) {
    return { kind: 'video', filename: 'video.m4a' }
  }
  return { kind: 'video', filename: 'video.mp4' }
}

export async function downloadMedia(
  url: string,
  dir: string,
  deps: DownloadDeps
): Promise<DownloadedMedia | null> {
  const { kind, filename } = classifyMediaUrl(url)
  const path = join(dir, filename)
  const ok = await downloadFile(url, path, deps)
  return ok ? { path, kind } : null
}
