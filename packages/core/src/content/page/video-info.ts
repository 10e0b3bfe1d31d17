import { describeError, type OnProgress, ProgressKind } from '../../progress.js'
import type { VideoInfo } from '../types.js'
import { AUDIO_ONLY_URI_MARKER, PLAY_ENDPOINT, ROUTER_PAGE_KEYS } from './constants.js'
import { fetchPageHtml } from './fetcher.js'
import {
  asRecordArray,
  getJsonArray,
  getJsonPath,
  getJsonString,
  isJsonRecord,
  type JsonRecord,
  nonEmpty,
} from './json.js'
import { extractRouterData } from './router-data.js'

export type ExtractVideoInfoDeps = {
  fetch: typeof fetch
  timeoutMs?: number
  onProgress?: OnProgress
}

/**
 * Walks `loaderData → <page route> → videoInfoRes → item_list[0]`. Any missing step means the
 * page layout changed or the request was served a stripped page; we return `null` instead of
 * guessing.
 */
export function findFirstItem(routerData: unknown): JsonRecord | null {
  const loaderData = getJsonPath(routerData, ['loaderData'])
  if (!isJsonRecord(loaderData)) return null

  const pageKey = ROUTER_PAGE_KEYS.find((key) => isJsonRecord(loaderData[key]))
  if (!pageKey) return null

  const itemList = getJsonPath(loaderData, [pageKey, 'videoInfoRes', 'item_list'])
  if (!Array.isArray(itemList)) return null
  const first: unknown = itemList[0]
  return isJsonRecord(first) ? first : null
}

export function parseVideoInfo(routerData: unknown): VideoInfo | null {
  const item = findFirstItem(routerData)
  if (!item) return null

  const playUri = nonEmpty(getJsonString(item, ['video', 'play_addr', 'uri']))
  let videoUrl: string | null = null
  let audioUrl: string | null = null
  if (playUri?.includes(AUDIO_ONLY_URI_MARKER)) {
    audioUrl = playUri
  } else if (playUri) {
    videoUrl = buildPlayUrl(playUri)
    audioUrl = readAudioAddr(item)
  }

  const imageUrls = asRecordArray(getJsonArray(item, ['images']))
    .map((image) => nonEmpty(getJsonString(image, ['url_list', 0])))
    .filter((url): url is string => url !== null)

  return {
    contentId: readContentId(item),
    title: getJsonString(item, ['desc'])?.trim() ?? '',
    author: getJsonString(item, ['author', 'nickname'])?.trim() ?? '',
    videoUrl,
    audioUrl,
    coverUrl: nonEmpty(getJsonString(item, ['video', 'cover', 'url_list', 0])),
    imageUrls,
  }
}

/** Fetches the share page and parses its embedded state. Never throws. */
export async function extractVideoInfo(
  url: string,
  deps: ExtractVideoInfoDeps
): Promise<VideoInfo | null> {
  deps.onProgress?.({ kind: ProgressKind.PageFetchStart, url })
  let html: string
  try {
    html = await fetchPageHtml(deps.fetch, url, { timeoutMs: deps.timeoutMs })
  } catch (error) {
    deps.onProgress?.({
      kind: ProgressKind.PageFetchDone,
      url,
      ok: false,
      error: describeError(error),
    })
    return null
  }

  const routerData = extractRouterData(html)
  const info = routerData === null ? null : parseVideoInfo(routerData)
  deps.onProgress?.({
    kind: ProgressKind.PageFetchDone,
    url,
    ok: info !== null,
    error:
      routerData === null
        ? 'embedded page state not found'
        : info === null
          ? 'embedded page state has no content item'
          : null,
  })
  return info
}

function buildPlayUrl(uri: string): string {
  const url = new URL(PLAY_ENDPOINT)
  url.searchParams.set('video_id', uri)
  url.searchParams.set('ratio', '720p')
  url.searchParams.set('line', '0')
  return url.toString()
}

function readAudioAddr(item: JsonRecord): string | null {
  const addr = getJsonPath(item, ['video', 'audio_addr'])
  if (typeof addr === 'string') return nonEmpty(addr)
  return (
    nonEmpty(getJsonString(addr, ['url_list', 0])) ?? nonEmpty(getJsonString(addr, ['uri'])) ?? null
  )
}

function readContentId(item: JsonRecord): string | null {
  const raw = item.aweme_id
  if (typeof raw === 'number') return Number.isSafeInteger(raw) && raw >= 0 ? String(raw) : null
  return typeof raw === 'string' ? nonEmpty(raw) : null
}
