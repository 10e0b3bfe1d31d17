export const MOBILE_USER_AGENT =
  'Mozilla/5.0 (Linux; Android 8.0.0; SM-G955U Build/R16NW) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/116.0.0.0 Mobile Safari/537.36'
export const PLATFORM_REFERER = 'https://www.douyin.com/?is_from_mobile_home=1&recommend=1'

// The share page only renders embedded state for mobile clients, and the edge checks the referer.
export const MOBILE_REQUEST_HEADERS: Record<string, string> = {
  'User-Agent': MOBILE_USER_AGENT,
  Referer: PLATFORM_REFERER,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
}

export const DEFAULT_PAGE_TIMEOUT_MS = 10_000

export const ROUTER_DATA_ASSIGNMENT_PATTERN = /^\s*(?:window\.)?_ROUTER_DATA\s*=\s*([\s\S]+?)\s*;?\s*$/

/** Versioned route keys under `loaderData`; gallery posts live under the `note` route. */
export const ROUTER_PAGE_KEYS = ['video_(id)/page', 'note_(id)/page'] as const

export const PLAY_ENDPOINT = 'https://www.iesdouyin.com/aweme/v1/play/'

/** A play-address URI carrying this marker points at an audio-only track. */
export const AUDIO_ONLY_URI_MARKER = 'mp3'
