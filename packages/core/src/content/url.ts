import { describeError, type OnProgress, ProgressKind } from '../progress.js'
import { MOBILE_REQUEST_HEADERS } from './page/constants.js'

export type PlatformHosts = {
  /** Redirecting hosts that must be resolved over HTTP before scraping. */
  shortLink: readonly string[]
  /** Desktop/web hosts serving `/video/<id>` and `/note/<id>` paths. */
  standard: readonly string[]
  /** Hosts serving the share-link form the page scraper is tuned for. */
  share: readonly string[]
}

export const DEFAULT_PLATFORM_HOSTS: PlatformHosts = {
  shortLink: ['v.douyin.com', 'dy.app'],
  standard: ['douyin.com'],
  share: ['iesdouyin.com'],
}

export const SHARE_URL_BASE = 'https://www.iesdouyin.com/share'
export const DEFAULT_REDIRECT_TIMEOUT_MS = 10_000
export const DEFAULT_MAX_REDIRECT_DEPTH = 5

// Share texts glue URLs to CJK prose and fullwidth punctuation; stop at either.
const URL_IN_TEXT_PATTERN = /https?:\/\/[^\s\u3000-\u303f\u4e00-\u9fff\uff00-\uffef"'<>]+/i
const STANDARD_PATH_PATTERN = /\/(video|note)\/(\d+)/

export type ResolveUrlOptions = {
  fetch: typeof fetch
  hosts?: PlatformHosts
  timeoutMs?: number
  maxRedirectDepth?: number
  onProgress?: OnProgress
}

export function extractFirstUrl(text: string): string | null {
  const match = text.match(URL_IN_TEXT_PATTERN)
  if (!match) return null
  // Trailing ASCII punctuation is almost always prose, not part of the link.
  const trimmed = match[0].replace(/[.,;:!?)\]]+$/, '')
  return trimmed.length > 0 ? trimmed : null
}

export function hostMatches(rawUrl: string, hosts: readonly string[]): boolean {
  let hostname: string
  try {
    hostname = new URL(rawUrl).hostname.toLowerCase()
  } catch {
    return false
  }
  return hosts.some((host) => hostname === host || hostname.endsWith(`.${host}`))
}

export function isShortLinkUrl(rawUrl: string, hosts: PlatformHosts = DEFAULT_PLATFORM_HOSTS) {
  return hostMatches(rawUrl, hosts.shortLink)
}

export function toShareUrl(rawUrl: string, hosts: PlatformHosts = DEFAULT_PLATFORM_HOSTS) {
  if (!hostMatches(rawUrl, hosts.standard)) return null
  const match = new URL(rawUrl).pathname.match(STANDARD_PATH_PATTERN)
  if (!match) return null
  return `${SHARE_URL_BASE}/${match[1]}/${match[2]}/`
}

/**
 * Normalizes a platform link into the share-link form.
 *
 * Short links are followed one hop at a time until the host leaves the short-link set. Transport
 * errors and the redirect depth limit both return the last URL seen, so callers must treat a
 * result that is still a short link as a soft failure.
 */
export async function resolveShareUrl(
  url: string,
  options: ResolveUrlOptions,
  depth = 0
): Promise<string> {
  const hosts = options.hosts ?? DEFAULT_PLATFORM_HOSTS

  if (hostMatches(url, hosts.shortLink)) {
    const maxDepth = options.maxRedirectDepth ?? DEFAULT_MAX_REDIRECT_DEPTH
    if (depth >= maxDepth) return url

    let redirected: string | null
    try {
      redirected = await nextRedirect(url, options)
    } catch (error) {
      options.onProgress?.({
        kind: ProgressKind.ResolveError,
        url,
        error: `redirect resolution failed: ${describeError(error)}`,
      })
      return url
    }
    if (!redirected || redirected === url) return url

    options.onProgress?.({ kind: ProgressKind.ResolveRedirect, from: url, to: redirected, depth })
    return resolveShareUrl(redirected, options, depth + 1)
  }

  const share = toShareUrl(url, hosts)
  if (share) return share

  return url
}

export async function resolveInputUrl(
  text: string,
  options: ResolveUrlOptions
): Promise<string | null> {
  const first = extractFirstUrl(text)
  if (!first) {
    options.onProgress?.({
      kind: ProgressKind.ResolveDone,
      input: text,
      url: null,
      error: 'no URL found in input',
    })
    return null
  }
  const resolved = await resolveShareUrl(first, options)
  options.onProgress?.({ kind: ProgressKind.ResolveDone, input: text, url: resolved, error: null })
  return resolved
}

/** One hop: the `Location` of a 3xx answer to HEAD, or to GET when HEAD does not redirect. */
async function nextRedirect(url: string, options: ResolveUrlOptions): Promise<string | null> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REDIRECT_TIMEOUT_MS

  const head = await options.fetch(url, {
    method: 'HEAD',
    headers: MOBILE_REQUEST_HEADERS,
    redirect: 'manual',
    signal: AbortSignal.timeout(timeoutMs),
  })
  const fromHead = redirectLocation(head, url)
  if (fromHead) return fromHead

  // Some edges reject HEAD outright or answer it without the redirect; retry with GET.
  const get = await options.fetch(url, {
    method: 'GET',
    headers: MOBILE_REQUEST_HEADERS,
    redirect: 'manual',
    signal: AbortSignal.timeout(timeoutMs),
  })
  await get.body?.cancel().catch(() => {})
  return redirectLocation(get, url)
}

function redirectLocation(response: Response, base: string): string | null {
  if (response.status < 300 || response.status >= 400) return null
  const location = response.headers.get('location')
  if (!location) return null
  try {
    return new URL(location, base).toString()
  } catch {
    return null
  }
}
