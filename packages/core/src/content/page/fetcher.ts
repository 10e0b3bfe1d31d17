import { DEFAULT_PAGE_TIMEOUT_MS, MOBILE_REQUEST_HEADERS } from './constants.js'

export async function fetchPageHtml(
  fetchImpl: typeof fetch,
  url: string,
  { timeoutMs }: { timeoutMs?: number } = {}
): Promise<string> {
  const controller = new AbortController()
  const effectiveTimeoutMs =
    typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) ? timeoutMs : DEFAULT_PAGE_TIMEOUT_MS
  const timeout = setTimeout(() => {
    controller.abort()
  }, effectiveTimeoutMs)

  try {
    const response = await fetchImpl(url, {
      headers: MOBILE_REQUEST_HEADERS,
      redirect: 'follow',
      signal: controller.signal,
    })

    if (!response.ok) {
      throw new Error(`Failed to fetch share page (status ${response.status})`)
    }

    const contentType = response.headers.get('content-type')?.toLowerCase() ?? null
    if (contentType && !contentType.startsWith('text/') && !contentType.includes('html')) {
      throw new Error(`Unsupported content-type for share page fetch: ${contentType}`)
    }

    const body = response.body
    if (!body) return await response.text()

    const reader = body.getReader()
    const decoder = new TextDecoder()
    let text = ''
    while (true) {
      const { value, done } = await reader.read()
      if (done) break
      if (!value) continue
      text += decoder.decode(value, { stream: true })
    }
    text += decoder.decode()
    return text
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error('Fetching share page timed out')
    }
    throw error
  } finally {
    clearTimeout(timeout)
  }
}
