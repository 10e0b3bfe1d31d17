import { describe, expect, it, vi } from 'vitest'

import {
  extractFirstUrl,
  isShortLinkUrl,
  resolveInputUrl,
  resolveShareUrl,
  toShareUrl,
} from '../packages/core/src/content/url.js'
import type { IngestProgressEvent } from '../packages/core/src/progress.js'
import { redirectResponse, requestUrl } from './helpers/share-page.js'

describe('content/url', () => {
  it('extracts the first URL from share text', () => {
    expect(extractFirstUrl('7.43 复制打开抖音，看看 https://v.douyin.com/iRNBho6u/ 太好笑了')).toBe(
      'https://v.douyin.com/iRNBho6u/'
    )
    expect(extractFirstUrl('链接：https://v.douyin.com/abc123/，快来看')).toBe(
      'https://v.douyin.com/abc123/'
    )
    expect(extractFirstUrl('see https://www.douyin.com/video/123.')).toBe(
      'https://www.douyin.com/video/123'
    )
    expect(extractFirstUrl('no link here')).toBeNull()
  })

  it('stops at CJK characters glued to the URL', () => {
    expect(extractFirstUrl('https://v.douyin.com/xyz/复制此链接')).toBe('https://v.douyin.com/xyz/')
  })

  it('detects short-link hosts including subdomains', () => {
    expect(isShortLinkUrl('https://v.douyin.com/abc/')).toBe(true)
    expect(isShortLinkUrl('https://www.dy.app/abc')).toBe(true)
    expect(isShortLinkUrl('https://www.douyin.com/video/1')).toBe(false)
    expect(isShortLinkUrl('not a url')).toBe(false)
  })

  it('rewrites standard video and note URLs into the share form', () => {
    expect(toShareUrl('https://www.douyin.com/video/7300000000000000001?modal_id=1')).toBe(
      'https://www.iesdouyin.com/share/video/7300000000000000001/'
    )
    expect(toShareUrl('https://www.douyin.com/note/7300000000000000002')).toBe(
      'https://www.iesdouyin.com/share/note/7300000000000000002/'
    )
    expect(toShareUrl('https://www.douyin.com/user/abc')).toBeNull()
    expect(toShareUrl('https://example.com/video/1')).toBeNull()
  })

  it('returns share-form and unknown URLs unchanged without network calls', async () => {
    const fetchMock = vi.fn<typeof fetch>()
    const share = 'https://www.iesdouyin.com/share/video/1/'
    await expect(resolveShareUrl(share, { fetch: fetchMock })).resolves.toBe(share)
    await expect(resolveShareUrl('https://example.com/x', { fetch: fetchMock })).resolves.toBe(
      'https://example.com/x'
    )
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('follows a short link through HEAD and normalizes the target', async () => {
    const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
      expect(requestUrl(input)).toBe('https://v.douyin.com/abc/')
      expect(init?.method).toBe('HEAD')
      return redirectResponse('https://www.douyin.com/video/42?previous_page=app_code_link')
    })
    const events: IngestProgressEvent[] = []

    const resolved = await resolveShareUrl('https://v.douyin.com/abc/', {
      fetch: fetchMock,
      onProgress: (event) => events.push(event),
    })

    expect(resolved).toBe('https://www.iesdouyin.com/share/video/42/')
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(events).toEqual([
      {
        kind: 'resolve-redirect',
        from: 'https://v.douyin.com/abc/',
        to: 'https://www.douyin.com/video/42?previous_page=app_code_link',
        depth: 0,
      },
    ])
  })

  it('falls back to GET when HEAD is rejected', async () => {
    const fetchMock = vi.fn<typeof fetch>(async (_input, init) => {
      if (init?.method === 'HEAD') return new Response(null, { status: 405 })
      return redirectResponse('https://www.iesdouyin.com/share/video/7/')
    })

    await expect(resolveShareUrl('https://v.douyin.com/get/', { fetch: fetchMock })).resolves.toBe(
      'https://www.iesdouyin.com/share/video/7/'
    )
    expect(fetchMock.mock.calls.map(([, init]) => init?.method)).toEqual(['HEAD', 'GET'])
  })

  it('returns the input unchanged when the redirect request fails', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new Error('socket hang up')
    })
    const events: IngestProgressEvent[] = []

    const resolved = await resolveShareUrl('https://v.douyin.com/down/', {
      fetch: fetchMock,
      onProgress: (event) => events.push(event),
    })

    expect(resolved).toBe('https://v.douyin.com/down/')
    expect(events).toEqual([
      {
        kind: 'resolve-error',
        url: 'https://v.douyin.com/down/',
        error: 'redirect resolution failed: socket hang up',
      },
    ])
  })

  it('follows relative locations hop by hop', async () => {
    const fetchMock = vi.fn<typeof fetch>(async (input) => {
      const url = requestUrl(input)
      if (url === 'https://v.douyin.com/rel/') return redirectResponse('/mid/', 301)
      return redirectResponse('https://www.douyin.com/video/5')
    })
    const events: IngestProgressEvent[] = []

    const resolved = await resolveShareUrl('https://v.douyin.com/rel/', {
      fetch: fetchMock,
      onProgress: (event) => events.push(event),
    })

    expect(resolved).toBe('https://www.iesdouyin.com/share/video/5/')
    const hops = fetchMock.mock.calls.map(([input, init]) => [requestUrl(input), init?.redirect])
    expect(hops).toEqual([
      ['https://v.douyin.com/rel/', 'manual'],
      ['https://v.douyin.com/mid/', 'manual'],
    ])
    const depths = events.map((event) => (event.kind === 'resolve-redirect' ? event.depth : -1))
    expect(depths).toEqual([0, 1])
  })

  it('ends a redirect loop at the depth limit on the last URL seen', async () => {
    const fetchMock = vi.fn<typeof fetch>(async (input) =>
      redirectResponse(requestUrl(input).endsWith('/a/') ? '/b/' : '/a/')
    )

    await expect(resolveShareUrl('https://v.douyin.com/a/', { fetch: fetchMock })).resolves.toBe(
      'https://v.douyin.com/b/'
    )
    expect(fetchMock).toHaveBeenCalledTimes(5)
  })

  it('keeps the last hop when a later hop fails', async () => {
    const fetchMock = vi.fn<typeof fetch>(async (input) => {
      if (requestUrl(input) === 'https://v.douyin.com/first/') {
        return redirectResponse('https://v.douyin.com/second/')
      }
      throw new Error('connect ETIMEDOUT')
    })

    await expect(
      resolveShareUrl('https://v.douyin.com/first/', { fetch: fetchMock })
    ).resolves.toBe('https://v.douyin.com/second/')
  })

  it('stops at the redirect depth limit and returns the last URL seen', async () => {
    let hop = 0
    const fetchMock = vi.fn<typeof fetch>(async () => {
      hop += 1
      return redirectResponse(`https://v.douyin.com/hop${hop}/`)
    })

    const resolved = await resolveShareUrl('https://v.douyin.com/start/', {
      fetch: fetchMock,
      maxRedirectDepth: 2,
    })

    expect(resolved).toBe('https://v.douyin.com/hop2/')
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('resolves share text end to end and reports a missing URL', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      redirectResponse('https://www.douyin.com/note/99')
    )
    await expect(
      resolveInputUrl('看这个 https://v.douyin.com/note1/ 好看', { fetch: fetchMock })
    ).resolves.toBe('https://www.iesdouyin.com/share/note/99/')

    const events: IngestProgressEvent[] = []
    await expect(
      resolveInputUrl('纯文本', { fetch: fetchMock, onProgress: (event) => events.push(event) })
    ).resolves.toBeNull()
    expect(events).toEqual([
      { kind: 'resolve-done', input: '纯文本', url: null, error: 'no URL found in input' },
    ])
  })
})
