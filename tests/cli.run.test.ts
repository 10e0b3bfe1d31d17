import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'

import { runCli } from '../src/run.js'
import {
  buildItem,
  buildRouterData,
  buildSharePage,
  htmlResponse,
  requestUrl,
} from './helpers/share-page.js'

const SHARE_URL = 'https://www.iesdouyin.com/share/note/900/'
const IMAGE_URL = 'https://img.example.com/1.webp'

function collectStream() {
  let text = ''
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })
  return { stream, read: () => text }
}

function galleryFetch() {
  const item = buildItem({
    awemeId: '900',
    desc: 'gallery post',
    nickname: 'maker',
    imageUrls: [IMAGE_URL],
  })
  return vi.fn<typeof fetch>(async (input) => {
    const url = requestUrl(input)
    if (url === SHARE_URL) {
      return htmlResponse(buildSharePage(buildRouterData(item, 'note_(id)/page')))
    }
    if (url === IMAGE_URL) return new Response('webp')
    return new Response('not found', { status: 404 })
  })
}

function setup(env: Record<string, string> = {}) {
  const home = mkdtempSync(join(tmpdir(), 'clipsift-cli-'))
  const cacheDir = join(home, 'cache')
  const stdout = collectStream()
  const stderr = collectStream()
  const context = {
    env: { HOME: home, CLIPSIFT_CACHE_DIR: cacheDir, ...env },
    fetch: galleryFetch(),
    stdout: stdout.stream,
    stderr: stderr.stream,
  }
  return { home, cacheDir, stdout, stderr, context }
}

describe('cli', () => {
  it('prints a text report and serves repeats from the cache', async () => {
    const { cacheDir, stdout, context } = setup()

    await expect(runCli([`看看 ${SHARE_URL}`], context)).resolves.toBe(0)
    expect(stdout.read()).toBe(
      [
        '900 [images]',
        `source: ${SHARE_URL}`,
        'title: gallery post',
        'author: maker',
        'assets:',
        `  image 1\t${join(cacheDir, '900', 'image_001.jpg')}`,
        '',
      ].join('\n')
    )

    const again = setup()
    const repeat = { ...again.context, env: context.env }
    await expect(runCli(['看看', SHARE_URL], repeat)).resolves.toBe(0)
    expect(again.stdout.read().split('\n')[0]).toBe('900 [images, cached]')
  })

  it('prints JSON with --json', async () => {
    const { stdout, context } = setup()

    await expect(runCli([SHARE_URL, '--json', '--no-cache'], context)).resolves.toBe(0)
    const parsed: unknown = JSON.parse(stdout.read())
    expect(parsed).toMatchObject({
      contentId: '900',
      mediaType: 'images',
      success: true,
      fromCache: false,
      transcript: '',
    })
  })

  it('exits with 1 and reports the error when ingestion fails', async () => {
    const { stdout, context } = setup()

    await expect(runCli(['nothing to see'], context)).resolves.toBe(1)
    expect(stdout.read()).toBe('(no content id) [unknown]\nerror: no URL found in input\n')
  })

  it('logs progress to stderr with --verbose', async () => {
    const { home, stderr, context } = setup()
    mkdirSync(join(home, '.clipsift'))
    writeFileSync(join(home, '.clipsift', 'config.json'), '{"cache": {"enabled": false}}')

    await expect(runCli([SHARE_URL, '--verbose', '--max-frames', '3'], context)).resolves.toBe(0)
    const lines = stderr.read().trimEnd().split('\n')
    expect(lines[0]).toBe(
      `[clipsift] config file=${join(home, '.clipsift', 'config.json')} cache=off maxFrames=3 ` +
        'providers=dashscope,openai,whisper.cpp,fal,google-web-speech language=zh'
    )
    expect(lines).toContain(`[clipsift] page fetch url=${SHARE_URL}`)
    expect(lines.at(-1)).toBe(
      '[clipsift] ingest done id=900 success=true cached=false'
    )
  })

  it('rejects an invalid --max-frames value', async () => {
    const { context } = setup()
    await expect(runCli([SHARE_URL, '--max-frames', 'lots'], context)).rejects.toThrow(
      'Invalid --max-frames: lots (expected a positive integer)'
    )
  })

  it('evicts cache entries', async () => {
    const { cacheDir, stdout, context } = setup()
    mkdirSync(join(cacheDir, '900'), { recursive: true })

    await expect(runCli(['evict', '900'], context)).resolves.toBe(0)
    await expect(runCli(['evict', '900'], context)).resolves.toBe(0)
    expect(stdout.read()).toBe('evicted 900\nnot cached: 900\n')
    await expect(runCli(['evict', '../900'], context)).rejects.toThrow(
      'Invalid content id: ../900'
    )
  })

  it('prints help and version', async () => {
    const help = setup()
    await expect(runCli(['--help'], help.context)).resolves.toBe(0)
    expect(help.stdout.read()).toContain('Usage: clipsift')

    const version = setup()
    await expect(runCli(['--version'], version.context)).resolves.toBe(0)
    expect(version.stdout.read()).toBe('0.1.0\n')
  })
})
