import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { createCacheStore, isSafeContentId } from '../packages/core/src/cache/store.js'
import type { ExtractionResult } from '../packages/core/src/content/types.js'
import type { IngestProgressEvent } from '../packages/core/src/progress.js'

const VIDEO_INFO = {
  contentId: '7301',
  title: 'clip',
  author: 'maker',
  videoUrl: 'https://www.iesdouyin.com/aweme/v1/play/?video_id=v1&ratio=720p&line=0',
  audioUrl: null,
  coverUrl: 'https://cdn.example.com/cover.jpeg',
  imageUrls: [],
}

function resultWith(assets: ExtractionResult['assets'], contentId = '7301'): ExtractionResult {
  return {
    contentId,
    sourceUrl: 'https://www.iesdouyin.com/share/video/7301/',
    videoInfo: VIDEO_INFO,
    mediaType: 'video',
    assets,
    transcript: '大家好',
    success: true,
    error: null,
    fromCache: false,
  }
}

async function setup(memory = false) {
  const root = await mkdtemp(join(tmpdir(), 'clipsift-cache-'))
  const events: IngestProgressEvent[] = []
  const store = createCacheStore({ root, memory, onProgress: (event) => events.push(event) })
  return { root, store, events }
}

const missReasons = (events: IngestProgressEvent[]) =>
  events.flatMap((event) => (event.kind === 'cache-miss' ? [event.reason] : []))

describe('cache/store', () => {
  it('validates content ids', () => {
    expect(isSafeContentId('7301')).toBe(true)
    expect(isSafeContentId('abc_DEF-9')).toBe(true)
    expect(isSafeContentId('')).toBe(false)
    expect(isSafeContentId('../etc')).toBe(false)
    expect(isSafeContentId('a/b')).toBe(false)
  })

  it('refuses entry directories for unsafe ids', async () => {
    const { store } = await setup()
    expect(() => store.entryDir('..')).toThrow('Unsafe content id for cache entry: ".."')
  })

  it('stores asset paths relative to the entry and resolves them on lookup', async () => {
    const { root, store, events } = await setup()
    const dir = store.entryDir('7301')
    await mkdir(dir, { recursive: true })
    await writeFile(join(dir, 'cover.jpg'), 'c')
    await writeFile(join(dir, 'frame_001.jpg'), 'f')
    const outside = await mkdtemp(join(tmpdir(), 'clipsift-outside-'))
    await writeFile(join(outside, 'audio.mp3'), 'a')

    await store.save(
      '7301',
      resultWith([
        { kind: 'cover', path: join(dir, 'cover.jpg'), ordinal: null },
        { kind: 'frame', path: join(dir, 'frame_001.jpg'), ordinal: 1 },
        { kind: 'audio', path: join(outside, 'audio.mp3'), ordinal: null },
      ])
    )

    const file: unknown = JSON.parse(await readFile(join(root, '7301', 'result.json'), 'utf8'))
    expect(file).toMatchObject({
      version: 1,
      result: {
        contentId: '7301',
        fromCache: false,
        assets: [
          { kind: 'cover', path: 'cover.jpg', ordinal: null },
          { kind: 'frame', path: 'frame_001.jpg', ordinal: 1 },
          { kind: 'audio', path: 'audio.mp3', ordinal: null },
        ],
      },
    })
    expect(await readFile(join(dir, 'audio.mp3'), 'utf8')).toBe('a')

    const hit = await store.lookup('7301')
    expect(hit).toEqual({
      ...resultWith([
        { kind: 'cover', path: join(dir, 'cover.jpg'), ordinal: null },
        { kind: 'frame', path: join(dir, 'frame_001.jpg'), ordinal: 1 },
        { kind: 'audio', path: join(dir, 'audio.mp3'), ordinal: null },
      ]),
      fromCache: true,
    })
    expect(events).toEqual([{ kind: 'cache-hit', contentId: '7301' }])
  })

  it('misses with a reason for absent or unusable entries', async () => {
    const { root, store, events } = await setup()
    const writeEntry = async (id: string, body: string) => {
      await mkdir(join(root, id), { recursive: true })
      await writeFile(join(root, id, 'result.json'), body)
    }
    const stored = (result: unknown, version = 1) =>
      JSON.stringify({ version, savedAt: '', result })

    await writeEntry('broken', '{not json')
    await writeEntry('old', stored(resultWith([], 'old'), 0))
    await writeEntry('shape', stored({ contentId: 'shape' }))
    await writeEntry('moved', stored(resultWith([], 'other')))
    await writeEntry(
      'gone',
      stored(resultWith([{ kind: 'cover', path: 'cover.jpg', ordinal: null }], 'gone'))
    )
    await writeEntry(
      'escape',
      stored(resultWith([{ kind: 'cover', path: '../7301/cover.jpg', ordinal: null }], 'escape'))
    )

    for (const id of ['absent', 'broken', 'old', 'shape', 'moved', 'gone', 'escape', '../x']) {
      await expect(store.lookup(id)).resolves.toBeNull()
    }
    expect(missReasons(events)).toEqual([
      'not cached',
      'malformed result.json',
      'unsupported cache format',
      'malformed result.json',
      'content id mismatch',
      'missing asset cover.jpg',
      'unsafe asset path ../7301/cover.jpg',
      'unsafe content id',
    ])
  })

  it('re-checks asset files even when entries are kept in memory', async () => {
    const { store, events } = await setup(true)
    const dir = store.entryDir('55')
    await mkdir(dir, { recursive: true })
    await writeFile(join(dir, 'image_001.jpg'), 'i')
    const image = { kind: 'image', path: join(dir, 'image_001.jpg'), ordinal: 1 } as const
    await store.save('55', resultWith([image], '55'))

    await expect(store.lookup('55')).resolves.toMatchObject({ fromCache: true })
    await rm(join(dir, 'image_001.jpg'))
    await expect(store.lookup('55')).resolves.toBeNull()
    expect(missReasons(events)).toEqual(['missing asset image_001.jpg'])
  })

  it('evicts whole entries', async () => {
    const { store } = await setup()
    await store.save('9', resultWith([], '9'))

    await expect(store.evict('9')).resolves.toBe(true)
    await expect(stat(store.entryDir('9'))).rejects.toThrow()
    await expect(store.evict('9')).resolves.toBe(false)
    await expect(store.evict('../9')).resolves.toBe(false)
  })
})
