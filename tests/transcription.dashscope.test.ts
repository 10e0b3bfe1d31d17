import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it, vi } from 'vitest'

import {
  createDashScopeSpeechProvider,
  extractTranscriptionText,
  transcribeWithDashScope,
} from '../packages/core/src/transcription/providers/dashscope.js'
import type { SpeechContext } from '../packages/core/src/transcription/types.js'
import { requestUrl } from './helpers/share-page.js'

const BASE = 'https://dashscope.example.com'
const RESULT_URL = 'https://results.example.com/task-1.json'

const POLICY = {
  data: {
    upload_host: 'https://oss.example.com',
    upload_dir: 'dashscope-instant/abc',
    oss_access_key_id: 'test-access-id',
    signature: 'test-signature',
    policy: 'test-policy',
    x_oss_object_acl: 'private',
    x_oss_forbid_overwrite: 'true',
  },
}

async function audioFixture(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'clipsift-dashscope-'))
  const path = join(dir, 'audio.mp3')
  await writeFile(path, new Uint8Array([9, 9, 9]))
  return path
}

/** Routes each DashScope call; `taskStates` are served in order by the polling endpoint. */
function dashScopeFetch(taskStates: unknown[], transcription: unknown = {}) {
  const requests: { url: string; init: RequestInit | undefined }[] = []
  let poll = 0
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    const url = requestUrl(input)
    requests.push({ url, init })
    if (url.startsWith(`${BASE}/api/v1/uploads`)) return Response.json(POLICY)
    if (url === 'https://oss.example.com') return new Response('', { status: 200 })
    if (url === `${BASE}/api/v1/services/audio/asr/transcription`) {
      return Response.json({ output: { task_id: 'task-1', task_status: 'PENDING' } })
    }
    if (url === `${BASE}/api/v1/tasks/task-1`) {
      const state = taskStates[Math.min(poll, taskStates.length - 1)]
      poll += 1
      return Response.json(state)
    }
    if (url === RESULT_URL) return Response.json(transcription)
    return new Response('unexpected', { status: 404 })
  })
  return { fetchMock, requests }
}

const contextWith = (fetchImpl: typeof fetch, timeoutMs = 10_000): SpeechContext => ({
  env: { DASHSCOPE_API_KEY: 'test-key' },
  fetch: fetchImpl,
  language: 'zh',
  timeoutMs,
})

const succeeded = {
  output: {
    task_status: 'SUCCEEDED',
    results: [{ subtask_status: 'SUCCEEDED', transcription_url: RESULT_URL }],
  },
}

describe('transcription/dashscope', () => {
  it('uploads, submits, polls and merges sentences in time order', async () => {
    const filePath = await audioFixture()
    const { fetchMock, requests } = dashScopeFetch(
      [{ output: { task_status: 'RUNNING' } }, succeeded],
      {
        transcripts: [
          {
            sentences: [
              { begin_time: 900, text: '第二句。' },
              { begin_time: 0, text: '第一句，' },
            ],
          },
        ],
      }
    )

    const text = await transcribeWithDashScope(filePath, contextWith(fetchMock), 'test-key', {
      baseUrl: `${BASE}/`,
      pollIntervalMs: 0,
    })

    expect(text).toBe('第一句，第二句。')
    expect(requests.map((request) => request.url)).toEqual([
      `${BASE}/api/v1/uploads?action=getPolicy&model=paraformer-v2`,
      'https://oss.example.com',
      `${BASE}/api/v1/services/audio/asr/transcription`,
      `${BASE}/api/v1/tasks/task-1`,
      `${BASE}/api/v1/tasks/task-1`,
      RESULT_URL,
    ])

    const upload = requests[1]?.init?.body
    if (!(upload instanceof FormData)) throw new Error('expected form data')
    expect(upload.get('key')).toBe('dashscope-instant/abc/audio.mp3')
    expect(upload.get('OSSAccessKeyId')).toBe('test-access-id')
    expect(upload.get('success_action_status')).toBe('200')

    const submit = requests[2]?.init
    expect(submit?.headers).toMatchObject({
      Authorization: 'Bearer test-key',
      'X-DashScope-Async': 'enable',
      'X-DashScope-OssResourceResolve': 'enable',
    })
    expect(JSON.parse(String(submit?.body))).toEqual({
      model: 'paraformer-v2',
      input: { file_urls: ['oss://dashscope-instant/abc/audio.mp3'] },
      parameters: { language_hints: ['zh'] },
    })
  })

  it('returns null when the subtask found no speech', async () => {
    const filePath = await audioFixture()
    const { fetchMock, requests } = dashScopeFetch([
      { output: { task_status: 'SUCCEEDED', results: [{ subtask_status: 'FAILED' }] } },
    ])

    await expect(
      transcribeWithDashScope(filePath, contextWith(fetchMock), 'test-key', {
        baseUrl: BASE,
        pollIntervalMs: 0,
      })
    ).resolves.toBeNull()
    expect(requests.some((request) => request.url === RESULT_URL)).toBe(false)
  })

  it('throws on a failed task with its message', async () => {
    const filePath = await audioFixture()
    const { fetchMock } = dashScopeFetch([
      { output: { task_status: 'FAILED', message: 'File download failed' } },
    ])

    await expect(
      transcribeWithDashScope(filePath, contextWith(fetchMock), 'test-key', {
        baseUrl: BASE,
        pollIntervalMs: 0,
      })
    ).rejects.toThrow('DashScope task task-1 ended with FAILED: File download failed')
  })

  it('gives up when the next poll would pass the deadline', async () => {
    const filePath = await audioFixture()
    const { fetchMock } = dashScopeFetch([{ output: { task_status: 'RUNNING' } }])

    await expect(
      transcribeWithDashScope(filePath, contextWith(fetchMock, 10), 'test-key', {
        baseUrl: BASE,
        pollIntervalMs: 60_000,
      })
    ).rejects.toThrow('DashScope task task-1 timed out')
  })

  it('reports HTTP errors from the policy endpoint', async () => {
    const filePath = await audioFixture()
    const fetchMock = vi.fn<typeof fetch>(
      async () => new Response('InvalidApiKey', { status: 401 })
    )
    const provider = createDashScopeSpeechProvider({ baseUrl: BASE })

    await expect(provider.transcribe(filePath, contextWith(fetchMock))).rejects.toThrow(
      'DashScope upload policy request failed (401): InvalidApiKey'
    )
  })

  it('falls back to per-channel text when sentences are missing', () => {
    expect(extractTranscriptionText({ transcripts: [{ text: ' 你好 ' }, { text: '世界' }] })).toBe(
      '你好世界'
    )
    expect(extractTranscriptionText({ transcripts: [] })).toBeNull()
  })
})
