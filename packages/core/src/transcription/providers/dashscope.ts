import { setTimeout as sleep } from 'node:timers/promises'

import { asRecordArray, getJsonPath, getJsonString, isJsonRecord } from '../../content/page/json.js'
import {
  DASHSCOPE_API_KEY_ENV,
  DASHSCOPE_BASE_URL,
  DASHSCOPE_MODEL,
  DASHSCOPE_POLL_INTERVAL_MS,
} from '../constants.js'
import type { SpeechContext, SpeechProvider } from '../types.js'
import { readAudioBlob, readEnvKey, readErrorDetail, trimToNull } from '../utils.js'

export type DashScopeOptions = {
  baseUrl?: string
  model?: string
  pollIntervalMs?: number
}

type UploadPolicy = {
  uploadHost: string
  uploadDir: string
  fields: Record<string, string>
}

const PENDING_STATUSES = new Set(['PENDING', 'RUNNING', 'QUEUEING'])

/**
 * Paraformer file transcription: the API only takes URLs, so the file goes to the temporary
 * OSS bucket first (upload policy → form POST), then an async task is submitted and polled.
 */
export async function transcribeWithDashScope(
  filePath: string,
  context: SpeechContext,
  apiKey: string,
  options: DashScopeOptions = {}
): Promise<string | null> {
  const baseUrl = (options.baseUrl ?? DASHSCOPE_BASE_URL).replace(/\/+$/, '')
  const model = options.model ?? DASHSCOPE_MODEL
  const pollIntervalMs = options.pollIntervalMs ?? DASHSCOPE_POLL_INTERVAL_MS
  const deadline = Date.now() + context.timeoutMs
  const auth = { Authorization: `Bearer ${apiKey}` }

  const policy = await fetchUploadPolicy(context, baseUrl, model, auth)
  const fileUrl = await uploadToOss(context, policy, filePath)

  const submit = await context.fetch(`${baseUrl}/api/v1/services/audio/asr/transcription`, {
    method: 'POST',
    headers: {
      ...auth,
      'Content-Type': 'application/json',
      'X-DashScope-Async': 'enable',
      'X-DashScope-OssResourceResolve': 'enable',
    },
    body: JSON.stringify({
      model,
      input: { file_urls: [fileUrl] },
      parameters: { language_hints: [context.language.split('-')[0] ?? 'zh'] },
    }),
    signal: AbortSignal.timeout(context.timeoutMs),
  })
  const submitted = await readJsonOrThrow(submit, 'DashScope task submission failed')
  const taskId = getJsonString(submitted, ['output', 'task_id'])
  if (!taskId) throw new Error('DashScope task submission returned no task_id')

  while (true) {
    const poll = await context.fetch(`${baseUrl}/api/v1/tasks/${encodeURIComponent(taskId)}`, {
      headers: auth,
      signal: AbortSignal.timeout(context.timeoutMs),
    })
    const task = await readJsonOrThrow(poll, 'DashScope task query failed')
    const status = getJsonString(task, ['output', 'task_status']) ?? 'UNKNOWN'

    if (status === 'SUCCEEDED') {
      const subtask = asRecordArray(getJsonPath(task, ['output', 'results']))[0]
      if (!subtask || getJsonString(subtask, ['subtask_status']) === 'FAILED') {
        // A failed subtask here means the audio held no recognizable speech.
        return null
      }
      const transcriptionUrl = getJsonString(subtask, ['transcription_url'])
      if (!transcriptionUrl) return null
      return fetchTranscriptionText(context, transcriptionUrl)
    }
    if (!PENDING_STATUSES.has(status)) {
      const message = getJsonString(task, ['output', 'message']) ?? 'no message'
      throw new Error(`DashScope task ${taskId} ended with ${status}: ${message}`)
    }
    if (Date.now() + pollIntervalMs > deadline) {
      throw new Error(`DashScope task ${taskId} timed out`)
    }
    await sleep(pollIntervalMs)
  }
}

/** Sentences are merged in start-time order; per-channel text is the fallback. */
export function extractTranscriptionText(payload: unknown): string | null {
  const transcripts = asRecordArray(getJsonPath(payload, ['transcripts']))
  const sentences = transcripts
    .flatMap((transcript) => asRecordArray(transcript.sentences))
    .map((sentence) => ({
      begin: typeof sentence.begin_time === 'number' ? sentence.begin_time : 0,
      text: typeof sentence.text === 'string' ? sentence.text.trim() : '',
    }))
    .filter((sentence) => sentence.text.length > 0)
    .sort((a, b) => a.begin - b.begin)
  if (sentences.length > 0) return sentences.map((sentence) => sentence.text).join('')

  return trimToNull(
    transcripts
      .map((transcript) => (typeof transcript.text === 'string' ? transcript.text.trim() : ''))
      .filter(Boolean)
      .join('')
  )
}

async function fetchUploadPolicy(
  context: SpeechContext,
  baseUrl: string,
  model: string,
  auth: Record<string, string>
): Promise<UploadPolicy> {
  const url = new URL(`${baseUrl}/api/v1/uploads`)
  url.searchParams.set('action', 'getPolicy')
  url.searchParams.set('model', model)
  const response = await context.fetch(url, {
    headers: auth,
    signal: AbortSignal.timeout(context.timeoutMs),
  })
  const payload = await readJsonOrThrow(response, 'DashScope upload policy request failed')
  const data = getJsonPath(payload, ['data'])
  const read = (key: string): string => {
    const value = getJsonString(data, [key])
    if (!value) throw new Error(`DashScope upload policy is missing ${key}`)
    return value
  }
  return {
    uploadHost: read('upload_host'),
    uploadDir: read('upload_dir'),
    fields: {
      OSSAccessKeyId: read('oss_access_key_id'),
      Signature: read('signature'),
      policy: read('policy'),
      'x-oss-object-acl': read('x_oss_object_acl'),
      'x-oss-forbid-overwrite': read('x_oss_forbid_overwrite'),
    },
  }
}

async function uploadToOss(
  context: SpeechContext,
  policy: UploadPolicy,
  filePath: string
): Promise<string> {
  const { blob, filename } = await readAudioBlob(filePath)
  const key = `${policy.uploadDir}/${filename}`
  const form = new FormData()
  for (const [name, value] of Object.entries(policy.fields)) form.append(name, value)
  form.append('key', key)
  form.append('success_action_status', '200')
  form.append('file', blob, filename)

  const response = await context.fetch(policy.uploadHost, {
    method: 'POST',
    body: form,
    signal: AbortSignal.timeout(context.timeoutMs),
  })
  if (!response.ok) {
    const detail = await readErrorDetail(response)
    throw new Error(`DashScope upload failed (${response.status})${detail ? `: ${detail}` : ''}`)
  }
  return `oss://${key}`
}

async function fetchTranscriptionText(
  context: SpeechContext,
  transcriptionUrl: string
): Promise<string | null> {
  const response = await context.fetch(transcriptionUrl, {
    signal: AbortSignal.timeout(context.timeoutMs),
  })
  const payload = await readJsonOrThrow(response, 'DashScope transcription download failed')
  return extractTranscriptionText(payload)
}

async function readJsonOrThrow(response: Response, prefix: string): Promise<unknown> {
  if (!response.ok) {
    const detail = await readErrorDetail(response)
    throw new Error(`${prefix} (${response.status})${detail ? `: ${detail}` : ''}`)
  }
  const payload: unknown = await response.json()
  if (!isJsonRecord(payload)) throw new Error(`${prefix}: unexpected payload`)
  return payload
}

export function createDashScopeSpeechProvider(options: DashScopeOptions = {}): SpeechProvider {
  return {
    id: 'dashscope',
    async unavailableReason(context) {
      return readEnvKey(context.env, DASHSCOPE_API_KEY_ENV)
        ? null
        : `${DASHSCOPE_API_KEY_ENV} is not set`
    },
    async transcribe(filePath, context) {
      const apiKey = readEnvKey(context.env, DASHSCOPE_API_KEY_ENV)
      if (!apiKey) throw new Error(`${DASHSCOPE_API_KEY_ENV} is not set`)
      return transcribeWithDashScope(filePath, context, apiKey, options)
    },
  }
}

export const dashScopeSpeechProvider = createDashScopeSpeechProvider()
