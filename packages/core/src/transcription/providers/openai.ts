import {
  OPENAI_API_KEY_ENV,
  OPENAI_DEFAULT_BASE_URL,
  OPENAI_TRANSCRIPTION_MODEL,
} from '../constants.js'
import type { SpeechContext, SpeechProvider } from '../types.js'
import { readAudioBlob, readEnvKey, readErrorDetail, trimToNull } from '../utils.js'

export function resolveOpenAiTranscriptionUrl(env: Record<string, string | undefined>): string {
  const candidates = [env.OPENAI_WHISPER_BASE_URL, env.OPENAI_BASE_URL]
  for (const candidate of candidates) {
    const trimmed = candidate?.trim() ?? ''
    if (!trimmed) continue
    // OpenRouter proxies chat, not audio; keep the official endpoint for it.
    if (/openrouter\.ai/i.test(trimmed)) continue
    return `${trimmed.replace(/\/+$/, '')}/audio/transcriptions`
  }
  return `${OPENAI_DEFAULT_BASE_URL}/audio/transcriptions`
}

export async function transcribeWithOpenAi(
  filePath: string,
  context: SpeechContext,
  apiKey: string
): Promise<string | null> {
  const { blob, filename } = await readAudioBlob(filePath)
  const form = new FormData()
  form.append('file', blob, filename)
  form.append('model', OPENAI_TRANSCRIPTION_MODEL)
  form.append('language', context.language.split('-')[0] ?? context.language)

  const response = await context.fetch(resolveOpenAiTranscriptionUrl(context.env), {
    method: 'POST',
    headers: { Authorization: `Bearer ${apiKey}` },
    body: form,
    signal: AbortSignal.timeout(context.timeoutMs),
  })

  if (!response.ok) {
    const detail = await readErrorDetail(response)
    const suffix = detail ? `: ${detail}` : ''
    throw new Error(`OpenAI transcription failed (${response.status})${suffix}`)
  }

  const payload: unknown = await response.json()
  if (typeof payload !== 'object' || payload === null || !('text' in payload)) return null
  return typeof payload.text === 'string' ? trimToNull(payload.text) : null
}

export const openAiSpeechProvider: SpeechProvider = {
  id: 'openai',
  async unavailableReason(context) {
    return readEnvKey(context.env, OPENAI_API_KEY_ENV) ? null : `${OPENAI_API_KEY_ENV} is not set`
  },
  async transcribe(filePath, context) {
    const apiKey = readEnvKey(context.env, OPENAI_API_KEY_ENV)
    if (!apiKey) throw new Error(`${OPENAI_API_KEY_ENV} is not set`)
    return transcribeWithOpenAi(filePath, context, apiKey)
  },
}
