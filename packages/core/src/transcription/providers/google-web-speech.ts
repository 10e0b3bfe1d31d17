import { randomUUID } from 'node:crypto'
import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { getJsonString, isJsonRecord } from '../../content/page/json.js'
import { CANONICAL_SAMPLE_RATE } from '../../media/constants.js'
import { runFfmpegTranscodeToFlac } from '../../media/ffmpeg.js'
import { GOOGLE_SPEECH_API_KEY_ENV, GOOGLE_SPEECH_ENDPOINT } from '../constants.js'
import type { SpeechContext, SpeechProvider } from '../types.js'
import { readEnvKey, readErrorDetail, toArrayBuffer, trimToNull } from '../utils.js'

// The endpoint wants a region-qualified tag.
const LANGUAGE_TAGS: Record<string, string> = {
  zh: 'zh-CN',
  en: 'en-US',
  ja: 'ja-JP',
  ko: 'ko-KR',
}

export function toGoogleLanguageTag(language: string): string {
  if (language.includes('-')) return language
  return LANGUAGE_TAGS[language.toLowerCase()] ?? language
}

/**
 * The response is a stream of JSON objects, one per line; the first line is usually an
 * empty `{"result":[]}` placeholder.
 */
export function parseGoogleSpeechResponse(body: string): string | null {
  const parts: string[] = []
  for (const line of body.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed) continue
    let parsed: unknown
    try {
      parsed = JSON.parse(trimmed)
    } catch {
      continue
    }
    if (!isJsonRecord(parsed)) continue
    const transcript = getJsonString(parsed, ['result', 0, 'alternative', 0, 'transcript'])
    if (transcript) parts.push(transcript.trim())
  }
  return trimToNull(parts.join(' '))
}

export async function transcribeWithGoogleWebSpeech(
  filePath: string,
  context: SpeechContext,
  apiKey: string
): Promise<string | null> {
  const flacPath = join(tmpdir(), `clipsift-google-${randomUUID()}.flac`)
  try {
    await runFfmpegTranscodeToFlac({ inputPath: filePath, outputPath: flacPath })
    const bytes = new Uint8Array(await fs.readFile(flacPath))

    const url = new URL(GOOGLE_SPEECH_ENDPOINT)
    url.searchParams.set('client', 'chromium')
    url.searchParams.set('lang', toGoogleLanguageTag(context.language))
    url.searchParams.set('key', apiKey)
    url.searchParams.set('output', 'json')

    const response = await context.fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': `audio/x-flac; rate=${CANONICAL_SAMPLE_RATE}` },
      body: toArrayBuffer(bytes),
      signal: AbortSignal.timeout(context.timeoutMs),
    })
    if (!response.ok) {
      const detail = await readErrorDetail(response)
      throw new Error(
        `Google speech recognition failed (${response.status})${detail ? `: ${detail}` : ''}`
      )
    }
    return parseGoogleSpeechResponse(await response.text())
  } finally {
    await fs.unlink(flacPath).catch(() => {})
  }
}

export const googleWebSpeechProvider: SpeechProvider = {
  id: 'google-web-speech',
  async unavailableReason(context) {
    return readEnvKey(context.env, GOOGLE_SPEECH_API_KEY_ENV)
      ? null
      : `${GOOGLE_SPEECH_API_KEY_ENV} is not set`
  },
  async transcribe(filePath, context) {
    const apiKey = readEnvKey(context.env, GOOGLE_SPEECH_API_KEY_ENV)
    if (!apiKey) throw new Error(`${GOOGLE_SPEECH_API_KEY_ENV} is not set`)
    return transcribeWithGoogleWebSpeech(filePath, context, apiKey)
  },
}
