import { createFalClient } from '@fal-ai/client'

import { FAL_KEY_ENV, FAL_WIZPER_MODEL } from '../constants.js'
import type { SpeechContext, SpeechProvider } from '../types.js'
import { readAudioBlob, readEnvKey, trimToNull } from '../utils.js'

export async function transcribeWithFal(
  filePath: string,
  context: SpeechContext,
  apiKey: string
): Promise<string | null> {
  const fal = createFalClient({ credentials: apiKey })
  const { blob } = await readAudioBlob(filePath)
  const audioUrl = await fal.storage.upload(blob)

  let timer: NodeJS.Timeout | undefined
  try {
    const result = await Promise.race([
      fal.subscribe(FAL_WIZPER_MODEL, {
        input: { audio_url: audioUrl, language: context.language.split('-')[0] ?? 'zh' },
      }),
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error('FAL transcription timeout')),
          context.timeoutMs
        )
      }),
    ])
    return extractText(result)
  } finally {
    clearTimeout(timer)
  }
}

function extractText(result: unknown): string | null {
  if (typeof result !== 'object' || result === null) return null
  const data = 'data' in result ? result.data : result
  if (typeof data !== 'object' || data === null) return null
  if ('text' in data && typeof data.text === 'string') {
    return trimToNull(data.text)
  }
  if ('chunks' in data && Array.isArray(data.chunks)) {
    const lines: string[] = []
    for (const chunk of data.chunks) {
      if (typeof chunk === 'object' && chunk !== null && 'text' in chunk) {
        const text = typeof chunk.text === 'string' ? chunk.text.trim() : ''
        if (text) lines.push(text)
      }
    }
    return lines.length > 0 ? lines.join(' ') : null
  }
  return null
}

export const falSpeechProvider: SpeechProvider = {
  id: 'fal',
  async unavailableReason(context) {
    return readEnvKey(context.env, FAL_KEY_ENV) ? null : `${FAL_KEY_ENV} is not set`
  },
  async transcribe(filePath, context) {
    const apiKey = readEnvKey(context.env, FAL_KEY_ENV)
    if (!apiKey) throw new Error(`${FAL_KEY_ENV} is not set`)
    return transcribeWithFal(filePath, context, apiKey)
  },
}
