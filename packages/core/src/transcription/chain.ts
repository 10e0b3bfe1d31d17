import { describeError, type OnProgress, ProgressKind } from '../progress.js'
import { DEFAULT_TRANSCRIPTION_LANGUAGE, TRANSCRIPTION_TIMEOUT_MS } from './constants.js'
import { DEFAULT_SPEECH_PROVIDERS } from './providers/index.js'
import type { SpeechContext, SpeechProvider, TranscriptionResult } from './types.js'

export type TranscriberOptions = {
  providers?: readonly SpeechProvider[]
  /** Read lazily per call when omitted, so keys exported after startup are seen. */
  env?: Record<string, string | undefined>
  fetch?: typeof fetch
  language?: string
  timeoutMs?: number
  onProgress?: OnProgress
}

export type Transcriber = {
  transcribe(audioPath: string): Promise<TranscriptionResult>
}

/**
 * Tries each provider in order and stops at the first non-empty transcript. Never throws:
 * unavailable providers and provider errors end up in `notes`, and an exhausted chain yields
 * `text: ''`. No provider is retried.
 */
export function createTranscriber(options: TranscriberOptions = {}): Transcriber {
  const providers = options.providers ?? DEFAULT_SPEECH_PROVIDERS
  const onProgress = options.onProgress ?? null

  return {
    async transcribe(audioPath) {
      const context: SpeechContext = {
        env: options.env ?? process.env,
        fetch: options.fetch ?? globalThis.fetch.bind(globalThis),
        language: options.language ?? DEFAULT_TRANSCRIPTION_LANGUAGE,
        timeoutMs: options.timeoutMs ?? TRANSCRIPTION_TIMEOUT_MS,
      }
      const notes: string[] = []

      for (const provider of providers) {
        let unavailable: string | null
        try {
          unavailable = await provider.unavailableReason(context)
        } catch (error) {
          unavailable = describeError(error)
        }
        if (unavailable) {
          notes.push(`${provider.id}: skipped (${unavailable})`)
          onProgress?.({
            kind: ProgressKind.TranscriberSkip,
            provider: provider.id,
            reason: unavailable,
          })
          continue
        }

        onProgress?.({ kind: ProgressKind.TranscriberAttempt, provider: provider.id, audioPath })
        try {
          const text = (await provider.transcribe(audioPath, context))?.trim() ?? ''
          if (text.length > 0) {
            onProgress?.({
              kind: ProgressKind.TranscriberDone,
              provider: provider.id,
              characters: text.length,
            })
            return { text, provider: provider.id, notes }
          }
          notes.push(`${provider.id}: no speech recognized`)
        } catch (error) {
          const message = describeError(error)
          notes.push(`${provider.id}: ${message}`)
          onProgress?.({
            kind: ProgressKind.TranscriberFail,
            provider: provider.id,
            error: message,
          })
        }
      }

      onProgress?.({ kind: ProgressKind.TranscriberDone, provider: null, characters: 0 })
      return { text: '', provider: null, notes }
    },
  }
}
