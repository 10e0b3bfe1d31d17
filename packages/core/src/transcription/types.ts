export type SpeechProviderId = 'dashscope' | 'openai' | 'whisper.cpp' | 'fal' | 'google-web-speech'

export type SpeechContext = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  /** BCP-47-ish language hint, e.g. `zh` or `zh-CN`. */
  language: string
  timeoutMs: number
}

/**
 * One step of the fallback chain. `unavailableReason` reports missing credentials or binaries
 * (`null` when usable); `transcribe` throws on provider errors and returns `null` when the audio
 * contained no recognizable speech.
 */
export interface SpeechProvider {
  id: SpeechProviderId
  unavailableReason(context: SpeechContext): Promise<string | null>
  transcribe(filePath: string, context: SpeechContext): Promise<string | null>
}

export type TranscriptionResult = {
  /** Empty string when every provider failed or was skipped. */
  text: string
  provider: SpeechProviderId | null
  notes: string[]
}
