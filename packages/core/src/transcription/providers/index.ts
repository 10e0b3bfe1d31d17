import type { SpeechProvider, SpeechProviderId } from '../types.js'
import { dashScopeSpeechProvider } from './dashscope.js'
import { falSpeechProvider } from './fal.js'
import { googleWebSpeechProvider } from './google-web-speech.js'
import { openAiSpeechProvider } from './openai.js'
import { whisperCppSpeechProvider } from './whisper-cpp.js'

/** Fallback order: first provider that yields text wins. */
export const DEFAULT_SPEECH_PROVIDERS: readonly SpeechProvider[] = [
  dashScopeSpeechProvider,
  openAiSpeechProvider,
  whisperCppSpeechProvider,
  falSpeechProvider,
  googleWebSpeechProvider,
]

export const SPEECH_PROVIDER_IDS: readonly SpeechProviderId[] = DEFAULT_SPEECH_PROVIDERS.map(
  (provider) => provider.id
)

export function isSpeechProviderId(value: string): value is SpeechProviderId {
  return SPEECH_PROVIDER_IDS.some((id) => id === value)
}

/** Keeps the requested order; unknown ids are the caller's problem (validated upstream). */
export function selectSpeechProviders(ids: readonly SpeechProviderId[]): SpeechProvider[] {
  const selected: SpeechProvider[] = []
  for (const id of ids) {
    const provider = DEFAULT_SPEECH_PROVIDERS.find((candidate) => candidate.id === id)
    if (provider && !selected.includes(provider)) selected.push(provider)
  }
  return selected
}

export { createDashScopeSpeechProvider, dashScopeSpeechProvider } from './dashscope.js'
export { falSpeechProvider } from './fal.js'
export { googleWebSpeechProvider } from './google-web-speech.js'
export { openAiSpeechProvider } from './openai.js'
export { whisperCppSpeechProvider } from './whisper-cpp.js'
