import type { SpeechProviderId } from './transcription/types.js'

// Progress kinds as a const object rather than a TS enum.
export const ProgressKind = {
  ResolveRedirect: 'resolve-redirect',
  ResolveError: 'resolve-error',
  ResolveDone: 'resolve-done',

  PageFetchStart: 'page-fetch-start',
  PageFetchDone: 'page-fetch-done',

  CacheHit: 'cache-hit',
  CacheMiss: 'cache-miss',
  CacheSave: 'cache-save',

  DownloadStart: 'download-start',
  DownloadDone: 'download-done',

  FramesDone: 'frames-done',
  AudioDone: 'audio-done',
  StageFail: 'stage-fail',

  TranscriberSkip: 'transcriber-skip',
  TranscriberAttempt: 'transcriber-attempt',
  TranscriberFail: 'transcriber-fail',
  TranscriberDone: 'transcriber-done',

  IngestDone: 'ingest-done',
} as const

/** Parallel tasks of an ingestion branch; a throw in one is absorbed and reported per stage. */
export type IngestStage = 'cover' | 'image' | 'media' | 'frames' | 'transcript'

export type IngestProgressEvent =
  | { kind: 'resolve-redirect'; from: string; to: string; depth: number }
  | { kind: 'resolve-error'; url: string; error: string }
  | { kind: 'resolve-done'; input: string; url: string | null; error: string | null }
  | { kind: 'page-fetch-start'; url: string }
  | { kind: 'page-fetch-done'; url: string; ok: boolean; error: string | null }
  | { kind: 'cache-hit'; contentId: string }
  | { kind: 'cache-miss'; contentId: string; reason: string }
  | { kind: 'cache-save'; contentId: string; ok: boolean; error: string | null }
  | { kind: 'download-start'; url: string; destination: string }
  | {
      kind: 'download-done'
      url: string
      destination: string
      ok: boolean
      downloadedBytes: number
      error: string | null
    }
  | { kind: 'frames-done'; videoPath: string; requested: number; written: number }
  | { kind: 'audio-done'; videoPath: string; ok: boolean; bytes: number; error: string | null }
  | { kind: 'stage-fail'; contentId: string; stage: IngestStage; error: string }
  | { kind: 'transcriber-skip'; provider: SpeechProviderId; reason: string }
  | { kind: 'transcriber-attempt'; provider: SpeechProviderId; audioPath: string }
  | { kind: 'transcriber-fail'; provider: SpeechProviderId; error: string }
  | { kind: 'transcriber-done'; provider: SpeechProviderId | null; characters: number }
  | {
      kind: 'ingest-done'
      contentId: string | null
      success: boolean
      fromCache: boolean
      error: string | null
    }

export type OnProgress = ((event: IngestProgressEvent) => void) | null

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
