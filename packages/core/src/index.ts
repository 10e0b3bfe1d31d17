export type { CacheStore, CacheStoreOptions } from './cache/store.js'
export {
  CACHE_FORMAT_VERSION,
  createCacheStore,
  isSafeContentId,
  RESULT_FILENAME,
} from './cache/store.js'
export { extractRouterData, parseEmbeddedJson } from './content/page/router-data.js'
export type { ExtractVideoInfoDeps } from './content/page/video-info.js'
export { extractVideoInfo, parseVideoInfo } from './content/page/video-info.js'
export type {
  ContentRef,
  ExtractionResult,
  MediaAsset,
  MediaAssetKind,
  MediaType,
  VideoInfo,
} from './content/types.js'
export { isMediaAssetKind, isMediaType, MEDIA_ASSET_KINDS } from './content/types.js'
export type { PlatformHosts, ResolveUrlOptions } from './content/url.js'
export {
  DEFAULT_PLATFORM_HOSTS,
  extractFirstUrl,
  isShortLinkUrl,
  resolveInputUrl,
  resolveShareUrl,
  toShareUrl,
} from './content/url.js'
export { mapWithConcurrency } from './ingest/concurrency.js'
export type {
  ExtractAudioFn,
  IngestionPipeline,
  IngestionPipelineDeps,
  IngestOptions,
  SampleFramesFn,
} from './ingest/pipeline.js'
export {
  createIngestionPipeline,
  GALLERY_CONCURRENCY,
  IngestError,
  MEDIA_CONCURRENCY,
} from './ingest/pipeline.js'
export { imagePaths, isSuccessful, sortAssets } from './ingest/result.js'
export { extractAudio } from './media/audio.js'
export { DEFAULT_MAX_FRAMES, MIN_AUDIO_BYTES } from './media/constants.js'
export type { DownloadDeps, DownloadedMedia } from './media/download.js'
export { classifyMediaUrl, downloadFile, downloadMedia } from './media/download.js'
export type { SampledFrame } from './media/frames.js'
export { computeFrameIndices, sampleFrames } from './media/frames.js'
export type { IngestProgressEvent, IngestStage, OnProgress } from './progress.js'
export { describeError, ProgressKind } from './progress.js'
export type { Transcriber, TranscriberOptions } from './transcription/chain.js'
export { createTranscriber } from './transcription/chain.js'
export { DEFAULT_TRANSCRIPTION_LANGUAGE } from './transcription/constants.js'
export {
  DEFAULT_SPEECH_PROVIDERS,
  isSpeechProviderId,
  SPEECH_PROVIDER_IDS,
  selectSpeechProviders,
} from './transcription/providers/index.js'
export type {
  SpeechContext,
  SpeechProvider,
  SpeechProviderId,
  TranscriptionResult,
} from './transcription/types.js'
