import { mkdtemp } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { type CacheStore, isSafeContentId } from '../cache/store.js'
import { DEFAULT_PAGE_TIMEOUT_MS } from '../content/page/constants.js'
import { extractVideoInfo } from '../content/page/video-info.js'
import type {
  ContentRef,
  ExtractionResult,
  MediaAsset,
  MediaType,
  VideoInfo,
} from '../content/types.js'
import {
  DEFAULT_PLATFORM_HOSTS,
  DEFAULT_REDIRECT_TIMEOUT_MS,
  type PlatformHosts,
  resolveInputUrl,
} from '../content/url.js'
import { extractAudio as defaultExtractAudio } from '../media/audio.js'
import {
  COVER_FILENAME,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
  DEFAULT_MAX_FRAMES,
  EXTRACTED_AUDIO_FILENAME,
  imageFilename,
} from '../media/constants.js'
import { type DownloadedMedia, downloadFile, downloadMedia } from '../media/download.js'
import { type SampledFrame, sampleFrames as defaultSampleFrames } from '../media/frames.js'
import { describeError, type IngestStage, type OnProgress, ProgressKind } from '../progress.js'
import { createTranscriber, type Transcriber } from '../transcription/chain.js'
import { mapWithConcurrency } from './concurrency.js'
import { buildResult, failedResult, isSuccessful, sortAssets } from './result.js'

export const GALLERY_CONCURRENCY = 3
export const MEDIA_CONCURRENCY = 2

export const IngestError = {
  NoUrl: 'no URL found in input',
  NoVideoInfo: 'cannot extract video info',
  NoContentId: 'cannot determine content id',
  NoMedia: 'no downloadable media found',
  NoUsableContent: 'no usable content extracted',
} as const

export type SampleFramesFn = (
  videoPath: string,
  outDir: string,
  maxFrames: number,
  options: { onProgress?: OnProgress }
) => Promise<SampledFrame[]>

export type ExtractAudioFn = (
  videoPath: string,
  outPath: string,
  options: { onProgress?: OnProgress }
) => Promise<boolean>

export type IngestionPipelineDeps = {
  fetch?: typeof fetch
  /** `null` disables caching; assets then land in a fresh temp dir unless `outDir` is given. */
  cacheStore?: CacheStore | null
  transcriber?: Transcriber
  sampleFrames?: SampleFramesFn
  extractAudio?: ExtractAudioFn
  maxFrames?: number
  hosts?: PlatformHosts
  redirectTimeoutMs?: number
  pageTimeoutMs?: number
  downloadTimeoutMs?: number
  onProgress?: OnProgress
}

export type IngestOptions = {
  outDir?: string
}

export type IngestionPipeline = {
  ingest(input: string, options?: IngestOptions): Promise<ExtractionResult>
}

type BranchOutput = {
  mediaType: MediaType
  assets: MediaAsset[]
  transcript: string
}

/**
 * Resolve → page info → content id → cache → download/process → save. Failures come back as
 * `success: false` results; `ingest` does not throw.
 */
export function createIngestionPipeline(deps: IngestionPipelineDeps = {}): IngestionPipeline {
  const fetchImpl = deps.fetch ?? globalThis.fetch.bind(globalThis)
  const onProgress = deps.onProgress ?? null
  const cacheStore = deps.cacheStore ?? null
  const transcriber = deps.transcriber ?? createTranscriber({ onProgress })
  const sampleFrames = deps.sampleFrames ?? defaultSampleFrames
  const extractAudio = deps.extractAudio ?? defaultExtractAudio
  const maxFrames = deps.maxFrames ?? DEFAULT_MAX_FRAMES
  const hosts = deps.hosts ?? DEFAULT_PLATFORM_HOSTS
  const downloadDeps = {
    fetch: fetchImpl,
    timeoutMs: deps.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS,
    onProgress,
  }

  const finish = (result: ExtractionResult): ExtractionResult => {
    onProgress?.({
      kind: ProgressKind.IngestDone,
      contentId: result.contentId,
      success: result.success,
      fromCache: result.fromCache,
      error: result.error,
    })
    return result
  }

  const transcribe = async (audioPath: string): Promise<string> => {
    const { text } = await transcriber.transcribe(audioPath)
    return text
  }

  /** Downloaded video → extracted audio → transcript; downloaded audio is transcribed as is. */
  const transcribeMedia = async (
    media: DownloadedMedia,
    outDir: string
  ): Promise<{ assets: MediaAsset[]; transcript: string }> => {
    if (media.kind === 'audio') {
      return { assets: [], transcript: await transcribe(media.path) }
    }
    const audioPath = join(outDir, EXTRACTED_AUDIO_FILENAME)
    if (!(await extractAudio(media.path, audioPath, { onProgress }))) {
      return { assets: [], transcript: '' }
    }
    return {
      assets: [{ kind: 'audio', path: audioPath, ordinal: null }],
      transcript: await transcribe(audioPath),
    }
  }

  /** Tries the video stream first, then the separate audio stream. */
  const acquireMedia = async (
    info: VideoInfo,
    outDir: string
  ): Promise<DownloadedMedia | null> => {
    for (const url of [info.videoUrl, info.audioUrl]) {
      if (!url) continue
      const media = await downloadMedia(url, outDir, downloadDeps)
      if (media) return media
    }
    return null
  }

  const downloadCover = async (info: VideoInfo, outDir: string): Promise<MediaAsset | null> => {
    if (!info.coverUrl) return null
    const path = join(outDir, COVER_FILENAME)
    return (await downloadFile(info.coverUrl, path, downloadDeps))
      ? { kind: 'cover', path, ordinal: null }
      : null
  }

  /** Runs one branch task; a throw degrades that task's output and is reported, not raised. */
  const absorb = async (
    contentId: string,
    stage: IngestStage,
    task: () => Promise<void>
  ): Promise<void> => {
    try {
      await task()
    } catch (error) {
      onProgress?.({
        kind: ProgressKind.StageFail,
        contentId,
        stage,
        error: describeError(error),
      })
    }
  }

  const runGallery = async (
    contentId: string,
    info: VideoInfo,
    outDir: string
  ): Promise<BranchOutput> => {
    const assets: MediaAsset[] = []
    let transcript = ''

    type GalleryTask = () => Promise<void>
    const tasks: GalleryTask[] = []
    tasks.push(() =>
      absorb(contentId, 'cover', async () => {
        const cover = await downloadCover(info, outDir)
        if (cover) assets.push(cover)
      })
    )
    info.imageUrls.forEach((url, index) => {
      const ordinal = index + 1
      tasks.push(() =>
        absorb(contentId, 'image', async () => {
          const path = join(outDir, imageFilename(ordinal))
          if (await downloadFile(url, path, downloadDeps)) {
            assets.push({ kind: 'image', path, ordinal })
          }
        })
      )
    })
    if (info.videoUrl || info.audioUrl) {
      tasks.push(async () => {
        const slot: { media: DownloadedMedia | null } = { media: null }
        await absorb(contentId, 'media', async () => {
          slot.media = await acquireMedia(info, outDir)
        })
        const acquired = slot.media
        if (!acquired) return
        assets.push({ kind: acquired.kind, path: acquired.path, ordinal: null })
        await absorb(contentId, 'transcript', async () => {
          const processed = await transcribeMedia(acquired, outDir)
          assets.push(...processed.assets)
          transcript = processed.transcript
        })
      })
    }

    await mapWithConcurrency(tasks, GALLERY_CONCURRENCY, (task) => task())
    return { mediaType: 'images', assets, transcript }
  }

  const runMedia = async (
    contentId: string,
    info: VideoInfo,
    outDir: string
  ): Promise<BranchOutput> => {
    const acquired: { media: DownloadedMedia | null; cover: MediaAsset | null } = {
      media: null,
      cover: null,
    }
    await mapWithConcurrency(
      [
        () =>
          absorb(contentId, 'media', async () => {
            acquired.media = await acquireMedia(info, outDir)
          }),
        () =>
          absorb(contentId, 'cover', async () => {
            acquired.cover = await downloadCover(info, outDir)
          }),
      ],
      MEDIA_CONCURRENCY,
      (task) => task()
    )

    const { media, cover } = acquired
    const assets: MediaAsset[] = cover ? [cover] : []
    if (!media) return { mediaType: info.videoUrl ? 'video' : 'audio', assets, transcript: '' }

    assets.push({ kind: media.kind, path: media.path, ordinal: null })
    let transcript = ''
    if (media.kind === 'audio') {
      await absorb(contentId, 'transcript', async () => {
        transcript = await transcribe(media.path)
      })
      return { mediaType: 'audio', assets, transcript }
    }

    let frames: SampledFrame[] = []
    await mapWithConcurrency(
      [
        () =>
          absorb(contentId, 'frames', async () => {
            frames = await sampleFrames(media.path, outDir, maxFrames, { onProgress })
          }),
        () =>
          absorb(contentId, 'transcript', async () => {
            const processed = await transcribeMedia(media, outDir)
            assets.push(...processed.assets)
            transcript = processed.transcript
          }),
      ],
      MEDIA_CONCURRENCY,
      (task) => task()
    )
    for (const frame of frames) {
      assets.push({ kind: 'frame', path: frame.path, ordinal: frame.ordinal })
    }
    return { mediaType: 'video', assets, transcript }
  }

  const resolveOutDir = async (contentId: string, outDir: string | undefined) => {
    if (outDir) return outDir
    if (cacheStore) return cacheStore.entryDir(contentId)
    return mkdtemp(join(tmpdir(), `clipsift-${contentId}-`))
  }

  const saveToCache = async (contentId: string, result: ExtractionResult) => {
    if (!cacheStore) return
    try {
      await cacheStore.save(contentId, result)
      onProgress?.({ kind: ProgressKind.CacheSave, contentId, ok: true, error: null })
    } catch (error) {
      onProgress?.({
        kind: ProgressKind.CacheSave,
        contentId,
        ok: false,
        error: describeError(error),
      })
    }
  }

  return {
    async ingest(input, options = {}) {
      const ref: ContentRef = { rawInput: input, resolvedUrl: null, contentId: null }

      const sourceUrl = await resolveInputUrl(ref.rawInput, {
        fetch: fetchImpl,
        hosts,
        timeoutMs: deps.redirectTimeoutMs ?? DEFAULT_REDIRECT_TIMEOUT_MS,
        onProgress,
      })
      if (!sourceUrl) return finish(failedResult(IngestError.NoUrl, ref))
      ref.resolvedUrl = sourceUrl

      const info = await extractVideoInfo(sourceUrl, {
        fetch: fetchImpl,
        timeoutMs: deps.pageTimeoutMs ?? DEFAULT_PAGE_TIMEOUT_MS,
        onProgress,
      })
      if (!info) return finish(failedResult(IngestError.NoVideoInfo, ref))

      const contentId = info.contentId
      if (!contentId || !isSafeContentId(contentId)) {
        return finish(failedResult(IngestError.NoContentId, ref, info))
      }
      ref.contentId = contentId

      if (cacheStore) {
        const cached = await cacheStore.lookup(contentId)
        if (cached) return finish(cached)
      }

      const hasMedia = Boolean(info.videoUrl || info.audioUrl)
      if (info.imageUrls.length === 0 && !hasMedia) {
        return finish(failedResult(IngestError.NoMedia, ref, info))
      }

      let branch: BranchOutput
      try {
        const outDir = await resolveOutDir(contentId, options.outDir)
        branch =
          info.imageUrls.length > 0
            ? await runGallery(contentId, info, outDir)
            : await runMedia(contentId, info, outDir)
      } catch (error) {
        return finish(failedResult(describeError(error), ref, info))
      }

      const assets = sortAssets(branch.assets)
      const success = isSuccessful(branch.transcript, assets)
      const result = buildResult(
        { ...ref, resolvedUrl: sourceUrl, contentId },
        {
          videoInfo: info,
          mediaType: branch.mediaType,
          assets,
          transcript: branch.transcript,
          success,
          error: success ? null : IngestError.NoUsableContent,
        }
      )
      if (success) await saveToCache(contentId, result)
      return finish(result)
    },
  }
}
