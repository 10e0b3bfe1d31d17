import {
  type ContentRef,
  type ExtractionResult,
  MEDIA_ASSET_KINDS,
  type MediaAsset,
  type MediaType,
  type VideoInfo,
} from '../content/types.js'

const VISUAL_KINDS = new Set<MediaAsset['kind']>(['cover', 'frame', 'image'])

/** Usable = a transcript, or at least one cover, frame or gallery image. */
export function isSuccessful(transcript: string, assets: readonly MediaAsset[]): boolean {
  return transcript.trim().length > 0 || assets.some((asset) => VISUAL_KINDS.has(asset.kind))
}

/** Kind order first (cover, frame, image, audio, video), then ordinal. */
export function sortAssets(assets: readonly MediaAsset[]): MediaAsset[] {
  return [...assets].sort((a, b) => {
    const byKind = MEDIA_ASSET_KINDS.indexOf(a.kind) - MEDIA_ASSET_KINDS.indexOf(b.kind)
    if (byKind !== 0) return byKind
    return (a.ordinal ?? 0) - (b.ordinal ?? 0)
  })
}

export function buildResult(
  ref: ContentRef & { resolvedUrl: string; contentId: string },
  fields: {
    videoInfo: VideoInfo
    mediaType: MediaType
    assets: MediaAsset[]
    transcript: string
    success: boolean
    error: string | null
  }
): ExtractionResult {
  return {
    contentId: ref.contentId,
    sourceUrl: ref.resolvedUrl,
    ...fields,
    fromCache: false,
  }
}

/** A failed result keeps whatever the request had resolved before it stopped. */
export function failedResult(
  error: string,
  ref: ContentRef,
  videoInfo: VideoInfo | null = null
): ExtractionResult {
  return {
    contentId: ref.contentId,
    sourceUrl: ref.resolvedUrl,
    videoInfo,
    mediaType: null,
    assets: [],
    transcript: '',
    success: false,
    error,
    fromCache: false,
  }
}

/** Paths of the visual assets in result order, for classifiers that take image files. */
export function imagePaths(result: ExtractionResult): string[] {
  return result.assets.filter((asset) => VISUAL_KINDS.has(asset.kind)).map((asset) => asset.path)
}
