export type MediaAssetKind = 'cover' | 'frame' | 'image' | 'audio' | 'video'

/** Shape of a piece of content; decides which ingestion branch runs. */
export type MediaType = 'images' | 'video' | 'audio'

export interface ContentRef {
  rawInput: string
  resolvedUrl: string | null
  contentId: string | null
}

/**
 * Structured media references scraped from a share page.
 *
 * `contentId` always comes from page metadata, never from the URL: the same item is reachable
 * through several URLs.
 */
export type VideoInfo = Readonly<{
  contentId: string | null
  title: string
  author: string
  videoUrl: string | null
  audioUrl: string | null
  coverUrl: string | null
  imageUrls: readonly string[]
}>

export interface MediaAsset {
  kind: MediaAssetKind
  path: string
  /** 1-based position for frames and gallery images; fixes the file name. */
  ordinal: number | null
}

export interface ExtractionResult {
  contentId: string | null
  sourceUrl: string | null
  videoInfo: VideoInfo | null
  mediaType: MediaType | null
  assets: MediaAsset[]
  transcript: string
  success: boolean
  error: string | null
  fromCache: boolean
}

export const MEDIA_ASSET_KINDS: readonly MediaAssetKind[] = [
  'cover',
  'frame',
  'image',
  'audio',
  'video',
] as const

export function isMediaAssetKind(value: unknown): value is MediaAssetKind {
  return MEDIA_ASSET_KINDS.some((kind) => kind === value)
}

export function isMediaType(value: unknown): value is MediaType {
  return value === 'images' || value === 'video' || value === 'audio'
}
