export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 120_000
export const DEFAULT_MAX_FRAMES = 5

/** Anything smaller cannot be a real audio track; ffmpeg leaves a bare header behind on silence. */
export const MIN_AUDIO_BYTES = 1024

export const CANONICAL_SAMPLE_RATE = 16_000

export const COVER_FILENAME = 'cover.jpg'
export const EXTRACTED_AUDIO_FILENAME = 'extracted_audio.mp3'

export function frameFilename(ordinal: number): string {
  return `frame_${String(ordinal).padStart(3, '0')}.jpg`
}

export function imageFilename(ordinal: number): string {
  return `image_${String(ordinal).padStart(3, '0')}.jpg`
}
