import { promises as fs } from 'node:fs'
import { basename } from 'node:path'

import { MAX_ERROR_DETAIL_CHARS } from './constants.js'

export function wrapError(prefix: string, error: unknown): Error {
  if (error instanceof Error) {
    return new Error(`${prefix}: ${error.message}`, { cause: error })
  }
  return new Error(`${prefix}: ${String(error)}`)
}

export function toArrayBuffer(view: Uint8Array): ArrayBuffer {
  const buffer = view.buffer as ArrayBuffer
  return buffer.slice(view.byteOffset, view.byteOffset + view.byteLength)
}

export function readEnvKey(env: Record<string, string | undefined>, name: string): string | null {
  const trimmed = env[name]?.trim() ?? ''
  return trimmed.length > 0 ? trimmed : null
}

export function mediaTypeForPath(filePath: string): string {
  const lower = filePath.toLowerCase()
  if (lower.endsWith('.mp3')) return 'audio/mpeg'
  if (lower.endsWith('.m4a')) return 'audio/mp4'
  if (lower.endsWith('.wav')) return 'audio/wav'
  if (lower.endsWith('.flac')) return 'audio/flac'
  if (lower.endsWith('.ogg')) return 'audio/ogg'
  return 'video/mp4'
}

export async function readAudioBlob(filePath: string): Promise<{ blob: Blob; filename: string }> {
  const bytes = new Uint8Array(await fs.readFile(filePath))
  return {
    blob: new Blob([toArrayBuffer(bytes)], { type: mediaTypeForPath(filePath) }),
    filename: basename(filePath),
  }
}

export async function readErrorDetail(response: Response): Promise<string | null> {
  try {
    const text = await response.text()
    const trimmed = text.trim()
    if (!trimmed) return null
    return trimmed.length > MAX_ERROR_DETAIL_CHARS
      ? `${trimmed.slice(0, MAX_ERROR_DETAIL_CHARS)}…`
      : trimmed
  } catch {
    return null
  }
}

export function trimToNull(text: string | null | undefined): string | null {
  const trimmed = text?.trim() ?? ''
  return trimmed.length > 0 ? trimmed : null
}
