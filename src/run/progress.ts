import type { IngestProgressEvent } from '@clipsift/core'

const withError = (line: string, error: string | null) => (error ? `${line} error=${error}` : line)

/** One log line per event; `null` for events not worth a line. */
export function formatProgressEvent(event: IngestProgressEvent): string | null {
  switch (event.kind) {
    case 'resolve-redirect':
      return `resolve redirect depth=${event.depth} ${event.from} -> ${event.to}`
    case 'resolve-error':
      return `resolve failed url=${event.url} error=${event.error}`
    case 'resolve-done':
      return withError(`resolve done url=${event.url ?? 'none'}`, event.error)
    case 'page-fetch-start':
      return `page fetch url=${event.url}`
    case 'page-fetch-done':
      return withError(`page done ok=${event.ok} url=${event.url}`, event.error)
    case 'cache-hit':
      return `cache hit id=${event.contentId}`
    case 'cache-miss':
      return `cache miss id=${event.contentId} reason=${event.reason}`
    case 'cache-save':
      return withError(`cache save id=${event.contentId} ok=${event.ok}`, event.error)
    case 'download-start':
      return null
    case 'download-done':
      return withError(
        `download ok=${event.ok} bytes=${event.downloadedBytes} file=${event.destination}`,
        event.error
      )
    case 'frames-done':
      return `frames written=${event.written}/${event.requested} video=${event.videoPath}`
    case 'audio-done':
      return withError(`audio ok=${event.ok} bytes=${event.bytes}`, event.error)
    case 'stage-fail':
      return `stage failed id=${event.contentId} stage=${event.stage} error=${event.error}`
    case 'transcriber-skip':
      return `transcribe skip provider=${event.provider} reason=${event.reason}`
    case 'transcriber-attempt':
      return `transcribe try provider=${event.provider}`
    case 'transcriber-fail':
      return `transcribe failed provider=${event.provider} error=${event.error}`
    case 'transcriber-done':
      return event.provider
        ? `transcribe done provider=${event.provider} chars=${event.characters}`
        : 'transcribe done provider=none'
    case 'ingest-done':
      return withError(
        `ingest done id=${event.contentId ?? 'none'} success=${event.success} ` +
          `cached=${event.fromCache}`,
        event.error
      )
  }
}
