import type { ExtractionResult } from '@clipsift/core'

const TRANSCRIPT_PREVIEW_CHARS = 400

export function formatResultJson(result: ExtractionResult): string {
  return `${JSON.stringify(result, null, 2)}\n`
}

/** Short human-readable report; the full data is available through `--json`. */
export function formatResultText(result: ExtractionResult): string {
  const lines: string[] = []
  const tags = [result.mediaType ?? 'unknown', ...(result.fromCache ? ['cached'] : [])]
  lines.push(`${result.contentId ?? '(no content id)'} [${tags.join(', ')}]`)
  if (result.sourceUrl) lines.push(`source: ${result.sourceUrl}`)
  if (result.videoInfo?.title) lines.push(`title: ${result.videoInfo.title}`)
  if (result.videoInfo?.author) lines.push(`author: ${result.videoInfo.author}`)
  if (result.error) lines.push(`error: ${result.error}`)

  if (result.assets.length > 0) {
    lines.push('assets:')
    for (const asset of result.assets) {
      const label = asset.ordinal === null ? asset.kind : `${asset.kind} ${asset.ordinal}`
      lines.push(`  ${label}\t${asset.path}`)
    }
  }

  const transcript = result.transcript.trim()
  if (transcript) {
    const preview =
      transcript.length > TRANSCRIPT_PREVIEW_CHARS
        ? `${transcript.slice(0, TRANSCRIPT_PREVIEW_CHARS)}…`
        : transcript
    lines.push(`transcript (${transcript.length} chars):`, `  ${preview}`)
  }

  return `${lines.join('\n')}\n`
}
