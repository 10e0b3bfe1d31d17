import { promises as fs } from 'node:fs'
import { join } from 'node:path'

import { type OnProgress, ProgressKind } from '../progress.js'
import { frameFilename } from './constants.js'
import { probeVideoStream, runFfmpegExtractFrame } from './ffmpeg.js'

/**
 * Frame indices to sample. Short clips keep every frame; longer ones get `maxFrames` indices spread
 * evenly over the whole duration (`floor(i * total / maxFrames)`), never clustered at the start.
 */
export function computeFrameIndices(totalFrames: number, maxFrames: number): number[] {
  const total = Math.max(0, Math.floor(totalFrames))
  const max = Math.max(0, Math.floor(maxFrames))
  if (total === 0 || max === 0) return []
  if (total <= max) return Array.from({ length: total }, (_, i) => i)
  return Array.from({ length: max }, (_, i) => Math.floor((i * total) / max))
}

export type SampledFrame = {
  path: string
  ordinal: number
  frameIndex: number
}

/**
 * Writes up to `maxFrames` numbered JPEGs (`frame_001.jpg`, ...) into `outDir`. Each index is an
 * explicit seek; one failed seek is skipped and the rest still run.
 */
export async function sampleFrames(
  videoPath: string,
  outDir: string,
  maxFrames: number,
  { onProgress }: { onProgress?: OnProgress } = {}
): Promise<SampledFrame[]> {
  const stream = await probeVideoStream(videoPath)
  const indices = stream ? computeFrameIndices(stream.totalFrames, maxFrames) : []
  const frames: SampledFrame[] = []

  if (stream && indices.length > 0) {
    await fs.mkdir(outDir, { recursive: true })
    for (const [position, frameIndex] of indices.entries()) {
      const ordinal = position + 1
      const outputPath = join(outDir, frameFilename(ordinal))
      try {
        await runFfmpegExtractFrame({
          inputPath: videoPath,
          seconds: frameIndex / stream.fps,
          outputPath,
        })
        const stat = await fs.stat(outputPath)
        if (!stat.isFile() || stat.size === 0) throw new Error('empty frame')
        frames.push({ path: outputPath, ordinal, frameIndex })
      } catch {
        // Seeking past the last decodable frame is common near the end of VFR clips.
        await fs.unlink(outputPath).catch(() => {})
      }
    }
  }

  onProgress?.({
    kind: ProgressKind.FramesDone,
    videoPath,
    requested: indices.length,
    written: frames.length,
  })
  return frames
}
