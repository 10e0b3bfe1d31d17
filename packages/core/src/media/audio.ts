import { promises as fs } from 'node:fs'
import { dirname } from 'node:path'

import { describeError, type OnProgress, ProgressKind } from '../progress.js'
import { MIN_AUDIO_BYTES } from './constants.js'
import { runFfmpegTranscodeToCanonicalAudio } from './ffmpeg.js'

/**
 * Demuxes the audio track of `videoPath` into the canonical transcription format at `outPath`.
 * Outputs under the size floor are discarded and reported as failure.
 */
export async function extractAudio(
  videoPath: string,
  outPath: string,
  { onProgress }: { onProgress?: OnProgress } = {}
): Promise<boolean> {
  const report = (ok: boolean, bytes: number, error: string | null) => {
    onProgress?.({ kind: ProgressKind.AudioDone, videoPath, ok, bytes, error })
    return ok
  }

  try {
    await fs.mkdir(dirname(outPath), { recursive: true })
    try {
      await runFfmpegTranscodeToCanonicalAudio({
        inputPath: videoPath,
        outputPath: outPath,
        mode: 'strict',
      })
    } catch {
      await runFfmpegTranscodeToCanonicalAudio({
        inputPath: videoPath,
        outputPath: outPath,
        mode: 'lenient',
      })
    }
  } catch (error) {
    await fs.unlink(outPath).catch(() => {})
    return report(false, 0, describeError(error))
  }

  const bytes = await fs
    .stat(outPath)
    .then((stat) => stat.size)
    .catch(() => 0)
  if (bytes < MIN_AUDIO_BYTES) {
    await fs.unlink(outPath).catch(() => {})
    return report(false, bytes, `extracted audio too small (${bytes} bytes)`)
  }
  return report(true, bytes, null)
}
