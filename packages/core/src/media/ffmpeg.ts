import { spawn } from 'node:child_process'

import { getJsonPath, getJsonString } from '../content/page/json.js'
import { CANONICAL_SAMPLE_RATE } from './constants.js'

const MAX_STDERR_CHARS = 8192
const MAX_PROBE_STDOUT_CHARS = 65_536

export type VideoStreamInfo = {
  totalFrames: number
  fps: number
  durationSeconds: number | null
}

/**
 * Reads frame count and frame rate of the first video stream. Containers that omit `nb_frames`
 * fall back to the demuxed packet count, then to duration × fps. Returns `null` when the file has
 * no usable video stream or ffprobe is missing.
 */
export async function probeVideoStream(filePath: string): Promise<VideoStreamInfo | null> {
  const args = [
    '-v',
    'error',
    '-select_streams',
    'v:0',
    '-count_packets',
    '-show_entries',
    'stream=nb_frames,nb_read_packets,avg_frame_rate,r_frame_rate:format=duration',
    '-of',
    'json',
    filePath,
  ]
  const stdout = await new Promise<string | null>((resolve) => {
    const proc = spawn('ffprobe', args, { stdio: ['ignore', 'pipe', 'ignore'] })
    let out = ''
    proc.stdout?.setEncoding('utf8')
    proc.stdout?.on('data', (chunk: string) => {
      if (out.length > MAX_PROBE_STDOUT_CHARS) return
      out += chunk
    })
    proc.on('error', () => resolve(null))
    proc.on('close', (code) => resolve(code === 0 ? out : null))
  })
  if (!stdout) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(stdout)
  } catch {
    return null
  }

  const fps =
    parseFrameRate(getJsonString(parsed, ['streams', 0, 'avg_frame_rate'])) ??
    parseFrameRate(getJsonString(parsed, ['streams', 0, 'r_frame_rate']))
  if (!fps) return null

  const durationSeconds = parsePositive(getJsonPath(parsed, ['format', 'duration']))
  const totalFrames =
    parsePositiveInt(getJsonPath(parsed, ['streams', 0, 'nb_frames'])) ??
    parsePositiveInt(getJsonPath(parsed, ['streams', 0, 'nb_read_packets'])) ??
    (durationSeconds ? Math.floor(durationSeconds * fps) : null)
  if (!totalFrames) return null

  return { totalFrames, fps, durationSeconds }
}

/** Seeks to `seconds` on the input side and writes exactly one JPEG. */
export async function runFfmpegExtractFrame({
  inputPath,
  seconds,
  outputPath,
}: {
  inputPath: string
  seconds: number
  outputPath: string
}): Promise<void> {
  await runFfmpeg(
    [
      '-hide_banner',
      '-loglevel',
      'error',
      '-y',
      '-ss',
      seconds.toFixed(3),
      '-i',
      inputPath,
      '-frames:v',
      '1',
      '-q:v',
      '2',
      outputPath,
    ],
    `ffmpeg frame extraction failed for ${inputPath} @ ${seconds.toFixed(3)}s`
  )
}

/** Mono, 16 kHz, 16-bit MP3: the one format every transcription provider accepts. */
export async function runFfmpegTranscodeToCanonicalAudio({
  inputPath,
  outputPath,
  mode,
}: {
  inputPath: string
  outputPath: string
  mode: 'strict' | 'lenient'
}): Promise<void> {
  const input =
    mode === 'strict'
      ? ['-i', inputPath]
      : ['-err_detect', 'ignore_err', '-fflags', '+genpts', '-i', inputPath, '-map', '0:a:0?']
  await runFfmpeg(
    [
      '-hide_banner',
      '-loglevel',
      'error',
      '-y',
      ...input,
      '-vn',
      '-sn',
      '-dn',
      '-ac',
      '1',
      '-ar',
      String(CANONICAL_SAMPLE_RATE),
      '-sample_fmt',
      's16p',
      '-b:a',
      '64k',
      outputPath,
    ],
    `ffmpeg ${mode} transcode failed for ${inputPath} -> ${outputPath}`
  )
}

export async function runFfmpegTranscodeToFlac({
  inputPath,
  outputPath,
}: {
  inputPath: string
  outputPath: string
}): Promise<void> {
  await runFfmpeg(
    [
      '-hide_banner',
      '-loglevel',
      'error',
      '-y',
      '-i',
      inputPath,
      '-vn',
      '-ac',
      '1',
      '-ar',
      String(CANONICAL_SAMPLE_RATE),
      '-sample_fmt',
      's16',
      '-f',
      'flac',
      outputPath,
    ],
    `ffmpeg flac transcode failed for ${inputPath} -> ${outputPath}`
  )
}

async function runFfmpeg(args: string[], failurePrefix: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const proc = spawn('ffmpeg', args, { stdio: ['ignore', 'ignore', 'pipe'] })
    let stderr = ''
    proc.stderr?.setEncoding('utf8')
    proc.stderr?.on('data', (chunk: string) => {
      if (stderr.length > MAX_STDERR_CHARS) return
      stderr += chunk
    })
    proc.on('error', (error) => reject(error))
    proc.on('close', (code) => {
      if (code === 0) {
        resolve()
        return
      }
      const detail = stderr.trim()
      reject(new Error(`${failurePrefix} (${code ?? 'unknown'}): ${detail || 'unknown error'}`))
    })
  })
}

function parseFrameRate(raw: string | null): number | null {
  if (!raw) return null
  const [num, den] = raw.split('/')
  const numerator = Number(num)
  const denominator = den === undefined ? 1 : Number(den)
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return null
  }
  const fps = numerator / denominator
  return fps > 0 ? fps : null
}

function parsePositive(raw: unknown): number | null {
  const value = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : Number.NaN
  return Number.isFinite(value) && value > 0 ? value : null
}

function parsePositiveInt(raw: unknown): number | null {
  const value = parsePositive(raw)
  return value === null ? null : Math.floor(value)
}
