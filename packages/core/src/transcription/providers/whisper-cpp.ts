import { spawn } from 'node:child_process'
import { randomUUID } from 'node:crypto'
import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { runFfmpegTranscodeToCanonicalAudio } from '../../media/ffmpeg.js'
import {
  DISABLE_LOCAL_WHISPER_CPP_ENV,
  WHISPER_CPP_BINARY_ENV,
  WHISPER_CPP_MODEL_PATH_ENV,
} from '../constants.js'
import type { SpeechContext, SpeechProvider } from '../types.js'
import { trimToNull, wrapError } from '../utils.js'

const MAX_STDERR_CHARS = 8192
const SUPPORTED_EXTENSIONS = ['.mp3', '.wav', '.flac', '.ogg']

export async function resolveWhisperCppModelPath(
  env: Record<string, string | undefined>
): Promise<string | null> {
  const override = (env[WHISPER_CPP_MODEL_PATH_ENV] ?? '').trim()
  if (override) {
    try {
      const stat = await fs.stat(override)
      return stat.isFile() ? override : null
    } catch {
      return null
    }
  }

  const home = (env.HOME ?? env.USERPROFILE ?? '').trim()
  if (!home) return null
  const cacheCandidate = join(home, '.clipsift', 'whisper-cpp', 'models', 'ggml-base.bin')
  try {
    const stat = await fs.stat(cacheCandidate)
    return stat.isFile() ? cacheCandidate : null
  } catch {
    return null
  }
}

function resolveWhisperCppBinary(env: Record<string, string | undefined>): string {
  const override = (env[WHISPER_CPP_BINARY_ENV] ?? '').trim()
  return override.length > 0 ? override : 'whisper-cli'
}

async function isWhisperCliAvailable(bin: string): Promise<boolean> {
  return new Promise((resolve) => {
    const proc = spawn(bin, ['--help'], { stdio: ['ignore', 'ignore', 'ignore'] })
    proc.on('error', () => resolve(false))
    proc.on('close', (code) => resolve(code === 0))
  })
}

export async function transcribeWithWhisperCpp(
  filePath: string,
  context: SpeechContext,
  modelPath: string
): Promise<string | null> {
  // whisper-cli only reads a handful of audio containers.
  const canUseDirectly = SUPPORTED_EXTENSIONS.some((ext) => filePath.toLowerCase().endsWith(ext))
  const inputPath = canUseDirectly
    ? filePath
    : join(tmpdir(), `clipsift-whisper-cpp-${randomUUID()}.mp3`)
  const outputBase = join(tmpdir(), `clipsift-whisper-cpp-out-${randomUUID()}`)
  const outputTxt = `${outputBase}.txt`

  try {
    if (!canUseDirectly) {
      await runFfmpegTranscodeToCanonicalAudio({
        inputPath: filePath,
        outputPath: inputPath,
        mode: 'lenient',
      })
    }

    const args = [
      '--model',
      modelPath,
      '--language',
      context.language.split('-')[0] ?? 'auto',
      '--no-timestamps',
      '--no-prints',
      '--output-txt',
      '--output-file',
      outputBase,
      inputPath,
    ]

    await new Promise<void>((resolve, reject) => {
      const proc = spawn(resolveWhisperCppBinary(context.env), args, {
        stdio: ['ignore', 'ignore', 'pipe'],
      })
      let stderr = ''
      proc.stderr?.setEncoding('utf8')
      proc.stderr?.on('data', (chunk: string) => {
        if (stderr.length <= MAX_STDERR_CHARS) stderr += chunk
      })
      const timeout = setTimeout(() => {
        proc.kill('SIGTERM')
        reject(new Error('whisper.cpp timed out'))
      }, context.timeoutMs)
      proc.on('error', (error) => {
        clearTimeout(timeout)
        reject(error)
      })
      proc.on('close', (code) => {
        clearTimeout(timeout)
        if (code === 0) {
          resolve()
          return
        }
        reject(new Error(`whisper.cpp failed (${code ?? 'unknown'}): ${stderr.trim()}`))
      })
    })

    const raw = await fs.readFile(outputTxt, 'utf8').catch(() => '')
    return trimToNull(raw)
  } catch (error) {
    throw wrapError('whisper.cpp failed', error)
  } finally {
    await fs.unlink(outputTxt).catch(() => {})
    if (!canUseDirectly) await fs.unlink(inputPath).catch(() => {})
  }
}

export const whisperCppSpeechProvider: SpeechProvider = {
  id: 'whisper.cpp',
  async unavailableReason(context) {
    if ((context.env[DISABLE_LOCAL_WHISPER_CPP_ENV] ?? '').trim() === '1') {
      return `disabled via ${DISABLE_LOCAL_WHISPER_CPP_ENV}`
    }
    const modelPath = await resolveWhisperCppModelPath(context.env)
    if (!modelPath) return `whisper.cpp model not found (set ${WHISPER_CPP_MODEL_PATH_ENV})`
    const bin = resolveWhisperCppBinary(context.env)
    if (!(await isWhisperCliAvailable(bin))) return `${bin} not found on PATH`
    return null
  },
  async transcribe(filePath, context) {
    const modelPath = await resolveWhisperCppModelPath(context.env)
    if (!modelPath) {
      throw new Error(`whisper.cpp model not found (set ${WHISPER_CPP_MODEL_PATH_ENV})`)
    }
    return transcribeWithWhisperCpp(filePath, context, modelPath)
  },
}
