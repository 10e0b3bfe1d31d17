import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { CommanderError } from 'commander'

import { runCli } from './run.js'

export type CliMainArgs = {
  argv: string[]
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  exit: (code: number) => void
  setExitCode: (code: number) => void
}

export function handlePipeErrors(stream: NodeJS.WritableStream, exit: (code: number) => void) {
  stream.on('error', (error: unknown) => {
    if (error instanceof Error && 'code' in error && error.code === 'EPIPE') {
      exit(0)
      return
    }
    throw error
  })
}

export function parseDotenv(text: string): Record<string, string> {
  const out: Record<string, string> = {}

  for (const rawLine of text.split(/\r?\n/)) {
    const trimmed = rawLine.trim()
    if (!trimmed || trimmed.startsWith('#')) continue

    let line = trimmed
    if (line.startsWith('export ')) line = line.slice('export '.length).trim()

    const equalsIndex = line.indexOf('=')
    if (equalsIndex <= 0) continue

    const key = line.slice(0, equalsIndex).trim()
    if (!key) continue

    let value = line.slice(equalsIndex + 1).trim()

    const quote = value[0]
    if ((quote === '"' || quote === "'") && value.endsWith(quote) && value.length >= 2) {
      value = value.slice(1, -1)
      if (quote === '"') value = value.replace(/\\n/g, '\n')
    } else {
      const commentIndex = value.search(/\s+#/)
      if (commentIndex !== -1) value = value.slice(0, commentIndex).trimEnd()
    }

    out[key] = value
  }

  return out
}

async function loadDotenvFromCwd(): Promise<Record<string, string>> {
  const dotenvPath = join(process.cwd(), '.env')
  try {
    const text = await readFile(dotenvPath, 'utf8')
    return parseDotenv(text)
  } catch {
    return {}
  }
}

// CSI sequences, and OSC sequences ended by BEL or ESC-backslash.
const ANSI_PATTERN = /\u001b\[[0-9;?]*[A-Za-z]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)/g

export function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, '')
}

export async function runCliMain({
  argv,
  env,
  fetch,
  stdout,
  stderr,
  exit,
  setExitCode,
}: CliMainArgs): Promise<void> {
  handlePipeErrors(stdout, exit)
  handlePipeErrors(stderr, exit)

  const verbose = argv.includes('--verbose')

  try {
    const mergedEnv = env === process.env ? { ...(await loadDotenvFromCwd()), ...env } : env
    const code = await runCli(argv, { env: mergedEnv, fetch, stdout, stderr })
    if (code !== 0) setExitCode(code)
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Commander already printed the usage error.
      setExitCode(error.exitCode === 0 ? 1 : error.exitCode)
      return
    }

    if (verbose && error instanceof Error && typeof error.stack === 'string') {
      stderr.write(`${error.stack}\n`)
      const cause = error.cause
      if (cause instanceof Error && typeof cause.stack === 'string') {
        stderr.write(`Caused by: ${cause.stack}\n`)
      }
      setExitCode(1)
      return
    }

    const message = error instanceof Error ? error.message : error ? String(error) : 'Unknown error'
    stderr.write(`${stripAnsi(message)}\n`)
    setExitCode(1)
  }
}
