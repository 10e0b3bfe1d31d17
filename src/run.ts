import {
  createCacheStore,
  createIngestionPipeline,
  createTranscriber,
  type IngestProgressEvent,
  isSafeContentId,
  selectSpeechProviders,
} from '@clipsift/core'
import { Command, CommanderError } from 'commander'

import { supportsColor, writeVerbose } from './run/logging.js'
import { formatResultJson, formatResultText } from './run/output.js'
import { formatProgressEvent } from './run/progress.js'
import { resolveRunSettings, type RunFlags } from './run/run-config.js'
import { resolvePackageVersion } from './version.js'

export type RunCliContext = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
}

const HELP_CODES = new Set(['commander.help', 'commander.helpDisplayed', 'commander.version'])

type IngestCommandOptions = RunFlags & {
  outDir?: string
  json?: boolean
  verbose?: boolean
}

function buildProgram(context: RunCliContext, setExitCode: (code: number) => void): Command {
  const { env, stdout, stderr } = context
  const program = new Command()
    .name('clipsift')
    .description('Turn short-video share links into frames, images, audio and a transcript.')
    .version(resolvePackageVersion(), '-V, --version')
    .configureOutput({
      writeOut(str) {
        stdout.write(str)
      },
      writeErr(str) {
        stderr.write(str)
      },
    })
    .exitOverride()

  program
    .command('ingest', { isDefault: true })
    .description('Ingest a share link or a pasted share text.')
    .argument('<input...>', 'share URL or share text (words are joined with spaces)')
    .option('--out-dir <dir>', 'write assets here instead of the cache entry directory')
    .option('--max-frames <n>', 'maximum number of sampled video frames')
    .option('--language <code>', 'transcription language hint (e.g. zh, en)')
    .option('--no-cache', 'skip cache lookup and save')
    .option('--json', 'print the full result as JSON')
    .option('--verbose', 'log progress to stderr')
    .action(async (words: string[], options: IngestCommandOptions) => {
      const settings = resolveRunSettings({ env, flags: options })
      const verbose = options.verbose === true
      const color = supportsColor(stderr, env)
      const log = (message: string) => writeVerbose(stderr, verbose, message, color)
      const onProgress = (event: IngestProgressEvent) => {
        const line = formatProgressEvent(event)
        if (line) log(line)
      }

      log(
        `config file=${settings.configPath ?? 'none'} cache=${
          settings.cacheEnabled ? settings.cacheDir : 'off'
        } maxFrames=${settings.maxFrames} providers=${settings.providers.join(',')} language=${
          settings.language
        }`
      )

      const pipeline = createIngestionPipeline({
        fetch: context.fetch,
        cacheStore: settings.cacheEnabled
          ? createCacheStore({
              root: settings.cacheDir,
              memory: settings.cacheMemory,
              onProgress,
            })
          : null,
        transcriber: createTranscriber({
          providers: selectSpeechProviders(settings.providers),
          env,
          fetch: context.fetch,
          language: settings.language,
          onProgress,
        }),
        maxFrames: settings.maxFrames,
        ...(settings.networkTimeoutMs !== null
          ? {
              redirectTimeoutMs: settings.networkTimeoutMs,
              pageTimeoutMs: settings.networkTimeoutMs,
            }
          : {}),
        onProgress,
      })

      const result = await pipeline.ingest(
        words.join(' '),
        options.outDir ? { outDir: options.outDir } : {}
      )
      stdout.write(options.json ? formatResultJson(result) : formatResultText(result))
      setExitCode(result.success ? 0 : 1)
    })

  program
    .command('evict')
    .description('Remove a cached result and its assets.')
    .argument('<contentId>', 'content id as printed by ingest')
    .action(async (contentId: string) => {
      if (!isSafeContentId(contentId)) {
        throw new Error(`Invalid content id: ${contentId}`)
      }
      const settings = resolveRunSettings({ env, flags: {} })
      const store = createCacheStore({ root: settings.cacheDir })
      const removed = await store.evict(contentId)
      stdout.write(removed ? `evicted ${contentId}\n` : `not cached: ${contentId}\n`)
      setExitCode(0)
    })

  return program
}

/** Parses `argv` (without node and script) and runs one command. Resolves to the exit code. */
export async function runCli(argv: string[], context: RunCliContext): Promise<number> {
  let exitCode = 0
  const program = buildProgram(context, (code) => {
    exitCode = code
  })

  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && HELP_CODES.has(error.code)) return 0
    throw error
  }
  return exitCode
}
