#!/usr/bin/env tsx
import 'dotenv/config'
import { existsSync, realpathSync } from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { Command } from 'commander'
import { env as defaultEnv, type Env } from '@sfm-prep/config'
import { loadConfig } from './config.js'
import { EXIT_CODES, PrepError, exitCodeFor } from './errors.js'
import { ConsoleSink, FileSink, TeeSink, type OutputSink } from './output.js'
import { runPipeline } from './runner.js'
import type { ConfirmPrompt, ProcessRunner } from './stage.js'
import { getVocabTree, type FetchLike } from './vocab-tree.js'

interface RunCommandOptions {
  config: string
  output: string
  vocabTree?: string
  fetchVocabTree?: boolean
  prompt?: boolean
  verbose?: boolean
  log?: boolean | string
}

export interface CliDeps {
  sink?: OutputSink
  processRunner?: ProcessRunner
  confirmPrompt?: ConfirmPrompt
  fetchImpl?: FetchLike
  env?: Env
  exit?: (code: number) => void
}

function createSink(base: OutputSink, log: boolean | string | undefined, logFile: string): OutputSink {
  if (log === undefined || log === false) return base
  const file = log === true ? logFile : log
  return new TeeSink([base, new FileSink(file)])
}

function reportFailure(sink: OutputSink, error: unknown): void {
  if (!(error instanceof PrepError)) {
    sink.error(`❌ Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`)
    return
  }
  switch (error.kind) {
    case 'cancelled':
      sink.warn(`🛑 ${error.message}`)
      return
    case 'stage':
      sink.error(`❌ Pipeline failed: ${error.message}`)
      return
    default:
      sink.error(`❌ ${error.message}`)
  }
}

export function createProgram(deps: CliDeps = {}): Command {
  const exit = deps.exit ?? ((code: number) => process.exit(code))
  const baseSink = deps.sink ?? new ConsoleSink()
  const env = deps.env ?? defaultEnv
  const vocabTreeOptions = {
    dataDir: env.SFM_PREP_DATA_DIR,
    url: env.SFM_PREP_VOCAB_TREE_URL,
    fetchImpl: deps.fetchImpl,
  }

  const program = new Command()

  program
    .name('sfm-prep')
    .description('Sparse reconstruction from an image folder, ready for nerfacto or splatfacto training')
    .version('0.1.0')

  program
    .command('run')
    .description('Run feature extraction, feature matching and mapping')
    .requiredOption('-c, --config <file>', 'Path to the YAML config file')
    .requiredOption('-o, --output <dir>', 'Path to the output directory')
    .option('--vocab-tree <file>', 'Path to the vocab tree (.fbow), needed when matching_method is vocab_tree')
    .option('--fetch-vocab-tree', 'Use the cached vocab tree download when no --vocab-tree is given')
    .option('-p, --prompt', 'Prompt before running each stage')
    .option('-v, --verbose', 'Stream tool output instead of hiding it behind a spinner')
    .option('-l, --log [file]', `Also write a plain-text log (default: ${env.SFM_PREP_LOG_FILE})`)
    .action(async (options: RunCommandOptions) => {
      let sink = baseSink

      try {
        sink = createSink(baseSink, options.log, env.SFM_PREP_LOG_FILE)
        const config = await loadConfig(options.config)

        let vocabTreePath = options.vocabTree
        if (vocabTreePath === undefined && options.fetchVocabTree && config.matchingMethod === 'vocab_tree') {
          vocabTreePath = await getVocabTree({ ...vocabTreeOptions, sink })
        }

        await runPipeline(
          config,
          vocabTreePath,
          options.output,
          { verbose: options.verbose, prompt: options.prompt },
          {
            sink,
            processRunner: deps.processRunner,
            confirmPrompt: deps.confirmPrompt,
            binaries: { colmap: env.COLMAP_BIN, glomap: env.GLOMAP_BIN },
          }
        )
        exit(EXIT_CODES.success)
      } catch (error) {
        reportFailure(sink, error)
        exit(exitCodeFor(error))
      }
    })

  program
    .command('vocab-tree')
    .description('Download the vocab tree if it is not cached yet and print its path')
    .action(async () => {
      try {
        const target = await getVocabTree({ ...vocabTreeOptions, sink: baseSink })
        baseSink.info(target)
      } catch (error) {
        reportFailure(baseSink, error)
        exit(exitCodeFor(error))
      }
    })

  return program
}

/** True when `scriptPath` (argv[1]) resolves to the module, through symlinks such as npm's .bin links */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath || !existsSync(scriptPath)) return false
  return realpathSync(fileURLToPath(moduleUrl)) === realpathSync(path.resolve(scriptPath))
}

// Handle direct execution
if (isEntryPoint(import.meta.url, process.argv[1])) {
  createProgram().parseAsync().catch((error: unknown) => {
    console.error(error)
    process.exit(EXIT_CODES.failure)
  })
}
