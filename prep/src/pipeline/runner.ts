import { mkdir } from 'fs/promises'
import path from 'path'
import { PATHS } from '@sfm-prep/config'
import {
  DEFAULT_BINARIES,
  assertVocabTreePath,
  buildExtractCommand,
  buildMapCommand,
  buildMatchCommand,
  formatCommand,
} from './commands.js'
import { PipelineCancelledError } from './errors.js'
import { runStage, type ConfirmPrompt, type ProcessRunner } from './stage.js'
import type { OutputSink } from './output.js'
import type {
  CommandLine,
  PipelineConfig,
  PipelineOptions,
  PipelineReport,
  PipelineStage,
  PipelineState,
  ToolBinaries,
} from './types.js'

export interface RunnerDeps {
  sink: OutputSink
  processRunner?: ProcessRunner
  confirmPrompt?: ConfirmPrompt
  binaries?: ToolBinaries
}

interface StagePlan {
  stage: PipelineStage
  state: PipelineState
  label: string
  doneMessage: string
  prepare: () => Promise<CommandLine>
}

const formatSeconds = (ms: number): string => `${(ms / 1000).toFixed(2)}s`

export const sparseDirFor = (config: PipelineConfig, outputDir: string): string =>
  path.join(outputDir, config.reconstructionTool, PATHS.sparseDir)

export class PipelineRunner {
  private startTime = Date.now()
  private state: PipelineState = 'extracting'
  private report: PipelineReport = {
    success: false,
    state: 'extracting',
    duration: 0,
    sparseDir: '',
    stages: []
  }

  constructor(private readonly deps: RunnerDeps) {}

  get currentState(): PipelineState {
    return this.state
  }

  /** Report of the latest run, including a failed one */
  get lastReport(): PipelineReport {
    return this.report
  }

  async run(
    config: PipelineConfig,
    vocabTreePath: string | undefined,
    outputDir: string,
    options: PipelineOptions = {}
  ): Promise<PipelineReport> {
    const { sink, binaries = DEFAULT_BINARIES } = this.deps
    const sparseDir = sparseDirFor(config, outputDir)

    this.startTime = Date.now()
    this.report = { success: false, state: 'extracting', duration: 0, sparseDir, stages: [] }

    // Fail before any stage runs so a bad tree path never leaves a half-built database
    assertVocabTreePath(config, vocabTreePath)

    const plan: StagePlan[] = [
      {
        stage: 'extract',
        state: 'extracting',
        label: 'feature extraction',
        doneMessage: '🎉 Done extracting COLMAP features.',
        prepare: async () => buildExtractCommand(config, binaries),
      },
      {
        stage: 'match',
        state: 'matching',
        label: `${config.matchingMethod} feature matching`,
        doneMessage: '🎉 Done matching COLMAP features.',
        prepare: async () => buildMatchCommand(config, vocabTreePath, binaries),
      },
      {
        stage: 'map',
        state: 'mapping',
        label: `${config.reconstructionTool} mapper`,
        doneMessage: `🎉 Done ${config.reconstructionTool} mapping.`,
        prepare: async () => {
          await mkdir(sparseDir, { recursive: true })
          return buildMapCommand(config, sparseDir, binaries)
        },
      },
    ]

    sink.info(`🌱 Preparing ${config.imageDir} for ${config.trainMethod} training`)

    for (const [index, step] of plan.entries()) {
      this.state = step.state
      const stepStartTime = Date.now()
      let printable = ''

      try {
        const commandLine = await step.prepare()
        printable = formatCommand(commandLine)

        sink.success(`Step ${index + 1}/${plan.length}: Running ${step.label}.`)
        await runStage(
          commandLine,
          { label: step.label, verbose: options.verbose, confirm: options.prompt },
          this.deps
        )

        this.report.stages.push({
          stage: step.stage,
          label: step.label,
          success: true,
          duration: Date.now() - stepStartTime,
          command: printable,
        })
        sink.success(step.doneMessage)
      } catch (error) {
        const cancelled = error instanceof PipelineCancelledError
        this.state = cancelled ? 'cancelled' : 'failed'
        this.report.stages.push({
          stage: step.stage,
          label: step.label,
          success: false,
          duration: Date.now() - stepStartTime,
          command: printable,
          ...(cancelled ? {} : { error: error instanceof Error ? error.message : String(error) }),
        })
        this.finish(false)

        const elapsed = formatSeconds(this.report.duration)
        if (cancelled) {
          sink.info(`⏹️  Stopped before ${step.label} after ${elapsed}`)
        } else {
          sink.error(`❌ Failed at ${step.label} after ${elapsed}`)
        }
        throw error
      }
    }

    this.state = 'done'
    this.finish(true)
    sink.success(`✅ Sparse reconstruction written to ${sparseDir}`)
    sink.info(`⏱️  Execution time: ${formatSeconds(this.report.duration)}`)
    return this.report
  }

  private finish(success: boolean): void {
    this.report.success = success
    this.report.state = this.state
    this.report.duration = Date.now() - this.startTime
  }
}

export function runPipeline(
  config: PipelineConfig,
  vocabTreePath: string | undefined,
  outputDir: string,
  options: PipelineOptions,
  deps: RunnerDeps
): Promise<PipelineReport> {
  return new PipelineRunner(deps).run(config, vocabTreePath, outputDir, options)
}
