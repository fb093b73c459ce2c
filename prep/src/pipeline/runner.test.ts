import { existsSync } from 'fs'
import { mkdir, mkdtemp, rm } from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { InvalidVocabTreePathError, PipelineCancelledError, StageFailedError } from './errors.js'
import { MemorySink } from './output.js'
import { PipelineRunner, runPipeline, sparseDirFor } from './runner.js'
import type { ProcessRunner } from './stage.js'
import type { CommandLine, PipelineConfig } from './types.js'

const config: PipelineConfig = {
  trainMethod: 'nerfacto',
  reconstructionTool: 'colmap',
  matchingMethod: 'exhaustive',
  databasePath: 'db.db',
  imageDir: 'imgs/',
  cameraModel: 'OPENCV',
  useGpu: 1,
}

interface Invocation {
  commandLine: CommandLine
  sparseDirExisted: boolean
}

function recordingRunner(outputDir: string, exitCodes: number[] = [0, 0, 0]) {
  const calls: Invocation[] = []
  const processRunner: ProcessRunner = async (commandLine) => {
    const sparseDirExisted = existsSync(path.join(outputDir, 'colmap', 'sparse'))
      || existsSync(path.join(outputDir, 'glomap', 'sparse'))
    calls.push({ commandLine, sparseDirExisted })
    const exitCode = exitCodes[calls.length - 1] ?? 0
    return exitCode === 0
      ? { exitCode, stdout: '', stderr: '' }
      : { exitCode, stdout: '', stderr: 'out of memory' }
  }
  return { calls, processRunner }
}

describe('runPipeline', () => {
  let dir: string
  let outputDir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'sfm-prep-runner-'))
    outputDir = path.join(dir, 'out')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('runs extract, match and map in order', async () => {
    const sink = new MemorySink()
    const { calls, processRunner } = recordingRunner(outputDir)

    const report = await runPipeline(config, undefined, outputDir, {}, { sink, processRunner })

    expect(calls.map((c) => c.commandLine.args[0])).toEqual(['feature_extractor', 'exhaustive_matcher', 'mapper'])
    expect(report.success).toBe(true)
    expect(report.state).toBe('done')
    expect(report.stages.map((s) => s.stage)).toEqual(['extract', 'match', 'map'])
    expect(report.sparseDir).toBe(path.join(outputDir, 'colmap', 'sparse'))
  })

  it('creates the sparse directory before mapping runs', async () => {
    const { calls, processRunner } = recordingRunner(outputDir)

    await runPipeline(config, undefined, outputDir, {}, { sink: new MemorySink(), processRunner })

    expect(calls.map((c) => c.sparseDirExisted)).toEqual([false, false, true])
    const mapArgs = calls[2]?.commandLine.args ?? []
    expect(mapArgs[mapArgs.indexOf('--output_path') + 1]).toBe(path.join(outputDir, 'colmap', 'sparse'))
  })

  it('accepts an existing sparse directory', async () => {
    await mkdir(path.join(outputDir, 'glomap', 'sparse'), { recursive: true })
    const { calls, processRunner } = recordingRunner(outputDir)

    const report = await runPipeline(
      { ...config, reconstructionTool: 'glomap' },
      undefined,
      outputDir,
      {},
      { sink: new MemorySink(), processRunner }
    )

    expect(report.success).toBe(true)
    expect(calls[2]?.commandLine.command).toBe('glomap')
  })

  it('passes the vocab tree to the matcher', async () => {
    const { calls, processRunner } = recordingRunner(outputDir)

    await runPipeline(
      { ...config, matchingMethod: 'vocab_tree' },
      '/trees/vocab_tree.fbow',
      outputDir,
      {},
      { sink: new MemorySink(), processRunner }
    )

    expect(calls[1]?.commandLine.args).toEqual([
      'vocab_tree_matcher',
      '--database_path', 'db.db',
      '--SiftMatching.use_gpu', '1',
      '--VocabTreeMatching.vocab_tree_path', '/trees/vocab_tree.fbow',
    ])
  })

  it('fails before extraction when the vocab tree path is missing', async () => {
    const { calls, processRunner } = recordingRunner(outputDir)

    await expect(
      runPipeline({ ...config, matchingMethod: 'vocab_tree' }, undefined, outputDir, {}, {
        sink: new MemorySink(),
        processRunner,
      })
    ).rejects.toBeInstanceOf(InvalidVocabTreePathError)

    expect(calls).toEqual([])
    expect(existsSync(outputDir)).toBe(false)
  })

  it('halts on the first failing stage', async () => {
    const sink = new MemorySink()
    const { calls, processRunner } = recordingRunner(outputDir, [1])
    const runner = new PipelineRunner({ sink, processRunner })

    await expect(runner.run(config, undefined, outputDir)).rejects.toMatchObject({
      label: 'feature extraction',
      exitCode: 1,
      stderr: 'out of memory',
    })

    expect(calls).toHaveLength(1)
    expect(runner.currentState).toBe('failed')
    expect(runner.lastReport.success).toBe(false)
    expect(runner.lastReport.stages).toHaveLength(1)
    expect(runner.lastReport.stages[0]?.error).toBe('feature extraction exited with code 1')
    expect(sink.messages('info')).toContain('out of memory')
    expect(runner.lastReport.state).toBe('failed')
    expect(sink.messages('error').at(-1)).toMatch(/^❌ Failed at feature extraction after \d+\.\d{2}s$/)
  })

  it('stops after a failed match without mapping', async () => {
    const { calls, processRunner } = recordingRunner(outputDir, [0, 2])

    await expect(
      runPipeline(config, undefined, outputDir, {}, { sink: new MemorySink(), processRunner })
    ).rejects.toBeInstanceOf(StageFailedError)

    expect(calls).toHaveLength(2)
    expect(existsSync(sparseDirFor(config, outputDir))).toBe(false)
  })

  it('cancels before any command when the first prompt is declined', async () => {
    const sink = new MemorySink()
    const { calls, processRunner } = recordingRunner(outputDir)
    const confirmPrompt = vi.fn(async () => false)
    const runner = new PipelineRunner({ sink, processRunner, confirmPrompt })

    await expect(runner.run(config, undefined, outputDir, { prompt: true })).rejects.toBeInstanceOf(
      PipelineCancelledError
    )

    expect(confirmPrompt).toHaveBeenCalledWith('Do you want to run feature extraction?')
    expect(calls).toEqual([])
    expect(runner.currentState).toBe('cancelled')
    expect(runner.lastReport.state).toBe('cancelled')
    expect(runner.lastReport.stages).toHaveLength(1)
    expect(runner.lastReport.stages[0]).not.toHaveProperty('error')
    expect(sink.messages('info').at(-1)).toMatch(/^⏹️ {2}Stopped before feature extraction after \d+\.\d{2}s$/)
    expect(sink.messages('error')).toEqual(['❌ Exiting...'])
  })

  it('uses the configured binaries', async () => {
    const { calls, processRunner } = recordingRunner(outputDir)

    await runPipeline(config, undefined, outputDir, {}, {
      sink: new MemorySink(),
      processRunner,
      binaries: { colmap: '/opt/colmap/bin/colmap', glomap: 'glomap' },
    })

    expect(calls.map((c) => c.commandLine.command)).toEqual([
      '/opt/colmap/bin/colmap',
      '/opt/colmap/bin/colmap',
      '/opt/colmap/bin/colmap',
    ])
  })
})
