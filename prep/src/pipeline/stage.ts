import { spawn } from 'child_process'
import inquirer from 'inquirer'
import { formatCommand } from './commands.js'
import { PipelineCancelledError, StageFailedError } from './errors.js'
import type { OutputSink } from './output.js'
import type { CommandLine, StageOptions, StageResult } from './types.js'

export type ProcessRunner = (commandLine: CommandLine, options: { capture: boolean }) => Promise<StageResult>

export type ConfirmPrompt = (message: string) => Promise<boolean>

export interface StageDeps {
  sink: OutputSink
  processRunner?: ProcessRunner
  confirmPrompt?: ConfirmPrompt
}

// Shell convention for "command not found"
const SPAWN_FAILURE_EXIT_CODE = 127

/**
 * Spawn the command without a shell. With `capture` the child's output is collected and
 * returned; otherwise it streams straight to the terminal.
 */
export const spawnProcess: ProcessRunner = ({ command, args }, { capture }) => {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      stdio: capture ? ['inherit', 'pipe', 'pipe'] : 'inherit',
      cwd: process.cwd(),
    })

    let stdout = ''
    let stderr = ''

    // Decode as a stream so multibyte characters split across chunks survive
    child.stdout?.setEncoding('utf8')
    child.stderr?.setEncoding('utf8')

    child.stdout?.on('data', (data: string) => {
      stdout += data
    })

    child.stderr?.on('data', (data: string) => {
      stderr += data
    })

    child.on('close', (code) => {
      resolve(capture ? { exitCode: code ?? 1, stdout, stderr } : { exitCode: code ?? 1 })
    })

    child.on('error', (error) => {
      resolve(
        capture
          ? { exitCode: SPAWN_FAILURE_EXIT_CODE, stdout, stderr: error.message }
          : { exitCode: SPAWN_FAILURE_EXIT_CODE, stderr: error.message }
      )
    })
  })
}

export const inquirerConfirm: ConfirmPrompt = async (message) => {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message,
      default: true,
    },
  ])
  return proceed
}

export async function runStage(
  commandLine: CommandLine,
  options: StageOptions,
  deps: StageDeps
): Promise<StageResult> {
  const { sink, processRunner = spawnProcess, confirmPrompt = inquirerConfirm } = deps
  const { label, verbose = false, confirm = false } = options
  const printable = formatCommand(commandLine)

  if (confirm) {
    const proceed = await confirmPrompt(`Do you want to run ${label}?`)
    if (!proceed) {
      sink.error('❌ Exiting...')
      throw new PipelineCancelledError(label)
    }
  }

  sink.command(printable)

  const status = verbose ? undefined : sink.status('Running...')
  const result = await processRunner(commandLine, { capture: !verbose })

  if (result.exitCode !== 0) {
    status?.fail(`${label} failed`)
    sink.rule('💀 ERROR 💀')
    sink.error(`Error running command: ${printable}`)
    sink.rule()
    const stderr = result.stderr ?? ''
    if (stderr) sink.info(stderr)
    throw new StageFailedError(label, result.exitCode, stderr)
  }

  status?.stop()
  return result
}
