import { appendFileSync, mkdirSync, writeFileSync } from 'fs'
import path from 'path'
import chalk from 'chalk'
import ora from 'ora'

export type SinkLevel = 'info' | 'success' | 'warn' | 'error' | 'rule' | 'command' | 'status' | 'progress'

export interface StatusHandle {
  /** Replace the indicator text, e.g. with download progress */
  update(text: string): void
  succeed(text?: string): void
  fail(text?: string): void
  stop(): void
}

/**
 * Where the pipeline reports progress. Passed explicitly to the stage executor and the
 * runner so tests can swap the terminal for a recording double.
 */
export interface OutputSink {
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  rule(title?: string): void
  command(line: string): void
  /** Show a transient indicator while a stage runs with captured output */
  status(text: string): StatusHandle
}

const RULE_WIDTH = 80

function ruleLine(title?: string): string {
  if (!title) return '─'.repeat(RULE_WIDTH)
  const side = Math.max(2, Math.floor((RULE_WIDTH - title.length - 2) / 2))
  return `${'─'.repeat(side)} ${title} ${'─'.repeat(side)}`
}

export class ConsoleSink implements OutputSink {
  info(message: string): void {
    console.log(message)
  }

  success(message: string): void {
    console.log(chalk.green(message))
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message))
  }

  error(message: string): void {
    console.error(chalk.red(message))
  }

  rule(title?: string): void {
    console.error(chalk.red.bold(ruleLine(title)))
  }

  command(line: string): void {
    console.log(chalk.dim(`$ ${line}`))
  }

  status(text: string): StatusHandle {
    const spinner = ora({ text, color: 'cyan', spinner: 'moon' }).start()
    return {
      update: (next) => { spinner.text = next },
      succeed: (done) => { spinner.succeed(done && chalk.green(done)) },
      fail: (failed) => { spinner.fail(failed && chalk.red(failed)) },
      stop: () => { spinner.stop() },
    }
  }
}

/** Plain-text log, one line per event. The file is truncated when the sink is created. */
export class FileSink implements OutputSink {
  constructor(readonly file: string) {
    mkdirSync(path.dirname(path.resolve(file)), { recursive: true })
    writeFileSync(file, '')
  }

  private write(level: string, message: string): void {
    appendFileSync(this.file, `${new Date().toISOString()} ${level.toUpperCase()} ${message}\n`)
  }

  info(message: string): void {
    this.write('info', message)
  }

  success(message: string): void {
    this.write('success', message)
  }

  warn(message: string): void {
    this.write('warn', message)
  }

  error(message: string): void {
    this.write('error', message)
  }

  rule(title?: string): void {
    if (title) this.write('error', title)
  }

  command(line: string): void {
    this.write('command', line)
  }

  status(text: string): StatusHandle {
    this.write('status', text)
    // Progress updates stay on the terminal
    return {
      update: () => {},
      succeed: (done) => { if (done) this.write('success', done) },
      fail: (failed) => { if (failed) this.write('error', failed) },
      stop: () => {},
    }
  }
}

export class TeeSink implements OutputSink {
  constructor(private readonly sinks: OutputSink[]) {}

  info(message: string): void {
    for (const sink of this.sinks) sink.info(message)
  }

  success(message: string): void {
    for (const sink of this.sinks) sink.success(message)
  }

  warn(message: string): void {
    for (const sink of this.sinks) sink.warn(message)
  }

  error(message: string): void {
    for (const sink of this.sinks) sink.error(message)
  }

  rule(title?: string): void {
    for (const sink of this.sinks) sink.rule(title)
  }

  command(line: string): void {
    for (const sink of this.sinks) sink.command(line)
  }

  status(text: string): StatusHandle {
    const handles = this.sinks.map((sink) => sink.status(text))
    return {
      update: (next) => handles.forEach((h) => h.update(next)),
      succeed: (done) => handles.forEach((h) => h.succeed(done)),
      fail: (failed) => handles.forEach((h) => h.fail(failed)),
      stop: () => handles.forEach((h) => h.stop()),
    }
  }
}

export interface SinkEvent {
  level: SinkLevel
  message: string
}

/** Records every event; used by tests */
export class MemorySink implements OutputSink {
  readonly events: SinkEvent[] = []

  private record(level: SinkLevel, message: string): void {
    this.events.push({ level, message })
  }

  messages(level?: SinkLevel): string[] {
    return this.events.filter((e) => level === undefined || e.level === level).map((e) => e.message)
  }

  info(message: string): void {
    this.record('info', message)
  }

  success(message: string): void {
    this.record('success', message)
  }

  warn(message: string): void {
    this.record('warn', message)
  }

  error(message: string): void {
    this.record('error', message)
  }

  rule(title?: string): void {
    this.record('rule', title ?? '')
  }

  command(line: string): void {
    this.record('command', line)
  }

  status(text: string): StatusHandle {
    this.record('status', text)
    return {
      update: (next) => { this.record('progress', next) },
      succeed: (done) => { if (done) this.record('success', done) },
      fail: (failed) => { if (failed) this.record('error', failed) },
      stop: () => {},
    }
  }
}
