export type PrepErrorKind = 'config' | 'stage' | 'cancelled' | 'download'

export abstract class PrepError extends Error {
  abstract readonly kind: PrepErrorKind

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class ConfigError extends PrepError {
  readonly kind = 'config'
}

export class ConfigFileError extends ConfigError {
  constructor(readonly file: string, reason: string) {
    super(`Could not read config file [${file}]: ${reason}`)
  }
}

export class MissingFieldError extends ConfigError {
  constructor(readonly field: string) {
    super(`No value was passed for required field [${field}].`)
  }
}

export class InvalidEnumValueError extends ConfigError {
  constructor(
    readonly field: string,
    readonly value: unknown,
    readonly allowed: readonly (string | number)[]
  ) {
    super(`Invalid value <${String(value)}> for field [${field}]. Allowed values are: ${allowed.join(', ')}.`)
  }
}

export class InvalidFieldError extends ConfigError {
  constructor(readonly field: string, reason: string) {
    super(`Invalid value for field [${field}]: ${reason}`)
  }
}

export class InvalidVocabTreePathError extends ConfigError {
  constructor(readonly path: string | undefined) {
    super(
      path === undefined
        ? 'If [matching_method] is <vocab_tree>, then a [vocab_tree_path] is needed.'
        : `Supplied file [${path}] does not end with '.fbow', a valid vocab tree path is needed.`
    )
  }
}

export class StageFailedError extends PrepError {
  readonly kind = 'stage'

  constructor(
    readonly label: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    super(`${label} exited with code ${exitCode}`)
  }
}

export class PipelineCancelledError extends PrepError {
  readonly kind = 'cancelled'

  constructor(readonly label: string) {
    super(`Cancelled before ${label}`)
  }
}

export class VocabTreeDownloadError extends PrepError {
  readonly kind = 'download'

  constructor(readonly url: string, reason: string) {
    super(`Failed to download vocab tree from ${url}: ${reason}`)
  }
}

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  config: 2,
  cancelled: 130,
} as const

export function exitCodeFor(error: unknown): number {
  if (!(error instanceof PrepError)) return EXIT_CODES.failure
  switch (error.kind) {
    case 'config':
      return EXIT_CODES.config
    case 'cancelled':
      return EXIT_CODES.cancelled
    case 'stage':
    case 'download':
      return EXIT_CODES.failure
  }
}
