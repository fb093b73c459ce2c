import { InvalidVocabTreePathError } from './errors.js'
import type { CommandLine, PipelineConfig, ToolBinaries } from './types.js'

export const DEFAULT_BINARIES: ToolBinaries = {
  colmap: 'colmap',
  glomap: 'glomap',
}

// Tighter global bundle-adjustment tolerance than colmap's default; not user-configurable
export const COLMAP_BA_TOLERANCE_FLAG = '--Mapper.ba_global_function_tolerance=1e-6'

export const VOCAB_TREE_EXTENSION = '.fbow'

/**
 * Throws when the matching method needs a vocab tree and the supplied path is missing
 * or does not point at a .fbow file. A no-op for the other matching methods.
 */
export function assertVocabTreePath(config: PipelineConfig, vocabTreePath: string | undefined): void {
  if (config.matchingMethod !== 'vocab_tree') return
  if (vocabTreePath === undefined || vocabTreePath === '') {
    throw new InvalidVocabTreePathError(undefined)
  }
  if (!vocabTreePath.endsWith(VOCAB_TREE_EXTENSION)) {
    throw new InvalidVocabTreePathError(vocabTreePath)
  }
}

export function buildExtractCommand(
  config: PipelineConfig,
  binaries: ToolBinaries = DEFAULT_BINARIES
): CommandLine {
  return {
    command: binaries.colmap,
    args: [
      'feature_extractor',
      '--database_path', config.databasePath,
      '--image_path', config.imageDir,
      '--ImageReader.single_camera', '1',
      '--ImageReader.camera_model', config.cameraModel,
      '--SiftExtraction.use_gpu', String(config.useGpu),
    ],
  }
}

export function buildMatchCommand(
  config: PipelineConfig,
  vocabTreePath: string | undefined,
  binaries: ToolBinaries = DEFAULT_BINARIES
): CommandLine {
  assertVocabTreePath(config, vocabTreePath)

  const args = [
    `${config.matchingMethod}_matcher`,
    '--database_path', config.databasePath,
    '--SiftMatching.use_gpu', String(config.useGpu),
  ]
  if (config.matchingMethod === 'vocab_tree' && vocabTreePath !== undefined) {
    args.push('--VocabTreeMatching.vocab_tree_path', vocabTreePath)
  }

  return { command: binaries.colmap, args }
}

export function buildMapCommand(
  config: PipelineConfig,
  sparseOutputDir: string,
  binaries: ToolBinaries = DEFAULT_BINARIES
): CommandLine {
  const args = [
    'mapper',
    '--database_path', config.databasePath,
    '--image_path', config.imageDir,
    '--output_path', sparseOutputDir,
  ]
  if (config.reconstructionTool === 'colmap') {
    args.push(COLMAP_BA_TOLERANCE_FLAG)
  }

  return { command: binaries[config.reconstructionTool], args }
}

const SAFE_ARG = /^[\w@%+=:,./-]+$/

function quoteArg(arg: string): string {
  if (arg !== '' && SAFE_ARG.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

/** Render a command for display and logs */
export function formatCommand({ command, args }: CommandLine): string {
  return [command, ...args].map(quoteArg).join(' ')
}
