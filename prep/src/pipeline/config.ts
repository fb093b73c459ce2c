import { readFile } from 'fs/promises'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import {
  CAMERA_MODELS,
  GPU_FLAGS,
  MATCHING_METHODS,
  RECONSTRUCTION_TOOLS,
  TRAIN_METHODS,
  type PipelineConfig,
} from './types.js'
import {
  ConfigError,
  ConfigFileError,
  InvalidEnumValueError,
  InvalidFieldError,
  MissingFieldError,
} from './errors.js'

const ENUM_FIELDS: Record<string, readonly (string | number)[]> = {
  train_method: TRAIN_METHODS,
  reconstruction_tool: RECONSTRUCTION_TOOLS,
  matching_method: MATCHING_METHODS,
  camera_model: CAMERA_MODELS,
  use_gpu: GPU_FLAGS,
}

const gpuFlag = z.preprocess(
  (value) => (typeof value === 'boolean' ? Number(value) : value),
  z.union([z.literal(0), z.literal(1)])
)

const schema = z.object({
  train_method: z.enum(TRAIN_METHODS).default('nerfacto'),
  reconstruction_tool: z.enum(RECONSTRUCTION_TOOLS).default('colmap'),
  matching_method: z.enum(MATCHING_METHODS).default('vocab_tree'),
  database_path: z.string().min(1),
  image_dir: z.string().min(1),
  camera_model: z.enum(CAMERA_MODELS).default('OPENCV'),
  use_gpu: gpuFlag.default(1),
})

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

// Empty YAML values come through as null; treat them as absent so defaults apply
function normalize(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(data)) {
    if (value !== null && value !== undefined) out[key] = value
  }
  if (out.reconstruction_tool === undefined && out.sfm_tool !== undefined) {
    out.reconstruction_tool = out.sfm_tool
  }
  return out
}

function toConfigError(issue: z.ZodIssue, data: Record<string, unknown>): ConfigError {
  const field = String(issue.path[0] ?? '<root>')
  const value = data[field]

  if (value === undefined) return new MissingFieldError(field)

  const allowed = ENUM_FIELDS[field]
  if (allowed) return new InvalidEnumValueError(field, value, allowed)

  return new InvalidFieldError(field, issue.message)
}

/**
 * Validate an already-parsed config document. Unknown keys are ignored.
 */
export function parseConfig(data: unknown): PipelineConfig {
  if (!isRecord(data)) {
    throw new InvalidFieldError('<root>', 'expected a mapping of field names to values')
  }

  const normalized = normalize(data)
  const result = schema.safeParse(normalized)

  if (!result.success) {
    const [issue] = result.error.issues
    throw issue ? toConfigError(issue, normalized) : new ConfigError(result.error.message)
  }

  const parsed = result.data
  return Object.freeze({
    trainMethod: parsed.train_method,
    reconstructionTool: parsed.reconstruction_tool,
    matchingMethod: parsed.matching_method,
    databasePath: parsed.database_path,
    imageDir: parsed.image_dir,
    cameraModel: parsed.camera_model,
    useGpu: parsed.use_gpu,
  })
}

export async function loadConfig(file: string): Promise<PipelineConfig> {
  let content: string
  try {
    content = await readFile(file, 'utf-8')
  } catch (error) {
    throw new ConfigFileError(file, error instanceof Error ? error.message : String(error))
  }

  let data: unknown
  try {
    data = parseYaml(content)
  } catch (error) {
    throw new ConfigFileError(file, error instanceof Error ? error.message : String(error))
  }

  if (!isRecord(data)) {
    throw new ConfigFileError(file, 'expected a mapping of field names to values')
  }

  return parseConfig(data)
}
