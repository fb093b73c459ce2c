export const TRAIN_METHODS = ['nerfacto', 'splatfacto'] as const
export const RECONSTRUCTION_TOOLS = ['colmap', 'glomap'] as const
export const MATCHING_METHODS = ['exhaustive', 'sequential', 'vocab_tree'] as const
export const CAMERA_MODELS = ['OPENCV', 'OPENCV_FISHEYE', 'EQUIRECTANGULAR', 'PINHOLE', 'SIMPLE_PINHOLE'] as const
export const GPU_FLAGS = [0, 1] as const

export type TrainMethod = (typeof TRAIN_METHODS)[number]
export type ReconstructionTool = (typeof RECONSTRUCTION_TOOLS)[number]
export type MatchingMethod = (typeof MATCHING_METHODS)[number]
export type CameraModel = (typeof CAMERA_MODELS)[number]
export type GpuFlag = (typeof GPU_FLAGS)[number]

export interface PipelineConfig {
  /** Downstream training target; only validated here */
  trainMethod: TrainMethod
  reconstructionTool: ReconstructionTool
  matchingMethod: MatchingMethod
  databasePath: string
  imageDir: string
  cameraModel: CameraModel
  useGpu: GpuFlag
}

/** An argv list; never interpreted by a shell */
export interface CommandLine {
  command: string
  args: string[]
}

export interface ToolBinaries {
  colmap: string
  glomap: string
}

export interface StageResult {
  exitCode: number
  stdout?: string
  stderr?: string
}

export type PipelineStage = 'extract' | 'match' | 'map'
export type PipelineState = 'extracting' | 'matching' | 'mapping' | 'done' | 'failed' | 'cancelled'

export interface StageOptions {
  label: string
  verbose?: boolean
  confirm?: boolean
}

export interface PipelineOptions {
  verbose?: boolean
  prompt?: boolean
}

export interface PipelineReport {
  success: boolean
  state: PipelineState
  duration: number
  sparseDir: string
  stages: Array<{
    stage: PipelineStage
    label: string
    success: boolean
    duration: number
    command: string
    error?: string
  }>
}
