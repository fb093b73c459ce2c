import path from 'path'
import os from 'os'

export const APP_NAME = 'sfm-prep'

type PathEnv = Record<string, string | undefined>

// Per-user application data directory, following each platform's convention
export const userDataDir = (
  platform: NodeJS.Platform = process.platform,
  source: PathEnv = process.env,
  home: string = os.homedir()
): string => {
  if (platform === 'win32') {
    const base = source.LOCALAPPDATA || path.win32.join(home, 'AppData', 'Local')
    return path.win32.join(base, APP_NAME)
  }
  if (platform === 'darwin') {
    return path.posix.join(home, 'Library', 'Application Support', APP_NAME)
  }
  const base = source.XDG_DATA_HOME || path.posix.join(home, '.local', 'share')
  return path.posix.join(base, APP_NAME)
}

export const PATHS = {
  vocabTreeFile: 'vocab_tree.fbow',
  logFile: `${APP_NAME}.log`,
  sparseDir: 'sparse',
} as const

export const resolveVocabTreePath = (dataDir: string): string => {
  return path.join(dataDir, PATHS.vocabTreeFile)
}
