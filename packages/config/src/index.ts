import { z } from 'zod'
import { PATHS, userDataDir } from './paths.js'

export const DEFAULT_VOCAB_TREE_URL = 'https://demuc.de/colmap/vocab_tree_flickr100K_words32K.bin'

const schema = z.object({
  // Executables invoked for each stage; override when they are not on PATH
  COLMAP_BIN: z.string().min(1).default('colmap'),
  GLOMAP_BIN: z.string().min(1).default('glomap'),
  SFM_PREP_DATA_DIR: z.string().min(1).optional(),
  SFM_PREP_VOCAB_TREE_URL: z.string().url().default(DEFAULT_VOCAB_TREE_URL),
  SFM_PREP_LOG_FILE: z.string().min(1).default(PATHS.logFile),
})

export type Env = Omit<z.infer<typeof schema>, 'SFM_PREP_DATA_DIR'> & { SFM_PREP_DATA_DIR: string }

export const loadEnv = (source: Record<string, string | undefined> = process.env): Env => {
  const parsed = schema.parse(source)
  return {
    ...parsed,
    SFM_PREP_DATA_DIR: parsed.SFM_PREP_DATA_DIR ?? userDataDir(process.platform, source),
  }
}

export const env = loadEnv()

export { APP_NAME, PATHS, userDataDir, resolveVocabTreePath } from './paths.js'
