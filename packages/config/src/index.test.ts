import { describe, expect, it } from 'vitest'
import { DEFAULT_VOCAB_TREE_URL, loadEnv, resolveVocabTreePath, userDataDir } from './index.js'

describe('userDataDir', () => {
  it('uses XDG_DATA_HOME on linux when set', () => {
    expect(userDataDir('linux', { XDG_DATA_HOME: '/data' }, '/home/ana')).toBe('/data/sfm-prep')
  })

  it('falls back to ~/.local/share on linux', () => {
    expect(userDataDir('linux', {}, '/home/ana')).toBe('/home/ana/.local/share/sfm-prep')
  })

  it('uses Application Support on macOS', () => {
    expect(userDataDir('darwin', {}, '/Users/ana')).toBe('/Users/ana/Library/Application Support/sfm-prep')
  })

  it('uses LOCALAPPDATA on windows', () => {
    expect(userDataDir('win32', { LOCALAPPDATA: 'C:\\Users\\ana\\AppData\\Local' }, 'C:\\Users\\ana'))
      .toBe('C:\\Users\\ana\\AppData\\Local\\sfm-prep')
  })
})

describe('loadEnv', () => {
  it('applies defaults', () => {
    const result = loadEnv({ SFM_PREP_DATA_DIR: '/tmp/prep' })
    expect(result).toEqual({
      COLMAP_BIN: 'colmap',
      GLOMAP_BIN: 'glomap',
      SFM_PREP_DATA_DIR: '/tmp/prep',
      SFM_PREP_VOCAB_TREE_URL: DEFAULT_VOCAB_TREE_URL,
      SFM_PREP_LOG_FILE: 'sfm-prep.log',
    })
  })

  it('reads binary overrides', () => {
    const result = loadEnv({ COLMAP_BIN: '/opt/colmap/bin/colmap', GLOMAP_BIN: 'glomap-dev' })
    expect(result.COLMAP_BIN).toBe('/opt/colmap/bin/colmap')
    expect(result.GLOMAP_BIN).toBe('glomap-dev')
  })

  it('rejects a malformed vocab tree url', () => {
    expect(() => loadEnv({ SFM_PREP_VOCAB_TREE_URL: 'not a url' })).toThrow()
  })
})

describe('resolveVocabTreePath', () => {
  it('places the tree inside the data dir', () => {
    expect(resolveVocabTreePath('/tmp/prep')).toBe('/tmp/prep/vocab_tree.fbow')
  })
})
