import { existsSync } from 'fs'
import { mkdir, open, rename, rm } from 'fs/promises'
import path from 'path'
import { env, resolveVocabTreePath } from '@sfm-prep/config'
import { VocabTreeDownloadError } from './errors.js'
import type { OutputSink } from './output.js'

export type FetchLike = (url: string) => Promise<Response>

export interface VocabTreeOptions {
  dataDir?: string
  url?: string
  fetchImpl?: FetchLike
  sink?: OutputSink
}

function formatBytes(bytes: number): string {
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

function progressText(received: number, total: number | undefined): string {
  if (!total) return `Downloading vocab tree... ${formatBytes(received)}`
  const percent = Math.min(100, Math.floor((received * 100) / total))
  return `Downloading vocab tree... ${formatBytes(received)} of ${formatBytes(total)} (${percent}%)`
}

/** Stream the response body into `file`, reporting bytes received. Returns the byte count. */
async function streamToFile(
  response: Response,
  file: string,
  onProgress: (received: number) => void
): Promise<number> {
  const handle = await open(file, 'w')
  let received = 0
  try {
    if (!response.body) return received
    const reader = response.body.getReader()
    for (;;) {
      const { done, value } = await reader.read()
      if (done) break
      await handle.write(value)
      received += value.byteLength
      onProgress(received)
    }
    return received
  } finally {
    await handle.close()
  }
}

/**
 * Return the path to the cached vocab tree, downloading it on first use.
 * The body is streamed to a `.part` file and only renamed into place once complete.
 */
export async function getVocabTree(options: VocabTreeOptions = {}): Promise<string> {
  const {
    dataDir = env.SFM_PREP_DATA_DIR,
    url = env.SFM_PREP_VOCAB_TREE_URL,
    fetchImpl = fetch,
    sink,
  } = options

  const target = resolveVocabTreePath(dataDir)
  if (existsSync(target)) return target

  await mkdir(path.dirname(target), { recursive: true })
  const partial = `${target}.part`
  const status = sink?.status(`Downloading vocab tree from ${url}...`)

  try {
    const response = await fetchImpl(url)
    if (!response.ok) {
      throw new VocabTreeDownloadError(url, `HTTP ${response.status} ${response.statusText}`)
    }

    const length = Number(response.headers.get('content-length'))
    const total = Number.isFinite(length) && length > 0 ? length : undefined

    const received = await streamToFile(response, partial, (bytes) => status?.update(progressText(bytes, total)))
    await rename(partial, target)
    status?.succeed(`🌳 Vocab tree saved to ${target} (${formatBytes(received)})`)
    return target
  } catch (error) {
    status?.fail('Vocab tree download failed')
    await rm(partial, { force: true })
    if (error instanceof VocabTreeDownloadError) throw error
    throw new VocabTreeDownloadError(url, error instanceof Error ? error.message : String(error))
  }
}
