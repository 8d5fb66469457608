/**
 * Infrastructure Layer - JSON Manifest Store
 *
 * Incremental-processing ledger persisted as one pretty-printed JSON file:
 *
 *   { "processed_files": { "<path>": { timestamp, provider, content_hash, file_name } },
 *     "failed_files": ["<path>", ...],
 *     "timestamp": "<iso>" }
 *
 * Loaded once; the in-memory copy is authoritative. Each mutation is written
 * to disk inside the critical section that made it.
 */

import { access, mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { constants } from 'node:fs'
import { basename, dirname } from 'node:path'
import {
  emptyManifest,
  ProcessingManifestSchema,
  type ProcessingManifest
} from '../../core/domain.js'
import { errorMessage } from '../../core/errors.js'
import type { Logger } from '../../core/ports/logger.js'
import type { ManifestStore } from '../../core/ports/manifestStore.js'
import { computeContentHash } from '../../application/contentHash.js'
import { AsyncMutex } from '../../shared/asyncMutex.js'

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK)
    return true
  } catch {
    return false
  }
}

export class JsonManifestStore implements ManifestStore {
  readonly #manifestPath: string
  readonly #providerName: string
  readonly #incremental: boolean
  readonly #outputPathFor: (sourcePath: string) => string
  readonly #logger: Logger
  readonly #mutex = new AsyncMutex()

  #manifest: ProcessingManifest = emptyManifest()

  constructor(opts: {
    manifestPath: string
    providerName: string
    incremental: boolean
    outputPathFor: (sourcePath: string) => string
    logger: Logger
  }) {
    this.#manifestPath = opts.manifestPath
    this.#providerName = opts.providerName
    this.#incremental = opts.incremental
    this.#outputPathFor = opts.outputPathFor
    this.#logger = opts.logger
  }

  // ======================== Load ========================

  async load(): Promise<void> {
    this.#manifest = await this.#readFromDisk()
    const count = Object.keys(this.#manifest.processed_files).length
    if (count > 0) {
      this.#logger.info(`Loaded manifest with ${count} processed files`)
    }
  }

  async #readFromDisk(): Promise<ProcessingManifest> {
    if (!(await fileExists(this.#manifestPath))) return emptyManifest()

    try {
      const raw = await readFile(this.#manifestPath, 'utf8')
      const parsed = ProcessingManifestSchema.safeParse(JSON.parse(raw))
      if (!parsed.success) {
        const message = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
          .join('; ')
        this.#logger.warn(`Manifest ${this.#manifestPath} failed validation, starting empty: ${message}`)
        return emptyManifest()
      }
      return parsed.data
    } catch (error) {
      this.#logger.warn(`Failed to load manifest ${this.#manifestPath}, starting empty: ${errorMessage(error)}`)
      return emptyManifest()
    }
  }

  // ======================== Queries ========================

  async isProcessed(sourcePath: string): Promise<boolean> {
    if (!this.#incremental) return false

    const entry = this.#manifest.processed_files[sourcePath]
    if (!entry) {
      this.#logger.debug(`Not in manifest: ${sourcePath}`)
      return false
    }

    const outputPath = this.#outputPathFor(sourcePath)
    if (!(await fileExists(outputPath))) {
      this.#logger.info(`Output file missing, reprocessing: ${sourcePath}`)
      return false
    }

    let currentHash: string
    try {
      currentHash = computeContentHash(await readFile(sourcePath, 'utf8'))
    } catch (error) {
      this.#logger.warn(`Error checking file hash, reprocessing ${sourcePath}: ${errorMessage(error)}`)
      return false
    }

    if (currentHash !== entry.content_hash) {
      this.#logger.info(`Source file changed, reprocessing: ${sourcePath} (${entry.content_hash} -> ${currentHash})`)
      return false
    }

    this.#logger.debug(`Unchanged since last run: ${sourcePath}`)
    return true
  }

  snapshot(): ProcessingManifest {
    return structuredClone(this.#manifest)
  }

  // ======================== Mutations ========================

  async markProcessed(sourcePath: string, success: boolean, content?: string): Promise<void> {
    let contentHash: string | null = null
    if (success) {
      try {
        contentHash = computeContentHash(content ?? (await readFile(sourcePath, 'utf8')))
      } catch (error) {
        this.#logger.warn(`Could not compute hash for ${sourcePath}, recording as failed: ${errorMessage(error)}`)
      }
    }

    await this.#mutex.runExclusive(async () => {
      if (contentHash !== null) {
        this.#manifest.processed_files[sourcePath] = {
          timestamp: new Date().toISOString(),
          provider: this.#providerName,
          content_hash: contentHash,
          file_name: basename(sourcePath)
        }
        this.#manifest.failed_files = this.#manifest.failed_files.filter((p) => p !== sourcePath)
      } else if (!this.#manifest.failed_files.includes(sourcePath)) {
        this.#manifest.failed_files.push(sourcePath)
      }

      this.#manifest.timestamp = new Date().toISOString()
      await this.#persist()
    })
  }

  // ======================== Disk I/O ========================

  async #persist(): Promise<void> {
    const tempPath = `${this.#manifestPath}.tmp`
    try {
      await mkdir(dirname(this.#manifestPath), { recursive: true })
      await writeFile(tempPath, `${JSON.stringify(this.#manifest, null, 2)}\n`, 'utf8')
      await rename(tempPath, this.#manifestPath)
    } catch (error) {
      this.#logger.error(`Failed to save manifest ${this.#manifestPath}: ${errorMessage(error)}`)
    }
  }
}

export async function createManifestStore(
  opts: ConstructorParameters<typeof JsonManifestStore>[0]
): Promise<JsonManifestStore> {
  const store = new JsonManifestStore(opts)
  await store.load()
  return store
}
