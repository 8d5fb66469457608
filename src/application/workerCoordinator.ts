/**
 * Application Layer - Worker Coordinator
 *
 * Runs the documentation pipeline across many files with a bounded number of
 * concurrent workers. Workers share two things: the manifest store (which
 * serializes its own mutations) and the write mutex below. A failure is
 * recorded for its file only; the rest of the batch keeps going.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { Subject, type Observable } from 'rxjs'
import { DocweaveError, errorMessage } from '../core/errors.js'
import type { Logger } from '../core/ports/logger.js'
import type { ManifestStore } from '../core/ports/manifestStore.js'
import { AsyncMutex } from '../shared/asyncMutex.js'
import type { DocumentationService } from './documentationService.js'

// ============================================================================
// Types
// ============================================================================

export type FileProgressEvent =
  | { type: 'file-started'; sourcePath: string; index: number; total: number }
  | { type: 'file-completed'; sourcePath: string; index: number; total: number; outputPath: string; applied: number }
  | { type: 'file-failed'; sourcePath: string; index: number; total: number; error: string }

export type DocumentedFile = {
  sourcePath: string
  outputPath: string
  /** Original content, used for diffs */
  original: string
  content: string
  applied: number
  timestamp: string
}

export type FailedFile = {
  sourcePath: string
  error: string
}

export type CoordinatorResult = {
  succeeded: DocumentedFile[]
  failed: FailedFile[]
}

// ============================================================================
// Pool
// ============================================================================

/**
 * Run `handler` over `items` with at most `concurrency` calls in flight.
 * Completion order is whatever the handlers produce.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  handler: (item: T, index: number) => Promise<void>
): Promise<void> {
  let next = 0
  const workerCount = Math.max(1, Math.min(concurrency, items.length))

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next
      next += 1
      const item = items[index]
      if (item !== undefined) await handler(item, index)
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()))
}

// ============================================================================
// Coordinator
// ============================================================================

export class WorkerCoordinator {
  readonly #service: DocumentationService
  readonly #manifest: ManifestStore
  readonly #outputPathFor: (sourcePath: string) => string
  readonly #workers: number
  readonly #logger: Logger
  readonly #writeMutex = new AsyncMutex()
  readonly #events = new Subject<FileProgressEvent>()

  constructor(opts: {
    service: DocumentationService
    manifest: ManifestStore
    outputPathFor: (sourcePath: string) => string
    workers: number
    logger: Logger
  }) {
    this.#service = opts.service
    this.#manifest = opts.manifest
    this.#outputPathFor = opts.outputPathFor
    this.#workers = opts.workers
    this.#logger = opts.logger
  }

  get events$(): Observable<FileProgressEvent> {
    return this.#events.asObservable()
  }

  async run(files: readonly string[]): Promise<CoordinatorResult> {
    const succeeded: DocumentedFile[] = []
    const failed: FailedFile[] = []
    const total = files.length

    if (total > 1 && this.#workers > 1) {
      this.#logger.info(`Starting parallel processing with ${this.#workers} workers`)
    }

    await runPool(files, this.#workers, async (sourcePath, i) => {
      const index = i + 1
      this.#events.next({ type: 'file-started', sourcePath, index, total })

      let outcome: DocumentedFile | FailedFile
      try {
        outcome = await this.#processOne(sourcePath)
      } catch (error) {
        this.#logger.error(`Error processing ${sourcePath}: ${errorMessage(error)}`)
        await this.#manifest.markProcessed(sourcePath, false)
        outcome = { sourcePath, error: errorMessage(error) }
      }

      if ('error' in outcome) {
        failed.push(outcome)
        this.#events.next({ type: 'file-failed', sourcePath, index, total, error: outcome.error })
        return
      }
      succeeded.push(outcome)
      this.#events.next({
        type: 'file-completed',
        sourcePath,
        index,
        total,
        outputPath: outcome.outputPath,
        applied: outcome.applied
      })
    })

    return { succeeded, failed }
  }

  async #processOne(sourcePath: string): Promise<DocumentedFile | FailedFile> {
    const result = await this.#service.documentFile(sourcePath)
    if (!result.ok) {
      await this.#manifest.markProcessed(sourcePath, false)
      return { sourcePath, error: result.error.message }
    }

    const outputPath = this.#outputPathFor(sourcePath)
    try {
      await this.#writeMutex.runExclusive(async () => {
        await mkdir(dirname(outputPath), { recursive: true })
        await writeFile(outputPath, result.documented, 'utf8')
      })
    } catch (error) {
      throw new DocweaveError('WRITE_FAILED', `Cannot write ${outputPath}: ${errorMessage(error)}`, { cause: error })
    }
    await this.#manifest.markProcessed(sourcePath, true, result.original)

    return {
      sourcePath,
      outputPath,
      original: result.original,
      content: result.documented,
      applied: result.outcome.applied.length,
      timestamp: new Date().toISOString()
    }
  }
}
