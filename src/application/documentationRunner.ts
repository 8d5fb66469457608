/**
 * Application Layer - Documentation Runner
 *
 * Directory mode: discover → incremental filter → coordinator → metadata → digest.
 * Single-file mode: one file through the same coordinator, or a diff preview
 * that writes nothing.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { createTwoFilesPatch } from 'diff'
import { nanoid } from 'nanoid'
import type { Observable } from 'rxjs'
import type { BatchStats, OutputStructure } from '../core/domain.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../core/ports/logger.js'
import type { ManifestStore } from '../core/ports/manifestStore.js'
import { writeCommentDigest } from './commentDigest.js'
import type { DocumentationService } from './documentationService.js'
import { METADATA_FILE } from './outputLayout.js'
import { WorkerCoordinator, type CoordinatorResult, type FileProgressEvent } from './workerCoordinator.js'

export type SourceDiscovery = (
  inputDir: string,
  opts: { pattern?: string; exclude?: readonly string[] }
) => Promise<string[]>

export type RunDirectoryOptions = {
  pattern?: string
  exclude?: readonly string[]
  /** Also write `<output>/yard/<name>.yard` comment digests */
  digest?: boolean
}

export type SingleFileResult =
  | { ok: true; sourcePath: string; outputPath: string | null; applied: number; diff: string | null }
  | { ok: false; sourcePath: string; error: string }

export type RunMetadata = {
  runId: string
  timestamp: string
  provider: string
  model: string
  input: string
  output_structure: OutputStructure
  stats: { processed: number; failed: number; skipped: number; total: number; elapsed_ms: number }
  files: Array<{ source: string; output: string; timestamp: string }>
  failed_files: string[]
}

export class DocumentationRunner {
  readonly #service: DocumentationService
  readonly #manifest: ManifestStore
  readonly #coordinator: WorkerCoordinator
  readonly #discover: SourceDiscovery
  readonly #outputDir: string
  readonly #structure: OutputStructure
  readonly #logger: Logger

  constructor(opts: {
    service: DocumentationService
    manifest: ManifestStore
    outputPathFor: (sourcePath: string) => string
    discover: SourceDiscovery
    outputDir: string
    structure: OutputStructure
    workers: number
    logger: Logger
  }) {
    this.#service = opts.service
    this.#manifest = opts.manifest
    this.#discover = opts.discover
    this.#outputDir = opts.outputDir
    this.#structure = opts.structure
    this.#logger = opts.logger
    this.#coordinator = new WorkerCoordinator({
      service: opts.service,
      manifest: opts.manifest,
      outputPathFor: opts.outputPathFor,
      workers: opts.workers,
      logger: opts.logger.child('Coordinator')
    })
  }

  get events$(): Observable<FileProgressEvent> {
    return this.#coordinator.events$
  }

  async runDirectory(inputDir: string, opts: RunDirectoryOptions = {}): Promise<BatchStats> {
    const startedAt = Date.now()
    const provider = this.#service.providerName

    const files = await this.#discover(inputDir, { pattern: opts.pattern, exclude: opts.exclude })
    if (files.length === 0) {
      this.#logger.warn(`No source files found in ${inputDir}`)
      return { processed: 0, failed: 0, skipped: 0, total: 0, elapsedMs: Date.now() - startedAt, provider, failedFiles: [] }
    }

    const pending: string[] = []
    let skipped = 0
    for (const file of files) {
      if (await this.#manifest.isProcessed(file)) {
        skipped += 1
      } else {
        pending.push(file)
      }
    }
    this.#logger.info(`Found ${files.length} files: ${pending.length} to process, ${skipped} unchanged`)

    const result = await this.#runTracked(pending)
    const stats: BatchStats = {
      processed: result.succeeded.length + skipped,
      failed: result.failed.length,
      skipped,
      total: files.length,
      elapsedMs: Date.now() - startedAt,
      provider,
      failedFiles: result.failed.map((f) => f.sourcePath)
    }

    await this.#writeMetadata(inputDir, stats, result)

    if (opts.digest && result.succeeded.length > 0) {
      await writeCommentDigest(this.#outputDir, result.succeeded, this.#logger)
    }

    return stats
  }

  async runFile(sourcePath: string, opts: { diff?: boolean } = {}): Promise<SingleFileResult> {
    if (opts.diff) {
      const result = await this.#service.documentFile(sourcePath)
      if (!result.ok) return { ok: false, sourcePath, error: result.error.message }
      const diff = createTwoFilesPatch(sourcePath, sourcePath, result.original, result.documented, 'original', 'documented')
      return { ok: true, sourcePath, outputPath: null, applied: result.outcome.applied.length, diff }
    }

    const result = await this.#runTracked([sourcePath])
    const documented = result.succeeded[0]
    if (documented) {
      return { ok: true, sourcePath, outputPath: documented.outputPath, applied: documented.applied, diff: null }
    }
    return { ok: false, sourcePath, error: result.failed[0]?.error ?? 'documentation failed' }
  }

  async #runTracked(files: readonly string[]): Promise<CoordinatorResult> {
    const subscription = this.#coordinator.events$.subscribe((event) => this.#logProgress(event))
    try {
      return await this.#coordinator.run(files)
    } finally {
      subscription.unsubscribe()
    }
  }

  #logProgress(event: FileProgressEvent): void {
    const prefix = `[${event.index}/${event.total}]`
    switch (event.type) {
      case 'file-started':
        this.#logger.info(`${prefix} Processing ${event.sourcePath}`)
        return
      case 'file-completed':
        this.#logger.info(`${prefix} Documented ${event.sourcePath} -> ${event.outputPath} (${event.applied} comments)`)
        return
      case 'file-failed':
        this.#logger.warn(`${prefix} Failed ${event.sourcePath}: ${event.error}`)
        return
    }
  }

  async #writeMetadata(inputDir: string, stats: BatchStats, result: CoordinatorResult): Promise<void> {
    const metadata: RunMetadata = {
      runId: nanoid(),
      timestamp: new Date().toISOString(),
      provider: stats.provider,
      model: this.#service.providerModel,
      input: inputDir,
      output_structure: this.#structure,
      stats: {
        processed: stats.processed,
        failed: stats.failed,
        skipped: stats.skipped,
        total: stats.total,
        elapsed_ms: stats.elapsedMs
      },
      files: result.succeeded.map((f) => ({ source: f.sourcePath, output: f.outputPath, timestamp: f.timestamp })),
      failed_files: stats.failedFiles
    }

    const metadataPath = join(this.#outputDir, METADATA_FILE)
    try {
      await mkdir(this.#outputDir, { recursive: true })
      await writeFile(metadataPath, `${JSON.stringify(metadata, null, 2)}\n`, 'utf8')
    } catch (error) {
      this.#logger.error(`Failed to write ${metadataPath}: ${errorMessage(error)}`)
    }
  }
}
