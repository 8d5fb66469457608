import { join } from 'node:path'
import type { AppConfig } from '../config/appConfig.js'
import type { OutputStructure } from '../core/domain.js'
import type { DocProvider } from '../core/ports/docProvider.js'
import type { Logger } from '../core/ports/logger.js'
import { DocumentationRunner } from '../application/documentationRunner.js'
import { DocumentationService } from '../application/documentationService.js'
import { MANIFEST_FILE, resolveOutputPath, type OutputLayout } from '../application/outputLayout.js'
import { discoverSourceFiles } from '../infrastructure/filesystem/sourceDiscovery.js'
import { createDocProvider } from '../infrastructure/llm/createDocProvider.js'
import { ConsoleLogger } from '../infrastructure/logging/consoleLogger.js'
import { createManifestStore, type JsonManifestStore } from '../infrastructure/persistence/jsonManifestStore.js'

export type App = {
  config: AppConfig
  layout: OutputLayout
  provider: DocProvider
  manifest: JsonManifestStore
  service: DocumentationService
  runner: DocumentationRunner
  logger: Logger
}

export type CreateAppOptions = {
  config: AppConfig
  outputDir: string
  structure: OutputStructure
  /** Root used by the mirror structure; the input directory in directory mode */
  sourceRoot?: string
  incremental: boolean
  logger?: Logger
}

/**
 * Wire the pipeline for one run. The manifest is loaded before this resolves.
 */
export async function createApp(opts: CreateAppOptions): Promise<App> {
  const logger = opts.logger ?? new ConsoleLogger({ tag: 'docweave', level: opts.config.logLevel })
  const provider = createDocProvider(opts.config.provider)
  const layout: OutputLayout = { outputDir: opts.outputDir, structure: opts.structure, sourceRoot: opts.sourceRoot }
  const outputPathFor = (sourcePath: string) => resolveOutputPath(layout, sourcePath, logger)

  const manifest = await createManifestStore({
    manifestPath: join(opts.outputDir, MANIFEST_FILE),
    providerName: provider.name,
    incremental: opts.incremental,
    outputPathFor,
    logger: logger.child('Manifest')
  })

  const service = new DocumentationService({ provider, outputDir: opts.outputDir, logger: logger.child('Service') })
  const runner = new DocumentationRunner({
    service,
    manifest,
    outputPathFor,
    discover: discoverSourceFiles,
    outputDir: opts.outputDir,
    structure: opts.structure,
    workers: opts.config.workers,
    logger: logger.child('Runner')
  })

  return { config: opts.config, layout, provider, manifest, service, runner, logger }
}
