/**
 * Application Layer - Documentation Service
 *
 * One file's trip through the pipeline:
 * read → prompt → provider → extract directives → apply → documented content.
 *
 * Nothing here writes the documented output or touches the manifest; the
 * coordinator owns those side effects. The only write is the diagnostic dump
 * of a response that could not be parsed.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { basename } from 'node:path'
import type { PatchOutcome } from '../core/domain.js'
import { DocweaveError, errorMessage } from '../core/errors.js'
import type { DocProvider } from '../core/ports/docProvider.js'
import type { Logger } from '../core/ports/logger.js'
import { extractDirectives, type ExtractionStrategy } from './directiveExtractor.js'
import { failedResponsePath } from './outputLayout.js'
import { applyDirectives } from './patchApplier.js'
import { buildDocumentationPrompt } from './promptBuilder.js'

export type DocumentResult =
  | {
      ok: true
      sourcePath: string
      original: string
      documented: string
      strategy: ExtractionStrategy
      outcome: PatchOutcome
    }
  | {
      ok: false
      sourcePath: string
      error: DocweaveError
    }

export class DocumentationService {
  readonly #provider: DocProvider
  readonly #outputDir: string
  readonly #logger: Logger

  constructor(opts: { provider: DocProvider; outputDir: string; logger: Logger }) {
    this.#provider = opts.provider
    this.#outputDir = opts.outputDir
    this.#logger = opts.logger
  }

  get providerName(): string {
    return this.#provider.name
  }

  get providerModel(): string {
    return this.#provider.model
  }

  async documentFile(sourcePath: string): Promise<DocumentResult> {
    const fileName = basename(sourcePath)

    let original: string
    try {
      original = await readFile(sourcePath, 'utf8')
    } catch (error) {
      return this.#fail(sourcePath, new DocweaveError('INVALID_INPUT', `Cannot read ${sourcePath}: ${errorMessage(error)}`, { cause: error }))
    }
    this.#logger.info(`${fileName}: ${original.split('\n').length} lines, ${original.length} characters`)

    const { systemPrompt, userPrompt } = buildDocumentationPrompt(fileName, original)

    let response: string
    try {
      this.#logger.info(`${fileName}: requesting documentation from ${this.#provider.name}`)
      response = await this.#provider.generate(userPrompt, systemPrompt)
    } catch (error) {
      return this.#fail(sourcePath, new DocweaveError('PROVIDER_FAILED', `Provider ${this.#provider.name} failed for ${fileName}: ${errorMessage(error)}`, { cause: error }))
    }

    const extraction = extractDirectives(response, this.#logger)
    if (!extraction.ok) {
      const dumpPath = await this.#saveFailedResponse(sourcePath, response)
      const tried = extraction.attempts.map((a) => `${a.strategy} (${a.error})`).join('; ') || 'empty response'
      return this.#fail(
        sourcePath,
        new DocweaveError('EXTRACTION_FAILED', `No directive list in response for ${fileName}: ${tried}${dumpPath ? `; raw response saved to ${dumpPath}` : ''}`)
      )
    }

    if (extraction.directives.length === 0) {
      this.#logger.info(`${fileName}: nothing to document`)
      return {
        ok: true,
        sourcePath,
        original,
        documented: original,
        strategy: extraction.strategy,
        outcome: { content: original, applied: [], skipped: [] }
      }
    }

    const outcome = applyDirectives(original, extraction.directives, this.#logger.child(fileName))
    this.#logger.info(
      `${fileName}: applied ${outcome.applied.length} of ${extraction.directives.length} directives (${outcome.skipped.length} skipped)`
    )

    return {
      ok: true,
      sourcePath,
      original,
      documented: outcome.content,
      strategy: extraction.strategy,
      outcome
    }
  }

  #fail(sourcePath: string, error: DocweaveError): DocumentResult {
    this.#logger.error(error.message)
    return { ok: false, sourcePath, error }
  }

  async #saveFailedResponse(sourcePath: string, response: string): Promise<string | null> {
    const dumpPath = failedResponsePath(this.#outputDir, sourcePath)
    const body = [
      `Failed to parse JSON for: ${basename(sourcePath)}`,
      `Response length: ${response.length} characters`,
      '='.repeat(80),
      response
    ].join('\n')

    try {
      await mkdir(this.#outputDir, { recursive: true })
      await writeFile(dumpPath, body, 'utf8')
      return dumpPath
    } catch (error) {
      this.#logger.error(`Could not save failed response for ${sourcePath}: ${errorMessage(error)}`)
      return null
    }
  }
}
