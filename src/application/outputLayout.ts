import { basename, isAbsolute, join, relative, resolve } from 'node:path'
import type { OutputStructure } from '../core/domain.js'
import type { Logger } from '../core/ports/logger.js'

export const DOCUMENTED_DIR = 'documented'
export const DIGEST_DIR = 'yard'
export const MANIFEST_FILE = 'manifest.json'
export const METADATA_FILE = 'metadata.json'

export type OutputLayout = {
  outputDir: string
  structure: OutputStructure
  /** Required for the mirror structure */
  sourceRoot?: string
}

/**
 * Where the documented copy of `sourcePath` is written.
 *
 * `flat` puts every file directly under `<output>/documented/`; `mirror`
 * reproduces the path relative to the source root and falls back to flat for
 * files outside it.
 */
export function resolveOutputPath(layout: OutputLayout, sourcePath: string, logger?: Logger): string {
  const documentedDir = join(layout.outputDir, DOCUMENTED_DIR)

  if (layout.structure === 'mirror' && layout.sourceRoot) {
    const rel = relative(resolve(layout.sourceRoot), resolve(sourcePath))
    if (rel && !rel.startsWith('..') && !isAbsolute(rel)) {
      return join(documentedDir, rel)
    }
    logger?.warn(`File ${sourcePath} not under source root ${layout.sourceRoot}, using flat structure`)
  }

  return join(documentedDir, basename(sourcePath))
}

export function failedResponsePath(outputDir: string, sourcePath: string): string {
  const name = basename(sourcePath)
  const dot = name.lastIndexOf('.')
  const stem = dot > 0 ? name.slice(0, dot) : name
  return join(outputDir, `${stem}_failed_response.txt`)
}
