import { mkdir, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../core/ports/logger.js'
import { DIGEST_DIR } from './outputLayout.js'

/** Keep only the comment lines of a documented file. */
export function extractCommentLines(content: string): string[] {
  return content.split(/\r?\n/).filter((line) => line.trim().startsWith('#'))
}

/**
 * Write `<output>/yard/<name>.yard` for each documented file.
 * Returns the paths written; a file that cannot be written is logged and skipped.
 */
export async function writeCommentDigest(
  outputDir: string,
  files: ReadonlyArray<{ sourcePath: string; content: string }>,
  logger: Logger
): Promise<string[]> {
  const digestDir = join(outputDir, DIGEST_DIR)
  await mkdir(digestDir, { recursive: true })

  const written: string[] = []
  for (const file of files) {
    const name = basename(file.sourcePath)
    const digestPath = join(digestDir, `${name}.yard`)
    try {
      await writeFile(digestPath, extractCommentLines(file.content).join('\n'), 'utf8')
      written.push(digestPath)
    } catch (error) {
      logger.warn(`Could not write comment digest for ${name}: ${errorMessage(error)}`)
    }
  }

  logger.info(`Wrote ${written.length} comment digest file(s) to ${digestDir}`)
  return written
}
