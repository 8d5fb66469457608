import { join } from 'node:path'
import { glob } from 'glob'

export const DEFAULT_SOURCE_PATTERN = '**/*.rb'
export const DEFAULT_EXCLUDES: readonly string[] = ['**/critranks/**']

/**
 * Source files under `inputDir` matching `pattern`, minus anything matching one of
 * `exclude`. Paths are joined onto `inputDir` and sorted.
 */
export async function discoverSourceFiles(
  inputDir: string,
  opts: { pattern?: string; exclude?: readonly string[] } = {}
): Promise<string[]> {
  const matches = await glob(opts.pattern ?? DEFAULT_SOURCE_PATTERN, {
    cwd: inputDir,
    ignore: [...(opts.exclude ?? DEFAULT_EXCLUDES)],
    nodir: true,
    posix: true
  })
  return matches.sort().map((rel) => join(inputDir, rel))
}
