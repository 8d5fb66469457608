import { stat } from 'node:fs/promises'
import { resolve } from 'node:path'
import yargs from 'yargs'
import { createApp } from '../../app/createApp.js'
import { loadAppConfig, PROVIDERS } from '../../config/appConfig.js'
import type { BatchStats, OutputStructure } from '../../core/domain.js'
import type { Logger } from '../../core/ports/logger.js'
import { DEFAULT_EXCLUDES, DEFAULT_SOURCE_PATTERN } from '../../infrastructure/filesystem/sourceDiscovery.js'
import type { IO } from './io.js'

const OUTPUT_STRUCTURES = ['flat', 'mirror'] as const satisfies readonly OutputStructure[]

/**
 * CLI adapter: parse flags → build the app → run one batch or one file.
 *
 * Usage:
 * - docweave <input> [--output <dir>] [--output-structure flat|mirror] [--yard]
 * - docweave --file <path> [--diff]
 *
 * Exit code is 1 for usage and configuration errors and for a failed single
 * file. A batch with failed files still exits 0; they are retried next run.
 */
export async function runCli(opts: {
  argv: string[]
  env: Record<string, string | undefined>
  cwd: string
  io: IO
  logger?: Logger
}): Promise<number> {
  const { argv, env, cwd, io } = opts

  const parser = yargs(argv)
    .scriptName('docweave')
    .usage('$0 <input> [options]\n$0 --file <path> [options]')
    .option('file', { type: 'string', describe: 'Document a single file' })
    .option('provider', { type: 'string', choices: PROVIDERS, describe: 'Documentation provider' })
    .option('output', { type: 'string', default: 'output/latest', describe: 'Output directory' })
    .option('output-structure', { type: 'string', choices: OUTPUT_STRUCTURES, default: 'flat' })
    .option('pattern', { type: 'string', default: DEFAULT_SOURCE_PATTERN, describe: 'Glob for source files' })
    .option('exclude', { type: 'string', array: true, default: [...DEFAULT_EXCLUDES], describe: 'Globs to skip' })
    .option('workers', { type: 'number', describe: 'Parallel workers' })
    .option('yard', { type: 'boolean', default: false, describe: 'Also write comment digests' })
    .option('force-rebuild', { type: 'boolean', default: false, describe: 'Ignore the manifest' })
    .option('incremental', { type: 'boolean', default: true, describe: 'Skip unchanged files (--no-incremental to disable)' })
    .option('diff', { type: 'boolean', default: false, describe: 'With --file, print a diff instead of writing' })
    .strictOptions()
    .fail((message, error) => {
      throw error ?? new Error(message)
    })
    .help()

  try {
    const args = await parser.parseAsync()

    const positional = args._[0]
    const input = positional === undefined ? undefined : String(positional)
    const file = args.file

    if (!input && !file) throw new Error('Provide an input directory or --file <path>')
    if (input && file) throw new Error('Use either <input> or --file, not both')
    if (args.diff && !file) throw new Error('--diff requires --file')

    const config = loadAppConfig(env, {
      provider: PROVIDERS.find((p) => p === args.provider),
      workers: args.workers
    })
    for (const warning of config.warnings) io.stderr(`Warning: ${warning}\n`)

    const outputDir = resolve(cwd, args.output)
    const structure = OUTPUT_STRUCTURES.find((s) => s === args['output-structure']) ?? 'flat'
    const incremental = args.incremental && !args['force-rebuild']

    if (file) {
      const sourcePath = resolve(cwd, file)
      if (!(await isFile(sourcePath))) throw new Error(`File not found: ${sourcePath}`)

      const app = await createApp({ config, outputDir, structure, incremental, logger: opts.logger })
      const result = await app.runner.runFile(sourcePath, { diff: args.diff })
      if (!result.ok) {
        io.stderr(`Failed to document ${sourcePath}: ${result.error}\n`)
        return 1
      }
      if (result.diff !== null) {
        io.stdout(result.diff)
      } else {
        io.stdout(`Documented ${sourcePath} -> ${result.outputPath} (${result.applied} comments)\n`)
      }
      return 0
    }

    const inputDir = resolve(cwd, input ?? '.')
    if (!(await isDirectory(inputDir))) throw new Error(`Input directory not found: ${inputDir}`)

    const app = await createApp({ config, outputDir, structure, sourceRoot: inputDir, incremental, logger: opts.logger })
    const stats = await app.runner.runDirectory(inputDir, {
      pattern: args.pattern,
      exclude: args.exclude.map(String),
      digest: args.yard
    })
    printSummary(io, stats, outputDir)
    return 0
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

function printSummary(io: IO, stats: BatchStats, outputDir: string): void {
  const rule = '='.repeat(60)
  io.stdout(`\n${rule}\nDocumentation run complete\n${rule}\n`)
  io.stdout(`${'Provider:'.padEnd(12)}${stats.provider}\n`)
  io.stdout(`${'Processed:'.padEnd(12)}${stats.processed}/${stats.total}${stats.skipped > 0 ? ` (${stats.skipped} unchanged)` : ''}\n`)
  io.stdout(`${'Failed:'.padEnd(12)}${stats.failed}\n`)
  io.stdout(`${'Time:'.padEnd(12)}${(stats.elapsedMs / 1000).toFixed(1)}s\n`)
  io.stdout(`${'Output:'.padEnd(12)}${outputDir}\n`)

  if (stats.failedFiles.length > 0) {
    io.stdout('\nFailed files:\n')
    for (const path of stats.failedFiles) io.stdout(`  - ${path}\n`)
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}
