/**
 * Machine-readable failure for one file's trip through the pipeline.
 *
 * These are always file-scoped: the coordinator records them in the
 * manifest and moves on to the next file.
 */
export class DocweaveError extends Error {
  readonly code:
    | 'EXTRACTION_FAILED'
    | 'PROVIDER_FAILED'
    | 'WRITE_FAILED'
    | 'INVALID_INPUT'

  constructor(
    code: DocweaveError['code'],
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'DocweaveError'
    this.code = code
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
