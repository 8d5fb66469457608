import { z } from 'zod'

// ============================================================================
// Edit Directives (wire format produced by the provider)
// ============================================================================

const LooseIntSchema = z
  .preprocess(
    (value) => (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value) ? Number(value) : value),
    z.number().int()
  )
  .catch(0)

/**
 * One element of the provider's JSON array. Never trusted: wrong or missing
 * fields collapse to empty values so the applier drops the entry instead of
 * failing the file.
 */
export const WireDirectiveSchema = z
  .object({
    line_number: LooseIntSchema,
    anchor: z.string().catch(''),
    indent: LooseIntSchema,
    comment: z.string().catch('')
  })
  .transform((wire) => ({
    lineNumber: wire.line_number,
    anchor: wire.anchor,
    indent: wire.indent,
    comment: wire.comment
  }))

export type EditDirective = z.output<typeof WireDirectiveSchema>

export const EMPTY_DIRECTIVE: EditDirective = Object.freeze({
  lineNumber: 0,
  anchor: '',
  indent: 0,
  comment: ''
})

export function toEditDirective(value: unknown): EditDirective {
  const parsed = WireDirectiveSchema.safeParse(value)
  return parsed.success ? parsed.data : { ...EMPTY_DIRECTIVE }
}

// ============================================================================
// Resolution & Application
// ============================================================================

/** How the resolver found the insertion point. */
export type MatchKind = 'exact' | 'soft' | 'nearby' | 'distant'

export type AnchorMatch = {
  /** 0-indexed line in the unmutated buffer */
  index: number
  kind: MatchKind
  /** index - expected index */
  offset: number
}

export type ResolvedInsertion = {
  directive: EditDirective
  match: AnchorMatch
  indentation: string
  commentLines: string[]
}

export type SkipReason = 'invalid' | 'duplicate_anchor' | 'anchor_not_found'

export type SkippedDirective = {
  directive: EditDirective
  reason: SkipReason
}

export type PatchOutcome = {
  content: string
  applied: ResolvedInsertion[]
  skipped: SkippedDirective[]
}

// ============================================================================
// Manifest (persisted structure)
// ============================================================================

export const ManifestEntrySchema = z.object({
  timestamp: z.string(),
  provider: z.string(),
  content_hash: z.string(),
  file_name: z.string()
})

export const ProcessingManifestSchema = z.object({
  processed_files: z.record(z.string(), ManifestEntrySchema).default({}),
  failed_files: z.array(z.string()).default([]),
  timestamp: z.string().optional()
})

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>
export type ProcessingManifest = z.infer<typeof ProcessingManifestSchema>

export function emptyManifest(): ProcessingManifest {
  return { processed_files: {}, failed_files: [], timestamp: new Date().toISOString() }
}

// ============================================================================
// Batch Results
// ============================================================================

export type OutputStructure = 'flat' | 'mirror'

export type BatchStats = {
  processed: number
  failed: number
  skipped: number
  total: number
  elapsedMs: number
  provider: string
  failedFiles: string[]
}
