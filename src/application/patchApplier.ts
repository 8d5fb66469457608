import type {
  EditDirective,
  PatchOutcome,
  ResolvedInsertion,
  SkippedDirective
} from '../core/domain.js'
import type { Logger } from '../core/ports/logger.js'
import { resolveAnchor } from './anchorResolver.js'
import { endingBefore, joinSource, leadingWhitespace, splitSource, type SourceLines } from './sourceText.js'

export function normalizeAnchor(anchor: string): string {
  return anchor.trim().toLowerCase()
}

export function commentLineCount(comment: string): number {
  return comment.trim().split(/\r?\n/).length
}

function isWellFormed(directive: EditDirective): boolean {
  return (
    Number.isInteger(directive.lineNumber) &&
    directive.lineNumber >= 1 &&
    directive.anchor.trim().length > 0 &&
    directive.comment.trim().length > 0
  )
}

function indentComment(comment: string, indentation: string): string[] {
  return comment
    .trim()
    .split(/\r?\n/)
    .map((line) => (line.trim() ? `${indentation}${line}` : ''))
}

/**
 * Insert every placeable directive's comment block into `content`.
 *
 * Directives are handled in descending declared line order and all of them
 * are resolved against the original, unshifted lines; the blocks are spliced
 * in afterwards in a single pass. Each original line takes at most one block
 * and each normalized anchor is placed at most once. Pure: the same inputs
 * always give the same output.
 */
export function applyDirectives(
  content: string,
  directives: readonly EditDirective[],
  logger?: Logger
): PatchOutcome {
  const source = splitSource(content)
  const lines = source.lines

  const claimed = new Set<number>()
  const placedAnchors = new Set<string>()
  const applied: ResolvedInsertion[] = []
  const skipped: SkippedDirective[] = []

  const ordered = [...directives].sort((a, b) => b.lineNumber - a.lineNumber)

  for (const directive of ordered) {
    if (!isWellFormed(directive)) {
      logger?.warn('Skipping invalid entry: missing or out-of-range fields')
      skipped.push({ directive, reason: 'invalid' })
      continue
    }

    const anchor = directive.anchor.trim()
    const normalized = normalizeAnchor(anchor)
    if (placedAnchors.has(normalized)) {
      logger?.debug(`Skipping duplicate anchor: ${anchor.slice(0, 40)}`)
      skipped.push({ directive, reason: 'duplicate_anchor' })
      continue
    }

    const match = resolveAnchor(lines, directive.lineNumber, anchor, claimed, logger)
    if (!match) {
      skipped.push({ directive, reason: 'anchor_not_found' })
      continue
    }

    const indentation = leadingWhitespace(lines[match.index] ?? '')
    applied.push({
      directive,
      match,
      indentation,
      commentLines: indentComment(directive.comment, indentation)
    })
    claimed.add(match.index)
    placedAnchors.add(normalized)
    logger?.debug(`Inserted comment at line ${match.index + 1} for anchor: ${anchor.slice(0, 30)}`)
  }

  if (applied.length === 0) {
    return { content, applied, skipped }
  }

  const blocks = new Map(applied.map((insertion) => [insertion.match.index, insertion.commentLines]))
  const output: SourceLines = { lines: [], endings: [] }
  lines.forEach((line, idx) => {
    const block = blocks.get(idx)
    if (block) {
      const ending = endingBefore(source, idx)
      for (const commentLine of block) {
        output.lines.push(commentLine)
        output.endings.push(ending)
      }
    }
    output.lines.push(line)
    output.endings.push(source.endings[idx] ?? '')
  })

  return { content: joinSource(output), applied, skipped }
}
