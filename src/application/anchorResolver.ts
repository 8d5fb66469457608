import type { AnchorMatch } from '../core/domain.js'
import type { Logger } from '../core/ports/logger.js'
import { compileAnchor, type AnchorPattern } from './anchorMatchers.js'

/** Lines on each side of the expected line that count as a near miss */
export const NEARBY_WINDOW = 5

function searchOrder(expected: number, lineCount: number): { nearby: number[]; rest: number[] } {
  const nearby: number[] = []
  for (let offset = -NEARBY_WINDOW; offset <= NEARBY_WINDOW; offset++) {
    const idx = expected + offset
    if (offset !== 0 && idx >= 0 && idx < lineCount) nearby.push(idx)
  }

  const skip = new Set([expected, ...nearby])
  const rest: number[] = []
  for (let idx = 0; idx < lineCount; idx++) {
    if (!skip.has(idx)) rest.push(idx)
  }
  return { nearby, rest }
}

function firstMatch(
  lines: readonly string[],
  candidates: readonly number[],
  pattern: AnchorPattern,
  claimed: ReadonlySet<number>
): number | null {
  for (const idx of candidates) {
    if (claimed.has(idx)) continue
    const line = lines[idx]
    if (line !== undefined && pattern.test(line)) return idx
  }
  return null
}

/**
 * Find the 0-indexed line a directive should be inserted before.
 *
 * Tries the declared line first (literal containment, then soft match), then
 * the surrounding window, then the whole file. Anchors are unique within a
 * file, so a match anywhere is accepted. Claimed lines are never returned.
 */
export function resolveAnchor(
  lines: readonly string[],
  expectedLineNumber: number,
  anchor: string,
  claimed: ReadonlySet<number>,
  logger?: Logger
): AnchorMatch | null {
  const expected = expectedLineNumber - 1

  if (!Number.isInteger(expected) || expected < 0 || expected >= lines.length) {
    logger?.warn(`Line number ${expectedLineNumber} out of bounds (file has ${lines.length} lines)`)
    return null
  }

  if (claimed.has(expected)) {
    logger?.debug(`Line ${expectedLineNumber} already has a comment, skipping`)
    return null
  }

  const expectedLine = lines[expected] ?? ''
  if (expectedLine.includes(anchor)) {
    return { index: expected, kind: 'exact', offset: 0 }
  }

  const pattern = compileAnchor(anchor)
  if (pattern.test(expectedLine)) {
    logger?.debug(`Soft match (${pattern.shape.kind}) at line ${expectedLineNumber} for anchor: ${anchor.slice(0, 30)}`)
    return { index: expected, kind: 'soft', offset: 0 }
  }

  const { nearby, rest } = searchOrder(expected, lines.length)

  const near = firstMatch(lines, nearby, pattern, claimed)
  if (near !== null) {
    const offset = near - expected
    logger?.info(`Found anchor at line ${near + 1} (expected ${expectedLineNumber}, offset ${formatOffset(offset)})`)
    return { index: near, kind: 'nearby', offset }
  }

  const distant = firstMatch(lines, rest, pattern, claimed)
  if (distant !== null) {
    const offset = distant - expected
    logger?.warn(`Found anchor at line ${distant + 1} (expected ${expectedLineNumber}, offset ${formatOffset(offset)})`)
    return { index: distant, kind: 'distant', offset }
  }

  logger?.warn(`Could not find anchor: ${anchor.slice(0, 50)} (expected line ${expectedLineNumber})`)
  return null
}

function formatOffset(offset: number): string {
  return offset > 0 ? `+${offset}` : String(offset)
}
