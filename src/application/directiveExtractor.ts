import { toEditDirective, type EditDirective } from '../core/domain.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../core/ports/logger.js'
import { sanitizeJsonEscapes } from './responseSanitizer.js'

export type ExtractionStrategy =
  | 'json code block'
  | 'greedy array match'
  | 'non-greedy array match'
  | 'raw response'

export type ExtractionAttempt = {
  strategy: ExtractionStrategy
  error: string
}

export type ExtractionResult =
  | { ok: true; strategy: ExtractionStrategy; directives: EditDirective[] }
  | { ok: false; attempts: ExtractionAttempt[] }

const JSON_FENCE = /```json\s*([\s\S]*?)```/
const GREEDY_ARRAY = /\[\s*\{[\s\S]*\}\s*\]/
const NARROW_ARRAY = /\[\s*\{[\s\S]*?\}\s*\]/

function collectCandidates(response: string): Array<{ strategy: ExtractionStrategy; text: string }> {
  const candidates: Array<{ strategy: ExtractionStrategy; text: string }> = []

  const fenced = JSON_FENCE.exec(response)?.[1]
  if (fenced !== undefined) {
    candidates.push({ strategy: 'json code block', text: fenced.trim() })
  }

  const greedy = GREEDY_ARRAY.exec(response)?.[0]
  if (greedy !== undefined) {
    candidates.push({ strategy: 'greedy array match', text: greedy })
  }

  const narrow = NARROW_ARRAY.exec(response)?.[0]
  if (narrow !== undefined && !candidates.some((c) => c.text === narrow)) {
    candidates.push({ strategy: 'non-greedy array match', text: narrow })
  }

  const raw = response.trim()
  if (raw) {
    candidates.push({ strategy: 'raw response', text: raw })
  }

  return candidates
}

/**
 * Locate and parse the directive array inside a free-form provider response.
 *
 * Strategies run in a fixed order and the first candidate that parses to an
 * array wins. An empty array is a success ("nothing to document").
 */
export function extractDirectives(response: string, logger?: Logger): ExtractionResult {
  const attempts: ExtractionAttempt[] = []

  for (const { strategy, text } of collectCandidates(response)) {
    let parsed: unknown
    try {
      parsed = JSON.parse(sanitizeJsonEscapes(text))
    } catch (error) {
      logger?.debug(`Strategy '${strategy}' failed to parse: ${errorMessage(error)}`)
      attempts.push({ strategy, error: errorMessage(error) })
      continue
    }

    if (!Array.isArray(parsed)) {
      logger?.debug(`Strategy '${strategy}' produced non-array JSON, skipping`)
      attempts.push({ strategy, error: 'parsed value is not an array' })
      continue
    }

    logger?.debug(`Strategy '${strategy}' extracted ${parsed.length} entries`)
    return { ok: true, strategy, directives: parsed.map((item: unknown) => toEditDirective(item)) }
  }

  return { ok: false, attempts }
}
