import { describe, expect, test } from 'vitest'
import { resolveAnchor } from '../src/application/anchorResolver.js'
import { MemoryLogger } from './helpers/memoryLogger.js'

/** 200 lines; `def foo` sits on line 11 (index 10). */
function fixtureLines(extra: Record<number, string> = {}): string[] {
  return Array.from({ length: 200 }, (_, idx) => {
    const lineNumber = idx + 1
    const override = extra[lineNumber]
    if (override !== undefined) return override
    if (lineNumber === 1) return 'class Widget'
    if (lineNumber === 11) return '  def foo(bar)'
    return `  value_${lineNumber} = ${lineNumber}`
  })
}

describe('resolveAnchor', () => {
  test('exact match on the declared line', () => {
    expect(resolveAnchor(fixtureLines(), 11, 'def foo', new Set())).toEqual({ index: 10, kind: 'exact', offset: 0 })
  })

  test('soft match on the declared line', () => {
    expect(resolveAnchor(fixtureLines(), 11, 'def foo(a, b)', new Set())).toEqual({ index: 10, kind: 'soft', offset: 0 })
  })

  test('finds drift within the nearby window', () => {
    const logger = new MemoryLogger()

    expect(resolveAnchor(fixtureLines(), 8, 'def foo', new Set(), logger)).toEqual({ index: 10, kind: 'nearby', offset: 3 })
    expect(logger.messages('info')).toEqual(['Found anchor at line 11 (expected 8, offset +3)'])
  })

  test('falls back to the whole file for large drift', () => {
    const logger = new MemoryLogger()

    expect(resolveAnchor(fixtureLines(), 61, 'def foo', new Set(), logger)).toEqual({ index: 10, kind: 'distant', offset: -50 })
    expect(logger.messages('warn')).toEqual(['Found anchor at line 11 (expected 61, offset -50)'])
  })

  test('skips claimed lines during the search', () => {
    const lines = fixtureLines({ 13: '  def foo' })

    expect(resolveAnchor(lines, 8, 'def foo', new Set([10]))).toEqual({ index: 12, kind: 'nearby', offset: 5 })
  })

  test('returns null when the declared line is already claimed', () => {
    const logger = new MemoryLogger()

    expect(resolveAnchor(fixtureLines(), 11, 'def foo', new Set([10]), logger)).toBeNull()
    expect(logger.messages('debug')).toEqual(['Line 11 already has a comment, skipping'])
  })

  test('rejects out-of-bounds line numbers', () => {
    const logger = new MemoryLogger()

    expect(resolveAnchor(fixtureLines(), 0, 'def foo', new Set(), logger)).toBeNull()
    expect(resolveAnchor(fixtureLines(), 201, 'def foo', new Set(), logger)).toBeNull()
    expect(logger.messages('warn')).toEqual([
      'Line number 0 out of bounds (file has 200 lines)',
      'Line number 201 out of bounds (file has 200 lines)'
    ])
  })

  test('returns null when the anchor is nowhere in the file', () => {
    const logger = new MemoryLogger()

    expect(resolveAnchor(fixtureLines(), 8, 'def missing', new Set(), logger)).toBeNull()
    expect(logger.messages('warn')).toEqual(['Could not find anchor: def missing (expected line 8)'])
  })
})
