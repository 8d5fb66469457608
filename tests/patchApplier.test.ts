import { describe, expect, test } from 'vitest'
import { applyDirectives, commentLineCount, normalizeAnchor } from '../src/application/patchApplier.js'
import { joinSource, splitSource } from '../src/application/sourceText.js'
import type { EditDirective } from '../src/core/domain.js'
import { MemoryLogger } from './helpers/memoryLogger.js'

const SOURCE = [
  'class Greeter',
  '  def initialize(name)',
  '    @name = name',
  '  end',
  '',
  '  def greet',
  '    "Hello, #{@name}"',
  '  end',
  'end',
  ''
].join('\n')

function directive(lineNumber: number, anchor: string, comment: string, indent = 0): EditDirective {
  return { lineNumber, anchor, indent, comment }
}

const classDoc = directive(1, 'class Greeter', '# A greeter')
const greetDoc = directive(6, 'def greet', '# Says hello\n# @return [String]', 2)

const EXPECTED = [
  '# A greeter',
  'class Greeter',
  '  def initialize(name)',
  '    @name = name',
  '  end',
  '',
  '  # Says hello',
  '  # @return [String]',
  '  def greet',
  '    "Hello, #{@name}"',
  '  end',
  'end',
  ''
].join('\n')

describe('applyDirectives', () => {
  test('result does not depend on submission order', () => {
    const ascending = applyDirectives(SOURCE, [classDoc, greetDoc])
    const descending = applyDirectives(SOURCE, [greetDoc, classDoc])

    expect(ascending.content).toBe(EXPECTED)
    expect(descending.content).toBe(EXPECTED)
    expect(ascending.applied.map((a) => a.match.index)).toEqual([5, 0])
  })

  test('adds exactly the applied comment lines', () => {
    const outcome = applyDirectives(SOURCE, [classDoc, greetDoc, directive(3, 'def nowhere', '# Lost')])
    const added = outcome.applied.reduce((sum, a) => sum + commentLineCount(a.directive.comment), 0)

    expect(added).toBe(3)
    expect(outcome.content.split('\n')).toHaveLength(SOURCE.split('\n').length + added)
  })

  test('is idempotent for identical inputs', () => {
    const directives = [greetDoc, classDoc]
    expect(applyDirectives(SOURCE, directives).content).toBe(applyDirectives(SOURCE, directives).content)
  })

  test('places drifted directives at the anchor and indents to the target line', () => {
    const outcome = applyDirectives(SOURCE, [directive(4, 'def greet', '# Says hello', 0)])

    expect(outcome.applied[0]?.match).toEqual({ index: 5, kind: 'nearby', offset: 2 })
    expect(outcome.applied[0]?.indentation).toBe('  ')
    expect(outcome.content.split('\n').slice(4, 8)).toEqual(['', '  # Says hello', '  def greet', '    "Hello, #{@name}"'])
  })

  test('drops duplicate anchors after the first placement', () => {
    const logger = new MemoryLogger()
    const outcome = applyDirectives(
      SOURCE,
      [directive(6, 'def greet', '# First'), directive(5, ' Def Greet ', '# Second')],
      logger
    )

    expect(outcome.applied.map((a) => a.directive.comment)).toEqual(['# First'])
    expect(outcome.skipped).toEqual([{ directive: directive(5, ' Def Greet ', '# Second'), reason: 'duplicate_anchor' }])
    expect(logger.messages('debug')).toContain('Skipping duplicate anchor: Def Greet')
  })

  test('gives each line at most one block', () => {
    const outcome = applyDirectives(SOURCE, [directive(6, 'def greet', '# First'), directive(6, 'greet', '# Second')])

    expect(outcome.applied).toHaveLength(1)
    expect(outcome.skipped.map((s) => s.reason)).toEqual(['anchor_not_found'])
  })

  test('skips malformed directives before resolution', () => {
    const logger = new MemoryLogger()
    const outcome = applyDirectives(
      SOURCE,
      [directive(0, 'class Greeter', '# x'), directive(1, '', '# x'), directive(1, 'class Greeter', '   '), directive(1.5, 'class Greeter', '# x')],
      logger
    )

    expect(outcome.applied).toEqual([])
    expect(outcome.skipped.map((s) => s.reason)).toEqual(['invalid', 'invalid', 'invalid', 'invalid'])
    expect(outcome.content).toBe(SOURCE)
    expect(logger.messages('warn')).toHaveLength(4)
  })

  test('returns the input unchanged when no anchor resolves', () => {
    const outcome = applyDirectives(SOURCE, [directive(3, 'def farewell', '# Bye')])

    expect(outcome.content).toBe(SOURCE)
    expect(outcome.skipped).toEqual([{ directive: directive(3, 'def farewell', '# Bye'), reason: 'anchor_not_found' }])
  })

  test('keeps blank comment lines empty', () => {
    const outcome = applyDirectives(SOURCE, [directive(6, 'def greet', '# Says hello\n\n# @return [String]')])

    expect(outcome.applied[0]?.commentLines).toEqual(['  # Says hello', '', '  # @return [String]'])
  })

  test('preserves CRLF line endings', () => {
    const crlf = 'class A\r\n  def run\r\n  end\r\nend\r\n'
    const outcome = applyDirectives(crlf, [directive(2, 'def run', '# Runs\n# @return [void]')])

    expect(outcome.content).toBe('class A\r\n  # Runs\r\n  # @return [void]\r\n  def run\r\n  end\r\nend\r\n')
  })

  test('places comments on the declared lines of a file mixing CRLF and LF', () => {
    const mixed = 'class A\r\n  def run\n  end\n  def stop\r\n  end\r\nend\r\n'
    const outcome = applyDirectives(mixed, [directive(4, 'def stop', '# Stops'), directive(2, 'def run', '# Runs')])

    expect(outcome.applied.map((insertion) => insertion.match.index)).toEqual([3, 1])
    expect(outcome.content).toBe('class A\r\n  # Runs\n  def run\n  end\n  # Stops\r\n  def stop\r\n  end\r\nend\r\n')
  })
})

describe('helpers', () => {
  test('splitSource keeps each line terminator', () => {
    const mixed = 'a\r\nb\nc'
    expect(splitSource(mixed)).toEqual({ lines: ['a', 'b', 'c'], endings: ['\r\n', '\n', ''] })
    expect(joinSource(splitSource(mixed))).toBe(mixed)
  })

  test('normalizeAnchor trims and lowercases', () => {
    expect(normalizeAnchor('  Def Greet ')).toBe('def greet')
  })

  test('commentLineCount ignores surrounding whitespace', () => {
    expect(commentLineCount('\n# a\r\n# b\n')).toBe(2)
  })
})
