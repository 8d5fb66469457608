import { describe, expect, test } from 'vitest'
import { sanitizeJsonEscapes } from '../src/application/responseSanitizer.js'

describe('sanitizeJsonEscapes', () => {
  test('doubles the backslash of a regex escape inside a string', () => {
    const raw = '{"comment": "# Matches \\d+ digits"}'
    const fixed = sanitizeJsonEscapes(raw)

    expect(fixed).toBe('{"comment": "# Matches \\\\d+ digits"}')
    expect(JSON.parse(fixed)).toEqual({ comment: '# Matches \\d+ digits' })
  })

  test('leaves valid escapes untouched', () => {
    const raw = '"line\\nnext\\t\\"quoted\\" \\\\ \\/ \\u00e9"'
    expect(sanitizeJsonEscapes(raw)).toBe(raw)
  })

  test('repairs a unicode escape without four hex digits', () => {
    const fixed = sanitizeJsonEscapes('"\\uZZ"')
    expect(fixed).toBe('"\\\\uZZ"')
    expect(JSON.parse(fixed)).toBe('\\uZZ')
  })

  test('repairs Windows paths', () => {
    const fixed = sanitizeJsonEscapes('"C:\\Users\\me"')
    expect(fixed).toBe('"C:\\\\Users\\\\me"')
    expect(JSON.parse(fixed)).toBe('C:\\Users\\me')
  })

  test('keeps a trailing lone backslash', () => {
    expect(sanitizeJsonEscapes('abc\\')).toBe('abc\\')
  })

  test('returns text without backslashes unchanged', () => {
    expect(sanitizeJsonEscapes('[{"a": 1}]')).toBe('[{"a": 1}]')
  })
})
