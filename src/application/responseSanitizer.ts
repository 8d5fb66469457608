const SIMPLE_ESCAPES = new Set(['"', '\\', '/', 'b', 'f', 'n', 'r', 't'])
const HEX_QUAD = /^[0-9A-Fa-f]{4}$/

/**
 * Repair escape sequences that JSON.parse would reject.
 *
 * Providers often copy regex fragments (`\d`, `\s`) or Windows paths into
 * string values without escaping the backslash. Anything that is not a valid
 * JSON escape gets its backslash doubled, so the literal text survives the
 * parse. Single forward pass, every input character is kept.
 */
export function sanitizeJsonEscapes(text: string): string {
  let out = ''
  let i = 0

  while (i < text.length) {
    const ch = text.charAt(i)
    const next = text[i + 1]

    if (ch !== '\\' || next === undefined) {
      out += ch
      i += 1
      continue
    }

    if (SIMPLE_ESCAPES.has(next)) {
      out += ch + next
      i += 2
      continue
    }

    if (next === 'u') {
      const hex = text.slice(i + 2, i + 6)
      if (HEX_QUAD.test(hex)) {
        out += '\\u' + hex
        i += 6
      } else {
        out += '\\\\u'
        i += 2
      }
      continue
    }

    out += '\\\\' + next
    i += 2
  }

  return out
}
