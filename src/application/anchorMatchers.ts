/**
 * Soft anchor matching.
 *
 * An anchor is classified once into a shape by the first matcher whose
 * `classify` accepts it; the compiled pattern is then tested against any
 * number of candidate lines. Matchers are independent of each other, so a
 * new syntactic category is one more entry in ANCHOR_MATCHERS.
 */

export type AnchorShape =
  | { kind: 'declaration'; keyword: string; name: string }
  | { kind: 'definition'; signature: string; method: string; suffix: string }
  | { kind: 'accessor'; accessor: string; symbol: string | null }
  | { kind: 'constant'; name: string }
  | { kind: 'fieldVariable'; name: string }
  | { kind: 'tokens'; tokens: string[] }

export type AnchorPattern = {
  shape: AnchorShape
  test(line: string): boolean
}

export type AnchorMatcher = {
  kind: AnchorShape['kind']
  classify(anchor: string): AnchorPattern | null
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&')
}

function stripParams(text: string): string {
  const paren = text.indexOf('(')
  return (paren === -1 ? text : text.slice(0, paren)).trim()
}

// ============================================================================
// Matchers
// ============================================================================

const declarationMatcher: AnchorMatcher = {
  kind: 'declaration',
  classify(anchor) {
    const m = /^(class|module)\s+(.+)$/.exec(anchor)
    if (!m?.[1] || !m[2]) return null
    const keyword = m[1]
    const name = stripParams(m[2]).split(/\s+/)[0] ?? ''
    if (!name) return null
    const pattern = new RegExp(`^\\s*${keyword}\\s+${escapeRegExp(name)}(?![\\w:])`)
    return {
      shape: { kind: 'declaration', keyword, name },
      test: (line) => pattern.test(line)
    }
  }
}

const definitionMatcher: AnchorMatcher = {
  kind: 'definition',
  classify(anchor) {
    if (!anchor.startsWith('def ')) return null
    const signature = stripParams(anchor.slice(4))
    if (!signature) return null

    const lastDot = signature.lastIndexOf('.')
    const bare = lastDot === -1 ? signature : signature.slice(lastDot + 1)
    const suffixMatch = /^(.+?)([?!=]?)$/.exec(bare)
    const method = suffixMatch?.[1] ?? bare
    const suffix = suffixMatch?.[2] ?? ''

    const pattern = new RegExp(
      `\\bdef\\s+(?:\\w+(?:::\\w+)*\\.)?${escapeRegExp(method)}${escapeRegExp(suffix)}(?![\\w?!=])`
    )
    const literal = `def ${signature}`
    return {
      shape: { kind: 'definition', signature, method, suffix },
      test: (line) => pattern.test(line) || line.includes(literal)
    }
  }
}

const accessorMatcher: AnchorMatcher = {
  kind: 'accessor',
  classify(anchor) {
    if (!anchor.startsWith('attr_')) return null
    const [accessor = '', rawSymbol] = anchor.split(/\s+/)
    const symbol = rawSymbol ? rawSymbol.replace(/^:/, '').replace(/,$/, '') : null

    if (!symbol) {
      const bare = new RegExp(`\\b${escapeRegExp(accessor)}\\b`)
      return {
        shape: { kind: 'accessor', accessor, symbol: null },
        test: (line) => bare.test(line)
      }
    }

    const pattern = new RegExp(
      `\\b${escapeRegExp(accessor)}\\s+(?::?\\w+[?!]?\\s*,\\s*)*:${escapeRegExp(symbol)}(?!\\w)`
    )
    return {
      shape: { kind: 'accessor', accessor, symbol },
      test: (line) => pattern.test(line)
    }
  }
}

const constantMatcher: AnchorMatcher = {
  kind: 'constant',
  classify(anchor) {
    const m = /^((?=[A-Z0-9_]*[A-Z])[A-Z_][A-Z0-9_]*)\s*(?:=.*)?$/.exec(anchor)
    if (!m?.[1]) return null
    const name = m[1]
    const pattern = new RegExp(`\\b${escapeRegExp(name)}\\s*=(?![=~])`)
    return {
      shape: { kind: 'constant', name },
      test: (line) => pattern.test(line)
    }
  }
}

const fieldVariableMatcher: AnchorMatcher = {
  kind: 'fieldVariable',
  classify(anchor) {
    const m = /^(@@?\w+)/.exec(anchor)
    if (!m?.[1]) return null
    const name = m[1]
    const pattern = new RegExp(
      `(?<![@\\w])${escapeRegExp(name)}(?!\\w)\\s*(?:\\|\\||&&|\\*\\*|<<|>>|[-+*/%|&^])?=(?![=~>])`
    )
    return {
      shape: { kind: 'fieldVariable', name },
      test: (line) => pattern.test(line)
    }
  }
}

/** Always classifies: every token of the anchor (before any `(`) must appear in the line. */
const tokensMatcher: AnchorMatcher = {
  kind: 'tokens',
  classify(anchor) {
    const tokens = stripParams(anchor).split(/\s+/).filter(Boolean)
    return {
      shape: { kind: 'tokens', tokens },
      test: (line) => tokens.length > 0 && tokens.every((token) => line.includes(token))
    }
  }
}

export const ANCHOR_MATCHERS: readonly AnchorMatcher[] = [
  declarationMatcher,
  definitionMatcher,
  accessorMatcher,
  constantMatcher,
  fieldVariableMatcher,
  tokensMatcher
]

// ============================================================================
// Entry Points
// ============================================================================

export function compileAnchor(
  anchor: string,
  matchers: readonly AnchorMatcher[] = ANCHOR_MATCHERS
): AnchorPattern {
  const trimmed = anchor.trim()
  for (const matcher of matchers) {
    const pattern = matcher.classify(trimmed)
    if (pattern) return pattern
  }
  return { shape: { kind: 'tokens', tokens: [] }, test: () => false }
}

export function softMatchAnchor(anchor: string, line: string): boolean {
  return compileAnchor(anchor).test(line)
}
