export type LineEnding = '\n' | '\r\n' | ''

export type SourceLines = {
  lines: string[]
  /** Terminator that followed each line; the last one is always '' */
  endings: LineEnding[]
}

/**
 * Split file content on `\n`, keeping each line's own terminator so that
 * files mixing `\r\n` and `\n` keep their numbering and round-trip byte for
 * byte through `joinSource`.
 */
export function splitSource(content: string): SourceLines {
  const segments = content.split('\n')
  const lines: string[] = []
  const endings: LineEnding[] = []
  segments.forEach((segment, idx) => {
    const last = idx === segments.length - 1
    if (!last && segment.endsWith('\r')) {
      lines.push(segment.slice(0, -1))
      endings.push('\r\n')
    } else {
      lines.push(segment)
      endings.push(last ? '' : '\n')
    }
  })
  return { lines, endings }
}

export function joinSource(source: SourceLines): string {
  return source.lines.map((line, idx) => `${line}${source.endings[idx] ?? ''}`).join('')
}

/** Terminator for lines inserted above line `index`: that line's own, else its predecessor's. */
export function endingBefore(source: SourceLines, index: number): Exclude<LineEnding, ''> {
  return source.endings[index] || source.endings[index - 1] || '\n'
}

export function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? ''
}
