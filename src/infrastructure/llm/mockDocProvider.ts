import type { DocProvider } from '../../core/ports/docProvider.js'

const NUMBERED_LINE = /^\s*(\d+): ?(.*)$/
const DECLARATION = /^(\s*)(class|module)\s+([\w:]+)/
const DEFINITION = /^(\s*)def\s+([^\s(]+)\s*(?:\((.*)\))?/

type MockDirective = {
  line_number: number
  anchor: string
  indent: number
  comment: string
}

function numberedCode(prompt: string): Array<{ lineNumber: number; text: string }> {
  const start = prompt.indexOf('```ruby\n')
  if (start === -1) return []
  const end = prompt.indexOf('\n```', start + 8)
  const body = prompt.slice(start + 8, end === -1 ? undefined : end)

  const out: Array<{ lineNumber: number; text: string }> = []
  for (const line of body.split('\n')) {
    const m = NUMBERED_LINE.exec(line)
    if (m?.[1]) out.push({ lineNumber: Number(m[1]), text: m[2] ?? '' })
  }
  return out
}

function paramNames(params: string | undefined): string[] {
  if (!params) return []
  return params
    .split(',')
    .map((p) => p.trim().split(/[=:\s]/)[0] ?? '')
    .map((p) => p.replace(/^[*&]+/, ''))
    .filter(Boolean)
}

/**
 * Offline provider: documents every class, module and method it can see in
 * the numbered prompt with placeholder YARD comments. No network access.
 */
export class MockDocProvider implements DocProvider {
  readonly name = 'mock'
  readonly model = 'mock-model'

  async generate(userPrompt: string, _systemPrompt: string): Promise<string> {
    const code = numberedCode(userPrompt)
    const directives: MockDirective[] = []

    code.forEach(({ lineNumber, text }, idx) => {
      const previous = code[idx - 1]?.text.trim() ?? ''
      if (previous.startsWith('#') && previous.includes('@')) return

      const decl = DECLARATION.exec(text)
      if (decl) {
        const [, indent = '', keyword = '', name = ''] = decl
        directives.push({
          line_number: lineNumber,
          anchor: `${keyword} ${name}`,
          indent: indent.length,
          comment: `# ${name} ${keyword}\n#\n# Mock documentation for testing`
        })
        return
      }

      const def = DEFINITION.exec(text)
      if (def) {
        const [, indent = '', method = '', params] = def
        const lines = [`# ${method} method`, '#']
        for (const param of paramNames(params)) {
          lines.push(`# @param ${param} [Object] mock parameter`)
        }
        lines.push('# @return [Object] mock return value')
        directives.push({
          line_number: lineNumber,
          anchor: `def ${method}`,
          indent: indent.length,
          comment: lines.join('\n')
        })
      }
    })

    return ['```json', JSON.stringify(directives, null, 2), '```'].join('\n')
  }
}
