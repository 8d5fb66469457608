import { splitSource } from './sourceText.js'

export type DocumentationPrompt = {
  systemPrompt: string
  userPrompt: string
}

const SYSTEM_PROMPT = `You are an expert Ruby documentation specialist.
Your task is to generate YARD-compatible documentation for Ruby code.
You will return JSON with documentation comments and their anchor points.`

export function numberLines(content: string): string {
  return splitSource(content)
    .lines.map((line, idx) => `${String(idx + 1).padStart(4)}: ${line}`)
    .join('\n')
}

export function buildDocumentationPrompt(fileName: string, content: string): DocumentationPrompt {
  const userPrompt = `Analyze this Ruby file: **${fileName}**

\`\`\`ruby
${numberLines(content)}
\`\`\`

Generate **YARD-compatible** documentation for every public class, module, method, and constant
that does not already have it. Each line starts with its line number (e.g. "  15: def method_name").

Rules:
1. Skip anything that already has YARD tags above it (# @param, # @return, ...).
2. @param names must match the method's parameters exactly, without sigils:
   use "block" for &block and "args" for *args.
3. Methods: brief description, @param [Type] for every parameter, @return [Type],
   @raise where applicable, @example with real usage, @note for caveats.
4. Classes and modules: brief description, longer description if needed, @example.
5. Constants: a brief description comment.

Return a JSON array. Each element has:
- "line_number": the line to insert before (1-indexed, numbering of the ORIGINAL file)
- "anchor": a short snippet of that line for validation (e.g. "class GameObj", "def initialize")
- "indent": number of spaces before that line
- "comment": the YARD comment block as one string, lines separated by \\n

Example:
\`\`\`json
[
  {
    "line_number": 15,
    "anchor": "class GameObj",
    "indent": 0,
    "comment": "# Represents a game object\\n# @example\\n#   obj = GameObj.new"
  },
  {
    "line_number": 23,
    "anchor": "def initialize",
    "indent": 2,
    "comment": "# Creates a game object\\n# @param id [String] the object id\\n# @return [GameObj]"
  }
]
\`\`\`

Return ONLY the JSON array. Inside "comment", escape double quotes as \\" and backslashes as \\\\.
If nothing needs documenting, return [].`

  return { systemPrompt: SYSTEM_PROMPT, userPrompt }
}
