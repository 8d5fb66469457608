import { createHash } from 'node:crypto'

export const CONTENT_HASH_LENGTH = 16

const DOC_TAGS = ['@param', '@return', '@example', '@note', '@see', '@yield']

function isDocumentationLine(line: string): boolean {
  const stripped = line.trim()
  if (!stripped.startsWith('#')) return false

  if (DOC_TAGS.some((tag) => stripped.includes(tag))) return true

  // Prose comment: "# " followed by text. Shebang and magic encoding comments stay.
  if (stripped.length > 1 && stripped[1] === ' ') {
    return !(stripped.startsWith('#!') || stripped.includes('coding:') || stripped.includes('encoding:'))
  }

  return false
}

/**
 * Hash of the code in `content`, ignoring documentation comments.
 *
 * Adding or removing YARD comments leaves the hash unchanged; editing any
 * code line changes it. Line endings are normalized before hashing.
 */
export function computeContentHash(content: string): string {
  const code = content
    .split(/\r?\n/)
    .filter((line) => !isDocumentationLine(line))
    .join('\n')
  return createHash('sha256').update(code, 'utf8').digest('hex').slice(0, CONTENT_HASH_LENGTH)
}
