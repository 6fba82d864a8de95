/**
 * Markup cleaning: wikitext to plain prose
 *
 * Order matters: block elements and references go first so their contents
 * never leak into the prose, then templates (with nesting), then links,
 * quotes, tags and entities, and finally whitespace.
 *
 * @module wikitext/clean
 */

import { scanTemplates } from './templates'

const GALLERY = /<gallery\b[^>]*>[\s\S]*?<\/gallery\s*>/gi
const COMMENT = /<!--[\s\S]*?(?:-->|$)/g
const REF_SELF_CLOSING = /<ref\b[^>]*\/>/gi
const REF_ELEMENT = /<ref\b[^>]*>[\s\S]*?<\/ref\s*>/gi
const INNERMOST_LINK = /\[\[([^[\]]*)\]\]/
const MEDIA_LINK = /^:?\s*(?:fitxer|file|imatge|image|categoria|category)\s*:/i
const EXTERNAL_LINK = /\[(?:https?:)?\/\/[^\s\]]+(?:\s+([^\]]*))?\]/g
const BOLD_ITALIC = /'{2,5}/g
const TAG = /<\/?[a-z][^>]*>/gi

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  nbsp: ' ',
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  laquo: '«',
  raquo: '»',
  middot: '·',
  ndash: '–',
  mdash: '—',
}

/**
 * Remove every template invocation; an unterminated `{{` drops the rest of
 * the text.
 */
export function removeTemplates(text: string): string {
  const scan = scanTemplates(text)
  let result = ''
  let cursor = 0
  for (const template of scan.templates) {
    result += text.slice(cursor, template.start)
    cursor = template.end
  }
  result += scan.unterminatedAt === undefined ? text.slice(cursor) : text.slice(cursor, scan.unterminatedAt)
  return result
}

/**
 * Replace internal links with their visible text:
 * `[[target|label]]` → label, `[[target]]` → target (section anchor dropped).
 * Media and category links are removed.
 */
export function replaceInternalLinks(text: string): string {
  let result = text
  let match = INNERMOST_LINK.exec(result)
  while (match) {
    const inner = match[1] ?? ''
    let replacement: string
    if (MEDIA_LINK.test(inner)) {
      replacement = ''
    } else {
      const pipe = inner.lastIndexOf('|')
      replacement = pipe >= 0 ? inner.slice(pipe + 1) : inner.replace(/#.*$/, '').replace(/^:/, '')
    }
    result = result.slice(0, match.index) + replacement + result.slice(match.index + match[0].length)
    match = INNERMOST_LINK.exec(result)
  }
  return result
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
    if (body.startsWith('#')) {
      const hex = body[1] === 'x' || body[1] === 'X'
      const codePoint = hex ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10)
      return codePoint > 0 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity
  })
}

export function collapseWhitespace(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/\s+([.,;:!?)»])/g, '$1')
    .replace(/([(«¿¡])\s+/g, '$1')
    .trim()
}

/**
 * Strip all markup from a wikitext fragment
 */
export function cleanMarkup(text: string): string {
  let result = text
    .replace(GALLERY, ' ')
    .replace(COMMENT, ' ')
    .replace(REF_SELF_CLOSING, '')
    .replace(REF_ELEMENT, '')

  result = removeTemplates(result)
  result = replaceInternalLinks(result)
  result = result.replace(EXTERNAL_LINK, (_link, label: string | undefined) => label ?? '')
  result = result.replace(BOLD_ITALIC, '')
  result = result.replace(TAG, '')
  result = decodeEntities(result)

  return collapseWhitespace(result)
}
