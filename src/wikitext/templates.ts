/**
 * Template invocation scanner
 *
 * Finds top-level `{{name|arg|key=value}}` invocations, honouring nested
 * templates and `[[links|with pipes]]` inside arguments. The result is a raw,
 * untyped call; classification into the closed set of template kinds the
 * pipeline understands happens in parser/templates.ts.
 *
 * @module wikitext/templates
 */

/**
 * One raw template invocation
 */
export interface TemplateCall {
  /** Template name, trimmed (case preserved) */
  name: string
  /** Positional arguments in order, trimmed */
  positional: string[]
  /** Named arguments; a repeated name keeps the last value, as MediaWiki does */
  named: Map<string, string>
  /** Offset of the opening `{{` */
  start: number
  /** Offset just past the closing `}}` */
  end: number
}

/**
 * Result of scanning a text for templates
 */
export interface TemplateScan {
  templates: TemplateCall[]
  /** Offset of a `{{` that is never closed, if any (scanning stops there) */
  unterminatedAt?: number
}

/**
 * Offset just past the `}}` matching the `{{` at `start`, or -1
 */
export function findTemplateEnd(text: string, start: number): number {
  let depth = 0
  let i = start
  while (i < text.length) {
    if (text.startsWith('{{', i)) {
      depth++
      i += 2
    } else if (text.startsWith('}}', i)) {
      depth--
      i += 2
      if (depth === 0) return i
    } else {
      i++
    }
  }
  return -1
}

/**
 * Split template inner text on top-level pipes
 */
function splitArguments(inner: string): string[] {
  const parts: string[] = []
  let braces = 0
  let brackets = 0
  let current = ''

  for (let i = 0; i < inner.length; i++) {
    const pair = inner.slice(i, i + 2)
    if (pair === '{{') {
      braces++
      current += pair
      i++
    } else if (pair === '}}' && braces > 0) {
      braces--
      current += pair
      i++
    } else if (pair === '[[') {
      brackets++
      current += pair
      i++
    } else if (pair === ']]' && brackets > 0) {
      brackets--
      current += pair
      i++
    } else if (inner[i] === '|' && braces === 0 && brackets === 0) {
      parts.push(current)
      current = ''
    } else {
      current += inner[i] ?? ''
    }
  }
  parts.push(current)
  return parts
}

/**
 * Parse the inside of one `{{…}}` into a call
 */
export function parseTemplateCall(inner: string, start = 0, end = inner.length + 4): TemplateCall {
  const [rawName = '', ...args] = splitArguments(inner)
  const positional: string[] = []
  const named = new Map<string, string>()

  for (const arg of args) {
    const eq = arg.indexOf('=')
    const nested = [arg.indexOf('{{'), arg.indexOf('[[')].filter((n) => n >= 0)
    const firstNested = nested.length > 0 ? Math.min(...nested) : -1

    if (eq > 0 && (firstNested < 0 || eq < firstNested)) {
      named.set(arg.slice(0, eq).trim(), arg.slice(eq + 1).trim())
    } else {
      positional.push(arg.trim())
    }
  }

  return { name: rawName.trim(), positional, named, start, end }
}

/**
 * Find the top-level template invocations of a text
 */
export function scanTemplates(text: string): TemplateScan {
  const templates: TemplateCall[] = []
  let i = text.indexOf('{{')

  while (i >= 0) {
    const end = findTemplateEnd(text, i)
    if (end < 0) {
      return { templates, unterminatedAt: i }
    }
    templates.push(parseTemplateCall(text.slice(i + 2, end - 2), i, end))
    i = text.indexOf('{{', end)
  }

  return { templates }
}

/**
 * Offset of the first `[[` without a matching `]]`, or undefined
 */
export function findUnterminatedLink(text: string): number | undefined {
  const open: number[] = []
  let i = 0
  while (i < text.length) {
    if (text.startsWith('[[', i)) {
      open.push(i)
      i += 2
    } else if (text.startsWith(']]', i)) {
      open.pop()
      i += 2
    } else {
      i++
    }
  }
  return open[0]
}
