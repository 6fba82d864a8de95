/**
 * Heading and section scanning for wikitext
 *
 * A section spans from its heading line to the next heading of the same or
 * a shallower level. `body` excludes deeper sub-sections, `content` includes
 * them.
 *
 * @module wikitext/sections
 */

const HEADING_LINE = /^(={1,6})\s*(.*?)\s*(={1,6})\s*$/

/**
 * A heading found in the text
 */
export interface Heading {
  level: number
  /** Heading text without the surrounding `=` and whitespace */
  title: string
  /** Offset of the first character of the heading line */
  start: number
  /** Offset just past the heading line (including its newline) */
  contentStart: number
}

/**
 * A section of text under one heading
 */
export interface Section {
  heading: Heading
  /** Offset where the section (including nested sub-sections) ends */
  end: number
  /** Offset where the first nested heading starts, or `end` */
  bodyEnd: number
}

/**
 * Find every heading line. Unbalanced markers (`== a ===`) take the shorter
 * side as the level, the way MediaWiki renders them.
 */
export function scanHeadings(text: string): Heading[] {
  const headings: Heading[] = []
  let offset = 0

  while (offset <= text.length) {
    const newline = text.indexOf('\n', offset)
    const lineEnd = newline < 0 ? text.length : newline
    const line = text.slice(offset, lineEnd)
    const match = HEADING_LINE.exec(line)

    if (match) {
      const open = match[1] ?? ''
      const close = match[3] ?? ''
      const title = match[2] ?? ''
      if (title !== '') {
        headings.push({
          level: Math.min(open.length, close.length),
          title,
          start: offset,
          contentStart: newline < 0 ? text.length : newline + 1,
        })
      }
    }

    if (newline < 0) break
    offset = newline + 1
  }

  return headings
}

/**
 * Build sections for every heading accepted by `predicate`
 */
export function findSections(
  text: string,
  predicate: (heading: Heading) => boolean,
  headings: readonly Heading[] = scanHeadings(text)
): Section[] {
  const sections: Section[] = []

  headings.forEach((heading, index) => {
    if (!predicate(heading)) return

    let end = text.length
    let bodyEnd: number | undefined
    for (const next of headings.slice(index + 1)) {
      if (bodyEnd === undefined) bodyEnd = next.start
      if (next.level <= heading.level) {
        end = next.start
        break
      }
    }

    sections.push({ heading, end, bodyEnd: Math.min(bodyEnd ?? end, end) })
  })

  return sections
}

/** Text of a section including nested sub-sections */
export function sectionContent(text: string, section: Section): string {
  return text.slice(section.heading.contentStart, section.end)
}

/** Text of a section up to its first nested heading */
export function sectionBody(text: string, section: Section): string {
  return text.slice(section.heading.contentStart, section.bodyEnd)
}

/**
 * Canonical form of a heading title for comparisons: lower-cased, inner
 * whitespace collapsed.
 */
export function headingKey(title: string): string {
  return title.trim().replace(/\s+/g, ' ').toLowerCase()
}
