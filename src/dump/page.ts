/**
 * Decoding of a single `<page>` block
 *
 * @module dump/page
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { z } from 'zod'
import type { EntryParseReason } from '../errors'
import type { RawEntry } from './types'

const MAIN_NAMESPACE = '0'

const parser = new XMLParser({
  parseTagValue: false,
  isArray: (name) => name === 'revision',
})

const RevisionSchema = z.object({ text: z.string().optional() }).passthrough()

const PageSchema = z
  .object({
    title: z.string().optional(),
    ns: z.string().optional(),
    redirect: z.unknown().optional(),
    revision: z.array(RevisionSchema).optional(),
  })
  .passthrough()

const DocumentSchema = z.object({ page: PageSchema })

/**
 * What one page block turned out to be
 */
export type DecodedPage =
  | { kind: 'entry'; entry: RawEntry }
  | { kind: 'non-article' }
  | { kind: 'redirect' }
  | { kind: 'malformed'; reason: EntryParseReason; message: string; title?: string }

/**
 * Validate and decode one `<page>…</page>` window
 */
export function decodePage(xml: string): DecodedPage {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    return {
      kind: 'malformed',
      reason: 'malformed-page',
      message: `Invalid page XML at line ${validation.err.line}: ${validation.err.msg}`,
    }
  }

  const parsed = DocumentSchema.safeParse(parser.parse(xml))
  if (!parsed.success) {
    return { kind: 'malformed', reason: 'malformed-page', message: 'Unexpected page structure' }
  }

  const page = parsed.data.page
  const title = page.title?.trim() ?? ''
  if (title === '') {
    return { kind: 'malformed', reason: 'missing-title', message: 'Page has no title' }
  }
  if ((page.ns ?? MAIN_NAMESPACE).trim() !== MAIN_NAMESPACE) {
    return { kind: 'non-article' }
  }
  if (page.redirect !== undefined) {
    return { kind: 'redirect' }
  }

  const latest = page.revision?.[page.revision.length - 1]
  return { kind: 'entry', entry: { title, body: latest?.text ?? '' } }
}
