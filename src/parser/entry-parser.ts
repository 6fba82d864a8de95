/**
 * Entry Parser
 *
 * Decides whether a raw page describes one or more Catalan verbs and pulls out
 * the infinitive, the conjugation source and the sense blocks of each verb
 * section. Markup cleaning is left to the Definition Extractor.
 *
 * @module parser/entry-parser
 */

import type { ConjugationTable } from '../conjugation/types'
import type { RawEntry } from '../dump/types'
import { EntryParseWarning } from '../errors'
import { isValidLemma, normalizeForm, stripReflexive } from '../utils/text'
import {
  findSections,
  headingKey,
  scanHeadings,
  sectionBody,
  sectionContent,
  type Heading,
  type Section,
} from '../wikitext/sections'
import { findUnterminatedLink, scanTemplates } from '../wikitext/templates'
import { classifyTemplate } from './templates'
import type {
  ConjugationSource,
  ParseOptions,
  ParseOutcome,
  PartOfSpeech,
  SenseBlock,
  TemplateInvocation,
  VerbEntry,
} from './types'

const LANGUAGE_HEADINGS: ReadonlySet<string> = new Set(['{{-ca-}}', 'català'])
const VERB_HEADING = /^(?:verb|\{\{-verb-\}\})(?:\s+\d+)?$/
const SENSE_LINE = /^(#+)([:*]*)\s*/
const SUBSECTION_MARKER = /\{\{-[^{}]*-\}\}/

type ConjugationInvocation = Extract<TemplateInvocation, { kind: 'conjugation' }>

function outcome(entries: VerbEntry[], warnings: EntryParseWarning[] = [], excluded = false): ParseOutcome {
  return { entries, warnings, excluded }
}

function isLanguageHeading(heading: Heading): boolean {
  return heading.level === 2 && LANGUAGE_HEADINGS.has(headingKey(heading.title))
}

function isVerbHeading(heading: Heading): boolean {
  return heading.level >= 3 && VERB_HEADING.test(headingKey(heading.title))
}

// =============================================================================
// Senses
// =============================================================================

function labelPartOfSpeech(markup: string): PartOfSpeech | undefined {
  for (const call of scanTemplates(markup).templates) {
    const invocation = classifyTemplate(call)
    if (invocation.kind === 'label' && invocation.partOfSpeech !== undefined) {
      return invocation.partOfSpeech
    }
  }
  return undefined
}

/**
 * Collect `#` sense lines with their `#:` / `#*` examples
 */
export function parseSenses(body: string, defaultPartOfSpeech: PartOfSpeech): SenseBlock[] {
  const senses: SenseBlock[] = []

  for (const rawLine of body.split('\n')) {
    const line = rawLine.trim()
    if (SUBSECTION_MARKER.test(line)) break

    const marker = SENSE_LINE.exec(line)
    if (!marker) continue
    const text = line.slice(marker[0].length).trim()
    if (text === '') continue

    if (marker[2] !== undefined && marker[2] !== '') {
      senses[senses.length - 1]?.examples.push(text)
      continue
    }

    senses.push({
      partOfSpeech: labelPartOfSpeech(text) ?? defaultPartOfSpeech,
      markup: text,
      examples: [],
    })
  }

  return senses
}

// =============================================================================
// Conjugation
// =============================================================================

function toTable(invocation: ConjugationInvocation, infinitive: string): ConjugationTable {
  const explicit = new Map(invocation.explicit)
  // The headword is authoritative for the infinitive (accents such as témer)
  if (!explicit.has('inf')) explicit.set('inf', [infinitive])

  return {
    template: invocation.template,
    ...(invocation.conjugationClass !== undefined ? { conjugationClass: invocation.conjugationClass } : {}),
    ...(invocation.stem !== undefined ? { stem: invocation.stem } : {}),
    explicit,
    stemOverrides: invocation.stemOverrides,
    ignoredArgs: invocation.ignoredArgs,
  }
}

function conjugationSource(
  invocations: readonly TemplateInvocation[],
  infinitive: string,
  reflexive: boolean,
  headword: string,
  warnings: EntryParseWarning[]
): ConjugationSource {
  for (const invocation of invocations) {
    if (invocation.kind === 'conjugation') {
      if (invocation.conjugationClass !== undefined && invocation.stem === undefined) {
        warnings.push(
          new EntryParseWarning(
            'missing-argument',
            `Template ${invocation.template} is missing its stem argument`,
            headword
          )
        )
        return { kind: 'none' }
      }
      return { kind: 'table', table: toTable(invocation, infinitive) }
    }

    if (invocation.kind === 'reference') {
      if (invocation.target === undefined) {
        warnings.push(
          new EntryParseWarning('missing-argument', 'Conjugation reference names no verb', headword)
        )
        return { kind: 'none' }
      }
      return { kind: 'reference', target: invocation.target, implicit: false }
    }
  }

  return reflexive ? { kind: 'reference', target: infinitive, implicit: true } : { kind: 'none' }
}

// =============================================================================
// Entry
// =============================================================================

function verbSections(body: string): Section[] {
  const headings = scanHeadings(body)
  const language = findSections(body, isLanguageHeading, headings)[0]
  if (!language) return []

  return findSections(
    body,
    (heading) =>
      heading.start >= language.heading.contentStart && heading.start < language.end && isVerbHeading(heading),
    headings
  ).map((section) => ({ ...section, end: Math.min(section.end, language.end) }))
}

/**
 * Parse one raw page into zero or more verb entries
 */
export function parseEntry(raw: RawEntry, options: ParseOptions = {}): ParseOutcome {
  const sections = verbSections(raw.body)
  if (sections.length === 0) return outcome([])

  const { base: infinitive, reflexive } = stripReflexive(normalizeForm(raw.title))
  if (!isValidLemma(infinitive)) {
    return outcome([], [new EntryParseWarning('invalid-lemma', `Not a valid verb lemma: "${raw.title}"`, raw.title)])
  }
  if (options.excluded?.has(infinitive)) return outcome([], [], true)

  for (const section of sections) {
    const content = sectionContent(raw.body, section)
    const unterminated = scanTemplates(content).unterminatedAt ?? findUnterminatedLink(content)
    if (unterminated !== undefined) {
      return outcome(
        [],
        [
          new EntryParseWarning(
            'unterminated-markup',
            `Unterminated markup in section "${section.heading.title}"`,
            raw.title
          ),
        ]
      )
    }
  }

  const warnings: EntryParseWarning[] = []
  const entries = sections.map((section, homograph): VerbEntry => {
    const invocations = scanTemplates(sectionContent(raw.body, section)).templates.map(classifyTemplate)

    let defaultPartOfSpeech: PartOfSpeech = reflexive ? 'pronominal-verb' : 'verb'
    const headwordPos = invocations.find((inv) => inv.kind === 'headword' && inv.partOfSpeech !== undefined)
    if (headwordPos?.kind === 'headword' && headwordPos.partOfSpeech !== undefined) {
      defaultPartOfSpeech = headwordPos.partOfSpeech
    }

    let alternativeOf: string | undefined
    for (const invocation of invocations) {
      if (invocation.kind === 'alternative' && invocation.target !== undefined && invocation.target !== infinitive) {
        alternativeOf = invocation.target
        break
      }
    }

    return {
      infinitive,
      headword: raw.title,
      reflexive,
      conjugation: conjugationSource(invocations, infinitive, reflexive, raw.title, warnings),
      senses: parseSenses(sectionBody(raw.body, section), defaultPartOfSpeech),
      ...(alternativeOf !== undefined ? { alternativeOf } : {}),
      sequence: options.sequence ?? 0,
      homograph,
    }
  })

  return outcome(entries, warnings)
}
