/**
 * Entry Parser types
 *
 * @module parser/types
 */

import type { ConjugationClass, ConjugationTable, SlotKey, StemTarget } from '../conjugation/types'
import type { EntryParseWarning } from '../errors'

export const PARTS_OF_SPEECH = [
  'verb',
  'transitive-verb',
  'intransitive-verb',
  'pronominal-verb',
  'auxiliary-verb',
] as const
export type PartOfSpeech = (typeof PARTS_OF_SPEECH)[number]

/**
 * One sense line as found in the entry, still in wikitext
 */
export interface SenseBlock {
  partOfSpeech: PartOfSpeech
  markup: string
  /** Usage and quotation lines (`#:`, `#*`) attached to the sense */
  examples: string[]
}

/**
 * Where a verb's conjugation comes from
 */
export type ConjugationSource =
  | { kind: 'table'; table: ConjugationTable }
  /** Reuse another verb's table, resolved in the second pass */
  | { kind: 'reference'; target: string; implicit: boolean }
  /** Definitions-only entry */
  | { kind: 'none' }

/**
 * A verb parsed from one part-of-speech section of a page
 */
export interface VerbEntry {
  /** Lemma: normalized headword without reflexive pronoun */
  infinitive: string
  /** Page title as written */
  headword: string
  reflexive: boolean
  conjugation: ConjugationSource
  senses: SenseBlock[]
  /** Target of a `forma-a` template, checked against known verbs later */
  alternativeOf?: string
  /** Page position in the dump */
  sequence: number
  /** Verb section position within the page (homograph split) */
  homograph: number
}

/**
 * Result of parsing one page
 */
export interface ParseOutcome {
  /** Empty when the page is not a verb, or was skipped */
  entries: VerbEntry[]
  warnings: EntryParseWarning[]
  /** The lemma is on the exclusion list */
  excluded: boolean
}

export interface ParseOptions {
  /** Page position in the dump, copied to every entry */
  sequence?: number
  /** Lemmas to drop */
  excluded?: ReadonlySet<string>
}

/**
 * Closed set of template kinds the parser understands. Every invocation in a
 * verb section is classified into exactly one of these; nothing else of the
 * raw argument map travels further down the pipeline.
 */
export type TemplateInvocation =
  | {
      kind: 'conjugation'
      template: string
      conjugationClass?: ConjugationClass
      stem?: string
      explicit: Map<SlotKey, string[]>
      stemOverrides: Map<StemTarget, string>
      ignoredArgs: string[]
    }
  | { kind: 'reference'; target?: string }
  | { kind: 'headword'; partOfSpeech?: PartOfSpeech }
  | { kind: 'label'; labels: string[]; partOfSpeech?: PartOfSpeech }
  | { kind: 'alternative'; target?: string }
  | { kind: 'other'; name: string }
