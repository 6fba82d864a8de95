/**
 * Conjugation Expander
 *
 * Turns a ConjugationTable into the set of distinct surface forms of a verb.
 * Explicit forms win; every other slot is synthesized from the class suffix
 * tables, with stem overrides replacing the regular stem tense by tense.
 * Slots with neither are reported as gaps and left out.
 *
 * @module conjugation/expander
 */

import { isValidForm, normalizeForm } from '../utils/text'
import { FUTURE_STEM_TENSES, PARADIGMS, adjustStem, type Paradigm } from './paradigms'
import {
  ALL_SLOTS,
  FINITE_TENSES,
  IMPERATIVE_PERSONS,
  PARTICIPLE_SLOTS,
  PERSONS,
  type ConjugationClass,
  type ConjugationTable,
  type Expansion,
  type FiniteTense,
  type SlotKey,
} from './types'

// =============================================================================
// Slot decoding
// =============================================================================

type DecodedSlot =
  | { kind: 'infinitive' }
  | { kind: 'gerund' }
  | { kind: 'participle'; index: number }
  | { kind: 'finite'; tense: FiniteTense; index: number }
  | { kind: 'imperative'; index: number }

const DECODED_SLOTS: ReadonlyMap<SlotKey, DecodedSlot> = new Map<SlotKey, DecodedSlot>([
  ['inf', { kind: 'infinitive' }],
  ['ger', { kind: 'gerund' }],
  ...PARTICIPLE_SLOTS.map((slot, index): [SlotKey, DecodedSlot] => [slot, { kind: 'participle', index }]),
  ...FINITE_TENSES.flatMap((tense) =>
    PERSONS.map((person, index): [SlotKey, DecodedSlot] => [`${tense}.${person}`, { kind: 'finite', tense, index }])
  ),
  ...IMPERATIVE_PERSONS.map((person, index): [SlotKey, DecodedSlot] => [
    `imp.pres.${person}`,
    { kind: 'imperative', index },
  ]),
])

// =============================================================================
// Synthesis
// =============================================================================

/**
 * Join a stem and suffix, applying the class spelling alternation only to the
 * regular stem (override stems are taken as written).
 */
function join(
  stem: string,
  suffix: string,
  conjugationClass: ConjugationClass,
  regular: boolean
): string {
  return (regular ? adjustStem(stem, suffix, conjugationClass) : stem) + suffix
}

function futureStem(table: ConjugationTable, tense: FiniteTense, stem: string, paradigm: Paradigm): string {
  const own = table.stemOverrides.get(tense)
  if (own !== undefined) return own
  // The conditional shares an irregular future stem (anir-é, anir-ia)
  if (tense === 'cond.pres') {
    const future = table.stemOverrides.get('ind.fut')
    if (future !== undefined) return future
  }
  return stem + paradigm.futureStem
}

/**
 * Synthesize one slot from the regular paradigm, or undefined when the table
 * has no class or no stem to build on.
 */
export function synthesizeSlot(table: ConjugationTable, slot: SlotKey): string | undefined {
  const { conjugationClass, stem } = table
  if (conjugationClass === undefined || stem === undefined || stem === '') {
    return undefined
  }
  const paradigm = PARADIGMS[conjugationClass]
  const decoded = DECODED_SLOTS.get(slot)
  if (decoded === undefined) {
    return undefined
  }

  switch (decoded.kind) {
    case 'infinitive':
      return stem + paradigm.infinitive

    case 'gerund': {
      const override = table.stemOverrides.get('ger')
      return join(override ?? stem, paradigm.gerund, conjugationClass, override === undefined)
    }

    case 'participle': {
      const suffix = paradigm.participle[decoded.index]
      if (suffix === undefined) return undefined
      const override = table.stemOverrides.get('part')
      return join(override ?? stem, suffix, conjugationClass, override === undefined)
    }

    case 'imperative': {
      const suffix = paradigm.imperative[decoded.index]
      if (suffix === undefined) return undefined
      const override = table.stemOverrides.get('imp.pres')
      return join(override ?? stem, suffix, conjugationClass, override === undefined)
    }

    case 'finite': {
      const suffix = paradigm.tenses[decoded.tense][decoded.index]
      if (suffix === undefined) return undefined
      if (FUTURE_STEM_TENSES.has(decoded.tense)) {
        return futureStem(table, decoded.tense, stem, paradigm) + suffix
      }
      const override = table.stemOverrides.get(decoded.tense)
      return join(override ?? stem, suffix, conjugationClass, override === undefined)
    }
  }
}

// =============================================================================
// Expansion
// =============================================================================

function addForm(forms: Set<string>, raw: string): boolean {
  const form = normalizeForm(raw)
  if (!isValidForm(form)) {
    return false
  }
  forms.add(form)
  return true
}

/**
 * Expand a table into its distinct surface forms and the slots that could
 * not be filled.
 */
export function expandTable(table: ConjugationTable): Expansion {
  const forms = new Set<string>()
  const gaps: SlotKey[] = []

  for (const slot of ALL_SLOTS) {
    const explicit = table.explicit.get(slot)
    if (explicit !== undefined && explicit.length > 0) {
      for (const variant of explicit) {
        addForm(forms, variant)
      }
      continue
    }

    const synthesized = synthesizeSlot(table, slot)
    if (synthesized === undefined || !addForm(forms, synthesized)) {
      gaps.push(slot)
    }
  }

  return { forms, gaps }
}

/**
 * The set of distinct surface forms of a table
 */
export function expand(table: ConjugationTable): Set<string> {
  return expandTable(table).forms
}
