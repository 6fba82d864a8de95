/**
 * Conjugation table types
 *
 * A slot is identified by (mood, tense, person), encoded as a SlotKey string
 * such as `ind.pres.1s`; the non-finite forms use `inf`, `ger` and the four
 * participle slots.
 *
 * @module conjugation/types
 */

export const PERSONS = ['1s', '2s', '3s', '1p', '2p', '3p'] as const
export type Person = (typeof PERSONS)[number]

/** Imperative persons (no first person singular) */
export const IMPERATIVE_PERSONS = ['2s', '3s', '1p', '2p', '3p'] as const
export type ImperativePerson = (typeof IMPERATIVE_PERSONS)[number]

export const FINITE_TENSES = [
  'ind.pres',
  'ind.impf',
  'ind.pret',
  'ind.fut',
  'cond.pres',
  'subj.pres',
  'subj.impf',
] as const
export type FiniteTense = (typeof FINITE_TENSES)[number]

export const PARTICIPLE_SLOTS = ['part.ms', 'part.fs', 'part.mp', 'part.fp'] as const
export type ParticipleSlot = (typeof PARTICIPLE_SLOTS)[number]

export type NonFiniteSlot = 'inf' | 'ger' | ParticipleSlot

export type SlotKey =
  | `${FiniteTense}.${Person}`
  | `imp.pres.${ImperativePerson}`
  | NonFiniteSlot

/** Targets of a stem override: every finite tense, the imperative, the participle and the gerund */
export type StemTarget = FiniteTense | 'imp.pres' | 'part' | 'ger'

export const STEM_TARGETS: readonly StemTarget[] = [...FINITE_TENSES, 'imp.pres', 'part', 'ger']

/** Every slot a complete paradigm fills, in display order */
export const ALL_SLOTS: readonly SlotKey[] = [
  'inf',
  'ger',
  ...PARTICIPLE_SLOTS,
  ...FINITE_TENSES.flatMap((tense) => PERSONS.map((person): SlotKey => `${tense}.${person}`)),
  ...IMPERATIVE_PERSONS.map((person): SlotKey => `imp.pres.${person}`),
]

const SLOT_SET: ReadonlySet<string> = new Set(ALL_SLOTS)
const STEM_TARGET_SET: ReadonlySet<string> = new Set(STEM_TARGETS)

export function isSlotKey(value: string): value is SlotKey {
  return SLOT_SET.has(value)
}

export function isStemTarget(value: string): value is StemTarget {
  return STEM_TARGET_SET.has(value)
}

/**
 * Conjugation classes with a regular paradigm:
 * - `ar`     cantar, parlar
 * - `er`     témer
 * - `re`     perdre, batre
 * - `ir`     dormir (pure)
 * - `ir-eix` servir (inchoative, -eix-)
 */
export const CONJUGATION_CLASSES = ['ar', 'er', 're', 'ir', 'ir-eix'] as const
export type ConjugationClass = (typeof CONJUGATION_CLASSES)[number]

const CLASS_SET: ReadonlySet<string> = new Set<string>(CONJUGATION_CLASSES)

export function isConjugationClass(value: string): value is ConjugationClass {
  return CLASS_SET.has(value)
}

/**
 * A parsed conjugation table for one verb
 */
export interface ConjugationTable {
  /** Template name the table was read from, e.g. `ca.v.conj.ar` */
  template: string
  /** Paradigm class; absent when the template names an unknown class */
  conjugationClass?: ConjugationClass
  /** Regular stem, e.g. `parl` for parlar */
  stem?: string
  /** Explicit (irregular) forms; an argument may list variants */
  explicit: ReadonlyMap<SlotKey, readonly string[]>
  /** Irregular stems that replace the regular stem for a whole tense */
  stemOverrides: ReadonlyMap<StemTarget, string>
  /** Argument names that were not recognized (kept for diagnostics only) */
  ignoredArgs: readonly string[]
}

/**
 * Result of expanding a table
 */
export interface Expansion {
  /** Distinct normalized surface forms */
  forms: Set<string>
  /** Slots with neither an explicit form nor a synthesis rule */
  gaps: SlotKey[]
}
