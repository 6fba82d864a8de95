/**
 * Regular paradigms
 *
 * Suffix tables per conjugation class are data (paradigms.json), validated
 * here once at module load. Finite tenses list six suffixes in person order
 * (1s 2s 3s 1p 2p 3p), the imperative five (2s 3s 1p 2p 3p), the participle
 * four (ms fs mp fp).
 *
 * @module conjugation/paradigms
 */

import { z } from 'zod'
import paradigmData from './paradigms.json'
import type { ConjugationClass, FiniteTense } from './types'

const six = z.tuple([z.string(), z.string(), z.string(), z.string(), z.string(), z.string()])
const five = z.tuple([z.string(), z.string(), z.string(), z.string(), z.string()])
const four = z.tuple([z.string(), z.string(), z.string(), z.string()])

const ParadigmSchema = z.object({
  /** Infinitive ending (parl + ar) */
  infinitive: z.string(),
  /** Appended to the stem to form the future/conditional stem (perd + r) */
  futureStem: z.string(),
  gerund: z.string(),
  participle: four,
  tenses: z.object({
    'ind.pres': six,
    'ind.impf': six,
    'ind.pret': six,
    'ind.fut': six,
    'cond.pres': six,
    'subj.pres': six,
    'subj.impf': six,
  }),
  imperative: five,
})

const ParadigmTableSchema = z.object({
  ar: ParadigmSchema,
  er: ParadigmSchema,
  re: ParadigmSchema,
  ir: ParadigmSchema,
  'ir-eix': ParadigmSchema,
})

export type Paradigm = z.infer<typeof ParadigmSchema>

export const PARADIGMS: Readonly<Record<ConjugationClass, Paradigm>> = ParadigmTableSchema.parse(paradigmData)

/** Tenses built on the future stem rather than the bare stem */
export const FUTURE_STEM_TENSES: ReadonlySet<FiniteTense> = new Set<FiniteTense>(['ind.fut', 'cond.pres'])

/** Classes whose stem takes the c/qu, g/gu, ç/c, j/g spelling alternation */
const ALTERNATING_CLASSES: ReadonlySet<ConjugationClass> = new Set<ConjugationClass>(['ar'])

const FRONT_VOWEL = /^[eéèiíï]/

/**
 * Adjust a stem for a suffix beginning with a front vowel, so the consonant
 * keeps its sound: toc+em → toquem, començ+i → comenci, menj+em → mengem,
 * jug+i → jugui, averigu+em → averigüem.
 */
export function adjustStem(stem: string, suffix: string, conjugationClass: ConjugationClass): string {
  if (!ALTERNATING_CLASSES.has(conjugationClass) || !FRONT_VOWEL.test(suffix)) {
    return stem
  }
  if (stem.endsWith('gu')) return `${stem.slice(0, -2)}gü`
  if (stem.endsWith('qu')) return `${stem.slice(0, -2)}qü`
  if (stem.endsWith('c')) return `${stem.slice(0, -1)}qu`
  if (stem.endsWith('g')) return `${stem.slice(0, -1)}gu`
  if (stem.endsWith('ç')) return `${stem.slice(0, -1)}c`
  if (stem.endsWith('j')) return `${stem.slice(0, -1)}g`
  return stem
}
