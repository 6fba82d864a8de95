/**
 * Text normalization shared by the parser, the index builder and the reader.
 *
 * The forms table is keyed by the output of normalizeForm(), and the query
 * side applies the same function to its input, so both ends agree on casing,
 * Unicode composition and apostrophes. Diacritics are kept: they distinguish
 * Catalan words (e.g. "és" / "es").
 *
 * @module utils/text
 */

const TYPOGRAPHIC_APOSTROPHES = /[’ʼ`´]/g

/** Letters allowed in a lemma: Catalan alphabet plus the middle dot of "l·l" */
const LEMMA_WORD = "[a-zàèéíïòóúüç·]+"

/** A lemma is one or more words joined by hyphens */
const LEMMA_PATTERN = new RegExp(`^${LEMMA_WORD}(?:-${LEMMA_WORD})*$`, 'u')

/** A surface form may additionally carry elided pronoun apostrophes */
const FORM_PATTERN = /^[\p{L}·'-]+$/u

/** Reflexive suffixes, longest first */
const REFLEXIVE_SUFFIXES = ["-se'n", '-se', "'s"] as const

/**
 * Normalize a surface form or lemma for storage and lookup
 */
export function normalizeForm(value: string): string {
  return value
    .trim()
    .normalize('NFC')
    .replace(TYPOGRAPHIC_APOSTROPHES, "'")
    .replace(/ŀ/g, 'l·') // precomposed l with middle dot
    .replace(/Ŀ/g, 'L·')
    .toLowerCase()
}

export function isValidLemma(value: string): boolean {
  return LEMMA_PATTERN.test(value)
}

export function isValidForm(value: string): boolean {
  return value.length > 0 && FORM_PATTERN.test(value)
}

/**
 * Split a (normalized) headword into its base infinitive and whether it
 * carried a reflexive pronoun: "rentar-se" → { base: "rentar", reflexive: true }.
 */
export function stripReflexive(headword: string): { base: string; reflexive: boolean } {
  for (const suffix of REFLEXIVE_SUFFIXES) {
    if (headword.length > suffix.length && headword.endsWith(suffix)) {
      return { base: headword.slice(0, -suffix.length), reflexive: true }
    }
  }
  return { base: headword, reflexive: false }
}

/**
 * Code-unit string comparison, the sort order of every persisted artifact
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/** True when the string contains at least one letter */
export function hasLetter(value: string): boolean {
  return /\p{L}/u.test(value)
}
