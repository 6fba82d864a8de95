/**
 * Stage 2: conjugation reference resolution
 *
 * Runs after the whole dump has been collected, so a reference may point at a
 * verb that appears later in the dump. A reference is replaced by the target's
 * concrete table; a target that is itself a reference is followed up to
 * MAX_REFERENCE_DEPTH hops. Anything left unresolved becomes definitions-only.
 *
 * @module pipeline/resolve
 */

import type { ConjugationTable } from '../conjugation/types'
import { EntryParseWarning } from '../errors'
import type { VerbEntry } from '../parser/types'
import type { Diagnostics } from './diagnostics'

export const MAX_REFERENCE_DEPTH = 8

/**
 * An entry ready for expansion and extraction
 */
export interface ResolvedEntry {
  entry: VerbEntry
  /** Concrete table, own or borrowed; absent for definitions-only entries */
  table?: ConjugationTable
  /** Confirmed alternative-form target */
  alternativeOf?: string
}

export interface Resolution {
  entries: ResolvedEntry[]
  referencesResolved: number
  referencesUnresolved: number
}

function compareOrigin(a: VerbEntry, b: VerbEntry): number {
  return a.sequence - b.sequence || a.homograph - b.homograph
}

export function resolveEntries(entries: readonly VerbEntry[], diagnostics: Diagnostics): Resolution {
  const ordered = [...entries].sort(compareOrigin)
  const tables = new Map<string, ConjugationTable>()
  const references = new Map<string, string>()
  const known = new Set<string>()

  // First table (and first outgoing reference) per infinitive in dump order
  for (const entry of ordered) {
    known.add(entry.infinitive)
    const source = entry.conjugation
    if (source.kind === 'table' && !tables.has(entry.infinitive)) {
      tables.set(entry.infinitive, source.table)
    } else if (source.kind === 'reference' && source.target !== entry.infinitive && !references.has(entry.infinitive)) {
      references.set(entry.infinitive, source.target)
    }
  }

  const follow = (start: string): ConjugationTable | undefined => {
    let target: string | undefined = start
    for (let depth = 0; depth <= MAX_REFERENCE_DEPTH && target !== undefined; depth++) {
      const table = tables.get(target)
      if (table) return table
      target = references.get(target)
    }
    return undefined
  }

  let referencesResolved = 0
  let referencesUnresolved = 0

  const resolved = ordered.map((entry): ResolvedEntry => {
    const alternativeOf =
      entry.alternativeOf !== undefined && known.has(entry.alternativeOf) ? entry.alternativeOf : undefined
    const base: ResolvedEntry = alternativeOf === undefined ? { entry } : { entry, alternativeOf }
    const source = entry.conjugation

    switch (source.kind) {
      case 'table':
        return { ...base, table: source.table }
      case 'none':
        return base
      case 'reference': {
        const table = follow(source.target)
        if (table) {
          referencesResolved++
          return { ...base, table }
        }
        referencesUnresolved++
        diagnostics.recordWarning(
          new EntryParseWarning(
            'unresolved-reference',
            `Conjugation reference to "${source.target}" has no table`,
            entry.headword
          )
        )
        return base
      }
    }
  })

  return { entries: resolved, referencesResolved, referencesUnresolved }
}
