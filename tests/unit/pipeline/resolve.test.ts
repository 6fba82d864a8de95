import { describe, it, expect } from 'vitest'
import type { ConjugationTable } from '@/conjugation/types'
import type { ConjugationSource, VerbEntry } from '@/parser/types'
import { Diagnostics } from '@/pipeline/diagnostics'
import { resolveEntries } from '@/pipeline/resolve'

function makeTable(stem: string): ConjugationTable {
  return {
    template: 'ca.v.conj.ar',
    conjugationClass: 'ar',
    stem,
    explicit: new Map(),
    stemOverrides: new Map(),
    ignoredArgs: [],
  }
}

function makeEntry(
  infinitive: string,
  conjugation: ConjugationSource,
  sequence: number,
  extra: Partial<VerbEntry> = {}
): VerbEntry {
  return {
    infinitive,
    headword: infinitive,
    reflexive: false,
    conjugation,
    senses: [],
    sequence,
    homograph: 0,
    ...extra,
  }
}

function reference(target: string, implicit = false): ConjugationSource {
  return { kind: 'reference', target, implicit }
}

describe('resolveEntries', () => {
  it('resolves a reference to a table that appears later in the dump', () => {
    const table = makeTable('rent')
    const diagnostics = new Diagnostics()
    const resolution = resolveEntries(
      [
        makeEntry('rentar', reference('rentar', true), 0, { headword: 'rentar-se', reflexive: true }),
        makeEntry('rentar', { kind: 'table', table }, 3),
      ],
      diagnostics
    )

    expect(resolution.entries.map((resolved) => resolved.table)).toEqual([table, table])
    expect(resolution.referencesResolved).toBe(1)
    expect(resolution.referencesUnresolved).toBe(0)
    expect(diagnostics.warningCount).toBe(0)
  })

  it('follows chains of references', () => {
    const table = makeTable('cant')
    const resolution = resolveEntries(
      [
        makeEntry('encantar', reference('decantar'), 0),
        makeEntry('decantar', reference('cantar'), 1),
        makeEntry('cantar', { kind: 'table', table }, 2),
      ],
      new Diagnostics()
    )

    expect(resolution.entries[0]?.table).toBe(table)
    expect(resolution.referencesResolved).toBe(2)
  })

  it('gives up on cycles and records a warning per entry', () => {
    const diagnostics = new Diagnostics()
    const resolution = resolveEntries(
      [makeEntry('anar', reference('venir'), 0), makeEntry('venir', reference('anar'), 1)],
      diagnostics
    )

    expect(resolution.entries.every((resolved) => resolved.table === undefined)).toBe(true)
    expect(resolution.referencesUnresolved).toBe(2)
    expect(diagnostics.summary().warnings).toEqual([
      {
        reason: 'unresolved-reference',
        count: 2,
        samples: [
          'anar: Conjugation reference to "venir" has no table',
          'venir: Conjugation reference to "anar" has no table',
        ],
      },
    ])
  })

  it('stops following after the maximum depth', () => {
    const names = Array.from({ length: 11 }, (_, index) => `v${index}`)
    const entries = names.map((name, index) => {
      const next = names[index + 1]
      return makeEntry(name, next === undefined ? { kind: 'table', table: makeTable('v') } : reference(next), index)
    })

    const resolution = resolveEntries(entries, new Diagnostics())

    expect(resolution.entries[0]?.table).toBeUndefined()
    expect(resolution.entries[1]?.table).toBeDefined()
  })

  it('keeps alternative-form targets only when the target is a known verb', () => {
    const resolution = resolveEntries(
      [
        makeEntry('atényer', { kind: 'none' }, 0, { alternativeOf: 'atènyer' }),
        makeEntry('complànyer', { kind: 'none' }, 1, { alternativeOf: 'complanyer' }),
        makeEntry('atènyer', { kind: 'none' }, 2),
      ],
      new Diagnostics()
    )

    expect(resolution.entries.map((resolved) => resolved.alternativeOf)).toEqual(['atènyer', undefined, undefined])
  })

  it('orders entries by page and section', () => {
    const resolution = resolveEntries(
      [
        makeEntry('b', { kind: 'none' }, 2),
        makeEntry('a', { kind: 'none' }, 1, { homograph: 1 }),
        makeEntry('a', { kind: 'none' }, 1),
      ],
      new Diagnostics()
    )

    expect(resolution.entries.map(({ entry }) => [entry.sequence, entry.homograph])).toEqual([
      [1, 0],
      [1, 1],
      [2, 0],
    ])
  })
})
