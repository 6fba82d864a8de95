import { describe, it, expect } from 'vitest'
import type { Sense } from '@/definitions/extractor'
import { IndexAccumulator } from '@/index-builder/accumulator'
import type { DuplicatePolicy } from '@/index-builder/types'
import type { VerbEntry } from '@/parser/types'

function makeEntry(infinitive: string, sequence: number, homograph = 0): VerbEntry {
  return {
    infinitive,
    headword: infinitive,
    reflexive: false,
    conjugation: { kind: 'none' },
    senses: [],
    sequence,
    homograph,
  }
}

function makeSense(text: string): Sense {
  return { partOfSpeech: 'verb', text, examples: [] }
}

function addEntry(
  index: IndexAccumulator,
  infinitive: string,
  sequence: number,
  texts: string[],
  forms: string[] = [],
  homograph = 0
): void {
  index.add(makeEntry(infinitive, sequence, homograph), forms, {
    lemma: infinitive,
    senses: texts.map(makeSense),
  })
}

function sensesOf(index: IndexAccumulator, lemma: string): string[] | undefined {
  return index
    .toArtifacts()
    .definitions.find((record) => record.lemma === lemma)
    ?.senses.map((sense) => sense.text)
}

describe('IndexAccumulator', () => {
  // ===========================================================================
  // Forms
  // ===========================================================================
  describe('forms', () => {
    it('maps shared forms to every lemma, sorted by code unit', () => {
      const index = new IndexAccumulator()
      addEntry(index, 'ser', 0, [], ['és', 'estat'])
      addEntry(index, 'estar', 1, [], ['estat', 'està'])

      expect(index.toArtifacts().forms).toEqual([
        { form: 'estat', lemmas: ['estar', 'ser'] },
        { form: 'està', lemmas: ['estar'] },
        { form: 'és', lemmas: ['ser'] },
      ])
      expect(index.formCount).toBe(3)
      expect(index.lemmaCount).toBe(2)
    })

    it('keeps a definitions record for a lemma without senses', () => {
      const index = new IndexAccumulator()
      addEntry(index, 'parlar', 0, [])
      expect(index.toArtifacts().definitions).toEqual([{ lemma: 'parlar', senses: [] }])
    })
  })

  // ===========================================================================
  // Duplicate policies
  // ===========================================================================
  describe('duplicate policies', () => {
    it('merges senses in dump order and drops exact repeats', () => {
      const index = new IndexAccumulator('merge')
      addEntry(index, 'cantar', 5, ['Fer cançons.', 'Delatar.'])
      addEntry(index, 'cantar', 2, ['Entonar.', 'Fer cançons.'])

      expect(sensesOf(index, 'cantar')).toEqual(['Entonar.', 'Fer cançons.', 'Delatar.'])
    })

    it('keeps a sense repeated within one entry', () => {
      const index = new IndexAccumulator('merge')
      addEntry(index, 'parlar', 0, ['Dir paraules.', 'Dir paraules.'])

      expect(sensesOf(index, 'parlar')).toEqual(['Dir paraules.', 'Dir paraules.'])
    })

    it('drops a repeat from another homograph section of the same page', () => {
      const index = new IndexAccumulator('merge')
      addEntry(index, 'parlar', 0, ['Dir paraules.', 'Dir paraules.'])
      addEntry(index, 'parlar', 0, ['Dir paraules.', 'Conversar.'], [], 1)

      expect(sensesOf(index, 'parlar')).toEqual(['Dir paraules.', 'Dir paraules.', 'Conversar.'])
    })

    it('orders homograph sections within a page', () => {
      const index = new IndexAccumulator('merge')
      addEntry(index, 'cantar', 3, ['Segon.'], [], 1)
      addEntry(index, 'cantar', 3, ['Primer.'], [], 0)

      expect(sensesOf(index, 'cantar')).toEqual(['Primer.', 'Segon.'])
    })

    it('keeps only the last page under last-wins', () => {
      const index = new IndexAccumulator('last-wins')
      addEntry(index, 'cantar', 5, ['Fer cançons.', 'Delatar.'])
      addEntry(index, 'cantar', 2, ['Entonar.'])

      expect(sensesOf(index, 'cantar')).toEqual(['Fer cançons.', 'Delatar.'])
    })

    it('lets a later page without senses win', () => {
      const index = new IndexAccumulator('last-wins')
      addEntry(index, 'cantar', 1, ['Entonar.'])
      addEntry(index, 'cantar', 4, [])

      expect(sensesOf(index, 'cantar')).toEqual([])
    })
  })

  // ===========================================================================
  // Merging shards
  // ===========================================================================
  describe('merge', () => {
    const policies: DuplicatePolicy[] = ['merge', 'last-wins']

    for (const policy of policies) {
      it(`gives the same artifacts in either order (${policy})`, () => {
        const build = () => {
          const a = new IndexAccumulator(policy)
          addEntry(a, 'cantar', 4, ['Delatar.'], ['canto', 'cantat'])
          addEntry(a, 'ser', 0, ['Existir.'], ['estat'])
          const b = new IndexAccumulator(policy)
          addEntry(b, 'cantar', 1, ['Fer cançons.'], ['canta'])
          addEntry(b, 'estar', 2, ['Romandre.'], ['estat'])
          return [a, b] as const
        }

        const [a1, b1] = build()
        const [a2, b2] = build()
        const forward = a1.merge(b1).toArtifacts()
        const backward = b2.merge(a2).toArtifacts()

        expect(backward).toEqual(forward)
        expect(forward.forms.find((record) => record.form === 'estat')?.lemmas).toEqual(['estar', 'ser'])
      })
    }

    it('applies last-wins across shards', () => {
      const early = new IndexAccumulator('last-wins')
      addEntry(early, 'cantar', 1, ['Entonar.'])
      const late = new IndexAccumulator('last-wins')
      addEntry(late, 'cantar', 9, ['Delatar.'])

      expect(sensesOf(late.merge(early), 'cantar')).toEqual(['Delatar.'])
    })
  })
})
