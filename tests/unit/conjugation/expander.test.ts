import { describe, it, expect } from 'vitest'
import { expand, expandTable, synthesizeSlot } from '@/conjugation/expander'
import { adjustStem } from '@/conjugation/paradigms'
import { ALL_SLOTS, type ConjugationTable, type SlotKey, type StemTarget } from '@/conjugation/types'

/** Helper to create a table with sensible defaults (parlar) */
function makeTable(overrides: Partial<ConjugationTable> = {}): ConjugationTable {
  return {
    template: 'ca.v.conj.ar',
    conjugationClass: 'ar',
    stem: 'parl',
    explicit: new Map<SlotKey, string[]>(),
    stemOverrides: new Map<StemTarget, string>(),
    ignoredArgs: [],
    ...overrides,
  }
}

const PARLAR_FORMS = [
  'parla', 'parlada', 'parlades', 'parlant', 'parlar', 'parlaran', 'parlarem', 'parlaren', 'parlares',
  'parlareu', 'parlaria', 'parlarien', 'parlaries', 'parlarà', 'parlaràs', 'parlaré', 'parlaríem',
  'parlaríeu', 'parlat', 'parlats', 'parlava', 'parlaven', 'parlaves', 'parlem', 'parlen', 'parles',
  'parlessin', 'parlessis', 'parleu', 'parli', 'parlin', 'parlis', 'parlo', 'parlà', 'parlàrem',
  'parlàreu', 'parlàvem', 'parlàveu', 'parlés', 'parléssim', 'parléssiu', 'parlí',
]

describe('expand', () => {
  // ===========================================================================
  // Regular paradigms
  // ===========================================================================
  describe('regular paradigms', () => {
    it('expands parlar into exactly its 42 distinct forms', () => {
      const forms = expand(makeTable())
      expect([...forms].sort()).toEqual([...PARLAR_FORMS].sort())
      expect(forms.size).toBe(42)
    })

    it('fills every slot of a regular table', () => {
      expect(ALL_SLOTS).toHaveLength(53)
      expect(expandTable(makeTable()).gaps).toEqual([])
    })

    it('conjugates the re class on the r future stem', () => {
      const table = makeTable({ template: 'ca.v.conj.re', conjugationClass: 're', stem: 'perd' })
      expect(synthesizeSlot(table, 'inf')).toBe('perdre')
      expect(synthesizeSlot(table, 'ind.pres.2s')).toBe('perds')
      expect(synthesizeSlot(table, 'ind.pres.3s')).toBe('perd')
      expect(synthesizeSlot(table, 'ind.fut.1s')).toBe('perdré')
      expect(synthesizeSlot(table, 'cond.pres.1p')).toBe('perdríem')
      expect(synthesizeSlot(table, 'ger')).toBe('perdent')
      expect(synthesizeSlot(table, 'part.fs')).toBe('perduda')
      expect(synthesizeSlot(table, 'imp.pres.2s')).toBe('perd')
    })

    it('conjugates the inchoative ir class with -eix-', () => {
      const table = makeTable({ template: 'ca.v.conj.ir-eix', conjugationClass: 'ir-eix', stem: 'serv' })
      expect(synthesizeSlot(table, 'ind.pres.1s')).toBe('serveixo')
      expect(synthesizeSlot(table, 'ind.pres.1p')).toBe('servim')
      expect(synthesizeSlot(table, 'ind.pres.3p')).toBe('serveixen')
      expect(synthesizeSlot(table, 'subj.pres.3s')).toBe('serveixi')
      expect(synthesizeSlot(table, 'imp.pres.2s')).toBe('serveix')
      expect(synthesizeSlot(table, 'ind.fut.1s')).toBe('serviré')
      expect(synthesizeSlot(table, 'part.ms')).toBe('servit')
    })

    it('conjugates the pure ir class', () => {
      const table = makeTable({ template: 'ca.v.conj.ir', conjugationClass: 'ir', stem: 'dorm' })
      expect(synthesizeSlot(table, 'ind.pres.1s')).toBe('dormo')
      expect(synthesizeSlot(table, 'ind.pres.2s')).toBe('dorms')
      expect(synthesizeSlot(table, 'ind.pres.2p')).toBe('dormiu')
      expect(synthesizeSlot(table, 'ger')).toBe('dormint')
    })

    it('conjugates the er class', () => {
      const table = makeTable({ template: 'ca.v.conj.er', conjugationClass: 'er', stem: 'tem' })
      expect(synthesizeSlot(table, 'inf')).toBe('temer')
      expect(synthesizeSlot(table, 'ind.pres.3s')).toBe('tem')
      expect(synthesizeSlot(table, 'ind.fut.1s')).toBe('temeré')
      expect(synthesizeSlot(table, 'part.ms')).toBe('temut')
    })
  })

  // ===========================================================================
  // Spelling alternations
  // ===========================================================================
  describe('spelling alternations', () => {
    it('writes c as qu before a front vowel', () => {
      const table = makeTable({ stem: 'toc' })
      expect(synthesizeSlot(table, 'ind.pres.1s')).toBe('toco')
      expect(synthesizeSlot(table, 'ind.pres.2s')).toBe('toques')
      expect(synthesizeSlot(table, 'ind.pres.1p')).toBe('toquem')
      expect(synthesizeSlot(table, 'ind.pret.1s')).toBe('toquí')
      expect(synthesizeSlot(table, 'subj.impf.1s')).toBe('toqués')
      expect(synthesizeSlot(table, 'ind.fut.1s')).toBe('tocaré')
    })

    it('applies the ç, j, g, gu and qu alternations', () => {
      expect(adjustStem('començ', 'i', 'ar')).toBe('comenc')
      expect(adjustStem('menj', 'em', 'ar')).toBe('meng')
      expect(adjustStem('jug', 'i', 'ar')).toBe('jugu')
      expect(adjustStem('averigu', 'em', 'ar')).toBe('averigü')
      expect(adjustStem('obliqu', 'i', 'ar')).toBe('obliqü')
    })

    it('leaves stems alone before back vowels and outside the ar class', () => {
      expect(adjustStem('toc', 'o', 'ar')).toBe('toc')
      expect(adjustStem('venc', 'em', 're')).toBe('venc')
    })
  })

  // ===========================================================================
  // Irregular tables
  // ===========================================================================
  describe('irregular tables', () => {
    it('emits explicit forms instead of the synthesized slot', () => {
      const forms = expand(
        makeTable({ explicit: new Map<SlotKey, string[]>([['ind.pres.1s', [' Vaig ', 'vaj']]]) })
      )
      expect(forms.has('vaig')).toBe(true)
      expect(forms.has('vaj')).toBe(true)
      expect(forms.has('parlo')).toBe(false)
    })

    it('builds the future and conditional on an irregular future stem', () => {
      const table = makeTable({ stem: 'an', stemOverrides: new Map<StemTarget, string>([['ind.fut', 'anir']]) })
      expect(synthesizeSlot(table, 'ind.fut.1s')).toBe('aniré')
      expect(synthesizeSlot(table, 'cond.pres.1s')).toBe('aniria')
      expect(synthesizeSlot(table, 'ind.pres.1p')).toBe('anem')
    })

    it('prefers a conditional stem override over the future one', () => {
      const table = makeTable({
        stem: 'an',
        stemOverrides: new Map<StemTarget, string>([
          ['ind.fut', 'anir'],
          ['cond.pres', 'anr'],
        ]),
      })
      expect(synthesizeSlot(table, 'cond.pres.1s')).toBe('anria')
    })

    it('takes override stems as written', () => {
      const table = makeTable({ stemOverrides: new Map<StemTarget, string>([['subj.pres', 'vag']]) })
      expect(synthesizeSlot(table, 'subj.pres.1s')).toBe('vagi')
      expect(synthesizeSlot(table, 'ind.pres.1s')).toBe('parlo')
    })

    it('uses participle and gerund stem overrides', () => {
      const table = makeTable({
        template: 'ca.v.conj.re',
        conjugationClass: 're',
        stem: 'viu',
        stemOverrides: new Map<StemTarget, string>([
          ['part', 'visc'],
          ['ger', 'viv'],
        ]),
      })
      expect(synthesizeSlot(table, 'part.ms')).toBe('viscut')
      expect(synthesizeSlot(table, 'part.fp')).toBe('viscudes')
      expect(synthesizeSlot(table, 'ger')).toBe('vivent')
    })
  })

  // ===========================================================================
  // Gaps
  // ===========================================================================
  describe('gaps', () => {
    it('reports every slot a class-less table cannot fill', () => {
      const table: ConjugationTable = {
        template: 'ca.v.conj.desconeguda',
        explicit: new Map<SlotKey, string[]>([
          ['inf', ['fer']],
          ['ind.pres.1s', ['faig']],
        ]),
        stemOverrides: new Map<StemTarget, string>(),
        ignoredArgs: [],
      }
      const expansion = expandTable(table)
      expect([...expansion.forms].sort()).toEqual(['faig', 'fer'])
      expect(expansion.gaps).toHaveLength(51)
      expect(expansion.gaps).not.toContain('inf')
    })

    it('synthesizes nothing without a stem', () => {
      expect(synthesizeSlot(makeTable({ stem: '' }), 'ind.pres.1s')).toBeUndefined()
    })
  })
})
