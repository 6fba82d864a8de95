import { describe, it, expect } from 'vitest'
import {
  compareStrings,
  hasLetter,
  isValidForm,
  isValidLemma,
  normalizeForm,
  stripReflexive,
} from '@/utils/text'

describe('normalizeForm', () => {
  it('trims and lower-cases', () => {
    expect(normalizeForm('  Parlàvem ')).toBe('parlàvem')
  })

  it('composes to NFC', () => {
    expect(normalizeForm('parla\u0300')).toBe('parl\u00e0')
  })

  it('maps typographic apostrophes to the ASCII one', () => {
    expect(normalizeForm('d’aquí')).toBe("d'aquí")
    expect(normalizeForm('témerʼs')).toBe("témer's")
  })

  it('expands the precomposed l with middle dot', () => {
    expect(normalizeForm('coŀlegiar')).toBe('col·legiar')
  })

  it('keeps diacritics', () => {
    expect(normalizeForm('És')).toBe('és')
    expect(normalizeForm('és')).not.toBe(normalizeForm('es'))
  })
})

describe('isValidLemma', () => {
  it('accepts Catalan infinitives', () => {
    expect(isValidLemma('parlar')).toBe(true)
    expect(isValidLemma('col·legiar')).toBe(true)
    expect(isValidLemma('témer')).toBe(true)
  })

  it('rejects digits, punctuation and empty strings', () => {
    expect(isValidLemma('parlar2')).toBe(false)
    expect(isValidLemma('parlar!')).toBe(false)
    expect(isValidLemma('')).toBe(false)
    expect(isValidLemma('-se')).toBe(false)
  })
})

describe('isValidForm', () => {
  it('accepts forms with hyphens and apostrophes', () => {
    expect(isValidForm('rentar-se')).toBe(true)
    expect(isValidForm("témer's")).toBe(true)
  })

  it('rejects empty strings and digits', () => {
    expect(isValidForm('')).toBe(false)
    expect(isValidForm('parla2')).toBe(false)
  })
})

describe('stripReflexive', () => {
  it('removes -se, -se\'n and \'s', () => {
    expect(stripReflexive('rentar-se')).toEqual({ base: 'rentar', reflexive: true })
    expect(stripReflexive("penedir-se'n")).toEqual({ base: 'penedir', reflexive: true })
    expect(stripReflexive("témer's")).toEqual({ base: 'témer', reflexive: true })
  })

  it('leaves other headwords alone', () => {
    expect(stripReflexive('parlar')).toEqual({ base: 'parlar', reflexive: false })
    expect(stripReflexive('-se')).toEqual({ base: '-se', reflexive: false })
  })
})

describe('compareStrings', () => {
  it('sorts by code unit', () => {
    expect(['b', 'à', 'a', 'B'].sort(compareStrings)).toEqual(['B', 'a', 'b', 'à'])
  })
})

describe('hasLetter', () => {
  it('detects letters', () => {
    expect(hasLetter('1. a')).toBe(true)
    expect(hasLetter('…, 2.')).toBe(false)
  })
})
