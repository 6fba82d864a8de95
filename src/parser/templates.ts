/**
 * Template classification
 *
 * Maps a raw TemplateCall onto the closed TemplateInvocation variant. Argument
 * names are interpreted here and nowhere else.
 *
 * @module parser/templates
 */

import {
  isConjugationClass,
  isSlotKey,
  isStemTarget,
  type SlotKey,
  type StemTarget,
} from '../conjugation/types'
import { normalizeForm, stripReflexive } from '../utils/text'
import type { TemplateCall } from '../wikitext/templates'
import type { PartOfSpeech, TemplateInvocation } from './types'

const CONJUGATION_PREFIX = 'ca.v.conj.'
const REFERENCE_TEMPLATE = 'ca.v.conj.ref'
const HEADWORD_TEMPLATE = 'ca-verb'
const LABEL_TEMPLATES: ReadonlySet<string> = new Set(['marca', 'marca-nocat'])
const ALTERNATIVE_TEMPLATE = 'forma-a'
const LANGUAGE_CODE = 'ca'

const HEADWORD_FLAGS: ReadonlyMap<string, PartOfSpeech> = new Map([
  ['t', 'transitive-verb'],
  ['tr', 'transitive-verb'],
  ['i', 'intransitive-verb'],
  ['intr', 'intransitive-verb'],
  ['p', 'pronominal-verb'],
  ['pron', 'pronominal-verb'],
  ['aux', 'auxiliary-verb'],
])

const LABELS: ReadonlyMap<string, PartOfSpeech> = new Map([
  ['transitiu', 'transitive-verb'],
  ['intransitiu', 'intransitive-verb'],
  ['pronominal', 'pronominal-verb'],
  ['auxiliar', 'auxiliary-verb'],
])

/** Separators between variants listed in one slot argument */
const VARIANT_SEPARATOR = /[,/]/

/**
 * MediaWiki treats the first letter of a template name case-insensitively and
 * underscores as spaces.
 */
export function canonicalTemplateName(name: string): string {
  const trimmed = name.trim().replace(/_/g, ' ')
  return trimmed.charAt(0).toLowerCase() + trimmed.slice(1)
}

/** Lemma named by a template argument, reflexive pronoun removed */
function targetLemma(value: string | undefined): string | undefined {
  if (value === undefined) return undefined
  const lemma = stripReflexive(normalizeForm(value)).base
  return lemma === '' ? undefined : lemma
}

function classifyConjugation(call: TemplateCall, name: string): TemplateInvocation {
  const className = name.slice(CONJUGATION_PREFIX.length)
  const explicit = new Map<SlotKey, string[]>()
  const stemOverrides = new Map<StemTarget, string>()
  const ignoredArgs: string[] = []

  for (const [rawKey, value] of call.named) {
    const key = rawKey.trim().toLowerCase()
    if (isSlotKey(key)) {
      const variants = value
        .split(VARIANT_SEPARATOR)
        .map((variant) => variant.trim())
        .filter((variant) => variant !== '')
      if (variants.length > 0) explicit.set(key, variants)
      continue
    }
    const target = key.startsWith('stem.') ? key.slice('stem.'.length) : undefined
    if (target !== undefined && isStemTarget(target) && value.trim() !== '') {
      stemOverrides.set(target, normalizeForm(value))
      continue
    }
    ignoredArgs.push(rawKey)
  }

  call.positional.slice(1).forEach((_arg, index) => ignoredArgs.push(String(index + 2)))

  const stem = call.positional[0] === undefined ? '' : normalizeForm(call.positional[0])

  return {
    kind: 'conjugation',
    template: name,
    ...(isConjugationClass(className) ? { conjugationClass: className } : {}),
    ...(stem !== '' ? { stem } : {}),
    explicit,
    stemOverrides,
    ignoredArgs,
  }
}

/**
 * Classify one template invocation
 */
export function classifyTemplate(call: TemplateCall): TemplateInvocation {
  const name = canonicalTemplateName(call.name)

  if (name === REFERENCE_TEMPLATE) {
    const target = targetLemma(call.positional[0])
    return target === undefined ? { kind: 'reference' } : { kind: 'reference', target }
  }

  if (name.startsWith(CONJUGATION_PREFIX) && name.length > CONJUGATION_PREFIX.length) {
    return classifyConjugation(call, name)
  }

  if (name === HEADWORD_TEMPLATE) {
    for (const flag of call.positional) {
      const partOfSpeech = HEADWORD_FLAGS.get(flag.trim().toLowerCase())
      if (partOfSpeech !== undefined) return { kind: 'headword', partOfSpeech }
    }
    return { kind: 'headword' }
  }

  const [language, ...rest] = call.positional

  if (LABEL_TEMPLATES.has(name) && language === LANGUAGE_CODE) {
    const labels = rest.map((label) => label.trim().toLowerCase()).filter((label) => label !== '')
    const partOfSpeech = labels.map((label) => LABELS.get(label)).find((pos) => pos !== undefined)
    return partOfSpeech === undefined ? { kind: 'label', labels } : { kind: 'label', labels, partOfSpeech }
  }

  if (name === ALTERNATIVE_TEMPLATE && language === LANGUAGE_CODE) {
    const target = targetLemma(rest[0])
    return target === undefined ? { kind: 'alternative' } : { kind: 'alternative', target }
  }

  return { kind: 'other', name }
}
