/**
 * Definition Extractor
 *
 * Turns the raw sense blocks of a verb entry into cleaned, markup-free senses.
 *
 * @module definitions/extractor
 */

import type { PartOfSpeech, SenseBlock, VerbEntry } from '../parser/types'
import { hasLetter } from '../utils/text'
import { cleanMarkup } from '../wikitext/clean'

/**
 * One meaning of a verb
 */
export interface Sense {
  partOfSpeech: PartOfSpeech
  text: string
  examples: string[]
}

/**
 * Cleaned senses of one entry, keyed by its lemma
 */
export interface DefinitionRecord {
  lemma: string
  senses: Sense[]
}

export interface ExtractOptions {
  /** Verb this entry is an alternative form of, when that verb exists */
  alternativeOf?: string
}

/**
 * Clean one sense block; undefined when nothing readable is left
 */
export function cleanSense(block: SenseBlock): Sense | undefined {
  const text = cleanMarkup(block.markup)
  if (!hasLetter(text)) return undefined

  return {
    partOfSpeech: block.partOfSpeech,
    text,
    examples: block.examples.map(cleanMarkup).filter(hasLetter),
  }
}

export function alternativeFormSense(target: string): Sense {
  return { partOfSpeech: 'verb', text: `Forma alternativa de ${target}.`, examples: [] }
}

export function extractDefinitions(entry: VerbEntry, options: ExtractOptions = {}): DefinitionRecord {
  const senses: Sense[] = []
  for (const block of entry.senses) {
    const sense = cleanSense(block)
    if (sense) senses.push(sense)
  }
  if (options.alternativeOf !== undefined) {
    senses.push(alternativeFormSense(options.alternativeOf))
  }
  return { lemma: entry.infinitive, senses }
}
