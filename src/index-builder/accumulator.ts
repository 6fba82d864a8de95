/**
 * IndexAccumulator: one worker shard's partial index
 *
 * Shards merge commutatively and associatively: forms are set unions, and
 * every sense carries its dump origin so the final order is fixed by the dump,
 * not by which shard saw the entry first.
 *
 * @module index-builder/accumulator
 */

import type { DefinitionRecord, Sense } from '../definitions/extractor'
import type { VerbEntry } from '../parser/types'
import { compareStrings } from '../utils/text'
import type { DuplicatePolicy, EntryOrigin, FormRecord, IndexArtifacts } from './types'

export interface StoredSense {
  origin: EntryOrigin
  index: number
  sense: Sense
}

/**
 * Plain-data copy of a shard, safe to post between threads
 */
export interface IndexSnapshot {
  policy: DuplicatePolicy
  forms: Array<[string, string[]]>
  senses: Array<[string, StoredSense[]]>
  latest: Array<[string, number]>
}

function compareStored(a: StoredSense, b: StoredSense): number {
  return (
    a.origin.sequence - b.origin.sequence ||
    a.origin.homograph - b.origin.homograph ||
    a.index - b.index
  )
}

export class IndexAccumulator {
  private readonly forms = new Map<string, Set<string>>()
  private readonly senses = new Map<string, StoredSense[]>()
  /** Latest page sequence seen per lemma (last-wins) */
  private readonly latest = new Map<string, number>()

  constructor(readonly policy: DuplicatePolicy = 'merge') {}

  /** Number of distinct surface forms so far */
  get formCount(): number {
    return this.forms.size
  }

  /** Number of lemmas with a definitions record so far */
  get lemmaCount(): number {
    return this.senses.size
  }

  addForms(lemma: string, forms: Iterable<string>): void {
    for (const form of forms) {
      let lemmas = this.forms.get(form)
      if (!lemmas) {
        lemmas = new Set()
        this.forms.set(form, lemmas)
      }
      lemmas.add(lemma)
    }
  }

  addDefinitions(record: DefinitionRecord, origin: EntryOrigin): void {
    const stored = this.senses.get(record.lemma) ?? []
    this.senses.set(record.lemma, stored)
    record.senses.forEach((sense, index) => {
      stored.push({ origin, index, sense })
    })
    this.markLatest(record.lemma, origin.sequence)
  }

  private markLatest(lemma: string, sequence: number): void {
    const current = this.latest.get(lemma)
    if (current === undefined || sequence > current) {
      this.latest.set(lemma, sequence)
    }
  }

  /**
   * Add one entry's forms and definitions
   */
  add(entry: VerbEntry, forms: Iterable<string>, record: DefinitionRecord): void {
    this.addForms(entry.infinitive, forms)
    this.addDefinitions(record, { sequence: entry.sequence, homograph: entry.homograph })
  }

  snapshot(): IndexSnapshot {
    return {
      policy: this.policy,
      forms: [...this.forms].map(([form, lemmas]): [string, string[]] => [form, [...lemmas]]),
      senses: [...this.senses].map(([lemma, stored]): [string, StoredSense[]] => [lemma, [...stored]]),
      latest: [...this.latest],
    }
  }

  static fromSnapshot(snapshot: IndexSnapshot): IndexAccumulator {
    const index = new IndexAccumulator(snapshot.policy)
    for (const [form, lemmas] of snapshot.forms) index.forms.set(form, new Set(lemmas))
    for (const [lemma, stored] of snapshot.senses) index.senses.set(lemma, [...stored])
    for (const [lemma, sequence] of snapshot.latest) index.latest.set(lemma, sequence)
    return index
  }

  /**
   * Fold another shard into this one
   */
  merge(other: IndexAccumulator): this {
    for (const [form, lemmas] of other.forms) {
      let target = this.forms.get(form)
      if (!target) {
        target = new Set()
        this.forms.set(form, target)
      }
      for (const lemma of lemmas) target.add(lemma)
    }
    for (const [lemma, stored] of other.senses) {
      const target = this.senses.get(lemma)
      if (target) {
        target.push(...stored)
      } else {
        this.senses.set(lemma, [...stored])
      }
    }
    for (const [lemma, sequence] of other.latest) {
      this.markLatest(lemma, sequence)
    }
    return this
  }

  private resolveSenses(lemma: string, stored: readonly StoredSense[]): Sense[] {
    let selected = [...stored].sort(compareStored)

    const last = this.latest.get(lemma)
    if (this.policy === 'last-wins' && last !== undefined) {
      selected = selected.filter((s) => s.origin.sequence === last)
    }

    // A text repeated by a later entry is dropped; repeats within one entry stay
    const firstOrigin = new Map<string, string>()
    const senses: Sense[] = []
    for (const { origin, sense } of selected) {
      const key = `${origin.sequence}:${origin.homograph}`
      const first = firstOrigin.get(sense.text)
      if (first === undefined) {
        firstOrigin.set(sense.text, key)
      } else if (first !== key) {
        continue
      }
      senses.push(sense)
    }
    return senses
  }

  /**
   * Sorted artifacts for serialization
   */
  toArtifacts(): IndexArtifacts {
    const forms: FormRecord[] = [...this.forms.entries()]
      .map(([form, lemmas]) => ({ form, lemmas: [...lemmas].sort(compareStrings) }))
      .sort((a, b) => compareStrings(a.form, b.form))

    const definitions: DefinitionRecord[] = [...this.senses.entries()]
      .map(([lemma, stored]) => ({ lemma, senses: this.resolveSenses(lemma, stored) }))
      .sort((a, b) => compareStrings(a.lemma, b.lemma))

    return { forms, definitions }
  }
}
