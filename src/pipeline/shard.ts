/**
 * Shard: one lane's or one thread's partial result
 *
 * Expansion and extraction of resolved entries into an index accumulator plus
 * its own diagnostics. The same functions run on the main thread and inside
 * the shard worker, so both paths produce identical shards.
 *
 * @module pipeline/shard
 */

import { expandTable } from '../conjugation/expander'
import { extractDefinitions } from '../definitions/extractor'
import { ConjugationSynthesisGap } from '../errors'
import { IndexAccumulator, type IndexSnapshot } from '../index-builder/accumulator'
import type { DuplicatePolicy } from '../index-builder/types'
import { isValidForm, normalizeForm } from '../utils/text'
import { Diagnostics, type DiagnosticsSnapshot } from './diagnostics'
import type { ResolvedEntry } from './resolve'

export interface Shard {
  index: IndexAccumulator
  diagnostics: Diagnostics
}

export interface ShardOptions {
  policy: DuplicatePolicy
  sampleLimit: number
}

export interface ShardSnapshot {
  index: IndexSnapshot
  diagnostics: DiagnosticsSnapshot
}

export function createShard(options: ShardOptions): Shard {
  return { index: new IndexAccumulator(options.policy), diagnostics: new Diagnostics(options.sampleLimit) }
}

export function mergeShards(into: Shard, from: Shard): Shard {
  return { index: into.index.merge(from.index), diagnostics: into.diagnostics.merge(from.diagnostics) }
}

/**
 * Expand and extract one resolved entry into a shard
 */
export function processEntry({ entry, table, alternativeOf }: ResolvedEntry, shard: Shard): void {
  const forms = new Set<string>()

  if (table) {
    const expansion = expandTable(table)
    for (const form of expansion.forms) forms.add(form)
    if (expansion.gaps.length > 0 && table.conjugationClass !== undefined) {
      shard.diagnostics.recordGap(new ConjugationSynthesisGap(entry.infinitive, expansion.gaps))
    }
    if (entry.reflexive) {
      const headword = normalizeForm(entry.headword)
      if (isValidForm(headword)) forms.add(headword)
    }
  }

  const record = extractDefinitions(entry, alternativeOf === undefined ? {} : { alternativeOf })
  shard.index.add(entry, forms, record)
}

export function snapshotShard(shard: Shard): ShardSnapshot {
  return { index: shard.index.snapshot(), diagnostics: shard.diagnostics.snapshot() }
}

export function restoreShard(snapshot: ShardSnapshot): Shard {
  return {
    index: IndexAccumulator.fromSnapshot(snapshot.index),
    diagnostics: Diagnostics.fromSnapshot(snapshot.diagnostics),
  }
}

/**
 * Process a whole batch into one shard, as a worker thread does
 */
export function compileShard(entries: readonly ResolvedEntry[], options: ShardOptions): ShardSnapshot {
  const shard = createShard(options)
  for (const resolved of entries) processEntry(resolved, shard)
  return snapshotShard(shard)
}
