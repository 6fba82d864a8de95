/**
 * Per-run diagnostics: warning counts by reason with a bounded sample list,
 * and conjugation synthesis gaps.
 *
 * Merging two collectors is commutative: counts add up, and samples are kept
 * as the first N in sorted order.
 *
 * @module pipeline/diagnostics
 */

import type { ConjugationSynthesisGap, EntryParseReason, EntryParseWarning } from '../errors'
import { logger } from '../utils/logger'
import { compareStrings } from '../utils/text'

export const DEFAULT_WARNING_SAMPLES = 20

export interface WarningSummary {
  reason: EntryParseReason
  count: number
  samples: string[]
}

export interface GapSummary {
  /** Entries with at least one unfilled slot */
  entries: number
  /** Unfilled slots over all entries */
  slots: number
  samples: string[]
}

export interface DiagnosticsSummary {
  warnings: WarningSummary[]
  gaps: GapSummary
}

/**
 * Plain-data copy of a collector, safe to post between threads
 */
export interface DiagnosticsSnapshot {
  sampleLimit: number
  counts: Array<[EntryParseReason, number]>
  samples: Array<[EntryParseReason, string[]]>
  gapEntries: number
  gapSlots: number
  gapSamples: string[]
}

function keepSamples(samples: string[], limit: number): string[] {
  return [...new Set(samples)].sort(compareStrings).slice(0, limit)
}

export class Diagnostics {
  private readonly counts = new Map<EntryParseReason, number>()
  private readonly samples = new Map<EntryParseReason, string[]>()
  private gapEntries = 0
  private gapSlots = 0
  private gapSamples: string[] = []

  constructor(readonly sampleLimit: number = DEFAULT_WARNING_SAMPLES) {}

  get warningCount(): number {
    let total = 0
    for (const count of this.counts.values()) total += count
    return total
  }

  count(reason: EntryParseReason): number {
    return this.counts.get(reason) ?? 0
  }

  recordWarning(warning: EntryParseWarning): void {
    logger.debug(`[diagnostics] ${warning.reason}: ${warning.message}`)
    this.counts.set(warning.reason, this.count(warning.reason) + 1)
    const sample = warning.title === undefined ? warning.message : `${warning.title}: ${warning.message}`
    this.samples.set(warning.reason, keepSamples([...(this.samples.get(warning.reason) ?? []), sample], this.sampleLimit))
  }

  recordGap(gap: ConjugationSynthesisGap): void {
    this.gapEntries++
    this.gapSlots += gap.slots.length
    this.gapSamples = keepSamples([...this.gapSamples, `${gap.lemma}: ${gap.slots.join(', ')}`], this.sampleLimit)
  }

  merge(other: Diagnostics): this {
    for (const [reason, count] of other.counts) {
      this.counts.set(reason, this.count(reason) + count)
      this.samples.set(
        reason,
        keepSamples([...(this.samples.get(reason) ?? []), ...(other.samples.get(reason) ?? [])], this.sampleLimit)
      )
    }
    this.gapEntries += other.gapEntries
    this.gapSlots += other.gapSlots
    this.gapSamples = keepSamples([...this.gapSamples, ...other.gapSamples], this.sampleLimit)
    return this
  }

  snapshot(): DiagnosticsSnapshot {
    return {
      sampleLimit: this.sampleLimit,
      counts: [...this.counts],
      samples: [...this.samples].map(([reason, samples]): [EntryParseReason, string[]] => [reason, [...samples]]),
      gapEntries: this.gapEntries,
      gapSlots: this.gapSlots,
      gapSamples: [...this.gapSamples],
    }
  }

  static fromSnapshot(snapshot: DiagnosticsSnapshot): Diagnostics {
    const diagnostics = new Diagnostics(snapshot.sampleLimit)
    for (const [reason, count] of snapshot.counts) diagnostics.counts.set(reason, count)
    for (const [reason, samples] of snapshot.samples) diagnostics.samples.set(reason, [...samples])
    diagnostics.gapEntries = snapshot.gapEntries
    diagnostics.gapSlots = snapshot.gapSlots
    diagnostics.gapSamples = [...snapshot.gapSamples]
    return diagnostics
  }

  summary(): DiagnosticsSummary {
    const warnings = [...this.counts.entries()]
      .map(([reason, count]) => ({ reason, count, samples: [...(this.samples.get(reason) ?? [])] }))
      .sort((a, b) => compareStrings(a.reason, b.reason))

    return {
      warnings,
      gaps: { entries: this.gapEntries, slots: this.gapSlots, samples: [...this.gapSamples] },
    }
  }
}
