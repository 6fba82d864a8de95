/**
 * Index Builder types
 *
 * @module index-builder/types
 */

import type { DefinitionRecord } from '../definitions/extractor'

/**
 * How senses of repeated entries for one lemma are combined:
 * - `merge`: every entry contributes, in dump order; a text already given by
 *   an earlier entry is dropped
 * - `last-wins`: only the last page that defines the lemma contributes
 */
export type DuplicatePolicy = 'merge' | 'last-wins'

export const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['merge', 'last-wins']

/** Dump position of an entry: page sequence, then homograph section */
export interface EntryOrigin {
  sequence: number
  homograph: number
}

/**
 * One line of the forms table
 */
export interface FormRecord {
  form: string
  /** Sorted, distinct */
  lemmas: string[]
}

/**
 * The two persisted structures, sorted and ready to serialize
 */
export interface IndexArtifacts {
  forms: FormRecord[]
  definitions: DefinitionRecord[]
}

/** One artifact file as listed in the manifest */
export interface ManifestFile {
  file: string
  records: number
  sha256: string
}

export interface Manifest {
  version: number
  createdAt: string
  forms: ManifestFile
  definitions: ManifestFile
}
