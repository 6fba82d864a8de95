/**
 * Artifact Reader
 *
 * Loads the persisted forms table and definitions store and answers point
 * lookups: normalize the query, find its lemma candidates, attach each
 * candidate's senses. No fuzzy fallback.
 *
 * @module lookup/reader
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { Sense } from '../definitions/extractor'
import { IndexLoadError, toError } from '../errors'
import { ManifestSchema, MANIFEST_FILE, parseDefinitions, parseForms } from '../index-builder/serialize'
import type { Manifest, ManifestFile } from '../index-builder/types'
import { sha256 } from '../utils/hash'
import { normalizeForm } from '../utils/text'

export interface LookupCandidate {
  lemma: string
  senses: Sense[]
}

export type LookupResult =
  | { found: true; form: string; candidates: LookupCandidate[] }
  | { found: false; form: string }

async function readArtifact(directory: string, file: string): Promise<string> {
  try {
    return await readFile(join(directory, file), 'utf-8')
  } catch (error: unknown) {
    throw new IndexLoadError(directory, `cannot read ${file}`, toError(error))
  }
}

function parseManifest(directory: string, content: string): Manifest {
  let json: unknown
  try {
    json = JSON.parse(content)
  } catch (error: unknown) {
    throw new IndexLoadError(directory, `${MANIFEST_FILE} is not valid JSON`, toError(error))
  }
  const parsed = ManifestSchema.safeParse(json)
  if (!parsed.success) {
    throw new IndexLoadError(directory, `${MANIFEST_FILE} is invalid: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
  }
  return parsed.data
}

async function readVerified(directory: string, entry: ManifestFile): Promise<string> {
  const content = await readArtifact(directory, entry.file)
  if (sha256(content) !== entry.sha256) {
    throw new IndexLoadError(directory, `${entry.file} does not match its manifest checksum`)
  }
  return content
}

function parseWith<T>(directory: string, parse: () => T[], entry: ManifestFile): T[] {
  let records: T[]
  try {
    records = parse()
  } catch (error: unknown) {
    throw new IndexLoadError(directory, toError(error).message, toError(error))
  }
  if (records.length !== entry.records) {
    throw new IndexLoadError(directory, `${entry.file} has ${records.length} records, manifest says ${entry.records}`)
  }
  return records
}

/**
 * Read-only view of a persisted index
 */
export class DictionaryIndex {
  private constructor(
    readonly manifest: Manifest,
    private readonly forms: ReadonlyMap<string, readonly string[]>,
    private readonly definitions: ReadonlyMap<string, readonly Sense[]>
  ) {}

  /**
   * Load and verify the artifacts of an output directory
   */
  static async load(directory: string): Promise<DictionaryIndex> {
    const manifest = parseManifest(directory, await readArtifact(directory, MANIFEST_FILE))

    const formsContent = await readVerified(directory, manifest.forms)
    const definitionsContent = await readVerified(directory, manifest.definitions)

    const forms = parseWith(directory, () => parseForms(formsContent), manifest.forms)
    const definitions = parseWith(directory, () => parseDefinitions(definitionsContent), manifest.definitions)

    return new DictionaryIndex(
      manifest,
      new Map(forms.map((record) => [record.form, record.lemmas])),
      new Map(definitions.map((record) => [record.lemma, record.senses]))
    )
  }

  get formCount(): number {
    return this.forms.size
  }

  get lemmaCount(): number {
    return this.definitions.size
  }

  /** Senses of a lemma, empty when it has none */
  senses(lemma: string): Sense[] {
    return [...(this.definitions.get(lemma) ?? [])]
  }

  lookup(word: string): LookupResult {
    const form = normalizeForm(word)
    const lemmas = this.forms.get(form)
    if (lemmas === undefined) {
      return { found: false, form }
    }
    return {
      found: true,
      form,
      candidates: lemmas.map((lemma) => ({ lemma, senses: this.senses(lemma) })),
    }
  }
}
