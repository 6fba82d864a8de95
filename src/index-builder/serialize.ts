/**
 * Artifact file formats
 *
 * - forms.tsv: `form<TAB>lemma[<TAB>lemma…]`, one line per form
 * - definitions.jsonl: one `{"lemma","senses":[{"pos","text","examples"}]}` per line
 * - manifest.json: file names, record counts and SHA-256 of both files
 *
 * On disk the two data files carry a content hash in their name
 * (`forms.<hash>.tsv`), so a new build never overwrites a file the current
 * manifest points at.
 *
 * @module index-builder/serialize
 */

import { z } from 'zod'
import type { DefinitionRecord } from '../definitions/extractor'
import { PARTS_OF_SPEECH } from '../parser/types'
import type { FormRecord, Manifest } from './types'

export const FORMS_FILE = 'forms.tsv'
export const DEFINITIONS_FILE = 'definitions.jsonl'
export const MANIFEST_FILE = 'manifest.json'
export const LOCK_FILE = '.lock'
export const MANIFEST_VERSION = 1

/** Hex digits of the content hash kept in a generation file name */
const GENERATION_HASH_LENGTH = 16

const GENERATION_FILE_PATTERN = /^(?:forms\.[0-9a-f]{16}\.tsv|definitions\.[0-9a-f]{16}\.jsonl)$/

/**
 * On-disk name of one build's data file, e.g. `forms.tsv` → `forms.3f2a9c0d1b7e4a56.tsv`
 */
export function generationFileName(base: string, hash: string): string {
  const dot = base.lastIndexOf('.')
  const tag = hash.slice(0, GENERATION_HASH_LENGTH)
  return dot === -1 ? `${base}.${tag}` : `${base.slice(0, dot)}.${tag}${base.slice(dot)}`
}

export function isGenerationFile(name: string): boolean {
  return GENERATION_FILE_PATTERN.test(name)
}

function joinLines(lines: readonly string[]): string {
  return lines.length === 0 ? '' : lines.join('\n') + '\n'
}

function splitLines(content: string): string[] {
  return content.split('\n').filter((line) => line !== '')
}

// =============================================================================
// Forms
// =============================================================================

export function serializeForms(records: readonly FormRecord[]): string {
  return joinLines(records.map((record) => [record.form, ...record.lemmas].join('\t')))
}

/**
 * Parse forms.tsv; throws on a line without a lemma
 */
export function parseForms(content: string): FormRecord[] {
  return splitLines(content).map((line, index) => {
    const [form = '', ...lemmas] = line.split('\t')
    if (form === '' || lemmas.length === 0 || lemmas.some((lemma) => lemma === '')) {
      throw new Error(`${FORMS_FILE} line ${index + 1} is malformed`)
    }
    return { form, lemmas }
  })
}

// =============================================================================
// Definitions
// =============================================================================

const StoredSenseSchema = z.object({
  pos: z.enum(PARTS_OF_SPEECH),
  text: z.string(),
  examples: z.array(z.string()),
})

const DefinitionLineSchema = z.object({
  lemma: z.string().min(1),
  senses: z.array(StoredSenseSchema),
})

export function serializeDefinitions(records: readonly DefinitionRecord[]): string {
  return joinLines(
    records.map((record) =>
      JSON.stringify({
        lemma: record.lemma,
        senses: record.senses.map((sense) => ({
          pos: sense.partOfSpeech,
          text: sense.text,
          examples: sense.examples,
        })),
      })
    )
  )
}

/**
 * Parse definitions.jsonl; throws on an invalid line
 */
export function parseDefinitions(content: string): DefinitionRecord[] {
  return splitLines(content).map((line, index) => {
    let json: unknown
    try {
      json = JSON.parse(line)
    } catch (error: unknown) {
      throw new Error(`${DEFINITIONS_FILE} line ${index + 1} is not valid JSON`, { cause: error })
    }
    const parsed = DefinitionLineSchema.safeParse(json)
    if (!parsed.success) {
      throw new Error(`${DEFINITIONS_FILE} line ${index + 1}: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
    }
    return {
      lemma: parsed.data.lemma,
      senses: parsed.data.senses.map((sense) => ({
        partOfSpeech: sense.pos,
        text: sense.text,
        examples: sense.examples,
      })),
    }
  })
}

// =============================================================================
// Manifest
// =============================================================================

const ManifestFileSchema = z.object({
  file: z.string().regex(/^(?!\.\.?$)[^/\\]+$/, 'file must be a name inside the index directory'),
  records: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
})

export const ManifestSchema = z.object({
  version: z.number().int(),
  createdAt: z.string(),
  forms: ManifestFileSchema,
  definitions: ManifestFileSchema,
})

export function serializeManifest(manifest: Manifest): string {
  return JSON.stringify(manifest, null, 2) + '\n'
}
