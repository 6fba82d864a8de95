import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { rm, writeFile } from 'node:fs/promises'
import { IndexLoadError } from '@/errors'
import type { Manifest } from '@/index-builder/types'
import { IndexWriter } from '@/index-builder/writer'
import { DictionaryIndex } from '@/lookup/reader'
import { createTestContext, type TestContext } from '@tests/helpers/temp-dir'

describe('DictionaryIndex', () => {
  let ctx: TestContext
  let manifest: Manifest

  beforeEach(async () => {
    ctx = await createTestContext({ prefix: 'verbforms-lookup-' })
    manifest = await new IndexWriter(ctx.tempDir).write({
      forms: [
        { form: "l'estat", lemmas: ['ser'] },
        { form: 'estat', lemmas: ['estar', 'ser'] },
        { form: 'és', lemmas: ['ser'] },
      ],
      definitions: [
        { lemma: 'estar', senses: [{ partOfSpeech: 'verb', text: 'Romandre.', examples: [] }] },
        { lemma: 'ser', senses: [] },
      ],
    })
  })

  afterEach(async () => {
    await ctx.cleanup()
  })

  // ===========================================================================
  // Lookup
  // ===========================================================================
  describe('lookup', () => {
    it('returns every candidate lemma with its senses', async () => {
      const index = await DictionaryIndex.load(ctx.tempDir)

      expect(index.lookup('estat')).toEqual({
        found: true,
        form: 'estat',
        candidates: [
          { lemma: 'estar', senses: [{ partOfSpeech: 'verb', text: 'Romandre.', examples: [] }] },
          { lemma: 'ser', senses: [] },
        ],
      })
      expect(index.formCount).toBe(3)
      expect(index.lemmaCount).toBe(2)
    })

    it('normalizes the query the way the forms were stored', async () => {
      const index = await DictionaryIndex.load(ctx.tempDir)

      expect(index.lookup('  És ')).toMatchObject({ found: true, form: 'és' })
      expect(index.lookup('L’Estat')).toMatchObject({ found: true, form: "l'estat" })
    })

    it('reports a miss without guessing', async () => {
      const index = await DictionaryIndex.load(ctx.tempDir)
      expect(index.lookup('estats')).toEqual({ found: false, form: 'estats' })
    })
  })

  // ===========================================================================
  // Loading
  // ===========================================================================
  describe('load', () => {
    it('rejects an artifact that does not match the manifest', async () => {
      await writeFile(ctx.path(manifest.forms.file), 'estat\testar\n')

      const error = await DictionaryIndex.load(ctx.tempDir).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(IndexLoadError)
      expect(error instanceof Error && error.message).toContain(
        `${manifest.forms.file} does not match its manifest checksum`
      )
    })

    it('rejects a directory without a manifest', async () => {
      await rm(ctx.path('manifest.json'))
      await expect(DictionaryIndex.load(ctx.tempDir)).rejects.toBeInstanceOf(IndexLoadError)
    })

    it('rejects a manifest that is not JSON', async () => {
      await writeFile(ctx.path('manifest.json'), '{')
      await expect(DictionaryIndex.load(ctx.tempDir)).rejects.toThrow('manifest.json is not valid JSON')
    })

    it('rejects a manifest naming a file outside the directory', async () => {
      await writeFile(ctx.path('manifest.json'), JSON.stringify({ ...manifest, forms: { ...manifest.forms, file: '../forms.tsv' } }))
      await expect(DictionaryIndex.load(ctx.tempDir)).rejects.toThrow(
        'manifest.json is invalid: file must be a name inside the index directory'
      )
    })
  })
})
