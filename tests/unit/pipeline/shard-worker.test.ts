import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFile } from 'node:fs/promises'
import type { ConjugationTable, SlotKey } from '@/conjugation/types'
import type { VerbEntry } from '@/parser/types'
import type { ResolvedEntry } from '@/pipeline/resolve'
import { compileShard, type ShardOptions } from '@/pipeline/shard'
import {
  compileOnThreads,
  handleShardRequest,
  resolveWorkerScript,
  ShardWorker,
  splitBatches,
  type WorkerScript,
} from '@/pipeline/shard-worker'
import { createTestContext, type TestContext } from '@tests/helpers/temp-dir'

const OPTIONS: ShardOptions = { policy: 'merge', sampleLimit: 20 }

class BrokenSlots extends Map<SlotKey, readonly string[]> {
  override get(): readonly string[] | undefined {
    throw new Error('broken table')
  }
}

function makeTable(explicit: ReadonlyMap<SlotKey, readonly string[]> = new Map()): ConjugationTable {
  return {
    template: 'ca.v.conj.ar',
    conjugationClass: 'ar',
    stem: 'cant',
    explicit,
    stemOverrides: new Map(),
    ignoredArgs: [],
  }
}

function makeResolved(infinitive: string, table: ConjugationTable): ResolvedEntry {
  const entry: VerbEntry = {
    infinitive,
    headword: infinitive,
    reflexive: false,
    conjugation: { kind: 'table', table },
    senses: [{ partOfSpeech: 'verb', markup: 'Fer cançons.', examples: [] }],
    sequence: 0,
    homograph: 0,
  }
  return { entry, table }
}

describe('shard worker', () => {
  let ctx: TestContext

  beforeEach(async () => {
    ctx = await createTestContext({ prefix: 'verbforms-shard-worker-' })
  })

  afterEach(async () => {
    await ctx.cleanup()
  })

  // ===========================================================================
  // Request handling
  // ===========================================================================
  describe('handleShardRequest', () => {
    it('answers with the compiled shard', () => {
      const entries = [makeResolved('cantar', makeTable())]

      expect(handleShardRequest({ type: 'compile', id: 'shard-1', entries, options: OPTIONS })).toEqual({
        type: 'compiled',
        id: 'shard-1',
        shard: compileShard(entries, OPTIONS),
      })
    })

    it('answers with the error when compiling fails', () => {
      const entries = [makeResolved('cantar', makeTable(new BrokenSlots()))]

      expect(handleShardRequest({ type: 'compile', id: 'shard-2', entries, options: OPTIONS })).toEqual({
        type: 'failed',
        id: 'shard-2',
        error: 'broken table',
      })
    })
  })

  // ===========================================================================
  // Batching
  // ===========================================================================
  describe('splitBatches', () => {
    it('splits into contiguous batches of near-equal size', () => {
      expect(splitBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2, 3], [4, 5]])
      expect(splitBatches([1, 2, 3, 4, 5], 4)).toEqual([[1, 2], [3, 4], [5]])
      expect(splitBatches([1, 2], 8)).toEqual([[1], [2]])
    })

    it('returns no batch for no items', () => {
      expect(splitBatches([], 3)).toEqual([])
    })
  })

  // ===========================================================================
  // Worker script
  // ===========================================================================
  describe('resolveWorkerScript', () => {
    it('loads the TypeScript source through tsx when nothing is built', async () => {
      await writeFile(ctx.path('shard-worker.worker.ts'), '')

      expect(resolveWorkerScript(ctx.tempDir)).toEqual({
        path: ctx.path('shard-worker.worker.ts'),
        execArgv: ['--import', 'tsx'],
      })
    })

    it('prefers the built script', async () => {
      await writeFile(ctx.path('shard-worker.worker.ts'), '')
      await writeFile(ctx.path('shard-worker.worker.js'), '')

      expect(resolveWorkerScript(ctx.tempDir)).toEqual({ path: ctx.path('shard-worker.worker.js') })
    })

    it('finds nothing in a directory without the script', () => {
      expect(resolveWorkerScript(ctx.tempDir)).toBeUndefined()
    })
  })

  // ===========================================================================
  // Fallback
  // ===========================================================================
  describe('when no thread can start', () => {
    const missing = (): WorkerScript => ({ path: ctx.path('missing.worker.js') })

    it('reports the worker as not started', async () => {
      const worker = new ShardWorker(missing())

      expect(await worker.start()).toBe(false)
      expect(worker.ready).toBe(false)
      await expect(worker.compile([], OPTIONS)).rejects.toThrow('Shard worker not started')
    })

    it('leaves compilation to the caller', async () => {
      const entries = [makeResolved('cantar', makeTable()), makeResolved('saltar', makeTable())]

      expect(await compileOnThreads(entries, 2, OPTIONS, missing())).toBeUndefined()
      expect(await compileOnThreads([], 2, OPTIONS, missing())).toBeUndefined()
    })
  })
})
