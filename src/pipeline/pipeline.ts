/**
 * Build pipeline
 *
 * Stage 1 streams the dump and parses every page, collecting verb entries.
 * Stage 2 resolves conjugation references against the complete collection.
 * The resolved entries are then expanded and extracted in shards, on worker
 * threads when the input is large enough and in-process lanes otherwise, and
 * the shards are merged and written.
 *
 * @module pipeline/pipeline
 */

import type { BuildConfig } from '../config/loader'
import { loadExclusions } from '../config/loader'
import { DumpReader } from '../dump/reader'
import type { DumpStats, RawEntry } from '../dump/types'
import type { DuplicatePolicy, IndexArtifacts, Manifest } from '../index-builder/types'
import { IndexWriter } from '../index-builder/writer'
import { parseEntry } from '../parser/entry-parser'
import type { VerbEntry } from '../parser/types'
import { logger } from '../utils/logger'
import { Diagnostics, type DiagnosticsSummary } from './diagnostics'
import { WorkerPool } from './pool'
import { resolveEntries, type ResolvedEntry } from './resolve'
import { createShard, mergeShards, processEntry, type Shard, type ShardOptions } from './shard'
import { compileOnThreads } from './shard-worker'

/** Smallest batch worth a worker thread */
export const DEFAULT_MIN_THREAD_BATCH = 256

export interface CompileOptions {
  /** Worker threads, or in-process lanes when threads are not used */
  concurrency?: number
  /** Entries per thread below which no thread is started (default 256) */
  minThreadBatch?: number
  duplicatePolicy?: DuplicatePolicy
  /** Lemmas to leave out */
  excluded?: ReadonlySet<string>
  /** Collector for warnings; one is created when absent */
  diagnostics?: Diagnostics
}

/**
 * Counters of one compile, independent of where the pages came from
 */
export interface CompileSummary extends DiagnosticsSummary {
  pagesParsed: number
  verbEntries: number
  tableEntries: number
  definitionsOnlyEntries: number
  excludedEntries: number
  referencesResolved: number
  forms: number
  lemmas: number
  senses: number
}

export interface CompileResult {
  artifacts: IndexArtifacts
  summary: CompileSummary
}

/**
 * What a full run did
 */
export interface BuildReport extends CompileSummary {
  dumpPath: string
  outputDir: string
  dump: DumpStats
  manifest: Manifest
  durationMs: number
}

/**
 * Expand and extract every resolved entry into one merged shard
 */
async function compileShards(
  entries: readonly ResolvedEntry[],
  concurrency: number,
  minThreadBatch: number,
  options: ShardOptions
): Promise<Shard> {
  const threads = Math.min(concurrency, Math.floor(entries.length / Math.max(1, minThreadBatch)))
  if (threads > 1) {
    const threaded = await compileOnThreads(entries, threads, options)
    if (threaded) return threaded
  }

  const pool = new WorkerPool({ concurrency })
  return pool.mapReduce<ResolvedEntry, Shard>(entries, () => createShard(options), processEntry, mergeShards)
}

async function collect(
  pages: AsyncIterable<RawEntry> | Iterable<RawEntry>,
  excluded: ReadonlySet<string> | undefined,
  diagnostics: Diagnostics
): Promise<{ entries: VerbEntry[]; pagesParsed: number; excludedEntries: number }> {
  const entries: VerbEntry[] = []
  let pagesParsed = 0
  let excludedEntries = 0

  for await (const page of pages) {
    const outcome = parseEntry(page, { sequence: pagesParsed, ...(excluded ? { excluded } : {}) })
    pagesParsed++
    for (const warning of outcome.warnings) diagnostics.recordWarning(warning)
    if (outcome.excluded) excludedEntries++
    entries.push(...outcome.entries)
  }

  return { entries, pagesParsed, excludedEntries }
}

/**
 * Turn a sequence of raw pages into sorted artifacts, without writing them
 */
export async function compileIndex(
  pages: AsyncIterable<RawEntry> | Iterable<RawEntry>,
  options: CompileOptions = {}
): Promise<CompileResult> {
  const diagnostics = options.diagnostics ?? new Diagnostics()
  const policy = options.duplicatePolicy ?? 'merge'

  const collected = await collect(pages, options.excluded, diagnostics)
  logger.debug(`[pipeline] Collected ${collected.entries.length} verb entries from ${collected.pagesParsed} pages`)

  const resolution = resolveEntries(collected.entries, diagnostics)

  const merged = await compileShards(
    resolution.entries,
    options.concurrency ?? 1,
    options.minThreadBatch ?? DEFAULT_MIN_THREAD_BATCH,
    { policy, sampleLimit: diagnostics.sampleLimit }
  )
  diagnostics.merge(merged.diagnostics)

  const artifacts = merged.index.toArtifacts()
  const tableEntries = resolution.entries.filter((resolved) => resolved.table !== undefined).length

  return {
    artifacts,
    summary: {
      pagesParsed: collected.pagesParsed,
      verbEntries: collected.entries.length,
      tableEntries,
      definitionsOnlyEntries: collected.entries.length - tableEntries,
      excludedEntries: collected.excludedEntries,
      referencesResolved: resolution.referencesResolved,
      forms: artifacts.forms.length,
      lemmas: artifacts.definitions.length,
      senses: artifacts.definitions.reduce((total, record) => total + record.senses.length, 0),
      ...diagnostics.summary(),
    },
  }
}

/**
 * Read the configured dump, compile the index and write it atomically
 */
export async function buildIndex(config: BuildConfig): Promise<BuildReport> {
  const started = Date.now()
  const diagnostics = new Diagnostics(config.warningSamples)
  const excluded = config.exclusionsPath === undefined ? undefined : await loadExclusions(config.exclusionsPath)

  logger.info(`[pipeline] Building index from ${config.dumpPath}`)

  const reader = new DumpReader(config.dumpPath, {
    maxEntryBytes: config.maxEntryBytes,
    onWarning: (warning) => diagnostics.recordWarning(warning),
  })

  const { artifacts, summary } = await compileIndex(reader.entries(), {
    concurrency: config.concurrency,
    duplicatePolicy: config.duplicatePolicy,
    diagnostics,
    ...(excluded ? { excluded } : {}),
  })

  const manifest = await new IndexWriter(config.outputDir).write(artifacts)

  const report: BuildReport = {
    ...summary,
    dumpPath: config.dumpPath,
    outputDir: config.outputDir,
    dump: reader.stats,
    manifest,
    durationMs: Date.now() - started,
  }

  const warnings = report.warnings.reduce((total, warning) => total + warning.count, 0)
  logger.info(
    `[pipeline] ${report.verbEntries} verb entries, ${report.forms} forms, ${report.lemmas} lemmas, ${warnings} warnings in ${report.durationMs}ms`
  )
  return report
}
