/**
 * verbforms
 *
 * Reverse index from inflected Catalan verb forms to their infinitive and
 * definitions, built from a Catalan Wiktionary XML dump.
 *
 * @packageDocumentation
 */

// Dump Reader
export { DumpReader, DEFAULT_MAX_ENTRY_BYTES } from './dump/reader'
export { detectCompression } from './dump/decompress'
export { decodePage, type DecodedPage } from './dump/page'
export type { RawEntry, DumpCompression, DumpReaderOptions, DumpStats } from './dump/types'

// Entry Parser
export { parseEntry, parseSenses } from './parser/entry-parser'
export { classifyTemplate } from './parser/templates'
export {
  PARTS_OF_SPEECH,
  type ConjugationSource,
  type ParseOptions,
  type ParseOutcome,
  type PartOfSpeech,
  type SenseBlock,
  type TemplateInvocation,
  type VerbEntry,
} from './parser/types'

// Conjugation Expander
export { expand, expandTable, synthesizeSlot } from './conjugation/expander'
export {
  ALL_SLOTS,
  CONJUGATION_CLASSES,
  type ConjugationClass,
  type ConjugationTable,
  type Expansion,
  type SlotKey,
  type StemTarget,
} from './conjugation/types'

// Definition Extractor
export { extractDefinitions, cleanSense, type DefinitionRecord, type Sense } from './definitions/extractor'
export { cleanMarkup } from './wikitext/clean'

// Index Builder
export { IndexAccumulator } from './index-builder/accumulator'
export { IndexWriter, type IndexWriterOptions } from './index-builder/writer'
export { DEFINITIONS_FILE, FORMS_FILE, MANIFEST_FILE, generationFileName } from './index-builder/serialize'
export type { DuplicatePolicy, FormRecord, IndexArtifacts, Manifest } from './index-builder/types'

// Artifact Reader
export { DictionaryIndex, type LookupCandidate, type LookupResult } from './lookup/reader'

// Pipeline
export {
  buildIndex,
  compileIndex,
  type BuildReport,
  type CompileOptions,
  type CompileResult,
  type CompileSummary,
} from './pipeline/pipeline'
export { Diagnostics, type DiagnosticsSummary, type WarningSummary } from './pipeline/diagnostics'
export { WorkerPool } from './pipeline/pool'
export { ShardWorker, compileOnThreads } from './pipeline/shard-worker'

// Configuration
export { loadConfig, loadExclusions, BuildConfigSchema, type BuildConfig } from './config/loader'

// Errors
export * from './errors'

// Logging
export { logger, setLogger, consoleLogger, noopLogger, type Logger } from './utils/logger'
export { normalizeForm } from './utils/text'
