/**
 * Dump Reader types
 *
 * @module dump/types
 */

import type { EntryParseWarning } from '../errors'

/**
 * One article page of the dump
 */
export interface RawEntry {
  readonly title: string
  readonly body: string
}

/** Compression detected from the first bytes of the file */
export type DumpCompression = 'gzip' | 'bzip2' | 'none'

export interface DumpReaderOptions {
  /** A single page larger than this is skipped as malformed (default 8 MiB) */
  maxEntryBytes?: number
  /** Receives every skipped-page warning */
  onWarning?: (warning: EntryParseWarning) => void
}

/**
 * Counters for one pass over the dump
 */
export interface DumpStats {
  compression: DumpCompression
  pagesSeen: number
  pagesYielded: number
  nonArticlePages: number
  redirects: number
  malformedPages: number
}
