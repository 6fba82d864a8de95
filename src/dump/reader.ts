/**
 * Dump Reader
 *
 * Streams a (possibly compressed) MediaWiki XML export and yields one RawEntry
 * per article page, in document order. Only the current `<page>` window is
 * held in memory. Each call to entries() reopens the file.
 *
 * @module dump/reader
 */

import { DumpFormatError, EntryParseWarning, type EntryParseReason } from '../errors'
import { logger } from '../utils/logger'
import { detectCompression, openDecoded } from './decompress'
import { decodePage } from './page'
import type { DumpCompression, DumpReaderOptions, DumpStats, RawEntry } from './types'

export const DEFAULT_MAX_ENTRY_BYTES = 8 * 1024 * 1024

const ROOT_OPEN = '<mediawiki'
const ROOT_CLOSE = '</mediawiki>'
const PAGE_OPEN = /<page[\s>]/g
const PAGE_CLOSE = '</page>'
const BOM = '\uFEFF'

/** Tail kept between chunks so a marker split across chunks is still found */
const MARKER_OVERLAP = ROOT_CLOSE.length

function emptyStats(compression: DumpCompression): DumpStats {
  return {
    compression,
    pagesSeen: 0,
    pagesYielded: 0,
    nonArticlePages: 0,
    redirects: 0,
    malformedPages: 0,
  }
}

function indexOfPage(text: string, from = 0): number {
  PAGE_OPEN.lastIndex = from
  const match = PAGE_OPEN.exec(text)
  return match ? match.index : -1
}

/**
 * Result of consuming the prolog (BOM, declaration, comments) before the root
 */
type PrologState = { status: 'need-more' } | { status: 'found'; rest: string } | { status: 'invalid' }

function consumeProlog(text: string): PrologState {
  let rest = text.startsWith(BOM) ? text.slice(1) : text

  for (;;) {
    rest = rest.trimStart()
    if (rest.startsWith('<?') || rest.startsWith('<!')) {
      const terminator = rest.startsWith('<!--') ? '-->' : rest.startsWith('<?') ? '?>' : '>'
      const end = rest.indexOf(terminator)
      if (end < 0) return { status: 'need-more' }
      rest = rest.slice(end + terminator.length)
      continue
    }
    if (rest.length <= ROOT_OPEN.length) {
      return ROOT_OPEN.startsWith(rest) ? { status: 'need-more' } : { status: 'invalid' }
    }
    if (!rest.startsWith(ROOT_OPEN) || !/[\s>/]/.test(rest.charAt(ROOT_OPEN.length))) {
      return { status: 'invalid' }
    }
    const tagEnd = rest.indexOf('>')
    if (tagEnd < 0) return { status: 'need-more' }
    return { status: 'found', rest: rest.slice(tagEnd + 1) }
  }
}

/**
 * Streaming reader over a MediaWiki export
 */
export class DumpReader {
  private readonly maxEntryBytes: number
  private currentStats: DumpStats = emptyStats('none')

  constructor(
    readonly path: string,
    private readonly options: DumpReaderOptions = {}
  ) {
    this.maxEntryBytes = options.maxEntryBytes ?? DEFAULT_MAX_ENTRY_BYTES
  }

  /** Counters of the latest (or current) pass */
  get stats(): DumpStats {
    return { ...this.currentStats }
  }

  private warn(reason: EntryParseReason, message: string, title?: string): void {
    this.currentStats.malformedPages++
    const warning = new EntryParseWarning(reason, message, title)
    logger.debug(`[dump-reader] ${message}`, { reason, title })
    this.options.onWarning?.(warning)
  }

  private decode(window: string): RawEntry | undefined {
    this.currentStats.pagesSeen++
    const page = decodePage(window)
    switch (page.kind) {
      case 'entry':
        this.currentStats.pagesYielded++
        return page.entry
      case 'non-article':
        this.currentStats.nonArticlePages++
        return undefined
      case 'redirect':
        this.currentStats.redirects++
        return undefined
      case 'malformed':
        this.warn(page.reason, page.message, page.title)
        return undefined
    }
  }

  private async *chunks(compression: DumpCompression): AsyncGenerator<string> {
    const stream = openDecoded(this.path, compression)
    const decoder = new TextDecoder('utf-8')
    try {
      for await (const chunk of stream) {
        if (chunk instanceof Uint8Array) {
          yield decoder.decode(chunk, { stream: true })
        } else if (typeof chunk === 'string') {
          yield chunk
        }
      }
      const tail = decoder.decode()
      if (tail !== '') yield tail
    } finally {
      stream.destroy()
    }
  }

  /**
   * Yield every article page of the dump in document order
   */
  async *entries(): AsyncGenerator<RawEntry> {
    const compression = await detectCompression(this.path)
    this.currentStats = emptyStats(compression)

    let buffer = ''
    let rootFound = false
    let rootClosed = false
    // An oversized page is being discarded until the next page marker
    let discarding = false

    const settleOutside = (text: string): void => {
      if (text.includes(ROOT_CLOSE)) rootClosed = true
    }

    for await (const chunk of this.chunks(compression)) {
      buffer += chunk

      if (!rootFound) {
        const prolog = consumeProlog(buffer)
        if (prolog.status === 'invalid') {
          throw new DumpFormatError(this.path, 'missing <mediawiki> root element')
        }
        if (prolog.status === 'need-more') continue
        rootFound = true
        buffer = prolog.rest
      }

      for (;;) {
        if (discarding) {
          const next = indexOfPage(buffer)
          if (next < 0) {
            buffer = buffer.slice(-MARKER_OVERLAP)
            break
          }
          discarding = false
          buffer = buffer.slice(next)
        }

        const start = indexOfPage(buffer)
        if (start < 0) {
          settleOutside(buffer)
          buffer = buffer.slice(-MARKER_OVERLAP)
          break
        }
        settleOutside(buffer.slice(0, start))
        buffer = buffer.slice(start)

        const close = buffer.indexOf(PAGE_CLOSE)
        const next = indexOfPage(buffer, 1)

        if (next >= 0 && (close < 0 || next < close)) {
          this.currentStats.pagesSeen++
          this.warn('malformed-page', 'Page is not closed before the next page starts')
          buffer = buffer.slice(next)
          continue
        }

        if (close < 0) {
          if (buffer.length > this.maxEntryBytes) {
            this.currentStats.pagesSeen++
            this.warn('oversized-page', `Page exceeds ${this.maxEntryBytes} bytes`)
            discarding = true
            buffer = buffer.slice(-MARKER_OVERLAP)
          }
          break
        }

        const window = buffer.slice(0, close + PAGE_CLOSE.length)
        buffer = buffer.slice(window.length)

        if (Buffer.byteLength(window, 'utf8') > this.maxEntryBytes) {
          this.currentStats.pagesSeen++
          this.warn('oversized-page', `Page exceeds ${this.maxEntryBytes} bytes`)
          continue
        }

        const entry = this.decode(window)
        if (entry) yield entry
      }
    }

    if (!rootFound) {
      throw new DumpFormatError(this.path, 'missing <mediawiki> root element')
    }

    if (!discarding && indexOfPage(buffer) >= 0) {
      // Input ended inside a page
      this.currentStats.pagesSeen++
      this.warn('malformed-page', 'Page is not closed before the end of the dump')
    }
    settleOutside(buffer)

    if (!rootClosed) {
      throw new DumpFormatError(this.path, 'dump ends without </mediawiki> (truncated container)')
    }
  }
}
