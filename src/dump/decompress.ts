/**
 * Compression detection and decoding streams for dump files
 *
 * @module dump/decompress
 */

import { createReadStream } from 'node:fs'
import { open } from 'node:fs/promises'
import { PassThrough, type Readable } from 'node:stream'
import { createGunzip } from 'node:zlib'
import bz2 from 'unbzip2-stream'
import { DecompressionError, toError } from '../errors'
import type { DumpCompression } from './types'

const GZIP_MAGIC = [0x1f, 0x8b]
const BZIP2_MAGIC = [0x42, 0x5a, 0x68] // "BZh"

function startsWith(header: Uint8Array, magic: readonly number[]): boolean {
  return header.length >= magic.length && magic.every((byte, index) => header[index] === byte)
}

/**
 * Detect the compression of a file from its first bytes
 */
export async function detectCompression(path: string): Promise<DumpCompression> {
  const handle = await open(path, 'r')
  try {
    const header = new Uint8Array(4)
    const { bytesRead } = await handle.read(header, 0, header.length, 0)
    const read = header.subarray(0, bytesRead)
    if (startsWith(read, GZIP_MAGIC)) return 'gzip'
    if (startsWith(read, BZIP2_MAGIC)) return 'bzip2'
    return 'none'
  } finally {
    await handle.close()
  }
}

/**
 * A decoded byte stream over the file
 *
 * File errors propagate unchanged; decoder errors are raised as
 * DecompressionError.
 */
export function openDecoded(path: string, compression: DumpCompression): Readable {
  const source = createReadStream(path)
  if (compression === 'none') return source

  const decoder: NodeJS.ReadWriteStream = compression === 'gzip' ? createGunzip() : bz2()
  const output = new PassThrough()

  source.on('error', (error) => output.destroy(error))
  decoder.on('error', (error: unknown) => {
    source.destroy()
    output.destroy(new DecompressionError(path, compression, toError(error)))
  })
  output.on('close', () => source.destroy())

  source.pipe(decoder).pipe(output)
  return output
}
