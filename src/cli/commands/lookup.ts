/**
 * Lookup Command
 *
 * Look up one word in a built index and print the result as JSON.
 *
 * Usage:
 *   verbforms lookup <word> [-o dir] [-p]
 */

import { defaultConfig } from '../../config/loader'
import { DictionaryIndex } from '../../lookup/reader'
import type { ParsedArgs } from '../types'
import { print, printError } from '../types'

export async function lookupCommand(parsed: ParsedArgs): Promise<number> {
  const word = parsed.args[0]
  if (word === undefined) {
    printError('Missing word. Usage: verbforms lookup <word> [-o dir]')
    return 1
  }

  const directory =
    parsed.options.outputDir ?? process.env['VERBFORMS_OUTPUT_DIR'] ?? defaultConfig().outputDir

  try {
    const index = await DictionaryIndex.load(directory)
    print(JSON.stringify(index.lookup(word), null, parsed.options.pretty ? 2 : 0))
    return 0
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}
