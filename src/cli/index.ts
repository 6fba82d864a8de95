#!/usr/bin/env node
/**
 * verbforms CLI
 *
 * Commands:
 *   build           Extract verb forms from a dump and write the index
 *   lookup          Look up a word in a built index
 *
 * Usage:
 *   verbforms build [dump] [options]
 *   verbforms lookup <word> [options]
 */

import { parseArgs } from './args'
import { buildCommand } from './commands/build'
import { lookupCommand } from './commands/lookup'
import { print, printError } from './types'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

export const HELP_TEXT = `
verbforms v${VERSION}

Builds a lookup dictionary from inflected Catalan verb forms to their
infinitive and definitions, extracted from a Wiktionary XML dump.

USAGE:
  verbforms <command> [options]

COMMANDS:
  build [dump]                  Extract forms and definitions, write the index
  lookup <word>                 Look up a word in a built index

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  -o, --output <dir>            Index directory (default: data)
  -c, --concurrency <n>         Worker threads (default: min(4, CPUs))
      --policy <policy>         Duplicate lemmas: merge, last-wins (default: merge)
      --config <file>           Config file (default: ./verbforms.config.yml)
      --exclusions <file>       Lemmas to leave out, one per line
      --debug                   Log every skipped entry
  -p, --pretty                  Pretty print JSON output

ENVIRONMENT:
  VERBFORMS_DUMP, VERBFORMS_OUTPUT_DIR, VERBFORMS_CONCURRENCY,
  VERBFORMS_DUPLICATE_POLICY, VERBFORMS_MAX_ENTRY_BYTES,
  VERBFORMS_EXCLUSIONS, VERBFORMS_DEBUG

EXAMPLES:
  # Build from a compressed dump into ./data
  verbforms build cawiktionary-latest-pages-articles.xml.bz2

  # Look up an inflected form
  verbforms lookup parlàvem -p
`

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const parsed = parseArgs(argv)

    // Handle help
    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    // Handle version
    if (parsed.options.version) {
      print(`verbforms v${VERSION}`)
      return 0
    }

    // No command provided
    if (!parsed.command) {
      print(HELP_TEXT)
      return 0
    }

    switch (parsed.command) {
      case 'build':
        return await buildCommand(parsed)
      case 'lookup':
        return await lookupCommand(parsed)
      case 'help':
        print(HELP_TEXT)
        return 0
      default:
        printError(`Unknown command: ${parsed.command}`)
        print('\nRun "verbforms --help" for usage.')
        return 1
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}

// Run CLI if this is the main module
if (process.argv[1]?.endsWith('/cli/index.js') || process.argv[1]?.endsWith('/cli/index.ts')) {
  void main().then((code) => {
    process.exitCode = code
  })
}
