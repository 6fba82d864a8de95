/**
 * CLI Argument Parser
 *
 * Pure functions for parsing command line arguments.
 * No I/O, so it can be tested without a process.
 */

import { DUPLICATE_POLICIES, type DuplicatePolicy } from '../index-builder/types'

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    debug: boolean
    pretty: boolean
    outputDir?: string
    concurrency?: number
    policy?: DuplicatePolicy
    config?: string
    exclusions?: string
  }
}

// =============================================================================
// Parser
// =============================================================================

const POLICY_NAMES: ReadonlySet<string> = new Set<string>(DUPLICATE_POLICIES)

function isDuplicatePolicy(value: string): value is DuplicatePolicy {
  return POLICY_NAMES.has(value)
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      debug: false,
      pretty: false,
    },
  }

  const value = (flag: string, index: number): string => {
    const next = argv[index]
    if (next === undefined || next.startsWith('-')) {
      throw new Error(`Missing value for ${flag}`)
    }
    return next
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    // Handle flags
    if (arg.startsWith('-')) {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '--debug':
          result.options.debug = true
          break
        case '-p':
        case '--pretty':
          result.options.pretty = true
          break
        case '-o':
        case '--output':
          result.options.outputDir = value(arg, ++i)
          break
        case '-c':
        case '--concurrency': {
          const raw = value(arg, ++i)
          const concurrency = Number(raw)
          if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new Error(`Invalid concurrency: ${raw}`)
          }
          result.options.concurrency = concurrency
          break
        }
        case '--policy': {
          const policy = value(arg, ++i)
          if (!isDuplicatePolicy(policy)) {
            throw new Error(`Invalid policy: ${policy}. Valid policies: ${DUPLICATE_POLICIES.join(', ')}`)
          }
          result.options.policy = policy
          break
        }
        case '--config':
          result.options.config = value(arg, ++i)
          break
        case '--exclusions':
          result.options.exclusions = value(arg, ++i)
          break
        default:
          throw new Error(`Unknown option: ${arg}`)
      }
    } else if (!result.command) {
      // First non-option is the command
      result.command = arg
    } else {
      // Rest are command arguments
      result.args.push(arg)
    }
    i++
  }

  return result
}
