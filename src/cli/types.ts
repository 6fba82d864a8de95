/**
 * CLI Types and Utilities
 *
 * Shared types and output helpers for the verbforms CLI, imported by the
 * commands and the entry point.
 */

export type { ParsedArgs } from './args'

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  process.stdout.write('OK ' + message + '\n')
}
