/**
 * Build Command
 *
 * Run the extraction pipeline and write the index.
 *
 * Usage:
 *   verbforms build [dump] [-o dir] [-c n] [--policy merge|last-wins]
 *                   [--config file] [--exclusions file] [--debug]
 */

import { loadConfig } from '../../config/loader'
import { isVerbFormsError } from '../../errors'
import { buildIndex, type BuildReport } from '../../pipeline/pipeline'
import { consoleLogger, quietConsoleLogger, setLogger } from '../../utils/logger'
import type { ParsedArgs } from '../types'
import { print, printError, printSuccess } from '../types'

/**
 * Human-readable run report
 */
export function formatReport(report: BuildReport): string {
  const lines = [
    `Dump:                 ${report.dumpPath} (${report.dump.compression})`,
    `Pages read:           ${report.dump.pagesYielded}`,
    `Pages skipped:        ${report.dump.nonArticlePages} non-article, ${report.dump.redirects} redirects, ${report.dump.malformedPages} malformed`,
    `Verb entries:         ${report.verbEntries} (${report.tableEntries} with forms, ${report.definitionsOnlyEntries} definitions only)`,
    `Excluded entries:     ${report.excludedEntries}`,
    `References resolved:  ${report.referencesResolved}`,
    `Forms:                ${report.forms}`,
    `Lemmas:               ${report.lemmas} (${report.senses} senses)`,
    `Synthesis gaps:       ${report.gaps.slots} slots in ${report.gaps.entries} entries`,
  ]

  if (report.warnings.length > 0) {
    lines.push('Warnings:')
    for (const warning of report.warnings) {
      lines.push(`  ${warning.reason}: ${warning.count}`)
      for (const sample of warning.samples) {
        lines.push(`    - ${sample}`)
      }
    }
  }

  lines.push(`Duration:             ${report.durationMs}ms`)
  return lines.join('\n')
}

export async function buildCommand(parsed: ParsedArgs): Promise<number> {
  try {
    const config = await loadConfig({
      ...(parsed.options.config !== undefined ? { configPath: parsed.options.config } : {}),
      overrides: {
        dumpPath: parsed.args[0],
        outputDir: parsed.options.outputDir,
        concurrency: parsed.options.concurrency,
        duplicatePolicy: parsed.options.policy,
        exclusionsPath: parsed.options.exclusions,
        debug: parsed.options.debug ? true : undefined,
      },
    })
    setLogger(config.debug ? consoleLogger : quietConsoleLogger)

    const report = await buildIndex(config)
    print(formatReport(report))
    printSuccess(`Index written to ${report.outputDir}`)
    return 0
  } catch (error: unknown) {
    if (isVerbFormsError(error)) {
      printError(error.message)
      return 1
    }
    const message = error instanceof Error ? error.message : String(error)
    printError(`Build failed: ${message}`)
    return 1
  }
}
