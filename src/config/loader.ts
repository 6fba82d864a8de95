/**
 * Build configuration
 *
 * Layered, later wins: defaults, the YAML config file, VERBFORMS_* environment
 * variables, explicit overrides (CLI flags). The merged result is validated
 * with zod; any issue raises a ConfigurationError listing all of them.
 *
 * @module config/loader
 */

import { readFile } from 'node:fs/promises'
import { cpus } from 'node:os'
import { resolve } from 'node:path'
import * as yaml from 'yaml'
import { z } from 'zod'
import { ConfigurationError, toError } from '../errors'
import { DEFAULT_MAX_ENTRY_BYTES } from '../dump/reader'
import { DEFAULT_WARNING_SAMPLES } from '../pipeline/diagnostics'
import { normalizeForm, stripReflexive } from '../utils/text'

/** Config file looked up in the working directory */
export const CONFIG_FILE = 'verbforms.config.yml'

export const BuildConfigSchema = z.object({
  /** MediaWiki export (.xml, .xml.gz, .xml.bz2) */
  dumpPath: z.string().min(1),
  /** Directory receiving the index: manifest.json and the data files it names */
  outputDir: z.string().min(1),
  /** Worker lanes */
  concurrency: z.number().int().min(1).max(64),
  duplicatePolicy: z.enum(['merge', 'last-wins']),
  /** Largest page accepted by the dump reader */
  maxEntryBytes: z.number().int().positive(),
  /** Warning samples kept per reason in the report */
  warningSamples: z.number().int().nonnegative(),
  /** File listing lemmas to leave out, one per line */
  exclusionsPath: z.string().min(1).optional(),
  debug: z.boolean(),
})

export type BuildConfig = z.infer<typeof BuildConfigSchema>

const FileConfigSchema = BuildConfigSchema.partial().strict()

/** Values that may override the loaded configuration; undefined is ignored */
export type ConfigOverrides = { [K in keyof BuildConfig]?: BuildConfig[K] | undefined }

export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string
  /** Directory searched for verbforms.config.yml (default process.cwd()) */
  cwd?: string
  env?: NodeJS.ProcessEnv
  overrides?: ConfigOverrides
}

const ENV_STRING_KEYS = {
  VERBFORMS_DUMP: 'dumpPath',
  VERBFORMS_OUTPUT_DIR: 'outputDir',
  VERBFORMS_DUPLICATE_POLICY: 'duplicatePolicy',
  VERBFORMS_EXCLUSIONS: 'exclusionsPath',
} as const

const ENV_NUMBER_KEYS = {
  VERBFORMS_CONCURRENCY: 'concurrency',
  VERBFORMS_MAX_ENTRY_BYTES: 'maxEntryBytes',
} as const

export function defaultConfig(): Omit<BuildConfig, 'dumpPath'> {
  return {
    outputDir: 'data',
    concurrency: Math.max(1, Math.min(4, cpus().length)),
    duplicatePolicy: 'merge',
    maxEntryBytes: DEFAULT_MAX_ENTRY_BYTES,
    warningSamples: DEFAULT_WARNING_SAMPLES,
    debug: false,
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false
  return value
}

/**
 * Configuration values present in the environment. Values are left for the
 * schema to reject, so a bad variable shows up as an issue.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const values: Record<string, unknown> = {}

  for (const [variable, key] of Object.entries(ENV_STRING_KEYS)) {
    const value = env[variable]
    if (value !== undefined && value !== '') values[key] = value
  }
  for (const [variable, key] of Object.entries(ENV_NUMBER_KEYS)) {
    const value = env[variable]
    if (value !== undefined && value !== '') values[key] = Number(value)
  }
  const debug = env['VERBFORMS_DEBUG']
  if (debug !== undefined) values['debug'] = parseBoolean(debug)

  return values
}

function isMissingFile(error: unknown): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}

/**
 * Read and validate a YAML config file. A missing file is an error only when
 * `required` is set.
 */
export async function readConfigFile(path: string, required = true): Promise<Record<string, unknown>> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error: unknown) {
    if (isMissingFile(error) && !required) return {}
    throw new ConfigurationError(`Cannot read config file ${path}`, [], toError(error))
  }

  let document: unknown
  try {
    document = yaml.parse(content)
  } catch (error: unknown) {
    throw new ConfigurationError(`Config file ${path} is not valid YAML`, [], toError(error))
  }
  if (document === null || document === undefined) return {}

  const parsed = FileConfigSchema.safeParse(document)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${path}`, formatIssues(parsed.error))
  }
  return parsed.data
}

/**
 * Load the build configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BuildConfig> {
  const file =
    options.configPath !== undefined
      ? await readConfigFile(options.configPath, true)
      : await readConfigFile(resolve(options.cwd ?? process.cwd(), CONFIG_FILE), false)

  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined)
  )

  const merged = { ...defaultConfig(), ...file, ...configFromEnv(options.env), ...overrides }
  const parsed = BuildConfigSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error))
  }
  return parsed.data
}

// =============================================================================
// Exclusions
// =============================================================================

/**
 * Parse an exclusions list: one lemma per line, `#` starts a comment
 */
export function parseExclusions(content: string): Set<string> {
  const lemmas = new Set<string>()
  for (const line of content.split('\n')) {
    const hash = line.indexOf('#')
    const value = (hash >= 0 ? line.slice(0, hash) : line).trim()
    if (value !== '') lemmas.add(stripReflexive(normalizeForm(value)).base)
  }
  return lemmas
}

export async function loadExclusions(path: string): Promise<Set<string>> {
  try {
    return parseExclusions(await readFile(path, 'utf-8'))
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read exclusions file ${path}`, [], toError(error))
  }
}
