/**
 * IndexWriter: atomic replacement of the persisted artifacts
 *
 * Each build writes its data files under content-addressed names
 * (`forms.<hash>.tsv`, `definitions.<hash>.jsonl`) through temporaries, then
 * renames the new manifest over `manifest.json`. That last rename is the
 * commit: until it happens the old manifest and the files it names are
 * untouched, after it the new ones are complete. Files of earlier builds are
 * removed once the commit is done.
 * One writer per directory, enforced with an exclusive `.lock` file.
 *
 * @module index-builder/writer
 */

import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import { IndexLockedError, IndexWriteError, toError } from '../errors'
import { sha256 } from '../utils/hash'
import { logger } from '../utils/logger'
import { getRandomBase36 } from '../utils/random'
import {
  DEFINITIONS_FILE,
  FORMS_FILE,
  generationFileName,
  isGenerationFile,
  LOCK_FILE,
  MANIFEST_FILE,
  MANIFEST_VERSION,
  serializeDefinitions,
  serializeForms,
  serializeManifest,
} from './serialize'
import type { IndexArtifacts, Manifest } from './types'

interface PendingFile {
  target: string
  temp: string
  content: string
}

export interface IndexWriterOptions {
  /** Clock for the manifest timestamp */
  now?: () => Date
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === code
}

export class IndexWriter {
  private readonly now: () => Date

  constructor(
    readonly outputDir: string,
    options: IndexWriterOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
  }

  get lockPath(): string {
    return join(this.outputDir, LOCK_FILE)
  }

  private pending(name: string, content: string): PendingFile {
    const target = join(this.outputDir, name)
    return { target, temp: `${target}.tmp.${Date.now()}.${getRandomBase36(10)}`, content }
  }

  private async acquireLock(): Promise<void> {
    try {
      await fs.mkdir(this.outputDir, { recursive: true })
    } catch (error: unknown) {
      const cause = toError(error)
      throw new IndexWriteError(this.outputDir, `cannot create directory (${cause.message})`, undefined, cause)
    }

    try {
      const handle = await fs.open(this.lockPath, 'wx')
      try {
        await handle.writeFile(`${process.pid}\n`)
      } finally {
        await handle.close()
      }
    } catch (error: unknown) {
      if (isErrnoCode(error, 'EEXIST')) {
        throw new IndexLockedError(this.outputDir, this.lockPath, toError(error))
      }
      const cause = toError(error)
      throw new IndexWriteError(this.outputDir, `cannot create lock file (${cause.message})`, undefined, cause)
    }
  }

  private async releaseLock(): Promise<void> {
    try {
      await fs.unlink(this.lockPath)
    } catch (error: unknown) {
      logger.warn(`[index-writer] Failed to remove lock ${this.lockPath}`, error)
    }
  }

  private async removeTemps(files: readonly PendingFile[]): Promise<void> {
    for (const file of files) {
      try {
        await fs.unlink(file.temp)
      } catch (cleanupError: unknown) {
        // Already renamed, or never written
        logger.debug(`[index-writer] Temp file ${file.temp} not removed`, cleanupError)
      }
    }
  }

  /**
   * Delete data files no longer named by the committed manifest
   */
  private async removeStaleGenerations(manifest: Manifest): Promise<void> {
    const live = new Set([manifest.forms.file, manifest.definitions.file])
    let names: string[]
    try {
      names = await fs.readdir(this.outputDir)
    } catch (error: unknown) {
      logger.warn(`[index-writer] Cannot list ${this.outputDir} for stale files`, error)
      return
    }
    for (const name of names) {
      if (!isGenerationFile(name) || live.has(name)) continue
      try {
        await fs.unlink(join(this.outputDir, name))
        logger.debug(`[index-writer] Removed stale ${name}`)
      } catch (error: unknown) {
        logger.warn(`[index-writer] Failed to remove stale ${name}`, error)
      }
    }
  }

  /**
   * Write both artifacts and the manifest; returns the manifest written
   */
  async write(artifacts: IndexArtifacts): Promise<Manifest> {
    await this.acquireLock()
    const files: PendingFile[] = []

    try {
      const formsContent = serializeForms(artifacts.forms)
      const definitionsContent = serializeDefinitions(artifacts.definitions)
      const formsHash = sha256(formsContent)
      const definitionsHash = sha256(definitionsContent)
      const manifest: Manifest = {
        version: MANIFEST_VERSION,
        createdAt: this.now().toISOString(),
        forms: { file: generationFileName(FORMS_FILE, formsHash), records: artifacts.forms.length, sha256: formsHash },
        definitions: {
          file: generationFileName(DEFINITIONS_FILE, definitionsHash),
          records: artifacts.definitions.length,
          sha256: definitionsHash,
        },
      }

      // Manifest last: its rename is the commit
      files.push(
        this.pending(manifest.forms.file, formsContent),
        this.pending(manifest.definitions.file, definitionsContent),
        this.pending(MANIFEST_FILE, serializeManifest(manifest))
      )
      for (const file of files) {
        await fs.writeFile(file.temp, file.content, 'utf-8')
      }
      for (const file of files) {
        await fs.rename(file.temp, file.target)
      }

      await this.removeStaleGenerations(manifest)
      logger.info(
        `[index-writer] Wrote ${manifest.forms.records} forms and ${manifest.definitions.records} lemmas to ${this.outputDir}`
      )
      return manifest
    } catch (error: unknown) {
      await this.removeTemps(files)
      const cause = toError(error)
      throw new IndexWriteError(this.outputDir, cause.message, undefined, cause)
    } finally {
      await this.releaseLock()
    }
  }
}
