/**
 * Test Temp Directory Utilities
 *
 * Each test gets its own directory under the OS temp dir, removed with
 * retries on cleanup.
 *
 * Usage:
 * ```typescript
 * let ctx: TestContext
 *
 * beforeEach(async () => {
 *   ctx = await createTestContext()
 * })
 *
 * afterEach(async () => {
 *   await ctx.cleanup()
 * })
 * ```
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export interface TestContextOptions {
  /** Prefix for the temp directory name */
  prefix?: string
  /** Maximum cleanup retries (default: 5) */
  maxCleanupRetries?: number
  /** Delay between cleanup retries in ms (default: 100) */
  cleanupRetryDelay?: number
}

export interface TestContext {
  /** The unique temp directory path */
  tempDir: string
  /** Path of a file inside the temp directory */
  path(...segments: string[]): string
  /** Remove the temp directory */
  cleanup(): Promise<void>
}

function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

async function cleanupTempDirWithRetries(tempDir: string, maxRetries: number, retryDelay: number): Promise<void> {
  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      await rm(tempDir, { recursive: true, force: true, maxRetries: 3 })
      return
    } catch (error: unknown) {
      const code = errorCode(error)
      if (code === 'ENOENT') return

      // Retriable errors - wait and try again
      if ((code === 'ENOTEMPTY' || code === 'EBUSY') && attempt < maxRetries - 1) {
        await new Promise((resolve) => setTimeout(resolve, retryDelay * (attempt + 1)))
        continue
      }
      throw error
    }
  }
}

export async function createTestContext(options: TestContextOptions = {}): Promise<TestContext> {
  const { prefix = 'verbforms-test-', maxCleanupRetries = 5, cleanupRetryDelay = 100 } = options
  const tempDir = await mkdtemp(join(tmpdir(), prefix))

  return {
    tempDir,
    path: (...segments: string[]) => join(tempDir, ...segments),
    cleanup: () => cleanupTempDirWithRetries(tempDir, maxCleanupRetries, cleanupRetryDelay),
  }
}
