/**
 * Worker Thread Shard Compilation
 *
 * Offloads expansion and extraction, the CPU-bound part of a build, to
 * worker threads. The main thread posts a batch of resolved entries, the
 * worker returns the compiled shard as plain data, and the main thread merges
 * the shards.
 *
 * Falls back to in-process lanes when worker threads cannot start, e.g. when
 * the worker script is TypeScript and no loader for it is available.
 *
 * The request handler is exported so it can be tested without a thread.
 */

import { existsSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Worker } from 'node:worker_threads'
import { toError } from '../errors'
import { logger } from '../utils/logger'
import type { ResolvedEntry } from './resolve'
import { compileShard, mergeShards, restoreShard, type Shard, type ShardOptions, type ShardSnapshot } from './shard'

// =============================================================================
// Message Types
// =============================================================================

/** Message sent from main thread to worker */
export interface ShardRequest {
  type: 'compile'
  id: string
  entries: ResolvedEntry[]
  options: ShardOptions
}

/** Message sent from worker back to main thread */
export type ShardResponse =
  | { type: 'ready' }
  | { type: 'compiled'; id: string; shard: ShardSnapshot }
  | { type: 'failed'; id: string; error: string }

export function handleShardRequest(request: ShardRequest): ShardResponse {
  try {
    return { type: 'compiled', id: request.id, shard: compileShard(request.entries, request.options) }
  } catch (error: unknown) {
    return { type: 'failed', id: request.id, error: toError(error).message }
  }
}

// =============================================================================
// Worker script
// =============================================================================

export interface WorkerScript {
  path: string
  /** Node options for the thread; inherited from the process when absent */
  execArgv?: string[]
}

const WORKER_BASENAME = 'shard-worker.worker'

/**
 * Locate the worker script beside this module: built JavaScript first, else
 * the TypeScript source loaded through tsx
 */
export function resolveWorkerScript(
  directory: string = dirname(fileURLToPath(import.meta.url))
): WorkerScript | undefined {
  const compiled = join(directory, `${WORKER_BASENAME}.js`)
  if (existsSync(compiled)) return { path: compiled }

  const source = join(directory, `${WORKER_BASENAME}.ts`)
  if (existsSync(source)) return { path: source, execArgv: ['--import', 'tsx'] }

  return undefined
}

// =============================================================================
// ShardWorker
// =============================================================================

interface PendingRequest {
  resolve: (shard: ShardSnapshot) => void
  reject: (error: Error) => void
}

/**
 * One background thread compiling shards.
 *
 * start() resolves false when the thread cannot be started or does not
 * report ready; callers then compile in process.
 */
export class ShardWorker {
  private worker: Worker | null = null
  private readonly pending = new Map<string, PendingRequest>()
  private requestCounter = 0
  private _ready = false
  private onStarted: ((ready: boolean) => void) | null = null

  constructor(private readonly script: WorkerScript | undefined = resolveWorkerScript()) {}

  get ready(): boolean {
    return this._ready && this.worker !== null
  }

  async start(): Promise<boolean> {
    if (this.worker) return this.ready
    if (this.script === undefined) return false

    const started = new Promise<boolean>((resolve) => {
      this.onStarted = resolve
    })

    try {
      this.worker = new Worker(
        this.script.path,
        this.script.execArgv === undefined ? {} : { execArgv: this.script.execArgv }
      )
    } catch (error: unknown) {
      logger.debug(`[shard-worker] Cannot start ${this.script.path}`, error)
      this.onStarted = null
      return false
    }

    this.worker.on('message', (message: ShardResponse) => this.receive(message))
    this.worker.on('error', (error: Error) => this.fail(error))
    this.worker.on('exit', (code: number) => this.fail(new Error(`Shard worker exited with code ${code}`)))

    this._ready = await started
    if (!this._ready) await this.stop()
    return this._ready
  }

  compile(entries: ResolvedEntry[], options: ShardOptions): Promise<ShardSnapshot> {
    const worker = this.worker
    if (!worker || !this._ready) {
      return Promise.reject(new Error('Shard worker not started'))
    }
    const request: ShardRequest = { type: 'compile', id: this.nextId(), entries, options }
    return new Promise((resolve, reject) => {
      this.pending.set(request.id, { resolve, reject })
      try {
        worker.postMessage(request)
      } catch (error: unknown) {
        this.pending.delete(request.id)
        reject(toError(error))
      }
    })
  }

  async stop(): Promise<void> {
    const worker = this.worker
    if (!worker) return
    this.worker = null
    this._ready = false
    await worker.terminate()
  }

  private nextId(): string {
    return `shard-${++this.requestCounter}`
  }

  private settleStart(ready: boolean): void {
    const onStarted = this.onStarted
    this.onStarted = null
    onStarted?.(ready)
  }

  private receive(message: ShardResponse): void {
    if (message.type === 'ready') {
      this.settleStart(true)
      return
    }
    const pending = this.pending.get(message.id)
    if (!pending) return
    this.pending.delete(message.id)
    if (message.type === 'failed') {
      pending.reject(new Error(message.error))
    } else {
      pending.resolve(message.shard)
    }
  }

  private fail(error: Error): void {
    if (this.onStarted) {
      logger.debug(`[shard-worker] Worker did not start`, error)
      this.settleStart(false)
    }
    for (const [, pending] of this.pending) {
      pending.reject(error)
    }
    this.pending.clear()
    this._ready = false
  }
}

// =============================================================================
// Batching
// =============================================================================

/**
 * Split into at most `count` contiguous batches of near-equal size
 */
export function splitBatches<T>(items: readonly T[], count: number): T[][] {
  if (items.length === 0) return []
  const size = Math.ceil(items.length / Math.max(1, count))
  const batches: T[][] = []
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size))
  }
  return batches
}

/**
 * Compile the entries on up to `threads` worker threads and merge the shards.
 * Resolves undefined, with every thread stopped, when any thread fails to start.
 */
export async function compileOnThreads(
  entries: readonly ResolvedEntry[],
  threads: number,
  options: ShardOptions,
  script: WorkerScript | undefined = resolveWorkerScript()
): Promise<Shard | undefined> {
  const lanes = splitBatches(entries, threads).map((batch) => ({ batch, worker: new ShardWorker(script) }))
  if (lanes.length === 0) return undefined

  try {
    const started = await Promise.all(lanes.map((lane) => lane.worker.start()))
    if (started.includes(false)) {
      logger.debug(`[shard-worker] Worker threads unavailable, compiling in process`)
      return undefined
    }

    logger.debug(`[shard-worker] Compiling ${entries.length} entries on ${lanes.length} threads`)
    const snapshots = await Promise.all(lanes.map((lane) => lane.worker.compile(lane.batch, options)))
    const [first, ...rest] = snapshots.map(restoreShard)
    return first === undefined ? undefined : rest.reduce(mergeShards, first)
  } finally {
    await Promise.all(lanes.map((lane) => lane.worker.stop()))
  }
}
