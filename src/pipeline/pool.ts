/**
 * WorkerPool: fan-out over in-process lanes, fan-in by merge
 *
 * Used for inputs too small for worker threads, and when threads cannot be
 * started. Each lane pulls items from one shared iterator and works into its own
 * shard; no shard is touched by another lane. Lanes yield to the event loop
 * every `yieldEvery` items so they interleave and I/O stays responsive.
 *
 * @module pipeline/pool
 */

export interface WorkerPoolOptions {
  /** Number of lanes (at least 1) */
  concurrency: number
  /** Items a lane processes before yielding (default 64) */
  yieldEvery?: number
}

const DEFAULT_YIELD_EVERY = 64

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

export class WorkerPool {
  readonly concurrency: number
  private readonly yieldEvery: number

  constructor(options: WorkerPoolOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency))
    this.yieldEvery = Math.max(1, options.yieldEvery ?? DEFAULT_YIELD_EVERY)
  }

  /**
   * Run `work` over every item and merge the lane shards into one
   */
  async mapReduce<T, S>(
    items: Iterable<T>,
    createShard: () => S,
    work: (item: T, shard: S) => void | Promise<void>,
    merge: (into: S, from: S) => S
  ): Promise<S> {
    const iterator = items[Symbol.iterator]()

    const lane = async (shard: S): Promise<S> => {
      let processed = 0
      for (let next = iterator.next(); next.done !== true; next = iterator.next()) {
        await work(next.value, shard)
        processed++
        if (processed % this.yieldEvery === 0) {
          await yieldToEventLoop()
        }
      }
      return shard
    }

    const lanes = Array.from({ length: this.concurrency }, () => lane(createShard()))
    const [first, ...rest] = await Promise.all(lanes)
    if (first === undefined) {
      return createShard()
    }
    return rest.reduce(merge, first)
  }
}
