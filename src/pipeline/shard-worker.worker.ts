/**
 * Worker Thread Script for Shard Compilation
 *
 * Announces itself with a `ready` message, then answers every compile
 * request with the compiled shard.
 */

import { parentPort } from 'node:worker_threads'
import { handleShardRequest, type ShardRequest, type ShardResponse } from './shard-worker'

const port = parentPort

if (port) {
  port.on('message', (request: ShardRequest) => {
    port.postMessage(handleShardRequest(request))
  })

  const ready: ShardResponse = { type: 'ready' }
  port.postMessage(ready)
}
