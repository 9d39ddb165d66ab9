import PQueue from 'p-queue'

export interface IKeyedLock {
  /**
   * Runs `operation` once every operation previously queued for the same key has settled.
   * Operations for different keys run concurrently.
   */
  withLock<T>(key: string, operation: () => Promise<T>): Promise<T>
}

export function createKeyedLock(): IKeyedLock {
  const queues = new Map<string, PQueue>()

  async function withLock<T>(key: string, operation: () => Promise<T>): Promise<T> {
    let queue = queues.get(key)
    if (!queue) {
      queue = new PQueue({ concurrency: 1 })
      queues.set(key, queue)
    }

    try {
      return await queue.add(operation)
    } finally {
      // idle queues are dropped so the map only holds keys with work in flight
      if (queue.size === 0 && queue.pending === 0 && queues.get(key) === queue) {
        queues.delete(key)
      }
    }
  }

  return {
    withLock
  }
}
