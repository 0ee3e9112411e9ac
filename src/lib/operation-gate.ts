/**
 * Operation Gate
 *
 * Single-writer critical section. Mutations queue behind each other through
 * a p-limit(1) queue and wait for in-flight reads to drain; reads run
 * concurrently with each other and wait while a mutation holds the gate.
 */

import pLimit from 'p-limit'

export class OperationGate {
  private writer = pLimit(1)
  private barrier: Promise<void> | null = null
  private readers = new Set<Promise<unknown>>()

  /**
   * Run fn with no other mutation or read in flight
   */
  exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.writer(async () => {
      let release: () => void = () => {}
      this.barrier = new Promise<void>(resolve => {
        release = resolve
      })

      try {
        await Promise.allSettled([...this.readers])
        return await fn()
      } finally {
        this.barrier = null
        release()
      }
    })
  }

  /**
   * Run fn alongside other reads, after any mutation in flight
   */
  async shared<T>(fn: () => Promise<T> | T): Promise<T> {
    while (this.barrier) {
      await this.barrier
    }

    const run = Promise.resolve().then(fn)
    this.readers.add(run)
    try {
      return await run
    } finally {
      this.readers.delete(run)
    }
  }

  /** Mutations queued or running */
  get pendingWrites(): number {
    return this.writer.activeCount + this.writer.pendingCount
  }

  get activeReads(): number {
    return this.readers.size
  }
}
