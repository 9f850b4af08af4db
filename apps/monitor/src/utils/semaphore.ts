/**
 * Counting semaphore for capping concurrent work inside one process.
 *
 * Waiters are served in arrival order. A released slot is handed
 * straight to the next waiter, so a burst of new callers cannot starve
 * the queue.
 */
export class Semaphore {
  private active = 0
  private readonly waiters: Array<() => void> = []

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`)
    }
  }

  get inUse(): number {
    return this.active
  }

  get waiting(): number {
    return this.waiters.length
  }

  /**
   * Wait for a slot. The returned function releases it; calling it more
   * than once has no effect.
   */
  async acquire(): Promise<() => void> {
    if (this.active < this.limit) {
      this.active++
    } else {
      await new Promise<void>(resolve => this.waiters.push(resolve))
    }
    return this.releaser()
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await task()
    } finally {
      release()
    }
  }

  private releaser(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.waiters.shift()
      if (next) {
        next()
      } else {
        this.active--
      }
    }
  }
}

/**
 * Run `task` over every item with at most `limit` in flight.
 * Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const semaphore = new Semaphore(limit)
  return Promise.all(items.map((item, index) => semaphore.run(() => task(item, index))))
}
