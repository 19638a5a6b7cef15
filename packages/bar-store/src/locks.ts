/**
 * In-process locks for the bar store.
 *
 * Both locks hand out access in FIFO order, the same way the rate limiter
 * queue hands out request slots.
 */

/**
 * Serialises async work per key. Work for different keys runs concurrently.
 *
 * Example:
 * ```typescript
 * const mutex = new KeyedMutex()
 * await mutex.runExclusive('BTCUSDT:15m', () => store.write(bar))
 * ```
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /**
   * Number of keys with work running or queued.
   */
  activeKeys(): number {
    return this.tails.size
  }
}

interface Waiter {
  mode: 'shared' | 'exclusive'
  grant: () => void
}

/**
 * Readers-writer lock. Any number of shared holders, or one exclusive
 * holder. A queued exclusive request blocks later shared requests, so bulk
 * deletes are not starved by a steady stream of writes.
 */
export class AsyncRwLock {
  private sharedHolders = 0
  private exclusiveHeld = false
  private queue: Waiter[] = []

  async runShared<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire('shared')
    try {
      return await fn()
    } finally {
      release()
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire('exclusive')
    try {
      return await fn()
    } finally {
      release()
    }
  }

  /**
   * Resolves with a release function once access is granted. Calling
   * release more than once has no effect.
   */
  acquire(mode: 'shared' | 'exclusive'): Promise<() => void> {
    return new Promise((resolve) => {
      this.queue.push({
        mode,
        grant: () => resolve(this.releaser(mode)),
      })
      this.drain()
    })
  }

  state(): { shared: number; exclusive: boolean; waiting: number } {
    return { shared: this.sharedHolders, exclusive: this.exclusiveHeld, waiting: this.queue.length }
  }

  private releaser(mode: 'shared' | 'exclusive'): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      if (mode === 'shared') {
        this.sharedHolders--
      } else {
        this.exclusiveHeld = false
      }
      this.drain()
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0]
      if (next === undefined || this.exclusiveHeld) return

      if (next.mode === 'exclusive') {
        if (this.sharedHolders > 0) return
        this.queue.shift()
        this.exclusiveHeld = true
        next.grant()
        return
      }

      this.queue.shift()
      this.sharedHolders++
      next.grant()
    }
  }
}
