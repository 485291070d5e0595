/**
 * Async mutex for read-modify-write sequences that span an await.
 * Waiters are served in arrival order.
 */

export class AsyncMutex {
  private held = false
  private queue: Array<() => void> = []

  get isLocked(): boolean {
    return this.held
  }

  get waiting(): number {
    return this.queue.length
  }

  async acquire(): Promise<void> {
    if (!this.held) {
      this.held = true
      return
    }
    return new Promise(resolve => {
      this.queue.push(resolve)
    })
  }

  release(): void {
    const next = this.queue.shift()
    if (next) {
      // Ownership passes straight to the next waiter; `held` stays true
      next()
    } else {
      this.held = false
    }
  }

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }
}
