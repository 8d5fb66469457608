/**
 * Shared - Async Mutex
 *
 * Promise-chain lock for serializing async critical sections within one
 * Node.js process. Callers are served in FIFO order.
 *
 * Not re-entrant: calling `runExclusive` from inside a critical section of
 * the same mutex deadlocks. Each logical mutation takes the lock exactly once.
 */
export class AsyncMutex {
  #tail: Promise<void> = Promise.resolve()
  #waiting = 0

  /** Number of callers holding or queued for the lock */
  get pending(): number {
    return this.#waiting
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release!: () => void
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const previous = this.#tail
    this.#tail = gate
    this.#waiting += 1

    await previous
    try {
      return await fn()
    } finally {
      this.#waiting -= 1
      release()
    }
  }
}
