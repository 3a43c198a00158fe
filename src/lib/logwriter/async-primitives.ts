/**
 * Small coordination helpers for the dispatch loop.
 */

/**
 * FIFO mutex: callers acquire in the order they asked.
 */
export class AsyncMutex {
  private locked = false
  private readonly waitQueue: Array<() => void> = []

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return
    }

    return new Promise((resolve) => {
      this.waitQueue.push(resolve)
    })
  }

  release(): void {
    const next = this.waitQueue.shift()
    if (next) {
      next()
    } else {
      this.locked = false
    }
  }

  async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await operation()
    } finally {
      this.release()
    }
  }
}

/**
 * A promise that is settled from outside. Resolving twice is a no-op.
 */
export class Latch {
  readonly promise: Promise<void>
  private released = false
  private resolveFn: () => void = () => undefined

  constructor() {
    this.promise = new Promise((resolve) => {
      this.resolveFn = resolve
    })
  }

  get isReleased(): boolean {
    return this.released
  }

  release(): void {
    this.released = true
    this.resolveFn()
  }
}

/**
 * Resolves true if `promise` settles within `millis`, false otherwise.
 */
export function settlesWithin(promise: Promise<unknown>, millis: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), Math.max(0, millis))
    const done = () => {
      clearTimeout(timer)
      resolve(true)
    }
    promise.then(done, done)
  })
}
