/**
 * A bounded task queue: at most `limit` tasks run at once, the rest wait in
 * FIFO order. Each `run()` returns the task's own promise, so callers can await
 * results individually and in whatever order they need.
 */
export class WorkerPool {
  private active = 0
  private readonly waiting: Array<() => void> = []

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Worker pool limit must be a positive integer, got ${limit}`)
    }
  }

  /** Tasks currently executing. */
  get running(): number {
    return this.active
  }

  /** Tasks queued behind the limit. */
  get queued(): number {
    return this.waiting.length
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.limit) {
      // The finishing task hands its slot over, so `active` stays unchanged.
      await new Promise<void>((resolve) => this.waiting.push(resolve))
    } else {
      this.active++
    }
    try {
      return await task()
    } finally {
      const next = this.waiting.shift()
      if (next) next()
      else this.active--
    }
  }
}
