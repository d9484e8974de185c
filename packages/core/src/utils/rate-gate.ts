/**
 * Rate Gate
 *
 * Enforces a minimum interval between calls to a rate-limited provider.
 * Calls made before the interval elapses are queued and served in order
 * from the next allowed slot; nothing is dropped.
 */
export class RateGate {
  private minIntervalMs: number
  private now: () => number
  private lastStartedAt: number | null = null
  private tail: Promise<void> = Promise.resolve()

  constructor(minIntervalMs: number, now: () => number = Date.now) {
    this.minIntervalMs = minIntervalMs
    this.now = now
  }

  /**
   * Run fn in the next free slot. The slot is taken when fn starts,
   * regardless of whether it succeeds.
   */
  schedule<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const wait = this.delayUntilNextSlot()
      if (wait > 0) {
        await new Promise<void>((resolve) => setTimeout(resolve, wait))
      }
      this.lastStartedAt = this.now()
      return fn()
    })

    // Keep the queue moving even when a call fails; the caller sees the failure
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  /** Milliseconds until the next call may start */
  delayUntilNextSlot(): number {
    if (this.lastStartedAt === null) return 0
    return Math.max(0, this.lastStartedAt + this.minIntervalMs - this.now())
  }
}
