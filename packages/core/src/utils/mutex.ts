/**
 * Async Mutex
 *
 * Serializes critical sections across async tasks on one event loop.
 * Sections run in the order they asked for the lock; a throwing section
 * releases the lock and rethrows to its own caller only.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail
    let release: () => void = () => {}
    this.tail = new Promise<void>((resolve) => {
      release = resolve
    })
    this.pending++

    try {
      await previous
      return await fn()
    } finally {
      this.pending--
      release()
    }
  }

  /** True while a section is running or waiting */
  get locked(): boolean {
    return this.pending > 0
  }
}
