/**
 * Serializes async tasks per key. Tasks for different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const run = previous.then(task)
    // The chain only tracks completion; the outcome goes back to the caller through `run`.
    const tail = run.then(
      () => undefined,
      () => undefined,
    )
    this.tails.set(key, tail)

    try {
      return await run
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }
}
