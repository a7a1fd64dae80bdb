/**
 * Serializes tasks that share a key; tasks under different keys run
 * independently. The tail of each key's chain is dropped once it settles.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail = result.then(
      () => undefined,
      () => undefined,
    )

    this.tails.set(key, tail)
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    })

    return result
  }

  get activeKeys(): number {
    return this.tails.size
  }
}
