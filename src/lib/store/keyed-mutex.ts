/**
 * FIFO async lock per key. Multi-key acquisition takes keys in sorted order so
 * two holders of overlapping key sets cannot wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async acquire(keys: string[]): Promise<() => void> {
    const ordered = Array.from(new Set(keys)).sort()
    const releases: Array<() => void> = []

    for (const key of ordered) {
      releases.push(await this.acquireOne(key))
    }

    return () => {
      releases.reverse().forEach((release) => release())
    }
  }

  isLocked(key: string) {
    return this.tails.has(key)
  }

  private async acquireOne(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous

    return () => {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }
}
