/**
 * Ordered async queue between a callback-driven producer and a single consumer.
 *
 * Producers push from event listeners; one `for await` loop reads items in push
 * order. After `end()` the consumer drains what is left and then stops.
 */
export class AsyncEventQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = []
  private waiting: ((result: IteratorResult<T>) => void) | null = null
  private ended = false
  private iterating = false

  get size(): number {
    return this.items.length
  }

  get isEnded(): boolean {
    return this.ended
  }

  push(item: T): void {
    if (this.ended) {
      return
    }

    if (this.waiting) {
      const resolve = this.waiting
      this.waiting = null
      resolve({ value: item, done: false })
      return
    }

    this.items.push(item)
  }

  end(): void {
    if (this.ended) {
      return
    }
    this.ended = true

    if (this.waiting) {
      const resolve = this.waiting
      this.waiting = null
      resolve({ value: undefined, done: true })
    }
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1)
      return Promise.resolve({ value: item, done: false })
    }

    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true })
    }

    return new Promise((resolve) => {
      this.waiting = resolve
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) {
      throw new Error('AsyncEventQueue supports a single consumer')
    }
    this.iterating = true

    return {
      next: () => this.next(),
      return: async () => {
        this.end()
        this.items.length = 0
        return { value: undefined, done: true }
      },
    }
  }
}
