import { assertCounterStart } from "../../core/validation/validation"
import type { CounterOptions, Ordinal, OrdinalCounter } from "../../ports/ordinal-counter"

/** Counter for a single thread. Not visible to worker threads. */
export class MemoryCounter implements OrdinalCounter {
  private next: Ordinal

  constructor(options: CounterOptions = {}) {
    const start = options.start ?? 1n

    assertCounterStart(start)
    this.next = start
  }

  issue(): Ordinal {
    const ordinal = this.next
    this.next += 1n
    return ordinal
  }

  peek(): Ordinal {
    return this.next
  }
}
