import { assertCounterStart, assertU64Slot, U64_BYTES } from "../../core/validation/validation"
import {
  type CounterOptions,
  type Ordinal,
  type OrdinalCounter,
  ZERO_ORDINAL,
} from "../../ports/ordinal-counter"

const SLOT = 0

export type AtomicCounterOptions =
  | (CounterOptions & { buffer?: never })
  | { buffer: SharedArrayBuffer; start?: never }

/**
 * Counter kept in a `SharedArrayBuffer` and advanced with `Atomics.add`.
 *
 * Post `counter.buffer` to a worker and attach to it there with
 * `new AtomicCounter({ buffer })`; both sides then draw from one sequence.
 * A slot that still holds 0 is moved to 1 on attach, so the zero ordinal is
 * never issued.
 *
 * @example
 * ```ts
 * const counter = new AtomicCounter()
 * new Worker(file, { workerData: { counter: counter.buffer } })
 *
 * // in the worker
 * const shared = new AtomicCounter({ buffer: workerData.counter })
 * shared.issue()
 * ```
 */
export class AtomicCounter implements OrdinalCounter {
  readonly buffer: SharedArrayBuffer
  private readonly view: BigUint64Array

  constructor(options: AtomicCounterOptions = {}) {
    const { buffer } = options

    if (buffer) {
      assertU64Slot(buffer, "AtomicCounter")

      this.buffer = buffer
      this.view = new BigUint64Array(this.buffer, 0, 1)
      Atomics.compareExchange(this.view, SLOT, ZERO_ORDINAL, 1n)
      return
    }

    const start = options.start ?? 1n
    assertCounterStart(start)

    this.buffer = new SharedArrayBuffer(U64_BYTES)
    this.view = new BigUint64Array(this.buffer, 0, 1)
    Atomics.store(this.view, SLOT, start)
  }

  issue(): Ordinal {
    return Atomics.add(this.view, SLOT, 1n)
  }

  peek(): Ordinal {
    return Atomics.load(this.view, SLOT)
  }
}
