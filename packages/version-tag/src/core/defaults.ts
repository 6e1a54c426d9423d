import { AtomicCounter } from "../adapters/atomic/atomic-counter"
import { AtomicInstanceId } from "../adapters/atomic/atomic-instance-id"

/**
 * Process-wide counter behind `VersionTag.fresh()` and `new VersionTag()`.
 * Starts at 1 when the module loads. Every worker thread loads its own copy;
 * see {@link attachDefaults}.
 */
export let defaultCounter = new AtomicCounter()

/** Process-wide instance id behind `SharedTag.from()`, drawn on first use. */
export let defaultInstanceId = new AtomicInstanceId()

/** The memory behind this thread's defaults, in a form `postMessage` can carry. */
export type SharedDefaults = {
  counter: SharedArrayBuffer
  instance: SharedArrayBuffer
}

export function sharedDefaults(): SharedDefaults {
  return { counter: defaultCounter.buffer, instance: defaultInstanceId.buffer }
}

/**
 * Point this thread's defaults at memory shared by another thread, so both
 * draw one sequence of ordinals and agree on one instance id.
 *
 * Call it when the worker starts, before it mints any tag. Tags and
 * `Tracked` values created earlier keep the counter they were created with.
 *
 * @example
 * ```ts
 * // main thread
 * new Worker(file, { workerData: { tags: sharedDefaults() } })
 *
 * // worker
 * attachDefaults(workerData.tags)
 * ```
 */
export function attachDefaults(shared: SharedDefaults): void {
  defaultCounter = new AtomicCounter({ buffer: shared.counter })
  defaultInstanceId = new AtomicInstanceId({ buffer: shared.instance })
}
