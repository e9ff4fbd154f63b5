// CHANGE: Wrap p-limit in an admission gate that observes an abort signal.
// WHY: Running repository searches must unwind promptly on interrupt; waiting ones are never started.

import pLimit from "p-limit";
import { CanceledError, throwIfCanceled } from "../errors.js";

/**
 * Counting gate bounding the number of tasks in flight.
 *
 * Invariant: at most `capacity` tasks passed to `run` execute at the same time, and at most `capacity` abort
 * listeners are registered on a signal by this gate.
 */
export class AdmissionGate {
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(readonly capacity: number) {
    this.limit = pLimit(capacity);
  }

  /**
   * Run `task` once a slot is free.
   *
   * A task admitted after cancellation is never started. An admitted task's promise rejects with
   * `CanceledError` as soon as the signal fires, releasing its slot.
   */
  run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    throwIfCanceled(signal);
    return this.limit(() => {
      throwIfCanceled(signal);
      if (!signal) {
        return task();
      }
      return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(new CanceledError());
        signal.addEventListener("abort", onAbort, { once: true });
        void task()
          .then(resolve, reject)
          .finally(() => signal.removeEventListener("abort", onAbort));
      });
    });
  }
}
