/**
 * @module GuardedCell
 */

import { ReceiverError } from "./error.ts";

/**
 * A mutual-exclusion wrapper around one owned value.
 *
 * The value is only reachable through {@link apply}, which holds the cell for
 * the duration of the mutator and releases it on every exit path, including
 * a throwing mutator. There is no bare lock/unlock pair.
 *
 * JavaScript runs one call stack at a time, so the only way two critical
 * sections can overlap is re-entrancy: a mutator that (directly or through a
 * callback) calls `apply` on the same cell again. That is the single-threaded
 * form of a self-deadlock and is rejected with a {@link ReceiverError}
 * instead of silently interleaving two mutations.
 *
 * @typeParam T - The type of the guarded value. Use an object when the
 * mutator needs to replace a primitive (`{ count: 0 }` rather than `0`).
 *
 * @example
 * ```ts
 * const counter = new GuardedCell({ count: 0 });
 *
 * const next = counter.apply(state => ++state.count); // 1
 * ```
 */
export class GuardedCell<T> {
  #value: T;
  #held = false;

  constructor(value: T) {
    this.#value = value;
  }

  /**
   * Whether a mutator is currently running against this cell.
   */
  get held(): boolean {
    return this.#held;
  }

  /**
   * Runs `mutator` with exclusive access to the guarded value and returns its
   * result.
   *
   * @throws {ReceiverError} When called from inside another `apply` on the
   * same cell.
   */
  apply<R>(mutator: (value: T) => R): R {
    if (this.#held) {
      throw new ReceiverError(
        new Error("GuardedCell is already held"),
        "Re-entrant access to a guarded cell",
        {
          operator: "apply",
          tip: "Do not call back into the same receiver or operator state from inside a mutator; do the work after apply() returns.",
        }
      );
    }

    this.#held = true;
    try {
      return mutator(this.#value);
    } finally {
      this.#held = false;
    }
  }
}
