import type { Receiver } from "../../receiver.ts";
import type { Operator } from "../../_types.ts";
import { createOperator, createStatefulOperator } from "../operators.ts";

/**
 * @module operations/core
 *
 * **Core Operators - Like Array Methods, But Over Time**
 *
 * These operators work just like Array methods you already know:
 *
 * ```ts
 * // Array methods:
 * [1, 2, 3].map(n => n * 2).filter(n => n > 3)  // [4, 6]
 *
 * // Receiver operators (same idea, values arrive one by one):
 * pipe(
 *   receiver,
 *   map(n => n * 2),
 *   filter(n => n > 3)
 * ).listen(console.log);  // 4, 6 as 1, 2, 3 are broadcast
 * ```
 *
 * Each operator returns a new hot receiver; the source is left untouched, so
 * several pipelines can share one source.
 */

/**
 * Rejects counts that do not name a whole number of values.
 */
function assertCount(operator: string, count: number): void {
  if (Number.isNaN(count) || (Number.isFinite(count) && !Number.isInteger(count))) {
    throw new RangeError(`${operator}() count must be an integer or Infinity, got ${count}`);
  }
}

/**
 * Transforms each value.
 *
 * Like `Array.map()`:
 *
 * ```ts
 * const [transmitter, receiver] = Receiver.make<number>();
 * const labels = pipe(receiver, map(n => `#${n}`));
 *
 * labels.listen(console.log);
 * transmitter.broadcast(1); // "#1"
 * ```
 *
 * @param project - Function that transforms each value
 */
export function map<T, R>(project: (value: T) => R): Operator<T, R> {
  return createOperator<T, R>({
    name: "map",
    transform(value, controller) {
      controller.enqueue(project(value));
    },
  });
}

/**
 * Keeps the values that pass your test.
 *
 * Like `Array.filter()`:
 *
 * ```ts
 * const evens = pipe(receiver, filter(n => n % 2 === 0));
 *
 * transmitter.broadcast(1); // dropped
 * transmitter.broadcast(2); // forwarded
 * ```
 *
 * @param predicate - Test function that decides which values to keep
 */
export function filter<T>(predicate: (value: T) => boolean): Operator<T, T> {
  return createOperator<T, T>({
    name: "filter",
    transform(value, controller) {
      if (predicate(value)) {
        controller.enqueue(value);
      }
    },
  });
}

/**
 * Skips the first `count` values, forwarding everything afterwards.
 *
 * Like `Array.slice(count)`:
 *
 * ```ts
 * const later = pipe(receiver, skip(3));
 *
 * // broadcast 1, 2, 3, 4, 5 → later delivers 4, 5
 * ```
 *
 * A `count` of zero or less returns the source itself.
 *
 * @param count - Number of values to skip
 * @throws {RangeError} When `count` is `NaN` or a fraction.
 */
export function skip<T>(count: number): Operator<T, T> {
  assertCount("skip", count);
  if (count <= 0) {
    return (source: Receiver<T>) => source;
  }

  return createStatefulOperator<T, T, { skipped: number }>({
    name: "skip",
    createState: () => ({ skipped: 0 }),
    transform(value, state, controller) {
      if (state.skipped < count) {
        state.skipped++;
        return;
      }

      controller.enqueue(value);
    },
  });
}

/**
 * Forwards only the first `count` values, dropping everything afterwards.
 *
 * Like `Array.slice(0, count)`:
 *
 * ```ts
 * const firstTwo = pipe(receiver, take(2));
 *
 * // broadcast 1, 2, 3, 4 → firstTwo delivers 1, 2
 * ```
 *
 * A `count` of zero or less forwards nothing.
 *
 * @param count - Number of values to forward
 * @throws {RangeError} When `count` is `NaN` or a fraction.
 */
export function take<T>(count: number): Operator<T, T> {
  assertCount("take", count);
  return createStatefulOperator<T, T, { remaining: number }>({
    name: "take",
    createState: () => ({ remaining: count }),
    transform(value, state, controller) {
      if (state.remaining <= 0) return;
      state.remaining--;

      controller.enqueue(value);
    },
  });
}
