import type { Operator } from "../../_types.ts";
import { createOperator, createStatefulOperator } from "../operators.ts";

/**
 * @module operations/values
 *
 * Operators that look at a value in relation to the values before it:
 * pairing with the previous one, dropping repeats and duplicates, and
 * unwrapping optional values.
 */

/**
 * Pairs each value with the value before it.
 *
 * The first value is paired with `undefined`.
 *
 * ```ts
 * const moves = pipe(position, withPrevious());
 *
 * moves.listen(([from, to]) => console.log(from, "→", to));
 *
 * transmitter.broadcast(1); // undefined → 1
 * transmitter.broadcast(2); // 1 → 2
 * ```
 */
export function withPrevious<T>(): Operator<T, [previous: T | undefined, current: T]> {
  return createStatefulOperator<T, [T | undefined, T], { last: T | undefined }>({
    name: "withPrevious",
    createState: () => ({ last: undefined }),
    transform(value, state, controller) {
      const previous = state.last;
      state.last = value;

      controller.enqueue([previous, value]);
    },
  });
}

/**
 * Drops a value when it equals the last value forwarded.
 *
 * ```ts
 * const changes = pipe(status, skipRepeats());
 *
 * // broadcast 1, 1, 2, 1, 2, 2, 3 → changes delivers 1, 2, 1, 2, 3
 * ```
 *
 * ## Practical Use Case
 *
 * Use `skipRepeats` to react only when a piece of state actually changes,
 * such as a connection status that is re-broadcast on every heartbeat.
 *
 * @param equals - Equality test between the last forwarded value and the
 * new one. Defaults to `Object.is`.
 */
export function skipRepeats<T>(
  equals: (previous: T, current: T) => boolean = Object.is
): Operator<T, T> {
  return createStatefulOperator<T, T, { last: { value: T } | null }>({
    name: "skipRepeats",
    createState: () => ({ last: null }),
    transform(value, state, controller) {
      if (state.last !== null && equals(state.last.value, value)) return;

      state.last = { value };
      controller.enqueue(value);
    },
  });
}

/**
 * Forwards only the first occurrence of each distinct value.
 *
 * Values are compared by `Set` membership (SameValueZero), optionally on a key
 * extracted from each value.
 *
 * ```ts
 * const firstSeen = pipe(ids, uniqueValues());
 *
 * // broadcast 1, 2, 1, 3, 1, 3, 2 → firstSeen delivers 1, 2, 3
 *
 * const firstPerUser = pipe(logins, uniqueValues(login => login.userId));
 * ```
 *
 * Every distinct key is remembered for the lifetime of the derived receiver.
 *
 * @param keySelector - Extracts the key used for the uniqueness check.
 */
export function uniqueValues<T, K = T>(keySelector?: (value: T) => K): Operator<T, T> {
  return createStatefulOperator<T, T, { seen: Set<T | K> }>({
    name: "uniqueValues",
    createState: () => ({ seen: new Set() }),
    transform(value, state, controller) {
      const key = keySelector ? keySelector(value) : value;
      if (state.seen.has(key)) return;

      state.seen.add(key);
      controller.enqueue(value);
    },
  });
}

/**
 * Unwraps a receiver of optional values, dropping `null` and `undefined`.
 *
 * ```ts
 * const [transmitter, receiver] = Receiver.make<string | undefined>();
 * const names = pipe(receiver, skipNil());  // Receiver<string>
 *
 * transmitter.broadcast("ada");     // forwarded
 * transmitter.broadcast(undefined); // dropped
 * ```
 */
export function skipNil<T>(): Operator<T | null | undefined, T> {
  return createOperator<T | null | undefined, T>({
    name: "skipNil",
    transform(value, controller) {
      if (value === null || value === undefined) return;
      controller.enqueue(value);
    },
  });
}
