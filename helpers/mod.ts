// @filename: helpers/mod.ts
/**
 * Receiver Operators Library
 *
 * @module
 *
 *
 * A collection of operators that derive new receivers from existing ones,
 * plus `pipe` to chain them and `combineLatest` to join two receivers.
 *
 * ## Core Features
 *
 * - **Receiver in, receiver out**: every operator takes a receiver and returns a new hot one
 * - **Synchronous**: values flow through a chain on the broadcasting caller's stack
 * - **Functional**: the source is never modified, so pipelines can share it
 * - **Type-safe**: `pipe` infers the value type at every step
 *
 * ## Basic Usage
 *
 * @example
 * ```ts
 * import { pipe, map, filter, take } from "./helpers/mod.ts";
 * import { Receiver } from "./receiver.ts";
 *
 * const [transmitter, receiver] = Receiver.make<number>();
 *
 * const result = pipe(
 *   receiver,
 *   filter(x => x % 2 === 0), // Keep even numbers
 *   map(x => x * 10),         // Multiply by 10
 *   take(3)                   // Take only the first 3 values
 * );
 *
 * result.listen(value => console.log(value));
 *
 * for (let i = 0; i < 10; i++) transmitter.broadcast(i);
 * // Output: 0, 20, 40
 * ```
 *
 * ## Custom Operators
 *
 * `createOperator` and `createStatefulOperator` build operators with the same
 * wiring, naming and error reporting as the built-in ones.
 */

export type * from "./_types.ts";

export * from "./operators.ts";
export * from "./pipe.ts";
export * from "./combination.ts";

export * from "./operations/core.ts";
export * from "./operations/values.ts";
