// helpers/pipe.ts
// Composition utility for receiver operators

import type { Receiver } from "../receiver.ts";
import type { Operator } from "../_types.ts";

/**
 * Pipe function with overloads for up to 9 operators with proper typing.
 * Takes a receiver as input and returns the receiver produced by the last
 * operator.
 *
 * `pipe(source, a, b, c)` is the same as `c(b(a(source)))`, just readable
 * from left to right. Each operator listens to the receiver before it, so
 * the chain is wired up immediately.
 *
 * @returns The receiver produced by the last operator, or `source` itself
 * when no operator is given.
 *
 * @example
 * ```ts
 * const [transmitter, receiver] = Receiver.make<number>();
 *
 * const result = pipe(
 *   receiver,
 *   map(x => x * 2),
 *   filter(x => x > 10),
 *   take(5)
 * );
 *
 * result.listen(console.log);
 * ```
 */

// Overload 0: No operator
export function pipe<T>(
  source: Receiver<T>,
): Receiver<T>;

// Overload 1: Single operator
export function pipe<T, A>(
  source: Receiver<T>,
  op1: Operator<T, A>
): Receiver<A>;

// Overload 2: Two operators
export function pipe<T, A, B>(
  source: Receiver<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>
): Receiver<B>;

// Overload 3: Three operators
export function pipe<T, A, B, C>(
  source: Receiver<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>
): Receiver<C>;

// Overload 4: Four operators
export function pipe<T, A, B, C, D>(
  source: Receiver<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>
): Receiver<D>;

// Overload 5: Five operators
export function pipe<T, A, B, C, D, E>(
  source: Receiver<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>
): Receiver<E>;

// Overload 6: Six operators
export function pipe<T, A, B, C, D, E, F>(
  source: Receiver<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>
): Receiver<F>;

// Overload 7: Seven operators
export function pipe<T, A, B, C, D, E, F, G>(
  source: Receiver<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>
): Receiver<G>;

// Overload 8: Eight operators
export function pipe<T, A, B, C, D, E, F, G, H>(
  source: Receiver<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>
): Receiver<H>;

// Overload 9: Nine operators
export function pipe<T, A, B, C, D, E, F, G, H, I>(
  source: Receiver<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>
): Receiver<I>;

// Implementation: the overloads above carry the types, each step only needs
// the previous receiver.
export function pipe<T>(
  source: Receiver<T>,
  ...operators: Array<Operator<T, T>>
): Receiver<T> {
  return operators.reduce((receiver, operator) => operator(receiver), source);
}
