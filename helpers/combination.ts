// helpers/combination.ts
// Operators that merge several receivers into one

import type { Receiver } from "../receiver.ts";

import { GuardedCell } from "../cell.ts";
import { deriveReceiver } from "../receiver.ts";

/**
 * Latest value seen on each side; `null` until that side emits.
 */
interface CombineLatestState<A, B> {
  a: { value: A } | null;
  b: { value: B } | null;
}

/**
 * Combines two receivers into one that delivers `[latestA, latestB]`.
 *
 * Nothing is delivered until both sources have emitted at least once. From
 * then on, every emission of either source is immediately paired with the
 * other source's latest value.
 *
 * ```ts
 * const [count, counts] = Receiver.make<number>();
 * const [label, labels] = Receiver.make<string>();
 *
 * combineLatest(counts, labels).listen(([n, s]) => console.log(n, s));
 *
 * count.broadcast(1);    // nothing yet
 * label.broadcast("a");  // 1 "a"
 * count.broadcast(2);    // 2 "a"
 * label.broadcast("b");  // 2 "b"
 * ```
 *
 * ## Atomicity
 *
 * Updating one side and reading the pair happen together under one guarded
 * state, so each delivered pair reflects exactly the emissions before it. No
 * ordering between the two sources is promised beyond that.
 *
 * The derived receiver is hot and reports listener failures to the first
 * source's error handler.
 *
 * @param first - Source of the first element of each pair
 * @param second - Source of the second element of each pair
 */
export function combineLatest<A, B>(first: Receiver<A>, second: Receiver<B>): Receiver<[A, B]> {
  const [transmitter, receiver] = deriveReceiver<[A, B]>(first);
  const state = new GuardedCell<CombineLatestState<A, B>>({ a: null, b: null });

  function emit(update: (current: CombineLatestState<A, B>) => void): void {
    const pair = state.apply<[A, B] | null>(current => {
      update(current);
      return current.a && current.b ? [current.a.value, current.b.value] : null;
    });

    if (pair) {
      transmitter.broadcast(pair);
    }
  }

  first.listen(value => emit(current => { current.a = { value }; }));
  second.listen(value => emit(current => { current.b = { value }; }));

  return receiver;
}
