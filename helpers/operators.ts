/**
 * Operators are the building blocks of receiver pipelines.
 *
 * If you've ever used `Array.map` or `Array.filter`, you already know the core idea:
 * an **operator** takes a sequence of values and transforms or filters it into a new
 * sequence. The difference is that a receiver's values arrive over time, so an operator
 * listens to its source and republishes through a receiver of its own:
 *
 * ```ts
 * // Double every number
 * const double = createOperator<number, number>({
 *   name: "double",
 *   transform(value, controller) {
 *     controller.enqueue(value * 2);
 *   }
 * });
 *
 * // Only allow even numbers through
 * const evens = createOperator<number, number>({
 *   name: "evens",
 *   transform(value, controller) {
 *     if (value % 2 === 0) controller.enqueue(value);
 *   }
 * });
 *
 * pipe(receiver, double, evens).listen(console.log);
 * ```
 *
 * Of course, no one wants to write operators from scratch every time, so the
 * familiar ones (`map`, `filter`, `skip`, `take`, ...) are provided ready-made.
 *
 * ## Stateful Operators: Remembering Across Values
 *
 * Some operators need to remember things between values, like a counter or the
 * last value seen. `createStatefulOperator` gives each application of the
 * operator its own state, guarded so that only one value updates it at a time:
 *
 * ```ts
 * const runningSum = createStatefulOperator<number, number, { sum: number }>({
 *   name: "runningSum",
 *   createState: () => ({ sum: 0 }),
 *   transform(value, state, controller) {
 *     state.sum += value;
 *     controller.enqueue(state.sum);
 *   }
 * });
 * ```
 *
 * Values enqueued from `transform` are published after the state has been
 * released, so a downstream listener that feeds back into the source cannot
 * run into the operator's own guarded state.
 *
 * ## Errors
 *
 * Derived receivers are always hot and report listener failures to the same
 * error handler as their source. If `transform` itself throws, the exception
 * is wrapped in a {@link ReceiverError} naming the operator and the value, and
 * surfaces through the source receiver's error handler like any other
 * listener failure.
 *
 * @module
 */

import type { Receiver } from "../receiver.ts";
import type { Operator } from "../_types.ts";
import type {
  OperatorController,
  OperatorOptions,
  StatefulOperatorOptions,
} from "./_types.ts";

import { GuardedCell } from "../cell.ts";
import { ReceiverError } from "../error.ts";
import { deriveReceiver } from "../receiver.ts";

/**
 * Publishes through `emit` what `run` enqueues, once `run` has returned.
 */
function drain<R>(run: (controller: OperatorController<R>) => void, emit: (value: R) => void): void {
  const pending: R[] = [];
  run({ enqueue: value => { pending.push(value); } });

  for (const value of pending) {
    emit(value);
  }
}

/**
 * Creates an operator from a `transform` function that needs no memory
 * between values.
 *
 * @example
 * ```ts
 * const toUpper = createOperator<string, string>({
 *   name: "toUpper",
 *   transform(value, controller) {
 *     controller.enqueue(value.toUpperCase());
 *   }
 * });
 * ```
 */
export function createOperator<T, R>(options: OperatorOptions<T, R>): Operator<T, R> {
  const { name, transform } = options;

  return (source: Receiver<T>): Receiver<R> => {
    const [transmitter, receiver] = deriveReceiver<R>(source);

    source.listen(value => {
      try {
        drain<R>(controller => transform(value, controller), next => transmitter.broadcast(next));
      } catch (err) {
        throw ReceiverError.from(err, name, value);
      }
    });

    return receiver;
  };
}

/**
 * Creates an operator whose `transform` carries state across values.
 *
 * The state is created once per derived receiver and kept in a
 * {@link GuardedCell}; `transform` runs inside the cell.
 *
 * @example
 * ```ts
 * const everyOther = <T>() => createStatefulOperator<T, T, { index: number }>({
 *   name: "everyOther",
 *   createState: () => ({ index: 0 }),
 *   transform(value, state, controller) {
 *     if (state.index++ % 2 === 0) controller.enqueue(value);
 *   }
 * });
 * ```
 */
export function createStatefulOperator<T, R, S>(
  options: StatefulOperatorOptions<T, R, S>
): Operator<T, R> {
  const { name, createState, transform } = options;

  return (source: Receiver<T>): Receiver<R> => {
    const [transmitter, receiver] = deriveReceiver<R>(source);
    const state = new GuardedCell<S>(createState());

    source.listen(value => {
      try {
        drain<R>(
          controller => state.apply(current => transform(value, current, controller)),
          next => transmitter.broadcast(next)
        );
      } catch (err) {
        throw ReceiverError.from(err, name, value);
      }
    });

    return receiver;
  };
}
