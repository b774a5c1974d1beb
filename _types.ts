// @filename: _types.ts
import type { Receiver, Strategy } from "./receiver.ts";
import type { ErrorHandler } from "./error.ts";

/**
 * A listener callback, invoked once per delivered value.
 *
 * @typeParam T - Type of values the listener receives.
 */
export type Handler<T> = (value: T) => void;

/**
 * A derived-stream operator: builds a new receiver out of an existing one.
 *
 * Operators never modify their source. They listen to it and republish
 * (possibly transformed, possibly fewer) values through a receiver of their
 * own, so that several operator chains can hang off the same source.
 *
 * @typeParam In - Type of values the source receiver delivers.
 * @typeParam Out - Type of values the resulting receiver delivers.
 *
 * @example
 * ```ts
 * const double: Operator<number, number> = map(n => n * 2);
 * const doubled = double(receiver);
 * ```
 */
export type Operator<In, Out> = (source: Receiver<In>) => Receiver<Out>;

/**
 * How a transmitter holds on to its receiver.
 *
 * - `"strong"`: the transmitter keeps the receiver alive.
 * - `"weak"`: the transmitter does not; once every other reference to the
 *   receiver is gone it may be collected, after which `broadcast` is a no-op.
 */
export type ReferenceMode = "strong" | "weak";

/**
 * Configuration accepted by `Receiver.make`.
 */
export interface ReceiverOptions {
  /**
   * Replay policy for late listeners.
   *
   * @default Strategy.hot
   */
  strategy?: Strategy;

  /**
   * How the returned transmitter references the receiver.
   *
   * @default "strong"
   */
  reference?: ReferenceMode;

  /**
   * Receives the errors thrown by listeners. One call per delivery, with
   * every failure of that delivery aggregated into one error.
   *
   * @default reportError (rethrows from a microtask)
   */
  onError?: ErrorHandler;
}
