import type { Receiver } from "../receiver.ts";

/**
 * Collects the values an operator republishes for one source value.
 *
 * Values enqueued while the operator's state is held are published only
 * after the state is released, in the order they were enqueued.
 */
export interface OperatorController<R> {
  /**
   * Queues `value` for republishing downstream.
   */
  enqueue(value: R): void;
}

/**
 * Base interface with properties shared across all operator options
 */
export interface BaseOperatorOptions {
  /**
   * Name of the operator, used in error reporting
   */
  name: string;
}

/**
 * Options for a stateless operator
 */
export interface OperatorOptions<T, R> extends BaseOperatorOptions {
  /**
   * Called once per source value
   * @param value - The source value
   * @param controller - Queues values for the derived receiver
   */
  transform: (value: T, controller: OperatorController<R>) => void;
}

/**
 * Options for an operator that remembers something across values
 */
export interface StatefulOperatorOptions<T, R, S> extends BaseOperatorOptions {
  /**
   * Function to create the initial state. Called once per application of the
   * operator, so every derived receiver gets its own state.
   */
  createState: () => S;

  /**
   * Called once per source value, with exclusive access to the state
   * @param value - The source value
   * @param state - The current state (can be modified)
   * @param controller - Queues values for the derived receiver
   */
  transform: (value: T, state: S, controller: OperatorController<R>) => void;
}

/**
 * Extracts the value type of a receiver.
 *
 * @example
 * ```ts
 * type N = InferReceiverType<Receiver<number>>; // number
 * ```
 */
export type InferReceiverType<TSource> =
  TSource extends Receiver<infer T> ? T : never;
