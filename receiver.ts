/**
 * The broadcast primitive: a {@link Receiver} paired with its write-only
 * {@link Transmitter}.
 *
 * A receiver is created together with its transmitter and never on its own.
 * Code that should only observe gets the receiver; code that produces events
 * gets the transmitter. Values are pushed synchronously, on the caller's stack,
 * to every registered listener.
 *
 * ```ts
 * const [transmitter, receiver] = Receiver.make<number>();
 *
 * receiver.listen(value => console.log("got", value));
 *
 * transmitter.broadcast(1); // logs "got 1"
 * ```
 *
 * ## Replay strategies
 *
 * The strategy, fixed at creation, decides what a listener that arrives late
 * gets to see:
 *
 * | Strategy             | Replayed on `listen`                  |
 * | -------------------- | ------------------------------------- |
 * | `Strategy.hot`       | nothing (the default)                 |
 * | `Strategy.warm(n)`   | the last `n` values, oldest first     |
 * | `Strategy.cold`      | every value so far, oldest first      |
 *
 * Replay only ever goes to the new listener, and it happens before `listen`
 * returns. `warm(0)` behaves like `hot`, `warm(Infinity)` like `cold`.
 *
 * ```ts
 * const [transmitter, receiver] = Receiver.make<number>(Strategy.warm(1));
 *
 * transmitter.broadcast(1);
 * transmitter.broadcast(2);
 *
 * receiver.listen(value => console.log(value)); // logs 2
 * transmitter.broadcast(3);                    // logs 3
 * ```
 *
 * ## Delivery
 *
 * `broadcast` records the value (for warm and cold receivers), takes a
 * snapshot of the listeners and calls them in registration order. Listeners
 * run outside the receiver's guarded state, so they may freely call
 * `listen`, `broadcast` or `dispose` on the same receiver:
 *
 * - a listener disposed while a delivery is in progress is skipped for the
 *   rest of that delivery and never called again;
 * - a listener added while a delivery is in progress does not get that value;
 * - a nested `broadcast` from a listener is delivered in full before the outer
 *   delivery continues with the next listener;
 * - a listener still being replayed to gets values broadcast meanwhile only
 *   after its replay, in the order they were broadcast.
 *
 * A throwing listener does not stop delivery to the others. Every failure of
 * one delivery is gathered into a single {@link ReceiverError} and passed to
 * the receiver's `onError` option (by default rethrown from a microtask).
 *
 * @module
 */

import type { Handler, ReceiverOptions, ReferenceMode } from "./_types.ts";
import type { Delivery, ErrorHandler } from "./error.ts";

import { GuardedCell } from "./cell.ts";
import { Disposable } from "./disposable.ts";
import { ReceiverError, dispatchError, reportError } from "./error.ts";

/**
 * Replay policy applied each time a new listener subscribes.
 *
 * Build one through the {@link Strategy} helpers rather than by hand, so that
 * the `warm` limit is validated.
 */
export type Strategy =
  | { readonly kind: "hot" }
  | { readonly kind: "warm"; readonly upTo: number }
  | { readonly kind: "cold" };

/** Discriminant of {@link Strategy}. */
export type StrategyKind = Strategy["kind"];

/**
 * Ready-made strategies.
 *
 * @example
 * ```ts
 * Receiver.make<string>(Strategy.hot);
 * Receiver.make<string>(Strategy.warm(5));
 * Receiver.make<string>(Strategy.cold);
 * ```
 */
export const Strategy = {
  /** Late listeners receive nothing published before they subscribed. */
  hot: Object.freeze<Strategy>({ kind: "hot" }),

  /** Late listeners receive every value published so far. */
  cold: Object.freeze<Strategy>({ kind: "cold" }),

  /**
   * Late listeners receive the most recent `upTo` values.
   *
   * @param upTo - A non-negative integer, or `Infinity`.
   * @throws {RangeError} When `upTo` is negative, `NaN` or a finite fraction.
   */
  warm(upTo: number): Strategy {
    assertWarmLimit(upTo);
    return Object.freeze<Strategy>({ kind: "warm", upTo });
  },
};

function isStrategy(config: Strategy | ReceiverOptions): config is Strategy {
  return "kind" in config;
}

function assertWarmLimit(upTo: number): void {
  const valid = upTo === Infinity || (Number.isInteger(upTo) && upTo >= 0);
  if (!valid) {
    throw new RangeError(`Warm replay limit must be a non-negative integer or Infinity, got ${upTo}`);
  }
}

/**
 * Number of trailing history entries a new listener is replayed.
 */
function replayCount(strategy: Strategy, historySize: number): number {
  switch (strategy.kind) {
    case "hot":
      return 0;
    case "warm":
      return Math.min(strategy.upTo, historySize);
    case "cold":
      return historySize;
  }
}

/**
 * Whether published values need to be kept for later listeners at all.
 */
function retainsHistory(strategy: Strategy): boolean {
  return strategy.kind === "cold" || (strategy.kind === "warm" && strategy.upTo > 0);
}

/**
 * Everything a receiver mutates, kept behind one {@link GuardedCell}.
 */
interface ReceiverState<T> {
  /** Next subscription id; only ever increases */
  nextId: number;
  /** Registered listeners, in registration order */
  listeners: Map<number, Handler<T>>;
  /** Every value published so far (warm and cold receivers only) */
  history: T[];
  /**
   * Listeners still working through their replay, with the live values
   * published meanwhile. Those values are delivered once the replay is done.
   */
  replaying: Map<number, T[]>;
}

/**
 * Key of the receiver's publish entry point. Not exported from the package,
 * so only a {@link Transmitter} can publish.
 */
const publish = Symbol("publish");

/**
 * Only holders of this key can construct a {@link Transmitter}, so a
 * receiver alone cannot be turned into a way to publish.
 */
const transmitterKey = Symbol("Transmitter");

/**
 * Error handler of every receiver, so that receivers derived from it by an
 * operator report listener failures to the same place.
 */
const ErrorHandlerMap = new WeakMap<object, ErrorHandler>();

/**
 * Creates the hot pair an operator republishes through. The new receiver
 * inherits `source`'s error handler.
 *
 * @internal Used by the operator helpers; not part of the package exports.
 */
export function deriveReceiver<R>(source: object): [Transmitter<R>, Receiver<R>] {
  return Receiver.make<R>({ onError: ErrorHandlerMap.get(source) });
}

/**
 * The read-only side of a broadcast pair.
 *
 * Consumers call {@link listen} with a handler that runs for every value the
 * paired {@link Transmitter} broadcasts (plus any replay the strategy calls
 * for). The returned {@link Disposable} removes the handler again.
 *
 * @typeParam T - The type of values delivered by this receiver.
 */
export class Receiver<T> {
  readonly #state = new GuardedCell<ReceiverState<T>>({
    nextId: 0,
    listeners: new Map(),
    history: [],
    replaying: new Map(),
  });
  readonly #strategy: Strategy;
  readonly #retain: boolean;
  readonly #onError: ErrorHandler;

  private constructor(strategy: Strategy, onError: ErrorHandler) {
    this.#strategy = strategy;
    this.#retain = retainsHistory(strategy);
    this.#onError = onError;
    ErrorHandlerMap.set(this, onError);
  }

  /**
   * Creates a transmitter/receiver pair.
   *
   * Accepts either a strategy or a full options object.
   *
   * @example
   * ```ts
   * // hot, strongly held
   * const [tx, rx] = Receiver.make<number>();
   *
   * // cold, with listener failures routed to a logger
   * const [log, history] = Receiver.make<string>({
   *   strategy: Strategy.cold,
   *   onError: error => logger.warn(String(error)),
   * });
   * ```
   */
  static make<T>(config: Strategy | ReceiverOptions = {}): [Transmitter<T>, Receiver<T>] {
    const options: ReceiverOptions = isStrategy(config) ? { strategy: config } : config;
    const strategy = options.strategy ?? Strategy.hot;
    if (strategy.kind === "warm") {
      assertWarmLimit(strategy.upTo);
    }

    const receiver = new Receiver<T>(strategy, options.onError ?? reportError);
    const transmitter = new Transmitter(transmitterKey, receiver, options.reference ?? "strong");

    return [transmitter, receiver];
  }

  /**
   * The replay strategy this receiver was created with.
   */
  get strategy(): Strategy {
    return this.#strategy;
  }

  /**
   * Number of listeners currently registered.
   */
  get listenerCount(): number {
    return this.#state.apply(state => state.listeners.size);
  }

  /**
   * Adds a listener.
   *
   * Any replay the strategy calls for is delivered to `handler` before this
   * method returns. Values broadcast while the replay is running (from inside
   * `handler`, say) are delivered to `handler` after the replay, so it sees
   * the history in order.
   *
   * @param handler - Called with every subsequent value.
   * @returns A disposable that removes `handler`. It does not keep the
   * receiver alive.
   */
  listen(handler: Handler<T>): Disposable {
    const { id, replay } = this.#state.apply(state => {
      const id = state.nextId++;
      state.listeners.set(id, handler);

      const count = replayCount(this.#strategy, state.history.length);
      const replay = count > 0 ? state.history.slice(-count) : [];
      if (replay.length > 0) {
        state.replaying.set(id, []);
      }
      return { id, replay };
    });

    if (replay.length > 0) {
      this.#replay(id, handler, replay);
    }

    const ref = new WeakRef<Receiver<T>>(this);
    return new Disposable(() => {
      const receiver = ref.deref();
      if (receiver) receiver.#remove(id);
    });
  }

  /**
   * Publishes `value` to every listener. Only reachable through a
   * {@link Transmitter}.
   *
   * @internal
   */
  [publish](value: T): void {
    const entries = this.#state.apply(state => {
      if (this.#retain) {
        state.history.push(value);
      }

      const live: Array<[number, Handler<T>]> = [];
      for (const entry of state.listeners) {
        const queued = state.replaying.get(entry[0]);
        if (queued) {
          queued.push(value);
        } else {
          live.push(entry);
        }
      }
      return live;
    });

    let errors: unknown[] | undefined;
    for (const [id, handler] of entries) {
      if (!this.#isListening(id)) continue;

      try {
        handler(value);
      } catch (err) {
        (errors ??= []).push(err);
      }
    }

    if (errors) {
      this.#fail(errors, "broadcast", value);
    }
  }

  /**
   * Delivers the replay window, then whatever was published meanwhile, until
   * nothing is left and the listener goes live.
   */
  #replay(id: number, handler: Handler<T>, window: T[]): void {
    const delivered: T[] = [];
    let errors: unknown[] | undefined;
    let batch = window;

    while (batch.length > 0) {
      for (const value of batch) {
        delivered.push(value);
        try {
          handler(value);
        } catch (err) {
          (errors ??= []).push(err);
        }
      }
      batch = this.#takeQueued(id);
    }

    if (errors) {
      this.#fail(errors, "listen", delivered);
    }
  }

  #takeQueued(id: number): T[] {
    return this.#state.apply(state => {
      const queued = state.replaying.get(id);
      if (!queued || queued.length === 0) {
        state.replaying.delete(id);
        return [];
      }

      state.replaying.set(id, []);
      return queued;
    });
  }

  #isListening(id: number): boolean {
    return this.#state.apply(state => state.listeners.has(id));
  }

  #remove(id: number): void {
    this.#state.apply(state => {
      state.listeners.delete(id);
    });
  }

  #fail(errors: unknown[], delivery: Delivery, value: unknown): void {
    dispatchError(this.#onError, ReceiverError.fromListeners(errors, delivery, value));
  }
}

/**
 * The write-only side of a broadcast pair.
 *
 * A transmitter holds its receiver strongly by default. Created with
 * `reference: "weak"`, it holds a `WeakRef` instead, and `broadcast` becomes a
 * no-op once the receiver has been collected.
 *
 * @typeParam T - The type of values this transmitter publishes.
 */
export class Transmitter<T> {
  readonly #target: Receiver<T> | WeakRef<Receiver<T>>;

  /**
   * Not callable from outside this module; pairs come from
   * {@link Receiver.make}.
   *
   * @throws {TypeError} Without the module's construction key.
   */
  constructor(key: typeof transmitterKey, receiver: Receiver<T>, reference: ReferenceMode = "strong") {
    if (key !== transmitterKey) {
      throw new TypeError("Transmitters are created by Receiver.make()");
    }
    this.#target = reference === "weak" ? new WeakRef(receiver) : receiver;
  }

  /**
   * The paired receiver, or `undefined` when a weakly held receiver is gone.
   */
  get receiver(): Receiver<T> | undefined {
    return this.#target instanceof WeakRef ? this.#target.deref() : this.#target;
  }

  /**
   * Publishes `value` to every listener of the paired receiver.
   */
  broadcast(value: T): void {
    this.receiver?.[publish](value);
  }
}
