/**
 * A minimal push-based broadcast primitive for in-process events.
 *
 * One factory call gives you two handles: a write-only {@link Transmitter} and
 * a read-only {@link Receiver}. Hand the receiver to whoever needs to observe,
 * keep the transmitter where the events come from:
 *
 * ```ts
 * import { Receiver, Strategy, DisposeBag, pipe, filter } from "signal-receiver";
 *
 * type Lifecycle = "starting" | "ready" | "stopping";
 *
 * const [emit, lifecycle] = Receiver.make<Lifecycle>(Strategy.warm(1));
 *
 * emit.broadcast("starting");
 * emit.broadcast("ready");
 *
 * const bag = new DisposeBag();
 *
 * // Arrives late, still sees the latest state ("ready") straight away
 * lifecycle.listen(state => console.log("state:", state)).disposedBy(bag);
 *
 * pipe(lifecycle, filter(state => state === "stopping"))
 *   .listen(() => console.log("shutting down"))
 *   .disposedBy(bag);
 *
 * emit.broadcast("stopping"); // state: stopping / shutting down
 *
 * bag.dispose(); // both listeners gone
 * ```
 *
 * ## What's inside
 *
 * - **Receiver / Transmitter** – the broadcast pair, with `hot`, `warm(n)` and
 *   `cold` replay for late listeners.
 * - **Disposable / DisposeBag** – listener removal, one at a time or per scope
 *   (both work with `using`).
 * - **Operators** – `map`, `filter`, `withPrevious`, `skip`, `take`,
 *   `skipRepeats`, `uniqueValues`, `skipNil`, `combineLatest`, chained with
 *   `pipe`.
 * - **GuardedCell** – the exclusive-access wrapper every piece of shared
 *   state goes through.
 * - **ReceiverError** – how listener failures are reported without stopping
 *   delivery to the other listeners.
 *
 * Everything is synchronous: `broadcast` returns once every listener ran.
 * There is no completion, no error channel and no back-pressure; a "failure"
 * event is just another value.
 *
 * @module
 */

import "./symbol.ts";

export { Receiver, Transmitter, Strategy } from "./receiver.ts";
export type { StrategyKind } from "./receiver.ts";
export { Disposable, DisposeBag } from "./disposable.ts";
export { GuardedCell } from "./cell.ts";
export * from "./error.ts";
export * from "./helpers/mod.ts";

export type * from "./_types.ts";
