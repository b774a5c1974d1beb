/**
 * Cancellation handles for receiver listeners.
 *
 * Every call to `receiver.listen(handler)` returns a {@link Disposable}. Calling
 * `dispose()` on it removes the handler, so it is never called again. When a
 * component owns many listeners, hand their disposables to a
 * {@link DisposeBag} and tear them all down in one go when the component goes
 * away:
 *
 * ```ts
 * class StatusPanel {
 *   #bag = new DisposeBag();
 *
 *   constructor(lifecycle: Receiver<LifecycleEvent>) {
 *     lifecycle.listen(event => this.render(event)).disposedBy(this.#bag);
 *     pipe(lifecycle, filter(e => e.type === "error")).listen(e => this.flash(e)).disposedBy(this.#bag);
 *   }
 *
 *   close() {
 *     this.#bag.dispose(); // both listeners removed
 *   }
 * }
 * ```
 *
 * Both classes also implement `[Symbol.dispose]`, so they work with `using`.
 *
 * @module
 */

import { ReceiverError } from "./error.ts";
import { Symbol } from "./symbol.ts";

/**
 * Wraps a cleanup action that runs at most once.
 *
 * Calling {@link dispose} again after the first call is a no-op, so a
 * disposable can be handed around freely without tracking who released it.
 */
export class Disposable {
  #cleanUp: (() => void) | null;

  constructor(cleanUp: () => void) {
    this.#cleanUp = cleanUp;
  }

  /**
   * `true` once {@link dispose} has been called.
   */
  get disposed(): boolean {
    return this.#cleanUp === null;
  }

  /**
   * Runs the cleanup action, unless it already ran.
   */
  dispose(): void {
    const cleanUp = this.#cleanUp;
    if (cleanUp === null) return;

    this.#cleanUp = null;
    cleanUp();
  }

  /**
   * Transfers this disposable into `bag`; the bag disposes it on teardown.
   * The caller does not need to keep a reference afterwards.
   */
  disposedBy(bag: DisposeBag): void {
    bag.insert(this);
  }

  /**
   * Alias for {@link dispose}, for `using` blocks.
   */
  [Symbol.dispose](): void {
    this.dispose();
  }
}

/**
 * Disposes whatever a bag still held when the bag itself was collected.
 * The held value is the bag's item list, never the bag.
 */
const orphanedBags = new FinalizationRegistry<Disposable[]>(items => {
  for (const item of items) {
    item.dispose();
  }
});

/**
 * An owning collection of {@link Disposable}s tied to a scope's lifetime.
 *
 * Teardown is synchronous: {@link dispose} disposes every held item exactly
 * once before returning, even when some cleanup actions throw (their errors
 * are rethrown together afterwards). The order across items is unspecified. A bag that is
 * garbage-collected without being disposed still tears down its items,
 * eventually, from a finalizer.
 *
 * Once disposed, the bag stays disposed: items inserted afterwards are
 * disposed immediately.
 */
export class DisposeBag {
  #items: Disposable[] = [];
  #disposed = false;

  constructor() {
    orphanedBags.register(this, this.#items, this);
  }

  /**
   * Number of disposables currently held.
   */
  get size(): number {
    return this.#items.length;
  }

  /**
   * `true` once the bag has been torn down.
   */
  get disposed(): boolean {
    return this.#disposed;
  }

  /**
   * Takes ownership of `disposable`.
   */
  insert(disposable: Disposable): void {
    if (this.#disposed) {
      disposable.dispose();
      return;
    }

    this.#items.push(disposable);
  }

  /**
   * Disposes every held item and empties the bag.
   */
  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    orphanedBags.unregister(this);

    // Emptied in place: the finalizer shares this array.
    const items = this.#items.splice(0);
    const errors: unknown[] = [];
    for (const item of items) {
      try {
        item.dispose();
      } catch (err) {
        errors.push(err);
      }
    }

    if (errors.length > 0) {
      throw new ReceiverError(errors, `${errors.length} disposable(s) failed to clean up`, {
        operator: "dispose",
      });
    }
  }

  /**
   * Alias for {@link dispose}, for `using` blocks.
   */
  [Symbol.dispose](): void {
    this.dispose();
  }
}
