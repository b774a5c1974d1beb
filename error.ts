// @filename: error.ts
/**
 * Error handling utilities for receivers and their operators
 *
 * @module
 */

/**
 * Represents an error raised while a receiver delivered values, with the
 * ability to aggregate every listener failure of one delivery.
 *
 * A receiver never lets one listener's exception stop delivery to the others.
 * Instead, every exception thrown during a single `broadcast` (or a single
 * replay inside `listen`) is collected and wrapped in one `ReceiverError`,
 * which is then handed to the receiver's error handler.
 *
 * Failures from inside the library (re-entrant `GuardedCell.apply`, a dispose
 * bag whose cleanups threw) use the same class with their own `operator`.
 *
 * @example
 * ```ts
 * const [transmitter, receiver] = Receiver.make({
 *   onError(error) {
 *     console.warn(String(error));
 *     // ReceiverError: 2 listeners failed
 *     //   during: broadcast
 *     //   value: 42
 *     //   [1] Error: ...
 *   }
 * });
 * ```
 */
export class ReceiverError extends AggregateError {
  /** The operation that failed: `broadcast`, `listen`, an operator name, ... */
  readonly operator?: string;

  /**
   * The value being delivered. For a failed replay (`listen`) this is the
   * whole replay window.
   */
  readonly value?: unknown;

  /** How to keep the error from happening again */
  readonly tip?: string;

  constructor(errors: unknown, message: string, options: ReceiverErrorOptions = {}) {
    const list: unknown[] = Array.isArray(errors) ? errors : [errors];
    super(list.map(toError), message, { cause: options.cause });

    this.name = "ReceiverError";
    this.operator = options.operator;
    this.value = options.value;
    this.tip = options.tip;
  }

  /**
   * Gathers every listener exception of one delivery.
   *
   * @param operator - `"broadcast"` for a live publish, `"listen"` for the
   * replay a new listener receives.
   * @param value - The published value, or the replay window.
   */
  static fromListeners(errors: unknown[], operator: Delivery, value: unknown): ReceiverError {
    const who = errors.length === 1 ? "A listener" : `${errors.length} listeners`;

    return new ReceiverError(errors, `${who} failed`, {
      operator,
      value,
      tip: operator === "listen"
        ? "The rest of the replay was still delivered. Catch errors inside the listener to keep them out of onError."
        : "The remaining listeners still ran. Catch errors inside the listener to keep them out of onError.",
    });
  }

  /**
   * Wraps whatever an operator's transform threw. A `ReceiverError` passes
   * through untouched.
   */
  static from(error: unknown, operator: string, value: unknown): ReceiverError {
    if (error instanceof ReceiverError) return error;

    const message = error instanceof Error ? error.message : String(error);
    return new ReceiverError(error, message, { operator, value, cause: error });
  }

  /**
   * One line per piece of context, then one line per collected error:
   *
   * ```
   * ReceiverError: 2 listeners failed
   *   during: broadcast
   *   value: 42
   *   [1] Error: one
   *   [2] Error: two
   *   tip: ...
   * ```
   */
  override toString(): string {
    const lines = [`${this.name}: ${this.message}`];

    if (this.operator) {
      lines.push(`  during: ${this.operator}`);
    }

    if (this.value !== undefined) {
      const label = this.operator === "listen" ? "replaying" : "value";
      lines.push(`  ${label}: ${describeValue(this.value)}`);
    }

    this.errors.forEach((err, i) => {
      lines.push(`  [${i + 1}] ${String(err)}`);
    });

    if (this.tip) {
      lines.push(`  tip: ${this.tip}`);
    }

    return lines.join("\n");
  }
}

/**
 * Context attached to a {@link ReceiverError}.
 */
export interface ReceiverErrorOptions {
  operator?: string;
  value?: unknown;
  cause?: unknown;
  tip?: string;
}

/** The two ways a receiver delivers to its listeners. */
export type Delivery = "broadcast" | "listen";

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * JSON for objects, truncated; `String` for everything else and for objects
 * JSON cannot encode (cycles, bigints).
 */
function describeValue(value: unknown): string {
  if (typeof value !== "object" || value === null) {
    return String(value);
  }

  try {
    const json = JSON.stringify(value);
    return json.length > 100 ? `${json.slice(0, 100)}...` : json;
  } catch {
    return String(value);
  }
}

/**
 * Checks if a value is a ReceiverError without throwing.
 *
 * Handy in error handlers that receive whatever a listener threw.
 *
 * @example
 * ```ts
 * if (isReceiverError(error)) {
 *   console.warn(`${error.errors.length} listener(s) failed in ${error.operator}`);
 * }
 * ```
 */
export function isReceiverError(value: unknown): value is ReceiverError {
  return value instanceof ReceiverError;
}

/**
 * Signature of the hook that receives listener failures.
 */
export type ErrorHandler = (error: ReceiverError) => void;

/**
 * The default error handler.
 *
 * Emulates the host's "report an uncaught error" behaviour: the error is
 * rethrown from a microtask, so the broadcasting caller continues normally
 * while the runtime still surfaces the failure (`uncaughtException` in Node.js).
 */
export function reportError(error: ReceiverError): void {
  queueMicrotask(() => { throw error; });
}

/**
 * Hands `error` to `handler`. If the handler itself throws, both errors are
 * reported through {@link reportError} so neither is lost.
 */
export function dispatchError(handler: ErrorHandler, error: ReceiverError): void {
  try {
    handler(error);
  } catch (handlerError) {
    console.error("Receiver error handler threw:", handlerError);
    reportError(new ReceiverError(
      [error, handlerError],
      "Receiver error handler threw",
      { operator: "onError", cause: handlerError }
    ));
  }
}
