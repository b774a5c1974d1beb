// @filename: symbol.ts
/**
 * > Inspired by https://jsr.io/@nick/dispose/1.1.0/symbol.ts
 *
 * Makes sure the explicit resource management symbols exist before any
 * {@link Disposable} or {@link DisposeBag} is created.
 *
 * Node.js 20 releases before 20.4 ship without `Symbol.dispose` and
 * `Symbol.asyncDispose`. Both are added here when missing, so that
 * `[Symbol.dispose]()` methods and `using` blocks work everywhere the
 * package runs.
 *
 * @example
 * ```ts
 * import { Symbol } from "./symbol.ts";
 *
 * const bag = new DisposeBag();
 * bag[Symbol.dispose]();
 * ```
 *
 * @module
 */

/**
 * The global `Symbol` constructor, re-exported after the polyfills below ran.
 *
 * Import it instead of relying on the global so that the module (and its
 * side effects) is always loaded first.
 */
export const Symbol: SymbolConstructor = globalThis.Symbol;

/**
 * Adds Symbol.dispose if it doesn't exist natively.
 */
if (typeof Symbol.dispose !== "symbol") {
  Reflect.defineProperty(Symbol, "dispose", {
    value: Symbol("Symbol.dispose"),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

/**
 * Adds Symbol.asyncDispose if it doesn't exist natively.
 */
if (typeof Symbol.asyncDispose !== "symbol") {
  Reflect.defineProperty(Symbol, "asyncDispose", {
    value: Symbol("Symbol.asyncDispose"),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}
