import { test, expect, vi } from "vitest";

import { Disposable, DisposeBag } from "../disposable.ts";
import { Receiver } from "../receiver.ts";
import { ReceiverError } from "../error.ts";
import { Symbol } from "../symbol.ts";
import { collectUntil } from "./gc.ts";

// -----------------------------------------------------------------------------
// Disposable
// -----------------------------------------------------------------------------

test("Disposable runs its cleanup action once", () => {
  const cleanUp = vi.fn();
  const disposable = new Disposable(cleanUp);

  expect(disposable.disposed).toBe(false);

  disposable.dispose();
  disposable.dispose();

  expect(cleanUp).toHaveBeenCalledTimes(1);
  expect(disposable.disposed).toBe(true);
});

test("Disposable supports Symbol.dispose for resource cleanup", () => {
  const cleanUp = vi.fn();
  const disposable = new Disposable(cleanUp);

  expect(typeof disposable[Symbol.dispose]).toBe("function");
  disposable[Symbol.dispose]();

  expect(cleanUp).toHaveBeenCalledTimes(1);
  expect(disposable.disposed).toBe(true);
});

test("Disposable returned by listen does not depend on the caller keeping it", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const handler = vi.fn();
  const bag = new DisposeBag();

  receiver.listen(handler).disposedBy(bag);
  transmitter.broadcast(1);
  bag.dispose();
  transmitter.broadcast(2);

  expect(handler).toHaveBeenCalledTimes(1);
  expect(handler).toHaveBeenCalledWith(1);
});

// -----------------------------------------------------------------------------
// DisposeBag
// -----------------------------------------------------------------------------

test("DisposeBag disposes every held item exactly once", () => {
  const bag = new DisposeBag();
  const cleanUps = [vi.fn(), vi.fn(), vi.fn()];

  for (const cleanUp of cleanUps) {
    new Disposable(cleanUp).disposedBy(bag);
  }

  expect(bag.size).toBe(3);

  bag.dispose();
  bag.dispose();

  for (const cleanUp of cleanUps) {
    expect(cleanUp).toHaveBeenCalledTimes(1);
  }
  expect(bag.size).toBe(0);
  expect(bag.disposed).toBe(true);
});

test("DisposeBag tears down all listeners of a scope", () => {
  const [numbers, numberReceiver] = Receiver.make<number>();
  const [words, wordReceiver] = Receiver.make<string>();
  const bag = new DisposeBag();
  const onNumber = vi.fn();
  const onWord = vi.fn();

  numberReceiver.listen(onNumber).disposedBy(bag);
  wordReceiver.listen(onWord).disposedBy(bag);

  bag[Symbol.dispose]();

  numbers.broadcast(1);
  words.broadcast("one");

  expect(onNumber).not.toHaveBeenCalled();
  expect(onWord).not.toHaveBeenCalled();
  expect(numberReceiver.listenerCount).toBe(0);
  expect(wordReceiver.listenerCount).toBe(0);
});

test("DisposeBag disposes items inserted after teardown immediately", () => {
  const bag = new DisposeBag();
  bag.dispose();

  const cleanUp = vi.fn();
  new Disposable(cleanUp).disposedBy(bag);

  expect(cleanUp).toHaveBeenCalledTimes(1);
  expect(bag.size).toBe(0);
});

test("DisposeBag keeps tearing down when a cleanup action throws", () => {
  const bag = new DisposeBag();
  const first = vi.fn();
  const last = vi.fn();
  const boom = new Error("cleanup failed");

  new Disposable(first).disposedBy(bag);
  new Disposable(() => { throw boom; }).disposedBy(bag);
  new Disposable(last).disposedBy(bag);

  let caught: unknown;
  try {
    bag.dispose();
  } catch (err) {
    caught = err;
  }

  expect(first).toHaveBeenCalledTimes(1);
  expect(last).toHaveBeenCalledTimes(1);
  expect(caught).toBeInstanceOf(ReceiverError);
  expect(caught).toMatchObject({
    message: "1 disposable(s) failed to clean up",
    operator: "dispose",
    errors: [boom],
  });
});

test("DisposeBag tears down its items when collected without dispose()", async () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const handler = vi.fn();
  const cleanUp = vi.fn();

  (() => {
    const bag = new DisposeBag();
    receiver.listen(handler).disposedBy(bag);
    new Disposable(cleanUp).disposedBy(bag);
  })();

  const collected = await collectUntil(() => cleanUp.mock.calls.length > 0);
  transmitter.broadcast(1);

  expect(collected).toBe(true);
  expect(cleanUp).toHaveBeenCalledTimes(1);
  expect(handler).not.toHaveBeenCalled();
  expect(receiver.listenerCount).toBe(0);
});
