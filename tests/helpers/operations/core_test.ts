import { test, expect, vi } from "vitest";

import { Receiver, Strategy } from "../../../receiver.ts";
import { ReceiverError } from "../../../error.ts";
import { pipe } from "../../../helpers/pipe.ts";
import { filter, map, skip, take } from "../../../helpers/operations/core.ts";

/**
 * Helper that collects everything a receiver delivers
 */
function collect<T>(receiver: Receiver<T>): T[] {
  const values: T[] = [];
  receiver.listen(value => { values.push(value); });
  return values;
}

// -----------------------------------------------------------------------------
// map
// -----------------------------------------------------------------------------

test("map transforms each value", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const values = collect(pipe(receiver, map((n: number) => `#${n}`)));

  transmitter.broadcast(1);
  transmitter.broadcast(2);

  expect(values).toEqual(["#1", "#2"]);
});

test("map leaves the source untouched", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const doubled = collect(pipe(receiver, map((n: number) => n * 2)));
  const raw = collect(receiver);

  transmitter.broadcast(3);

  expect(doubled).toEqual([6]);
  expect(raw).toEqual([3]);
});

test("map reports a throwing projection with the operator name", () => {
  const onError = vi.fn();
  const [transmitter, receiver] = Receiver.make<number>({ onError });
  const boom = new Error("projection failed");
  const values = collect(pipe(receiver, map((n: number): number => {
    if (n === 2) throw boom;
    return n;
  })));

  transmitter.broadcast(1);
  transmitter.broadcast(2);
  transmitter.broadcast(3);

  expect(values).toEqual([1, 3]);
  expect(onError).toHaveBeenCalledTimes(1);

  const error = onError.mock.calls[0][0];
  expect(error).toBeInstanceOf(ReceiverError);
  expect(error.operator).toBe("broadcast");
  expect(error.value).toBe(2);
  expect(error.errors[0]).toBeInstanceOf(ReceiverError);
  expect(error.errors[0]).toMatchObject({ operator: "map", value: 2, message: "projection failed" });
});

test("derived receivers report listener failures to the source's handler", () => {
  const onError = vi.fn();
  const [transmitter, receiver] = Receiver.make<number>({ onError });
  const boom = new Error("listener failed");

  pipe(receiver, map((n: number) => n + 1)).listen(() => { throw boom; });
  transmitter.broadcast(1);

  expect(onError).toHaveBeenCalledTimes(1);
  expect(onError.mock.calls[0][0]).toMatchObject({
    operator: "broadcast",
    value: 2,
    errors: [boom],
  });
});

// -----------------------------------------------------------------------------
// filter
// -----------------------------------------------------------------------------

test("filter keeps the values that pass the predicate", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const values = collect(pipe(receiver, filter((n: number) => n % 2 === 0)));

  for (const n of [1, 2, 3, 4, 5, 6]) {
    transmitter.broadcast(n);
  }

  expect(values).toEqual([2, 4, 6]);
});

// -----------------------------------------------------------------------------
// skip
// -----------------------------------------------------------------------------

test("skip drops the first values", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const handler = vi.fn();
  pipe(receiver, skip<number>(3)).listen(handler);

  for (let i = 0; i < 5; i++) {
    transmitter.broadcast(1);
  }

  expect(handler).toHaveBeenCalledTimes(2);
});

test("skip forwards values in order once the count is reached", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const values = collect(pipe(receiver, skip<number>(2)));

  for (const n of [1, 2, 3, 4]) {
    transmitter.broadcast(n);
  }

  expect(values).toEqual([3, 4]);
});

test("skip with a count of zero or less returns the source", () => {
  const [, receiver] = Receiver.make<number>();

  expect(pipe(receiver, skip<number>(0))).toBe(receiver);
  expect(pipe(receiver, skip<number>(-1))).toBe(receiver);
});

test("skip rejects counts that are not whole numbers", () => {
  expect(() => skip<number>(NaN)).toThrow(RangeError);
  expect(() => skip<number>(1.5)).toThrow("skip() count must be an integer or Infinity, got 1.5");
});

test("skip(Infinity) forwards nothing", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const handler = vi.fn();
  pipe(receiver, skip<number>(Infinity)).listen(handler);

  transmitter.broadcast(1);

  expect(handler).not.toHaveBeenCalled();
});

// -----------------------------------------------------------------------------
// take
// -----------------------------------------------------------------------------

test("take forwards only the first values", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const values = collect(pipe(receiver, take<number>(2)));

  for (const n of [1, 2, 3, 4]) {
    transmitter.broadcast(n);
  }

  expect(values).toEqual([1, 2]);
});

test("take with a count of zero forwards nothing", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const handler = vi.fn();
  pipe(receiver, take<number>(0)).listen(handler);

  transmitter.broadcast(1);
  transmitter.broadcast(2);

  expect(handler).not.toHaveBeenCalled();
});

test("each application of an operator keeps its own state", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const first = collect(pipe(receiver, take<number>(1)));

  transmitter.broadcast(1);
  const second = collect(pipe(receiver, take<number>(1)));
  transmitter.broadcast(2);

  expect(first).toEqual([1]);
  expect(second).toEqual([2]);
});

test("operators apply to values broadcast after they are wired", () => {
  const [transmitter, receiver] = Receiver.make<number>(Strategy.cold);
  transmitter.broadcast(1);

  const values = collect(pipe(receiver, map((n: number) => n * 10)));
  transmitter.broadcast(2);

  expect(values).toEqual([20]);
});

test("take rejects counts that are not whole numbers", () => {
  expect(() => take<number>(NaN)).toThrow("take() count must be an integer or Infinity, got NaN");
  expect(() => take<number>(1.5)).toThrow(RangeError);
});

test("take(Infinity) forwards everything", () => {
  const [transmitter, receiver] = Receiver.make<number>();
  const values = collect(pipe(receiver, take<number>(Infinity)));

  for (const n of [1, 2, 3]) {
    transmitter.broadcast(n);
  }

  expect(values).toEqual([1, 2, 3]);
});
