import { test, expect, vi } from "vitest";

import { Receiver } from "../../receiver.ts";
import { combineLatest } from "../../helpers/combination.ts";

test("combineLatest pairs each value with the other side's latest", () => {
  const [count, counts] = Receiver.make<number>();
  const [label, labels] = Receiver.make<string>();
  const pairs: Array<[number, string]> = [];

  combineLatest(counts, labels).listen(pair => { pairs.push(pair); });

  count.broadcast(1);
  expect(pairs).toEqual([]);

  label.broadcast("1");
  count.broadcast(2);
  label.broadcast("2");

  expect(pairs).toEqual([[1, "1"], [2, "1"], [2, "2"]]);
});

test("combineLatest delivers nothing until both sources have emitted", () => {
  const [count, counts] = Receiver.make<number>();
  const [, labels] = Receiver.make<string>();
  const handler = vi.fn();

  combineLatest(counts, labels).listen(handler);

  count.broadcast(1);
  count.broadcast(2);
  count.broadcast(3);

  expect(handler).not.toHaveBeenCalled();
});

test("combineLatest keeps only the latest value of the waiting side", () => {
  const [count, counts] = Receiver.make<number>();
  const [label, labels] = Receiver.make<string>();
  const pairs: Array<[number, string]> = [];

  combineLatest(counts, labels).listen(pair => { pairs.push(pair); });

  count.broadcast(1);
  count.broadcast(2);
  label.broadcast("a");

  expect(pairs).toEqual([[2, "a"]]);
});

test("combineLatest reports listener failures to the first source's handler", () => {
  const onFirstError = vi.fn();
  const onSecondError = vi.fn();
  const [count, counts] = Receiver.make<number>({ onError: onFirstError });
  const [label, labels] = Receiver.make<string>({ onError: onSecondError });
  const boom = new Error("listener failed");

  combineLatest(counts, labels).listen(() => { throw boom; });

  count.broadcast(1);
  label.broadcast("a");

  expect(onFirstError).toHaveBeenCalledTimes(1);
  expect(onFirstError.mock.calls[0][0]).toMatchObject({
    operator: "broadcast",
    value: [1, "a"],
    errors: [boom],
  });
  expect(onSecondError).not.toHaveBeenCalled();
});
