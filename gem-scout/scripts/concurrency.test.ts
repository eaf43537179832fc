import assert from "node:assert/strict";
import { test } from "node:test";
import { mapLimit, withTimeout } from "./concurrency";

test("mapLimit keeps input order and never exceeds the worker count", async () => {
  let active = 0;
  let peak = 0;
  const out = await mapLimit([5, 1, 3, 2, 4], 2, async (value) => {
    active += 1;
    peak = Math.max(peak, active);
    await new Promise((resolve) => setTimeout(resolve, value));
    active -= 1;
    return value * 10;
  });
  assert.deepEqual(out, [50, 10, 30, 20, 40]);
  assert.equal(peak, 2);
});

test("mapLimit rejects a zero limit", async () => {
  await assert.rejects(() => mapLimit([1], 0, async (x) => x), /limit >= 1/);
});

test("withTimeout resolves fast tasks and rejects slow ones", async () => {
  const fast = await withTimeout(
    1000,
    async () => "done",
    () => new Error("too slow"),
  );
  assert.equal(fast, "done");

  let aborted = false;
  await assert.rejects(
    () =>
      withTimeout(
        5,
        (signal) =>
          new Promise<string>((resolve) => {
            signal.addEventListener("abort", () => {
              aborted = true;
              resolve("late");
            });
          }),
        () => new Error("too slow"),
      ),
    /too slow/,
  );
  assert.equal(aborted, true);
});
