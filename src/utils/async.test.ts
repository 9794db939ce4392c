import { describe, expect, it } from "vitest";
import { mapWithConcurrency, sleep, withDeadline, withTimeout } from "./async.js";

describe("mapWithConcurrency", () => {
  it("keeps input order and never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (delay, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(delay);
      inFlight -= 1;
      return `${index}:${delay}`;
    });
    expect(results).toEqual(["0:30", "1:5", "2:20", "3:1", "4:10"]);
    expect(peak).toBe(2);
  });

  it("returns an empty list for no items", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe("withTimeout", () => {
  it("rejects with the supplied error once the timer fires", async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10, () => new Error("too_slow"))).rejects.toThrow("too_slow");
  });

  it("passes the task result through", async () => {
    await expect(withTimeout(Promise.resolve(7), 50, () => new Error("too_slow"))).resolves.toBe(7);
  });
});

describe("withDeadline", () => {
  it("aborts the call at the deadline and settles only after the call has stopped", async () => {
    let stopped = false;
    const pending = withDeadline(
      async (signal) => {
        try {
          await sleep(1_000, signal);
        } finally {
          stopped = true;
        }
      },
      10,
      () => new Error("too_slow"),
    );
    await expect(pending).rejects.toThrow("too_slow");
    expect(stopped).toBe(true);
  });

  it("forwards the parent's abort to the call", async () => {
    const parent = new AbortController();
    const pending = withDeadline((signal) => sleep(1_000, signal), 5_000, () => new Error("too_slow"), parent.signal);
    parent.abort(new Error("cancelled"));
    await expect(pending).rejects.toThrow("cancelled");
  });
});

describe("sleep", () => {
  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(1_000, controller.signal);
    controller.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });
});
