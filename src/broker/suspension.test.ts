import { describe, expect, it, vi } from "vitest";
import { Suspension, awaitWithTimeout, unwrapOutcome } from "./suspension.js";
import { CancelledError } from "../errors.js";

describe("Suspension", () => {
  it("settles once and ignores later outcomes", async () => {
    const slot = new Suspension();
    expect(slot.settled).toBe(false);

    expect(slot.settle({ kind: "answered", answer: "first" })).toBe(true);
    expect(slot.settle({ kind: "cancelled", reason: "late" })).toBe(false);

    expect(slot.settled).toBe(true);
    await expect(slot.outcome).resolves.toEqual({ kind: "answered", answer: "first" });
  });

  it("does not resume the waiter inside the settling call", async () => {
    const slot = new Suspension();
    const order: string[] = [];
    const waiter = slot.outcome.then(() => order.push("waiter"));

    slot.settle({ kind: "answered", answer: "x" });
    order.push("resolver");

    await waiter;
    expect(order).toEqual(["resolver", "waiter"]);
  });
});

describe("unwrapOutcome", () => {
  it("returns answers and throws cancellations", () => {
    expect(unwrapOutcome("req_1", { kind: "answered", answer: "yes" })).toBe("yes");
    expect(() => unwrapOutcome("req_1", { kind: "cancelled", reason: "gone" })).toThrow(
      new CancelledError("req_1", "gone")
    );
  });
});

describe("awaitWithTimeout", () => {
  it("cancels through the broker when time runs out", async () => {
    vi.useFakeTimers();
    const cancel = vi.fn();
    let settle: (value: string) => void = () => undefined;
    const handle = {
      id: "req_slow",
      response: () => new Promise<string>((resolve) => (settle = resolve)),
    };

    const waiting = awaitWithTimeout({ cancel }, handle, 250);
    await vi.advanceTimersByTimeAsync(249);
    expect(cancel).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(cancel).toHaveBeenCalledWith("req_slow", "timeout");

    settle("done anyway");
    await expect(waiting).resolves.toBe("done anyway");
    vi.useRealTimers();
  });
});
