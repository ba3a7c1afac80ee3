import { afterEach, describe, expect, it, vi } from "vitest";
import { ResponseBroker } from "../broker/index.js";
import { BrokerInputProvider } from "./broker.js";
import { CancelledError } from "../errors.js";

describe("BrokerInputProvider", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("returns the answer delivered through the broker", async () => {
    const broker = new ResponseBroker();
    const provider = new BrokerInputProvider(broker);

    const answer = provider.getInput("Crust?", { pizza: 1 });
    expect(provider.outstandingCount).toBe(1);

    const [open] = broker.listOpen();
    expect(open).toMatchObject({ question: "Crust?", metadata: { pizza: 1 } });
    broker.resolve(open.id, "thin");

    await expect(answer).resolves.toBe("thin");
    expect(provider.outstandingCount).toBe(0);
  });

  it("withdraws only its own questions", async () => {
    const broker = new ResponseBroker();
    const mine = new BrokerInputProvider(broker);
    const theirs = new BrokerInputProvider(broker);

    const myAnswer = mine.getInput("Mine?");
    const theirAnswer = theirs.getInput("Theirs?");

    expect(mine.cancelOutstanding("run aborted")).toBe(1);
    await expect(myAnswer).rejects.toMatchObject({ reason: "run aborted" });

    const [open] = broker.listOpen();
    expect(open.question).toBe("Theirs?");
    broker.resolve(open.id, "still here");
    await expect(theirAnswer).resolves.toBe("still here");
  });

  it("applies its timeout to every question", async () => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const broker = new ResponseBroker();
    const provider = new BrokerInputProvider(broker, { timeoutMs: 5_000 });

    const answer = provider.getInput("Quick question?").catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(5_000);

    const err = await answer;
    expect(err).toBeInstanceOf(CancelledError);
    expect(err).toMatchObject({ reason: "timeout" });
    expect(broker.size).toBe(0);
  });
});
