import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ResponseBroker } from "../broker/index.js";
import { BrokerInputProvider } from "./broker.js";
import { ConsoleTransport } from "./console.js";
import type { Prompter } from "./types.js";

/** Answers from a script; once it runs dry, waits until aborted. */
function scriptedPrompter(answers: Array<string | (() => string)>): Prompter & { calls: number } {
  return {
    calls: 0,
    async question(_prompt, options) {
      this.calls++;
      const next = answers.shift();
      if (next !== undefined) return typeof next === "function" ? next() : next;
      return new Promise<string>((_resolve, reject) => {
        options.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    },
  };
}

describe("ConsoleTransport", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("re-prompts on blank input and resolves with the trimmed answer", async () => {
    const broker = new ResponseBroker();
    const prompter = scriptedPrompter(["", "  large  "]);
    const stop = new AbortController();
    const running = new ConsoleTransport(broker, prompter).run(stop.signal);

    const answer = await new BrokerInputProvider(broker).getInput("What size?");

    expect(answer).toBe("large");
    expect(prompter.calls).toBe(2);

    stop.abort();
    await running;
    expect(broker.observerCount).toBe(0);
  });

  it("answers questions one after another in order", async () => {
    const broker = new ResponseBroker();
    const prompter = scriptedPrompter(["medium", "olives"]);
    const stop = new AbortController();
    const running = new ConsoleTransport(broker, prompter).run(stop.signal);

    const provider = new BrokerInputProvider(broker);
    const size = provider.getInput("Size?");
    const topping = provider.getInput("Topping?");

    await expect(size).resolves.toBe("medium");
    await expect(topping).resolves.toBe("olives");

    stop.abort();
    await running;
  });

  it("skips a question withdrawn while it was being prompted", async () => {
    const broker = new ResponseBroker();
    const provider = new BrokerInputProvider(broker);
    const prompter = scriptedPrompter([
      () => {
        provider.cancelOutstanding("customer left");
        return "pepperoni";
      },
    ]);
    const stop = new AbortController();
    const running = new ConsoleTransport(broker, prompter).run(stop.signal);

    await expect(provider.getInput("Topping?")).rejects.toMatchObject({ reason: "customer left" });
    expect(prompter.calls).toBe(1);

    stop.abort();
    await running;
  });

  it("stops when the broker shuts down", async () => {
    const broker = new ResponseBroker();
    const running = new ConsoleTransport(broker, scriptedPrompter([])).run();

    broker.shutdown();

    await expect(running).resolves.toBeUndefined();
  });
});
