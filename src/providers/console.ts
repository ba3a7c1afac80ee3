import chalk from "chalk";
import { log } from "../logger.js";
import type { ResponseBroker } from "../broker/index.js";
import type { PendingRequestView } from "../types.js";
import type { Prompter } from "./types.js";

/**
 * Terminal transport: observes the broker, prompts for each pending question
 * in turn and reports the typed answer back by id.
 */
export class ConsoleTransport {
  constructor(
    private readonly broker: ResponseBroker,
    private readonly prompter: Prompter
  ) {}

  /** Runs until `signal` aborts or the broker shuts down. */
  async run(signal?: AbortSignal): Promise<void> {
    const subscription = this.broker.subscribe();

    try {
      while (!signal?.aborted) {
        const request = await subscription.next(signal);
        if (!request) break;
        await this.answer(request, signal);
      }
    } finally {
      subscription.close();
    }
  }

  private async answer(request: PendingRequestView, signal?: AbortSignal): Promise<void> {
    console.log();
    console.log(`  ${chalk.yellow("?")} ${chalk.bold(request.question)}`);

    while (!signal?.aborted) {
      // The question may have been withdrawn while we were prompting.
      if (this.broker.get(request.id)?.isOpen !== true) {
        log.dim("That question is no longer open.");
        return;
      }

      let raw: string;
      try {
        raw = await this.prompter.question(`  ${chalk.cyan("> ")}`, { signal });
      } catch (err) {
        if (signal?.aborted) return;
        throw err;
      }

      const answer = raw.trim();
      if (!answer) {
        log.warn("Please enter a response.");
        continue;
      }

      const result = this.broker.resolve(request.id, answer);
      if (!result.ok) log.dim("That question is no longer open.");
      return;
    }
  }
}
