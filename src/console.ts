#!/usr/bin/env node
import readline from "readline/promises";
import chalk from "chalk";
import { loadConfig, requireApiKey } from "./config.js";
import { ResponseBroker } from "./broker/index.js";
import { BrokerInputProvider } from "./providers/broker.js";
import { ConsoleTransport } from "./providers/console.js";
import { createOrderAgent } from "./agent/order-agent.js";
import { formatOrder } from "./agent/order.js";
import { isCancelled, SHUTDOWN_REASON } from "./errors.js";
import { log, errorMessage, initLogger, printBanner, printStartupError } from "./logger.js";

const QUIT_WORDS = new Set(["quit", "exit", "q"]);

async function main() {
  printBanner("Ask Broker · console");

  const config = loadConfig();
  requireApiKey();
  initLogger(config.debug);

  const broker = new ResponseBroker();
  const provider = new BrokerInputProvider(broker, { timeoutMs: config.requestTimeoutMs });
  const agent = createOrderAgent(config);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const stop = new AbortController();
  const transport = new ConsoleTransport(broker, rl)
    .run(stop.signal)
    .catch((err) => log.error(`Console transport stopped: ${errorMessage(err)}`));

  rl.on("SIGINT", () => {
    broker.shutdown(SHUTDOWN_REASON);
    stop.abort();
    rl.close();
  });

  try {
    while (!stop.signal.aborted) {
      console.log(`  ${chalk.dim("What would you like to order? (type 'quit' to exit)")}`);
      let request: string;
      try {
        request = (await rl.question(`  ${chalk.cyan("> ")}`, { signal: stop.signal })).trim();
      } catch (err) {
        if (stop.signal.aborted) break;
        throw err;
      }

      if (QUIT_WORDS.has(request.toLowerCase())) {
        log.info("Goodbye!");
        break;
      }
      if (!request) continue;

      console.log();
      log.dim(`Agent is thinking about: "${request}"`);
      log.dim("It may ask you questions along the way.");

      try {
        const order = await agent({ request, provider, signal: stop.signal });
        console.log();
        log.success("Your order:");
        for (const line of formatOrder(order)) console.log(`     ${line}`);
      } catch (err) {
        if (isCancelled(err)) log.warn(`Question withdrawn: ${err.reason}`);
        else log.error(errorMessage(err));
      }

      console.log();
      console.log(`  ${chalk.dim("-".repeat(50))}`);
    }
  } finally {
    broker.shutdown(SHUTDOWN_REASON);
    stop.abort();
    rl.close();
    await transport;
  }
}

main().catch((err) => {
  printStartupError(err);
  process.exit(1);
});
