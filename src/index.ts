#!/usr/bin/env node
import { loadConfig, requireApiKey } from "./config.js";
import { ResponseBroker } from "./broker/index.js";
import { RunManager } from "./run-manager.js";
import { createOrderAgent } from "./agent/order-agent.js";
import { createServer } from "./server.js";
import { log, initLogger, printBanner, printStartupError } from "./logger.js";
import { SHUTDOWN_REASON } from "./errors.js";

async function main() {
  printBanner("Ask Broker · web");

  const config = loadConfig();
  requireApiKey();

  initLogger(config.debug);
  if (config.debug) log.detail("Debug:", "enabled");

  const broker = new ResponseBroker();
  const runs = new RunManager(broker, createOrderAgent(config), {
    timeoutMs: config.requestTimeoutMs,
  });
  const app = createServer({ broker, runs, heartbeatMs: config.heartbeatMs });

  const sweeper = setInterval(() => {
    broker.sweep(config.settledRetentionMs);
  }, config.sweepIntervalMs);
  sweeper.unref();

  const server = app.listen(config.port, config.host);
  await new Promise<void>((resolve, reject) => {
    server.once("listening", resolve);
    server.once("error", reject);
  });

  log.success(`Running on http://${config.host}:${config.port}`);
  log.detail("Model:   ", config.model);
  log.detail("Timeout: ", config.requestTimeoutMs ? `${config.requestTimeoutMs}ms` : "none");
  console.log();

  const shutdown = () => {
    console.log();
    log.dim("Shutting down...");
    clearInterval(sweeper);
    runs.cancelAll(SHUTDOWN_REASON);
    runs.events.close();
    const drained = broker.shutdown(SHUTDOWN_REASON);
    if (drained > 0) log.warn(`Drained ${drained} unanswered question(s)`);
    server.close(() => process.exit(0));
    server.closeAllConnections();
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  printStartupError(err);
  process.exit(1);
});
