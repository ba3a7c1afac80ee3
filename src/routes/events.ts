import { Router } from "express";
import { createLogger } from "../logger.js";
import type { ResponseBroker } from "../broker/index.js";
import type { RunManager } from "../run-manager.js";
import type { StreamEvent } from "../types.js";

const logger = createLogger("http");

export interface EventStreamOptions {
  heartbeatMs: number;
}

export function createEventsRouter(
  broker: ResponseBroker,
  runs: RunManager,
  options: EventStreamOptions
): Router {
  const router = Router();

  // GET /events: SSE stream of pending questions and run results
  router.get("/", async (_req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    const disconnected = new AbortController();
    const subscription = broker.subscribe();

    const send = (event: StreamEvent) => {
      if (!res.writableEnded) res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    const unsubscribe = runs.events.subscribe(send);
    const heartbeat = setInterval(() => {
      if (!res.writableEnded) res.write(": ping\n\n");
    }, options.heartbeatMs);

    res.on("close", () => {
      disconnected.abort();
    });

    logger.debug(`Event stream opened (${subscription.id})`);

    try {
      while (true) {
        const request = await subscription.next(disconnected.signal);
        if (!request) break;
        send({ type: "human_input", ...request });
      }
    } finally {
      clearInterval(heartbeat);
      unsubscribe();
      subscription.close();
      logger.debug(`Event stream closed (${subscription.id})`);
    }

    res.end();
  });

  return router;
}
