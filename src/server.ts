import express, { type ErrorRequestHandler, type Express } from "express";
import { fileURLToPath } from "url";
import { createAgentRouter } from "./routes/agent.js";
import { createEventsRouter } from "./routes/events.js";
import { createRequestsRouter } from "./routes/requests.js";
import { log, errorMessage } from "./logger.js";
import type { ResponseBroker } from "./broker/index.js";
import type { RunManager } from "./run-manager.js";

const INDEX_HTML = fileURLToPath(new URL("../public/index.html", import.meta.url));

const FAVICON_SVG = `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 32 32">
  <circle cx="16" cy="16" r="14" fill="#FFD700" stroke="#D2691E" stroke-width="2"/>
  <circle cx="10" cy="12" r="2" fill="#DC143C"/>
  <circle cx="22" cy="11" r="2" fill="#DC143C"/>
  <circle cx="12" cy="20" r="2" fill="#32CD32"/>
  <circle cx="20" cy="22" r="2" fill="#DC143C"/>
</svg>`;

export interface ServerDeps {
  broker: ResponseBroker;
  runs: RunManager;
  heartbeatMs: number;
}

/** The 4xx status a body-parser style error carries, if any. */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

const jsonErrors: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    res.status(status).json({ error: errorMessage(err) });
    return;
  }

  log.error(`Unhandled route error: ${errorMessage(err)}`);
  res.status(500).json({ error: "Internal server error" });
};

export function createServer({ broker, runs, heartbeatMs }: ServerDeps): Express {
  const app = express();
  app.use(express.json());

  app.use("/agent", createAgentRouter(runs));
  app.use("/events", createEventsRouter(broker, runs, { heartbeatMs }));
  app.use(createRequestsRouter(broker));

  app.get("/health", (_req, res) => {
    res.json({
      healthy: true,
      openRequests: broker.listOpen().length,
      activeRun: runs.getActiveRunId(),
      uptime: Math.round(process.uptime()),
    });
  });

  app.get("/", (_req, res) => {
    res.sendFile(INDEX_HTML);
  });

  app.get("/favicon.ico", (_req, res) => {
    res.type("image/svg+xml").send(FAVICON_SVG);
  });

  app.use(jsonErrors);
  return app;
}
