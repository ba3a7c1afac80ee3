import { Router } from "express";
import { z } from "zod/v4";
import { createLogger } from "../logger.js";
import type { ResponseBroker } from "../broker/index.js";

const logger = createLogger("http");

const respondSchema = z.object({
  request_id: z.string().min(1),
  response: z.string().trim().min(1),
});

/** Answer submission and the poll view of open questions. */
export function createRequestsRouter(broker: ResponseBroker): Router {
  const router = Router();

  // POST /respond: deliver a human's answer by request id
  router.post("/respond", (req, res) => {
    const parsed = respondSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid request body",
        details: parsed.error.issues,
      });
      return;
    }

    const { request_id: requestId, response } = parsed.data;
    const result = broker.resolve(requestId, response);
    if (!result.ok) {
      res.status(404).json({ error: "Unknown or closed request", requestId });
      return;
    }

    logger.debug(`Answer received for ${requestId}`);
    res.json({ status: "received" });
  });

  // GET /requests: every question still waiting for an answer
  router.get("/requests", (_req, res) => {
    res.json({ requests: broker.listOpen() });
  });

  return router;
}
