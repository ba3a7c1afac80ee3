import { Router } from "express";
import { z } from "zod/v4";
import type { RunManager } from "../run-manager.js";

const startRunSchema = z.object({
  question: z.string().trim().min(1),
});

export function createAgentRouter(runs: RunManager): Router {
  const router = Router();

  // POST /agent/start: start an ordering run, superseding any active one
  router.post("/start", (req, res) => {
    const parsed = startRunSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid request body",
        details: parsed.error.issues,
      });
      return;
    }

    const managed = runs.start(parsed.data.question);

    res.status(201).json({
      status: "started",
      message: "Agent is running",
      runId: managed.runId,
    });
  });

  return router;
}
