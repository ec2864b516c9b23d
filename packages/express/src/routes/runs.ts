import { randomUUID } from "node:crypto";
import { Router } from "express";
import { NotFoundError, type AgentRun } from "agentry-shared";
import type { AgentEngine } from "agentry";
import { asyncHandler, contextOf } from "../middleware/engine";
import type { SSETransport } from "../transports/sse";

type ControlOperation = "pause" | "resume" | "cancel";

const CONTROL_MESSAGES: Record<ControlOperation, string> = {
  pause: "Pause requested",
  resume: "Resume requested",
  cancel: "Cancellation requested",
};

/**
 * Run reads, lifecycle control and the run event stream.
 *
 * - GET  /runs/active
 * - GET  /runs/:agentId/:id
 * - POST /runs/:agentId/:id/pause | resume | cancel
 * - GET  /runs/:agentId/:id/events   (SSE)
 */
export function runRoutes(transport: SSETransport): Router {
  const router = Router();

  router.get("/runs/active", (req, res, next) => {
    try {
      const activeRuns = contextOf(req).engine.listActive();
      res.json({ activeRuns, count: activeRuns.length });
    } catch (error) {
      next(error);
    }
  });

  router.get(
    "/runs/:agentId/:id",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      res.json(await findRun(engine, owner, req.params.agentId, req.params.id));
    }),
  );

  for (const operation of ["pause", "resume", "cancel"] as const) {
    router.post(
      `/runs/:agentId/:id/${operation}`,
      asyncHandler(async (req, res) => {
        const { engine, owner } = contextOf(req);
        const run = await findRun(engine, owner, req.params.agentId, req.params.id);
        const updated = await engine[operation](run.id);
        res.json({ message: CONTROL_MESSAGES[operation], runId: updated.id, status: updated.status });
      }),
    );
  }

  router.get(
    "/runs/:agentId/:id/events",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      const run = await findRun(engine, owner, req.params.agentId, req.params.id);
      transport.connect(randomUUID(), res, run, engine);
    }),
  );

  return router;
}

async function findRun(engine: AgentEngine, owner: string, agentId: string, runId: string): Promise<AgentRun> {
  const run = await engine.getRun(runId, agentId);
  if (run.owner !== owner) {
    throw new NotFoundError("run", runId);
  }
  return run;
}
