import { Router } from "express";
import { parseAgentDefinition } from "agentry";
import { sanitizeForLog, Logger } from "agentry-kernel";
import { asyncHandler, contextOf } from "../middleware/engine";
import { parseBody, runInputSchema } from "../schemas";

export interface AgentRoutesConfig {
  /** Limit for POST /agents/:id/run before it answers 504 (default: wait forever) */
  syncRunTimeoutMs?: number;
}

/**
 * Agent CRUD plus the run endpoints that start from an agent.
 *
 * - GET    /agents
 * - POST   /agents
 * - GET    /agents/:id
 * - PUT    /agents/:id
 * - DELETE /agents/:id
 * - POST   /agents/:id/run        run and wait for it to stop
 * - POST   /agents/:id/run-async  queue a run (202)
 * - GET    /agents/:agentId/runs
 */
export function agentRoutes(config: AgentRoutesConfig = {}): Router {
  const router = Router();
  const log = Logger.for("AgentRoutes");

  router.get(
    "/agents",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      res.json(await engine.listAgents({ owner }));
    }),
  );

  router.post(
    "/agents",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      const agent = await engine.createAgent(parseAgentDefinition(req.body), { owner });
      log.info({ agentId: agent.id, name: sanitizeForLog(agent.name) }, "Agent created");
      res.status(201).location(`/agents/${agent.id}`).json(agent);
    }),
  );

  router.get(
    "/agents/:id",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      res.json(await engine.getAgent(req.params.id, { owner }));
    }),
  );

  router.put(
    "/agents/:id",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      res.json(await engine.updateAgent(req.params.id, parseAgentDefinition(req.body), { owner }));
    }),
  );

  router.delete(
    "/agents/:id",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      await engine.deleteAgent(req.params.id, { owner });
      res.status(204).end();
    }),
  );

  router.post(
    "/agents/:id/run",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      const inputValues = parseBody(runInputSchema, req.body);
      const run = await engine.execute(req.params.id, inputValues, {
        owner,
        timeoutMs: config.syncRunTimeoutMs,
      });
      res.json(run);
    }),
  );

  router.post(
    "/agents/:id/run-async",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      const agentId = req.params.id;
      const runId = await engine.enqueue(agentId, parseBody(runInputSchema, req.body), { owner });
      res
        .status(202)
        .location(`/runs/${agentId}/${runId}`)
        .json({ runId, agentId, status: "queued" });
    }),
  );

  router.get(
    "/agents/:agentId/runs",
    asyncHandler(async (req, res) => {
      const { engine, owner } = contextOf(req);
      res.json(await engine.listRuns(req.params.agentId, { owner }));
    }),
  );

  return router;
}
