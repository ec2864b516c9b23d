/**
 * Express Router Factory
 *
 * Creates a pre-configured Express router with the agentry control API.
 * This is the main entry point for most Express applications.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createAgentryRouter } from 'agentry-express';
 * import { AgentEngine, InMemoryRunStore } from 'agentry';
 *
 * const engine = new AgentEngine({ store: new InMemoryRunStore(), model });
 * engine.start();
 *
 * const app = express();
 * app.use('/api', createAgentryRouter({ engine }));
 * ```
 */

import express, { Router } from "express";
import { Logger } from "agentry-kernel";
import { agentRoutes, type AgentRoutesConfig } from "../routes/agents";
import { runRoutes } from "../routes/runs";
import { SSETransport } from "../transports/sse";
import { withEngine, type ExpressEngineConfig } from "./engine";
import { errorHandler } from "./errors";

export interface CreateAgentryRouterConfig extends ExpressEngineConfig, AgentRoutesConfig {
  /** Transport for run event streams (default: a new SSETransport) */
  transport?: SSETransport;
  /** JSON body size limit (default: 1mb) */
  bodyLimit?: string;
}

export function createAgentryRouter(config: CreateAgentryRouterConfig): Router {
  const router = Router();

  router.use(express.json({ limit: config.bodyLimit ?? "1mb" }));

  router.get("/health", (_req, res) => {
    res.json({ status: "Healthy" });
  });

  router.use(withEngine(config));
  router.use(agentRoutes(config));
  router.use(runRoutes(config.transport ?? new SSETransport()));
  router.use(errorHandler());

  Logger.for("AgentryHttp").debug("Agentry routes configured");
  return router;
}
