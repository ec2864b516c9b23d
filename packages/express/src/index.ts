/**
 * # Agentry Express
 *
 * Express control API for the agentry engine: agent CRUD, run enqueue and
 * reads, pause/resume/cancel, active runs and an SSE stream of run events.
 *
 * ## Quick Start
 *
 * ```typescript
 * import express from 'express';
 * import cors from 'cors';
 * import { createAgentryRouter, SSETransport } from 'agentry-express';
 *
 * const transport = new SSETransport({ heartbeatInterval: 15000 });
 * const app = express();
 * app.use(cors());
 * app.use(createAgentryRouter({ engine, transport }));
 * ```
 *
 * @module agentry-express
 */

export { createAgentryRouter } from "./middleware/create-middleware";
export type { CreateAgentryRouterConfig } from "./middleware/create-middleware";

export {
  withEngine,
  contextOf,
  asyncHandler,
  setupStreamingResponse,
  writeSSEEvent,
  OWNER_HEADER,
} from "./middleware/engine";
export type { AgentryRequestContext, ExpressEngineConfig } from "./middleware/engine";

export { errorHandler, httpStatusOf, errorBodyOf } from "./middleware/errors";
export type { ErrorBody } from "./middleware/errors";

export { agentRoutes } from "./routes/agents";
export type { AgentRoutesConfig } from "./routes/agents";
export { runRoutes } from "./routes/runs";

export { SSETransport } from "./transports/sse";
export type { SSETransportConfig, RunEventSource } from "./transports/sse";

export { parseBody, runInputSchema } from "./schemas";
