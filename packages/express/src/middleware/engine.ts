/**
 * Express Middleware for the Agent Engine
 *
 * Attaches the engine and the caller's owner to each request.
 *
 * @example
 * ```typescript
 * // Basic usage with defaults (owner from the x-agentry-owner header)
 * app.use('/api', withEngine({ engine }), myRouter);
 *
 * // Owner taken from an upstream auth middleware
 * app.use('/api', withEngine({
 *   engine,
 *   extractOwner: (req) => req.header('x-tenant-id'),
 * }));
 * ```
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { DEFAULT_OWNER, ContextError } from "agentry-shared";
import type { AgentEngine } from "agentry";

export const OWNER_HEADER = "x-agentry-owner";

export interface AgentryRequestContext {
  engine: AgentEngine;
  /** Partition key for agents and runs */
  owner: string;
}

declare global {
  namespace Express {
    interface Request {
      agentry?: AgentryRequestContext;
    }
  }
}

export interface ExpressEngineConfig {
  /** Engine instance or factory function */
  engine: AgentEngine | (() => AgentEngine);
  /** Return undefined to fall back to the default owner */
  extractOwner?: (req: Request) => string | undefined;
}

/**
 * Creates middleware that attaches the engine context to the request.
 */
export function withEngine(config: ExpressEngineConfig): RequestHandler {
  const extractOwner = config.extractOwner ?? ((req: Request) => req.header(OWNER_HEADER));

  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      const engine = typeof config.engine === "function" ? config.engine() : config.engine;
      const owner = extractOwner(req)?.trim() || DEFAULT_OWNER;
      req.agentry = { engine, owner };
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Context attached by withEngine.
 *
 * @throws ContextError when withEngine did not run first
 */
export function contextOf(req: Request): AgentryRequestContext {
  if (!req.agentry) {
    throw new ContextError("Engine context missing: mount withEngine before agentry routes");
  }
  return req.agentry;
}

/**
 * Forward rejections of an async handler to the error middleware.
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

// =============================================================================
// Streaming Response Helpers
// =============================================================================

/**
 * Set up SSE headers for streaming response
 */
export function setupStreamingResponse(res: Response): void {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders();
}

/**
 * Write an SSE event, with an event name when given
 */
export function writeSSEEvent(res: Response, data: unknown, event?: string): void {
  const prefix = event ? `event: ${event}\n` : "";
  res.write(`${prefix}data: ${JSON.stringify(data)}\n\n`);
}
