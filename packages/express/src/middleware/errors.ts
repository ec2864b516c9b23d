import type { ErrorRequestHandler } from "express";
import {
  ensureError,
  isAbortError,
  isAgentryError,
  isInvalidStateError,
  isNotFoundError,
  isQueueFullError,
  isValidationError,
} from "agentry-shared";
import { Logger } from "agentry-kernel";

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

/**
 * HTTP status for an error thrown by the engine or a route.
 */
export function httpStatusOf(error: unknown): number {
  if (isNotFoundError(error)) return 404;
  if (isValidationError(error)) return 400;
  if (isInvalidStateError(error)) return 409;
  if (isQueueFullError(error)) return 503;
  if (isAbortError(error) && error.code === "ABORT_TIMEOUT") return 504;
  return 500;
}

export function errorBodyOf(error: unknown): ErrorBody {
  if (isAgentryError(error)) {
    const body: ErrorBody = { error: { code: error.code, message: error.message } };
    if (isValidationError(error) && Object.keys(error.details).length > 0) {
      body.error.details = error.details;
    }
    return body;
  }
  // Unexpected errors keep their message out of the response.
  return { error: { code: "INTERNAL", message: "Internal server error" } };
}

/**
 * Final error middleware for agentry routes.
 */
export function errorHandler(): ErrorRequestHandler {
  const log = Logger.for("AgentryHttp");

  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = httpStatusOf(error);
    if (status >= 500) {
      log.error({ err: ensureError(error), method: req.method, path: req.path }, "Request failed");
    } else {
      log.debug({ status, method: req.method, path: req.path }, ensureError(error).message);
    }
    res.status(status).json(errorBodyOf(error));
  };
}
