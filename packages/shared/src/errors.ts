/**
 * Agentry Error Hierarchy
 *
 * Structured error classes shared by the engine, the control API and the
 * model/tool adapters. Every error extends AgentryError, which provides:
 * - A stable error code for programmatic handling
 * - Details for diagnostics
 * - JSON serialization for HTTP responses and run logs
 *
 * @example Throwing errors
 * ```typescript
 * throw new NotFoundError('agent', 'agent-42');
 * throw ValidationError.required('inputValues.customerName');
 * throw InvalidStateError.terminal('run-7', 'completed', 'pause');
 * ```
 *
 * @example Classifying failures
 * ```typescript
 * try {
 *   await model.complete(messages, options);
 * } catch (error) {
 *   if (isRetryableError(error)) {
 *     // back off and try again
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., NOT_FOUND_RUN, MODEL_RATE_LIMIT)
 */
export type AgentryErrorCode =
  // Abort/Cancellation
  | "ABORT_CANCELLED"
  | "ABORT_TIMEOUT"
  | "ABORT_SIGNAL"
  // Not Found
  | "NOT_FOUND_AGENT"
  | "NOT_FOUND_RUN"
  // Validation
  | "VALIDATION_REQUIRED"
  | "VALIDATION_TYPE"
  | "VALIDATION_FORMAT"
  | "VALIDATION_CONSTRAINT"
  // State/Lifecycle
  | "STATE_INVALID"
  | "STATE_TRANSITION"
  | "STATE_TERMINAL"
  // Admission
  | "QUEUE_FULL"
  // Configuration
  | "CONFIG_INVALID"
  | "CONFIG_TEMPLATE"
  | "CONFIG_TOOL"
  // Chat model
  | "MODEL_TRANSIENT"
  | "MODEL_TIMEOUT"
  | "MODEL_RATE_LIMIT"
  | "MODEL_FATAL"
  | "MODEL_AUTH"
  | "MODEL_CONTENT_FILTER"
  | "MODEL_MALFORMED"
  // Tool transport
  | "TOOL_TRANSIENT"
  | "TOOL_TIMEOUT"
  // Context
  | "CONTEXT_NOT_FOUND";

/**
 * Serialized error format for transport
 */
export interface SerializedAgentryError {
  name: string;
  code: AgentryErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedAgentryError | { message: string; name?: string };
  stack?: string;
}

/**
 * Base class for all Agentry errors.
 */
export class AgentryError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: AgentryErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: AgentryErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "AgentryError";
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  /**
   * Serialize error for transport (JSON-safe)
   */
  toJSON(): SerializedAgentryError {
    const serialized: SerializedAgentryError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause instanceof AgentryError) {
      serialized.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      serialized.cause = { message: this.cause.message, name: this.cause.name };
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedAgentryError): AgentryError {
    let cause: Error | undefined;
    if (json.cause) {
      cause =
        "code" in json.cause
          ? AgentryError.fromJSON(json.cause)
          : new Error(json.cause.message);
    }
    return new AgentryError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// Abort/Cancellation Errors
// =============================================================================

/**
 * Error thrown when an operation is aborted, either by a caller's signal or by
 * a timeout.
 */
export class AbortError extends AgentryError {
  constructor(
    message: string = "Operation aborted",
    code: "ABORT_CANCELLED" | "ABORT_TIMEOUT" | "ABORT_SIGNAL" = "ABORT_CANCELLED",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "AbortError";
  }

  /**
   * Create from an AbortSignal's reason
   */
  static fromSignal(signal: AbortSignal): AbortError {
    const reason: unknown = signal.reason;
    if (reason instanceof AbortError) {
      return reason;
    }
    const message = reason instanceof Error ? reason.message : String(reason ?? "Operation aborted");
    return new AbortError(message, "ABORT_SIGNAL", {}, reason instanceof Error ? reason : undefined);
  }

  static timeout(timeoutMs: number): AbortError {
    return new AbortError(`Operation timed out after ${timeoutMs}ms`, "ABORT_TIMEOUT", {
      timeoutMs,
    });
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

export type ResourceType = "agent" | "run";

const NOT_FOUND_CODES = {
  agent: "NOT_FOUND_AGENT",
  run: "NOT_FOUND_RUN",
} as const satisfies Record<ResourceType, AgentryErrorCode>;

/**
 * Error thrown when an agent or run cannot be found.
 *
 * @example
 * ```typescript
 * throw new NotFoundError('run', 'run-123');
 * throw new NotFoundError('agent', 'a-1', 'Agent a-1 belongs to another owner');
 * ```
 */
export class NotFoundError extends AgentryError {
  readonly resourceType: ResourceType;
  readonly resourceId: string;

  constructor(resourceType: ResourceType, resourceId: string, message?: string, cause?: Error) {
    super(
      NOT_FOUND_CODES[resourceType],
      message ?? `${capitalize(resourceType)} '${resourceId}' not found`,
      { resourceType, resourceId },
      cause,
    );
    this.name = "NotFoundError";
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when caller-supplied input is rejected.
 */
export class ValidationError extends AgentryError {
  /** Field or path that failed validation */
  readonly field: string;

  constructor(
    field: string,
    message: string,
    code:
      | "VALIDATION_REQUIRED"
      | "VALIDATION_TYPE"
      | "VALIDATION_FORMAT"
      | "VALIDATION_CONSTRAINT" = "VALIDATION_CONSTRAINT",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, { field, ...details }, cause);
    this.name = "ValidationError";
    this.field = field;
  }

  static required(field: string, message?: string): ValidationError {
    return new ValidationError(field, message ?? `${field} is required`, "VALIDATION_REQUIRED");
  }

  static type(field: string, expected: string, received?: string): ValidationError {
    return new ValidationError(
      field,
      `${field} must be ${expected}${received ? `, received ${received}` : ""}`,
      "VALIDATION_TYPE",
      { expected, received },
    );
  }
}

// =============================================================================
// State Errors
// =============================================================================

/**
 * Error thrown when an operation is not allowed in the current run state.
 */
export class InvalidStateError extends AgentryError {
  readonly current: string;

  constructor(
    current: string,
    message: string,
    code: "STATE_INVALID" | "STATE_TRANSITION" | "STATE_TERMINAL" = "STATE_INVALID",
    details: Record<string, unknown> = {},
  ) {
    super(code, message, { current, ...details });
    this.name = "InvalidStateError";
    this.current = current;
  }

  /**
   * The run has already reached a terminal status and can no longer change.
   */
  static terminal(runId: string, status: string, operation: string): InvalidStateError {
    return new InvalidStateError(
      status,
      `Cannot ${operation} run '${runId}': run is already ${status}`,
      "STATE_TERMINAL",
      { runId, operation },
    );
  }

  static transition(runId: string, from: string, to: string): InvalidStateError {
    return new InvalidStateError(
      from,
      `Run '${runId}' cannot move from ${from} to ${to}`,
      "STATE_TRANSITION",
      { runId, to },
    );
  }
}

// =============================================================================
// Admission Errors
// =============================================================================

/**
 * Error thrown when the execution queue has no free slot.
 */
export class QueueFullError extends AgentryError {
  readonly capacity: number;

  constructor(capacity: number) {
    super("QUEUE_FULL", `Execution queue is full (capacity ${capacity})`, { capacity });
    this.name = "QueueFullError";
    this.capacity = capacity;
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when an agent definition or engine setting cannot be used,
 * e.g. a prompt template referencing an undeclared variable.
 */
export class ConfigurationError extends AgentryError {
  constructor(
    message: string,
    code: "CONFIG_INVALID" | "CONFIG_TEMPLATE" | "CONFIG_TOOL" = "CONFIG_INVALID",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// Chat Model Errors
// =============================================================================

/**
 * Recoverable model failure: network error, timeout, rate limit or 5xx.
 */
export class TransientModelError extends AgentryError {
  /** Provider-suggested delay before retrying, when known */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    code: "MODEL_TRANSIENT" | "MODEL_TIMEOUT" | "MODEL_RATE_LIMIT" = "MODEL_TRANSIENT",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "TransientModelError";
    const retryAfter = details["retryAfterMs"];
    if (typeof retryAfter === "number") {
      this.retryAfterMs = retryAfter;
    }
  }

  static rateLimit(provider: string, retryAfterMs?: number): TransientModelError {
    return new TransientModelError(
      `Rate limit exceeded for ${provider}${retryAfterMs ? `. Retry after ${retryAfterMs}ms` : ""}`,
      "MODEL_RATE_LIMIT",
      { provider, retryAfterMs },
    );
  }

  static timeout(timeoutMs: number): TransientModelError {
    return new TransientModelError(
      `Model call timed out after ${timeoutMs}ms`,
      "MODEL_TIMEOUT",
      { timeoutMs },
    );
  }
}

/**
 * Unrecoverable model failure: authentication, bad request or content filter.
 */
export class FatalModelError extends AgentryError {
  constructor(
    message: string,
    code: "MODEL_FATAL" | "MODEL_AUTH" | "MODEL_CONTENT_FILTER" = "MODEL_FATAL",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "FatalModelError";
  }
}

/**
 * The model answered with something that is not a valid completion.
 * Retried like a transient failure.
 */
export class MalformedResponseError extends AgentryError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: Error) {
    super("MODEL_MALFORMED", message, details, cause);
    this.name = "MalformedResponseError";
  }
}

// =============================================================================
// Tool Errors
// =============================================================================

/**
 * Transport-level tool failure (connection lost, server unavailable, timeout).
 * Tool-level failures are reported as tool outcomes, not thrown.
 */
export class TransientToolError extends AgentryError {
  readonly toolName: string;

  constructor(
    toolName: string,
    message: string,
    code: "TOOL_TRANSIENT" | "TOOL_TIMEOUT" = "TOOL_TRANSIENT",
    cause?: Error,
  ) {
    super(code, message, { toolName }, cause);
    this.name = "TransientToolError";
    this.toolName = toolName;
  }

  static timeout(toolName: string, timeoutMs: number): TransientToolError {
    return new TransientToolError(
      toolName,
      `Tool '${toolName}' timed out after ${timeoutMs}ms`,
      "TOOL_TIMEOUT",
    );
  }
}

// =============================================================================
// Context Errors
// =============================================================================

export class ContextError extends AgentryError {
  constructor(message: string) {
    super("CONTEXT_NOT_FOUND", message);
    this.name = "ContextError";
  }

  static notFound(): ContextError {
    return new ContextError("Run context not found. Ensure you are running within Context.run().");
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAgentryError(error: unknown): error is AgentryError {
  return error instanceof AgentryError;
}

export function isAbortError(error: unknown): error is AbortError {
  return error instanceof AbortError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isInvalidStateError(error: unknown): error is InvalidStateError {
  return error instanceof InvalidStateError;
}

export function isQueueFullError(error: unknown): error is QueueFullError {
  return error instanceof QueueFullError;
}

/**
 * Transient model failures, malformed completions and transient tool
 * failures are retried with backoff; everything else is not.
 */
export function isRetryableError(error: unknown): boolean {
  return (
    error instanceof TransientModelError ||
    error instanceof MalformedResponseError ||
    error instanceof TransientToolError
  );
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
