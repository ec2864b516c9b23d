/**
 * Logger - Structured logging with automatic run context injection
 *
 * Built on pino. Every line written inside a {@link Context} scope carries
 * `run_id`, `agent_id`, `worker_id` and `owner` when they are known.
 *
 * Loggers handed out by `Logger.get`, `Logger.for` and `Logger.child` resolve
 * the configured pino instance on each call, so module-level loggers follow a
 * later `Logger.configure`.
 *
 * @example
 * ```typescript
 * import { Logger } from 'agentry-kernel';
 *
 * const log = Logger.for('WorkerPool');
 *
 * Logger.configure({ level: 'debug' });
 * log.info({ concurrency: 4 }, 'Worker pool started');
 * ```
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from "pino";
import { Context, type KernelContext } from "./context";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export const DEFAULT_REDACT_PATHS: readonly string[] = [
  "apiKey",
  "*.apiKey",
  "authorization",
  "headers.authorization",
  "*.headers.authorization",
];

export type ContextFieldsExtractor = (ctx: Readonly<KernelContext>) => Record<string, unknown>;

export interface LoggerConfig {
  /** Default: LOG_LEVEL env var, else 'info' */
  level?: LogLevel;
  /** pino-pretty output (default: outside production and test, when no destination is given) */
  prettyPrint?: boolean;
  /** Write JSON lines here instead of stdout */
  destination?: DestinationStream;
  /** Default: `{ pid }` */
  base?: Record<string, unknown>;
  /** Extra fields from the context, merged over the run fields */
  contextFields?: ContextFieldsExtractor;
  /** Paths censored in every line (default: DEFAULT_REDACT_PATHS) */
  redact?: readonly string[];
}

export interface LogMethod {
  (msg: string): void;
  (obj: Record<string, unknown>, msg?: string): void;
}

export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child(bindings: Record<string, unknown>): KernelLogger;
  readonly level: LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Log fields of the run identifiers in `ctx`.
 */
export function runContextFields(ctx: Readonly<KernelContext>): Record<string, string> {
  const fields: Record<string, string> = {};
  if (ctx.runId) fields["run_id"] = ctx.runId;
  if (ctx.agentId) fields["agent_id"] = ctx.agentId;
  if (ctx.workerId) fields["worker_id"] = ctx.workerId;
  if (ctx.owner) fields["owner"] = ctx.owner;
  return fields;
}

/**
 * Strip line breaks from caller-supplied values before they reach a log line.
 */
export function sanitizeForLog(value: unknown): string {
  return String(value).replace(/[\r\n]+/g, "");
}

// =============================================================================
// Implementation
// =============================================================================

function buildPino(config: LoggerConfig): PinoLogger {
  const env = process.env["NODE_ENV"];
  const fromEnv = process.env["LOG_LEVEL"];

  const options: LoggerOptions = {
    level: config.level ?? (isLogLevel(fromEnv) ? fromEnv : "info"),
    base: config.base ?? { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: [...(config.redact ?? DEFAULT_REDACT_PATHS)], censor: "[redacted]" },
    mixin: () => {
      const ctx = Context.tryGet();
      if (!ctx) {
        return {};
      }
      return { ...runContextFields(ctx), ...config.contextFields?.(ctx) };
    },
  };

  if (config.destination) {
    return pino(options, config.destination);
  }
  if (config.prettyPrint ?? (env !== "production" && env !== "test")) {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
    };
  }
  return pino(options);
}

function levelOf(logger: PinoLogger): LogLevel {
  return isLogLevel(logger.level) ? logger.level : "info";
}

/** Re-derives the child whenever its parent instance changes. */
function childOf(parent: () => PinoLogger, bindings: Record<string, unknown>): () => PinoLogger {
  let cached: { parent: PinoLogger; child: PinoLogger } | undefined;
  return () => {
    const current = parent();
    if (cached?.parent !== current) {
      cached = { parent: current, child: current.child(bindings) };
    }
    return cached.child;
  };
}

function bind(resolve: () => PinoLogger): KernelLogger {
  const method =
    (level: Exclude<LogLevel, "silent">): LogMethod =>
    (first: string | Record<string, unknown>, msg?: string) => {
      const target = resolve();
      if (typeof first === "string") {
        target[level](first);
      } else {
        target[level](first, msg);
      }
    };

  return {
    trace: method("trace"),
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    fatal: method("fatal"),
    child: (bindings) => bind(childOf(resolve, bindings)),
    get level() {
      return levelOf(resolve());
    },
    isLevelEnabled: (level) => resolve().isLevelEnabled(level),
  };
}

let globalConfig: LoggerConfig = {};
let globalPino: PinoLogger | undefined;

function root(): PinoLogger {
  globalPino ??= buildPino(globalConfig);
  return globalPino;
}

// =============================================================================
// Public API
// =============================================================================

export const Logger = {
  /**
   * Merge `config` into the global configuration and rebuild the logger.
   * Existing loggers pick up the change on their next call.
   */
  configure(config: LoggerConfig): void {
    globalConfig = { ...globalConfig, ...config };
    globalPino = buildPino(globalConfig);
  },

  get(): KernelLogger {
    return bind(root);
  },

  /**
   * Logger bound to `{ component }`; an object is named after its class.
   */
  for(nameOrComponent: string | object): KernelLogger {
    const component = typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return bind(childOf(root, { component }));
  },

  child(bindings: Record<string, unknown>): KernelLogger {
    return bind(childOf(root, bindings));
  },

  /**
   * Standalone logger; the global configuration does not apply to it.
   */
  create(config: LoggerConfig = {}): KernelLogger {
    const logger = buildPino(config);
    return bind(() => logger);
  },

  get level(): LogLevel {
    return levelOf(root());
  },

  setLevel(level: LogLevel): void {
    Logger.configure({ level });
  },

  isLevelEnabled(level: LogLevel): boolean {
    return root().isLevelEnabled(level);
  },

  reset(): void {
    globalConfig = {};
    globalPino = undefined;
  },
};
