/**
 * # Agentry Kernel
 *
 * Low-level primitives the engine builds on:
 *
 * - **Context** - Run-scoped state propagated through async calls
 * - **Logger** - pino logging with run context injection
 * - **Channels** - Typed pub/sub for run events
 * - **Retry / Timeout** - Exponential backoff and abortable deadlines
 *
 * @module agentry-kernel
 */

export * from "./context";
export * from "./logger";
export * from "./channel";
export * from "./retry";
export * from "./timeout";
