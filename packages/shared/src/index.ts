/**
 * # Agentry Shared
 *
 * Types and errors shared by every agentry package: agent and run records,
 * the run status table, chat messages, the Chat Model port and tool types.
 *
 * @module agentry-shared
 */

export * from "./errors";
export * from "./runs";
export * from "./messages";
export * from "./models";
export * from "./tools";
