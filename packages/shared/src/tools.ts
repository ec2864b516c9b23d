/**
 * Tool Types
 *
 * Types exchanged between the turn loop and a Tool Provider.
 */

/**
 * Everything the model needs to decide whether and how to call a tool.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  /** JSON Schema of the tool's arguments object */
  inputSchema: Record<string, unknown>;
  /**
   * Optional group the tool belongs to (for MCP tools, the server name).
   * Agents may declare a group instead of listing each tool.
   */
  group?: string;
}

/**
 * A tool call the model asked for.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Kinds of tool failure recorded on a tool turn.
 * - `not_declared`: the agent does not declare the tool, nothing was invoked
 * - `not_found`: the provider has no such tool
 * - `invocation_failed`: the tool ran and reported an error
 */
export type ToolErrorKind = "not_declared" | "not_found" | "invocation_failed";

/**
 * Result of a provider invocation. Transport failures are thrown instead.
 */
export type ToolOutcome =
  | { ok: true; value: unknown }
  | { ok: false; kind: Exclude<ToolErrorKind, "not_declared">; message: string };

/**
 * Result stored on a ToolCall.
 */
export type ToolCallResult =
  | { ok: true; value: unknown }
  | { ok: false; error: { kind: ToolErrorKind; message: string } };

export function toCallResult(outcome: ToolOutcome): ToolCallResult {
  if (outcome.ok) {
    return { ok: true, value: outcome.value };
  }
  return { ok: false, error: { kind: outcome.kind, message: outcome.message } };
}

/**
 * Text form of a tool result, as shown to the model and stored as turn content.
 */
export function formatToolResult(result: ToolCallResult): string {
  if (!result.ok) {
    return `Error (${result.error.kind}): ${result.error.message}`;
  }
  if (typeof result.value === "string") {
    return result.value;
  }
  if (result.value === undefined) {
    return "Done";
  }
  return JSON.stringify(result.value);
}

/**
 * An agent may call a tool when it declares the tool's name or its group.
 * Group names compare case-insensitively.
 */
export function isToolDeclared(declared: readonly string[], tool: ToolDescriptor): boolean {
  if (declared.includes(tool.name)) {
    return true;
  }
  if (!tool.group) {
    return false;
  }
  const group = tool.group.toLowerCase();
  return declared.some((entry) => entry.toLowerCase() === group);
}
