import type { ToolDescriptor, ToolOutcome } from "agentry-shared";

export interface InvokeOptions {
  /** Aborted when the per-call timeout elapses */
  signal?: AbortSignal;
}

/**
 * Tool Provider Port
 *
 * `invoke` reports tool-level failures as a ToolOutcome and throws
 * TransientToolError only for transport failures worth retrying.
 */
export interface ToolProvider {
  listTools(): Promise<ToolDescriptor[]>;
  invoke(name: string, args: Record<string, unknown>, options?: InvokeOptions): Promise<ToolOutcome>;
}
