/**
 * Agent and run records.
 *
 * Field names and enum spellings below are the wire contract of the control
 * API and of every Run Store implementation.
 */

import type { ToolCallResult } from "./tools";

// ============================================================================
// Run Status
// ============================================================================

export type RunStatus =
  | "pending"
  | "running"
  | "paused"
  | "cancelling"
  | "completed"
  | "failed"
  | "cancelled";

export const RUN_STATUSES = [
  "pending",
  "running",
  "paused",
  "cancelling",
  "completed",
  "failed",
  "cancelled",
] as const satisfies readonly RunStatus[];

export type TerminalRunStatus = Extract<RunStatus, "completed" | "failed" | "cancelled">;

/**
 * Allowed status edges. Anything not listed is rejected by the lifecycle
 * manager. Terminal statuses have no outgoing edges.
 */
export const RUN_TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  pending: ["running", "cancelling"],
  running: ["paused", "cancelling", "completed", "failed"],
  paused: ["running", "cancelling"],
  cancelling: ["cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminalStatus(status: RunStatus): status is TerminalRunStatus {
  return status === "completed" || status === "failed" || status === "cancelled";
}

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return RUN_TRANSITIONS[from].includes(to);
}

// ============================================================================
// Agent
// ============================================================================

export interface AgentConfig {
  /** Model or deployment name passed to the chat model */
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  /** Turn budget per run (default 10) */
  maxTurns: number;
  /** When false the run completes after a single iteration */
  enableMultiTurn: boolean;
  /** Goal text; multi-turn runs end early once the evaluator judges it achieved */
  goalCompletionPrompt?: string;
}

export interface InputVariable {
  name: string;
  description: string;
  required: boolean;
}

export interface Agent {
  id: string;
  owner: string;
  entityType: "agent";
  name: string;
  description: string;
  /** System prompt template with `{{variable}}` placeholders */
  prompt: string;
  config: AgentConfig;
  /** Declared tool names or tool groups (e.g. an MCP server name) */
  tools: string[];
  inputVariables: InputVariable[];
  createdAt: string;
  updatedAt: string;
}

export const DEFAULT_OWNER = "default";
export const DEFAULT_MAX_TURNS = 10;

// ============================================================================
// Run
// ============================================================================

export type TurnRole = "system" | "user" | "assistant" | "tool";

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  result: ToolCallResult;
}

/**
 * One entry of a run's conversation history.
 *
 * Turn numbers start at 1 and increase by exactly 1. A tool-role turn
 * carries exactly one ToolCall.
 */
export interface Turn {
  turnNumber: number;
  role: TurnRole;
  content: string;
  timestamp: string;
  toolCalls?: ToolCall[];
  toolCallId?: string;
  toolName?: string;
  /** Tool calls the assistant requested in this turn (assistant turns only) */
  requestedToolCalls?: Array<{ id: string; name: string; arguments: Record<string, unknown> }>;
}

export type RunLogLevel = "debug" | "info" | "warn" | "error";

export interface RunLog {
  timestamp: string;
  level: RunLogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface AgentRun {
  id: string;
  agentId: string;
  owner: string;
  entityType: "agent-run";
  inputValues: Record<string, string>;
  status: RunStatus;
  /** Completion reason once the run ends successfully or is cancelled */
  result: string | null;
  error: string | null;
  logs: RunLog[];
  conversationHistory: Turn[];
  /** Completed loop iterations */
  turnCount: number;
  maxTurns: number;
  goal: string | null;
  goalAchieved: boolean;
  createdAt: string;
  startedAt: string | null;
  pausedAt: string | null;
  completedAt: string | null;
  lastUpdated: string;
}

/**
 * Snapshot row of the Active Run Registry.
 */
export interface RunSummary {
  runId: string;
  agentId: string;
  status: RunStatus;
  turnCount: number;
  maxTurns: number;
  workerId: string;
  claimedAt: string;
  pauseRequested: boolean;
  cancelRequested: boolean;
}

// ============================================================================
// Run Events
// ============================================================================

/**
 * Events pushed to subscribers of a run while it executes.
 */
export type RunEvent =
  | { type: "status"; runId: string; agentId: string; status: RunStatus; previous: RunStatus }
  | { type: "turn"; runId: string; agentId: string; turn: Turn }
  | { type: "log"; runId: string; agentId: string; log: RunLog };

export type RunEventType = RunEvent["type"];
