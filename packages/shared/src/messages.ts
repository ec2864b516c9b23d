/**
 * Chat message types sent to a Chat Model.
 *
 * The turn loop rebuilds these from a run's conversation history before
 * every model call; they are never persisted.
 */

import type { ToolCallRequest } from "./tools";

export type ChatRole = "system" | "user" | "assistant" | "tool";

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCallRequest[] }
  | { role: "tool"; content: string; toolCallId: string; toolName: string };

export function systemMessage(content: string): ChatMessage {
  return { role: "system", content };
}

export function userMessage(content: string): ChatMessage {
  return { role: "user", content };
}

export function assistantMessage(content: string, toolCalls?: ToolCallRequest[]): ChatMessage {
  return toolCalls && toolCalls.length > 0
    ? { role: "assistant", content, toolCalls }
    : { role: "assistant", content };
}

export function toolMessage(toolCallId: string, toolName: string, content: string): ChatMessage {
  return { role: "tool", content, toolCallId, toolName };
}
