/**
 * Chat Model Port
 *
 * The engine talks to a language model only through this interface.
 * Implementations report recoverable failures as `TransientModelError` and
 * everything else as `FatalModelError`.
 */

import type { ChatMessage } from "./messages";
import type { ToolCallRequest, ToolDescriptor } from "./tools";

/**
 * Generation parameters copied from the agent's configuration.
 */
export interface GenerationOptions {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
}

export interface ChatOptions extends GenerationOptions {
  /** Tools the model may call; empty when the agent declares none */
  tools: ToolDescriptor[];
  /** Aborted when the per-call timeout elapses */
  signal?: AbortSignal;
}

export interface ChatCompletion {
  content: string;
  toolCalls: ToolCallRequest[];
}

export interface ChatModel {
  complete(messages: ChatMessage[], options: ChatOptions): Promise<ChatCompletion>;
}
