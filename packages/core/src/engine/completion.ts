import { z } from "zod";
import {
  MalformedResponseError,
  assistantMessage,
  systemMessage,
  toolMessage,
  userMessage,
  type ChatCompletion,
  type ChatMessage,
  type Turn,
} from "agentry-shared";

const toolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()),
});

const completionSchema = z.object({
  content: z.string().nullish().transform((value) => value ?? ""),
  toolCalls: z.array(toolCallSchema).default([]),
});

/**
 * Check a chat model reply before it enters the run history.
 *
 * @throws MalformedResponseError when the reply does not have the expected shape
 */
export function parseCompletion(value: unknown): ChatCompletion {
  const result = completionSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new MalformedResponseError(`Malformed model response: ${issues.join("; ")}`, { issues });
  }
  const ids = new Set<string>();
  for (const call of result.data.toolCalls) {
    if (ids.has(call.id)) {
      throw new MalformedResponseError(`Malformed model response: duplicate tool call id '${call.id}'`, {
        toolCallId: call.id,
      });
    }
    ids.add(call.id);
  }
  return result.data;
}

/**
 * Messages for a model call: the rendered system prompt followed by the
 * run's history. Assistant turns carry the tool calls they requested, each
 * answered by the tool turns that follow.
 */
export function buildMessages(systemPrompt: string, history: readonly Turn[]): ChatMessage[] {
  const messages: ChatMessage[] = [systemMessage(systemPrompt)];
  for (const turn of history) {
    switch (turn.role) {
      case "system":
        messages.push(systemMessage(turn.content));
        break;
      case "user":
        messages.push(userMessage(turn.content));
        break;
      case "assistant":
        messages.push(assistantMessage(turn.content, turn.requestedToolCalls));
        break;
      case "tool":
        messages.push(toolMessage(turn.toolCallId ?? "", turn.toolName ?? "", turn.content));
        break;
    }
  }
  return messages;
}

/**
 * `role: content` lines, used by the goal evaluator.
 */
export function formatTranscript(messages: readonly ChatMessage[]): string {
  return messages.map((message) => `${message.role}: ${message.content}`).join("\n");
}
