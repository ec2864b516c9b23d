import {
  TransientModelError,
  ensureError,
  systemMessage,
  userMessage,
  type ChatMessage,
  type ChatModel,
  type GenerationOptions,
} from "agentry-shared";
import { Logger, retry, withTimeout, type RetryPolicy } from "agentry-kernel";
import { formatTranscript, parseCompletion } from "./completion";

export const GOAL_EVALUATION_PREFIX = "You are evaluating if a goal has been achieved.";

export interface GoalVerdict {
  achieved: boolean;
  /** Raw evaluator reply, when the call succeeded */
  reply?: string;
  error?: Error;
}

export interface GoalEvaluatorOptions {
  policy: RetryPolicy;
  timeoutMs: number;
}

/**
 * Asks the chat model whether a run's goal has been reached.
 */
export class GoalEvaluator {
  private readonly log = Logger.for(this);

  constructor(
    private readonly model: ChatModel,
    private readonly options: GoalEvaluatorOptions,
  ) {}

  async evaluate(
    goal: string,
    conversation: readonly ChatMessage[],
    generation: GenerationOptions,
    signal?: AbortSignal,
  ): Promise<GoalVerdict> {
    const messages = [
      systemMessage(`${GOAL_EVALUATION_PREFIX} The goal is: ${goal}`),
      userMessage(
        "Based on the following conversation, has the goal been achieved? Answer only 'yes' or 'no'." +
          `\n\nConversation:\n${formatTranscript(conversation)}`,
      ),
    ];

    try {
      const completion = await retry(
        () =>
          withTimeout(
            async (callSignal) =>
              parseCompletion(await this.model.complete(messages, { ...generation, tools: [], signal: callSignal })),
            { timeoutMs: this.options.timeoutMs, onTimeout: (ms) => TransientModelError.timeout(ms) },
          ),
        { policy: this.options.policy, signal },
      );
      const reply = completion.content.trim();
      return { achieved: isAffirmative(reply), reply };
    } catch (error) {
      const err = ensureError(error);
      this.log.warn({ err }, "Goal evaluation failed");
      return { achieved: false, error: err };
    }
  }
}

export function isAffirmative(reply: string): boolean {
  return /^yes\b/.test(reply.trim().toLowerCase());
}
