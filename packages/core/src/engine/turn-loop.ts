import {
  AbortError,
  ConfigurationError,
  TransientModelError,
  TransientToolError,
  ensureError,
  formatToolResult,
  isAbortError,
  isAgentryError,
  isToolDeclared,
  toCallResult,
  type Agent,
  type ChatCompletion,
  type ChatModel,
  type GenerationOptions,
  type ToolCallRequest,
  type ToolCallResult,
  type ToolDescriptor,
} from "agentry-shared";
import { Logger, retry, withTimeout, type RetryPolicy } from "agentry-kernel";
import type { EngineConfig } from "../config";
import { retryPolicyOf } from "../config";
import { renderPrompt } from "../prompt/template";
import type { ToolProvider } from "../tools";
import { buildMessages, parseCompletion } from "./completion";
import { GoalEvaluator } from "./goal-evaluator";
import type { RunSession } from "./session";
import type { RunSignals } from "./signals";

export const RESULT_GOAL_ACHIEVED = "Goal achieved";
export const RESULT_MAX_TURNS = "Max turns reached";
export const RESULT_COMPLETED = "Completed";
export const RESULT_CANCELLED = "Cancelled by user";

/**
 * How a call to `drive` ended. The worker persists it.
 */
export type LoopOutcome =
  | { status: "completed"; result: string; goalAchieved: boolean }
  | { status: "paused" }
  | { status: "cancelled" }
  | { status: "failed"; error: string };

interface Prepared {
  systemPrompt: string;
  tools: ToolDescriptor[];
  generation: GenerationOptions;
}

export interface TurnLoopDeps {
  model: ChatModel;
  tools: ToolProvider;
  config: EngineConfig;
  /** Clock the run timestamps were taken from */
  now?: () => Date;
}

/**
 * Drives a claimed run from its current turn until it completes, fails, or
 * is suspended by a pause or cancel request.
 */
export class TurnLoop {
  private readonly log = Logger.for(this);
  private readonly policy: RetryPolicy;
  private readonly evaluator: GoalEvaluator;

  constructor(private readonly deps: TurnLoopDeps) {
    this.policy = retryPolicyOf(deps.config);
    this.evaluator = new GoalEvaluator(deps.model, {
      policy: this.policy,
      timeoutMs: deps.config.modelTimeoutMs,
    });
  }

  async drive(session: RunSession, agent: Agent, signals: RunSignals): Promise<LoopOutcome> {
    let prepared: Prepared | undefined;

    for (;;) {
      const suspension = this.checkBoundary(session, signals);
      if (suspension) {
        if (suspension.status === "failed") {
          await session.log("error", `Run failed: ${suspension.error}`);
        }
        return suspension;
      }

      try {
        prepared ??= await this.prepare(session, agent, signals);
        const outcome = await this.iterate(session, agent, signals, prepared);
        if (outcome) {
          return outcome;
        }
      } catch (error) {
        return this.fail(session, signals, error);
      }
    }
  }

  private checkBoundary(session: RunSession, signals: RunSignals): LoopOutcome | null {
    const request = signals.pending();
    if (request === "cancel") return { status: "cancelled" };
    if (request === "pause") return { status: "paused" };

    const remaining = this.remainingRunTime(session);
    if (remaining !== undefined && remaining <= 0) {
      return { status: "failed", error: `Run timed out after ${this.deps.config.runTimeoutMs}ms` };
    }
    return null;
  }

  private async prepare(session: RunSession, agent: Agent, signals: RunSignals): Promise<Prepared> {
    const run = session.run;
    const systemPrompt = renderPrompt(agent.prompt, agent.inputVariables, run.inputValues);

    let tools: ToolDescriptor[] = [];
    if (agent.tools.length > 0) {
      const available = await retry(() => this.deps.tools.listTools(), {
        policy: this.policy,
        signal: signals.signal,
        onRetry: (error, attempt, delayMs) =>
          session.log("warn", `Listing tools failed (attempt ${attempt}), retrying in ${delayMs}ms`, {
            error: ensureError(error).message,
          }),
      });

      const unknown = agent.tools.filter(
        (declared) =>
          !available.some(
            (tool) => tool.name === declared || tool.group?.toLowerCase() === declared.toLowerCase(),
          ),
      );
      if (unknown.length > 0) {
        throw new ConfigurationError(
          `Agent '${agent.name}' declares unknown tools: ${unknown.join(", ")}`,
          "CONFIG_TOOL",
          { unknown },
        );
      }
      tools = available.filter((tool) => isToolDeclared(agent.tools, tool));
    }

    const { config } = agent;
    const generation: GenerationOptions = { model: config.model };
    if (config.temperature !== undefined) generation.temperature = config.temperature;
    if (config.topP !== undefined) generation.topP = config.topP;
    if (config.maxTokens !== undefined) generation.maxTokens = config.maxTokens;
    if (config.frequencyPenalty !== undefined) generation.frequencyPenalty = config.frequencyPenalty;
    if (config.presencePenalty !== undefined) generation.presencePenalty = config.presencePenalty;

    await session.log("info", `Starting run with ${tools.length} tool(s)`, {
      tools: tools.map((tool) => tool.name),
    });
    return { systemPrompt, tools, generation };
  }

  /**
   * One model call plus the tool calls it asks for.
   * @returns an outcome when the run ends in this iteration
   */
  private async iterate(
    session: RunSession,
    agent: Agent,
    signals: RunSignals,
    prepared: Prepared,
  ): Promise<LoopOutcome | null> {
    const completion = await this.callModel(session, signals, prepared);

    await session.appendTurn(
      completion.toolCalls.length > 0
        ? { role: "assistant", content: completion.content, requestedToolCalls: completion.toolCalls }
        : { role: "assistant", content: completion.content },
    );

    for (const call of completion.toolCalls) {
      if (signals.cancelRequested) {
        return { status: "cancelled" };
      }
      const result = await this.callTool(session, signals, prepared, agent, call);
      await session.appendTurn({
        role: "tool",
        content: formatToolResult(result),
        toolCallId: call.id,
        toolName: call.name,
        toolCalls: [{ ...call, result }],
      });
    }

    const turnCount = session.run.turnCount + 1;
    await session.update({ turnCount });

    if (turnCount >= session.run.maxTurns) {
      await session.log("info", `Max turns reached (${session.run.maxTurns})`);
      return { status: "completed", result: RESULT_MAX_TURNS, goalAchieved: false };
    }

    if (!agent.config.enableMultiTurn) {
      return { status: "completed", result: RESULT_COMPLETED, goalAchieved: false };
    }

    const goal = session.run.goal?.trim();
    if (goal) {
      const verdict = await this.evaluator.evaluate(
        goal,
        buildMessages(prepared.systemPrompt, session.run.conversationHistory),
        prepared.generation,
        signals.signal,
      );
      if (verdict.error) {
        await session.log("warn", `Goal evaluation failed: ${verdict.error.message}`);
      }
      if (verdict.achieved) {
        await session.log("info", "Goal achieved", { turnCount });
        return { status: "completed", result: RESULT_GOAL_ACHIEVED, goalAchieved: true };
      }
    }

    if (completion.toolCalls.length === 0) {
      await session.appendTurn({ role: "user", content: this.deps.config.continuationPrompt });
    }
    return null;
  }

  private async callModel(
    session: RunSession,
    signals: RunSignals,
    prepared: Prepared,
  ): Promise<ChatCompletion> {
    return retry(
      () => {
        const messages = buildMessages(prepared.systemPrompt, session.run.conversationHistory);
        const remaining = this.remainingRunTime(session);
        if (remaining !== undefined && remaining <= 0) {
          throw AbortError.timeout(this.deps.config.runTimeoutMs ?? 0);
        }
        const timeoutMs = Math.min(this.deps.config.modelTimeoutMs, remaining ?? Infinity);
        return withTimeout(
          async (signal) =>
            parseCompletion(
              await this.deps.model.complete(messages, {
                ...prepared.generation,
                tools: prepared.tools,
                signal,
              }),
            ),
          { timeoutMs, onTimeout: (ms) => TransientModelError.timeout(ms) },
        );
      },
      {
        policy: this.policy,
        signal: signals.signal,
        onRetry: (error, attempt, delayMs) =>
          session.log("warn", `Model call failed (attempt ${attempt}), retrying in ${delayMs}ms`, {
            error: ensureError(error).message,
          }),
      },
    );
  }

  private async callTool(
    session: RunSession,
    signals: RunSignals,
    prepared: Prepared,
    agent: Agent,
    call: ToolCallRequest,
  ): Promise<ToolCallResult> {
    if (!prepared.tools.some((tool) => tool.name === call.name)) {
      await session.log("warn", `Model requested undeclared tool '${call.name}'`);
      return {
        ok: false,
        error: {
          kind: "not_declared",
          message: `Tool '${call.name}' is not declared by agent '${agent.name}'`,
        },
      };
    }

    try {
      const outcome = await retry(
        () =>
          withTimeout((signal) => this.deps.tools.invoke(call.name, call.arguments, { signal }), {
            timeoutMs: this.deps.config.toolTimeoutMs,
            onTimeout: (ms) => TransientToolError.timeout(call.name, ms),
          }),
        {
          policy: this.policy,
          signal: signals.signal,
          onRetry: (error, attempt, delayMs) =>
            session.log(
              "warn",
              `Tool '${call.name}' failed (attempt ${attempt}), retrying in ${delayMs}ms`,
              { error: ensureError(error).message },
            ),
        },
      );
      return toCallResult(outcome);
    } catch (error) {
      if (error instanceof TransientToolError || isAbortError(error)) {
        throw error;
      }
      const message = ensureError(error).message;
      await session.log("warn", `Tool '${call.name}' threw: ${message}`);
      return { ok: false, error: { kind: "invocation_failed", message } };
    }
  }

  private async fail(session: RunSession, signals: RunSignals, error: unknown): Promise<LoopOutcome> {
    if (isAbortError(error) && signals.cancelRequested) {
      return { status: "cancelled" };
    }
    const err = ensureError(error);
    this.log.error({ err }, "Run failed");
    await session.log(
      "error",
      `Run failed: ${err.message}`,
      isAgentryError(err) ? { error: err.name, code: err.code } : { error: err.name },
    );
    return { status: "failed", error: err.message };
  }

  private remainingRunTime(session: RunSession): number | undefined {
    const limit = this.deps.config.runTimeoutMs;
    const startedAt = session.run.startedAt;
    if (limit === undefined || !startedAt) {
      return undefined;
    }
    const now = this.deps.now?.() ?? new Date();
    return limit - (now.getTime() - Date.parse(startedAt));
  }
}
