import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError, type ClientOptions } from "openai";
import type {
  ChatCompletion as OpenAIChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import {
  AbortError,
  FatalModelError,
  MalformedResponseError,
  TransientModelError,
  ensureError,
  type ChatCompletion,
  type ChatMessage,
  type ChatModel,
  type ChatOptions,
  type ToolCallRequest,
  type ToolDescriptor,
} from "agentry-shared";
import { Logger } from "agentry-kernel";
import type { ChatCompletionsClient, OpenAIAdapterConfig } from "./types";

const logger = Logger.for("OpenAIAdapter");

/**
 * Chat Model backed by the OpenAI Chat Completions API.
 *
 * The client is created with `maxRetries: 0`; the engine owns retries and
 * timeouts.
 *
 * @example
 * ```typescript
 * const model = new OpenAIChatModel({ apiKey: process.env.OPENAI_API_KEY });
 * const engine = new AgentEngine({ store, model });
 * ```
 */
export class OpenAIChatModel implements ChatModel {
  private readonly client: ChatCompletionsClient;

  constructor(config: OpenAIAdapterConfig = {}) {
    this.client = config.client ?? new OpenAI(buildClientOptions(config));
  }

  async complete(messages: ChatMessage[], options: ChatOptions): Promise<ChatCompletion> {
    const params = prepareInput(messages, options);
    logger.debug({ model: params.model, messages: params.messages.length, tools: options.tools.length }, "Chat request");

    let output: OpenAIChatCompletion;
    try {
      output = await this.client.chat.completions.create(params, { signal: options.signal });
    } catch (error) {
      throw classifyOpenAIError(error);
    }
    return processOutput(output);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function buildClientOptions(config: OpenAIAdapterConfig): ClientOptions {
  const options: ClientOptions = { maxRetries: 0, ...config.clientOptions };
  const apiKey = config.apiKey ?? process.env["OPENAI_API_KEY"];
  const baseURL = config.baseURL ?? process.env["OPENAI_BASE_URL"];
  const organization = config.organization ?? process.env["OPENAI_ORGANIZATION"];

  if (apiKey !== undefined) options.apiKey = apiKey;
  if (baseURL !== undefined) options.baseURL = baseURL;
  if (organization !== undefined) options.organization = organization;
  if (config.project !== undefined) options.project = config.project;
  if (config.headers !== undefined) options.defaultHeaders = config.headers;
  return options;
}

/**
 * Convert a ChatMessage to an OpenAI message param
 */
export function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content || null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
      return { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content || "Done" };
  }
}

/**
 * Map a tool descriptor to an OpenAI function tool
 */
export function mapToolDefinition(tool: ToolDescriptor): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  };
}

/**
 * Build chat completion params from messages and options
 */
export function prepareInput(messages: ChatMessage[], options: ChatOptions): ChatCompletionCreateParamsNonStreaming {
  const params: ChatCompletionCreateParamsNonStreaming = {
    model: options.model,
    messages: messages.map(toOpenAIMessage),
  };

  if (options.temperature !== undefined) params.temperature = options.temperature;
  if (options.topP !== undefined) params.top_p = options.topP;
  if (options.maxTokens !== undefined) params.max_tokens = options.maxTokens;
  if (options.frequencyPenalty !== undefined) params.frequency_penalty = options.frequencyPenalty;
  if (options.presencePenalty !== undefined) params.presence_penalty = options.presencePenalty;

  if (options.tools.length > 0) {
    params.tools = options.tools.map(mapToolDefinition);
    params.tool_choice = "auto";
  }
  return params;
}

/**
 * Convert an OpenAI completion to a ChatCompletion
 *
 * @throws FatalModelError when the reply was withheld by the content filter
 * @throws MalformedResponseError when the reply has no message or unreadable tool arguments
 */
export function processOutput(output: OpenAIChatCompletion): ChatCompletion {
  const choice = output.choices[0];
  if (!choice) {
    throw new MalformedResponseError("No message in OpenAI response", { id: output.id });
  }
  if (choice.finish_reason === "content_filter") {
    throw new FatalModelError("Response was blocked by the content filter", "MODEL_CONTENT_FILTER", {
      id: output.id,
    });
  }

  const toolCalls: ToolCallRequest[] = [];
  for (const toolCall of choice.message.tool_calls ?? []) {
    if (toolCall.type !== "function") {
      continue;
    }
    toolCalls.push({
      id: toolCall.id,
      name: toolCall.function.name,
      arguments: parseArguments(toolCall.function.name, toolCall.function.arguments),
    });
  }

  return { content: choice.message.content ?? "", toolCalls };
}

function parseArguments(toolName: string, raw: string): Record<string, unknown> {
  if (raw.trim() === "") {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedResponseError(
      `Model returned invalid JSON arguments for tool '${toolName}'`,
      { toolName },
      ensureError(error),
    );
  }
  if (!isRecord(parsed)) {
    throw new MalformedResponseError(`Model returned non-object arguments for tool '${toolName}'`, { toolName });
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Map an OpenAI SDK error to the engine's error taxonomy: rate limits,
 * timeouts, connection failures and 5xx are transient; everything else the
 * API rejects is fatal.
 */
export function classifyOpenAIError(error: unknown): Error {
  if (error instanceof APIUserAbortError) {
    return new AbortError("Model request was aborted", "ABORT_SIGNAL", {}, error);
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new TransientModelError(error.message, "MODEL_TIMEOUT", { provider: "openai" }, error);
  }
  if (error instanceof APIConnectionError) {
    return new TransientModelError(error.message, "MODEL_TRANSIENT", { provider: "openai" }, error);
  }
  if (error instanceof APIError) {
    const status = error.status;
    const details = { provider: "openai", status };
    if (status === 429) {
      return new TransientModelError(
        error.message,
        "MODEL_RATE_LIMIT",
        { ...details, retryAfterMs: retryAfterMs(error) },
        error,
      );
    }
    if (status === undefined || status === 408 || status === 409 || status >= 500) {
      return new TransientModelError(error.message, "MODEL_TRANSIENT", details, error);
    }
    if (status === 401 || status === 403) {
      return new FatalModelError(error.message, "MODEL_AUTH", details, error);
    }
    return new FatalModelError(error.message, "MODEL_FATAL", details, error);
  }
  return new FatalModelError(ensureError(error).message, "MODEL_FATAL", { provider: "openai" }, ensureError(error));
}

function retryAfterMs(error: APIError): number | undefined {
  const header = error.headers?.get("retry-after");
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}
