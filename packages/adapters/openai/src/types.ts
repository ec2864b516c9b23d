import type { ClientOptions } from "openai";
import type {
  ChatCompletion as OpenAIChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";

/**
 * The part of the OpenAI client the adapter calls. An `OpenAI` instance
 * satisfies it; tests pass a fake.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<OpenAIChatCompletion>;
    };
  };
}

/**
 * OpenAI adapter configuration.
 */
export interface OpenAIAdapterConfig {
  apiKey?: string;
  /** OpenAI-compatible endpoint (Azure OpenAI, a local server) */
  baseURL?: string;
  organization?: string;
  project?: string;
  headers?: Record<string, string>;
  /** Extra options for the OpenAI client */
  clientOptions?: ClientOptions;
  /** Use this client instead of creating one */
  client?: ChatCompletionsClient;
}
