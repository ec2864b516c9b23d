/**
 * # Agentry OpenAI Adapter
 *
 * Chat Model port implemented on the official `openai` SDK. Works with any
 * OpenAI-compatible endpoint through `baseURL`.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { OpenAIChatModel } from 'agentry-openai';
 *
 * const model = new OpenAIChatModel({ apiKey: process.env.OPENAI_API_KEY });
 * const engine = new AgentEngine({ store: new InMemoryRunStore(), model });
 * ```
 *
 * @module agentry-openai
 */
export {
  OpenAIChatModel,
  classifyOpenAIError,
  mapToolDefinition,
  prepareInput,
  processOutput,
  toOpenAIMessage,
} from "./openai";
export type { ChatCompletionsClient, OpenAIAdapterConfig } from "./types";
