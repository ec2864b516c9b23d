/**
 * # Agentry
 *
 * Background execution of LLM agents: runs are queued, driven turn by turn
 * by a pool of workers, and can be paused, resumed or cancelled while they
 * execute.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { AgentEngine, InMemoryRunStore, LocalToolProvider, defineTool } from 'agentry';
 * import { z } from 'zod';
 *
 * const tools = new LocalToolProvider([
 *   defineTool({
 *     name: 'add',
 *     description: 'Add two numbers',
 *     input: z.object({ a: z.number(), b: z.number() }),
 *     handler: ({ a, b }) => a + b,
 *   }),
 * ]);
 *
 * const engine = new AgentEngine({ store: new InMemoryRunStore(), model, tools });
 * engine.start();
 * ```
 *
 * @see {@link AgentEngine} - Run lifecycle control
 * @see {@link RunStore} - Persistence contract
 * @see {@link ToolProvider} - Tool source contract
 *
 * @module agentry
 */

export * from "./engine";
export * from "./store";
export * from "./tools";
export * from "./mcp";
export * from "./prompt";
export {
  engineConfigSchema,
  resolveEngineConfig,
  retryPolicyOf,
  DEFAULT_CONTINUATION_PROMPT,
} from "./config";
export type { EngineConfig, EngineConfigInput } from "./config";
export {
  agentDefinitionSchema,
  agentConfigSchema,
  inputVariableSchema,
  parseAgentDefinition,
  toAgent,
} from "./agents";
export type { AgentDefinition, ParsedAgentDefinition } from "./agents";
