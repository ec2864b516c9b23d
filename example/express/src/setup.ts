import {
  AgentEngine,
  CompositeToolProvider,
  InMemoryRunStore,
  LocalToolProvider,
  McpToolProvider,
  type ToolProvider,
} from "agentry";
import { Logger } from "agentry-kernel";
import { OpenAIChatModel } from "agentry-openai";
import type { ChatModel } from "agentry-shared";
import { ScriptedChatModel, reply } from "agentry-shared/testing";
import type { ServerConfig } from "./config";
import { exampleTools } from "./tools";

const log = Logger.for("Setup");

export const NO_MODEL_REPLY = "No model is configured. Set OPENAI_API_KEY to run agents against OpenAI.";

export interface ServerRuntime {
  engine: AgentEngine;
  /** Release tool connections after the engine has stopped */
  close(): Promise<void>;
}

export function createModel(config: ServerConfig): ChatModel {
  if (!config.OPENAI_API_KEY) {
    log.warn("OPENAI_API_KEY is not set; agents will receive a canned reply");
    return new ScriptedChatModel({ fallback: reply(NO_MODEL_REPLY) });
  }
  return new OpenAIChatModel({
    apiKey: config.OPENAI_API_KEY,
    ...(config.OPENAI_BASE_URL ? { baseURL: config.OPENAI_BASE_URL } : {}),
  });
}

export function setupEngine(config: ServerConfig): ServerRuntime {
  Logger.configure({ level: config.LOG_LEVEL });

  const local = new LocalToolProvider(exampleTools);
  const servers = Object.entries(config.MCP_SERVERS ?? {}).map(([serverName, url]) => ({ serverName, url }));
  const mcp = servers.length > 0 ? new McpToolProvider(servers) : undefined;
  const tools: ToolProvider = mcp ? new CompositeToolProvider([local, mcp]) : local;

  const engine = new AgentEngine({
    store: new InMemoryRunStore(),
    model: createModel(config),
    tools,
    config: {
      concurrency: config.AGENT_CONCURRENCY,
      queueCapacity: config.AGENT_QUEUE_CAPACITY,
      ...(config.AGENT_RUN_TIMEOUT_MS ? { runTimeoutMs: config.AGENT_RUN_TIMEOUT_MS } : {}),
    },
  });

  log.info(
    { concurrency: config.AGENT_CONCURRENCY, mcpServers: servers.map((server) => server.serverName) },
    "Engine configured",
  );

  return {
    engine,
    close: async () => {
      await mcp?.close();
    },
  };
}
