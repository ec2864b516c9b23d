/**
 * MCP Tool Provider
 *
 * Wraps the official @modelcontextprotocol/sdk Client to expose the tools of
 * several MCP servers through the Tool Provider port.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  ConfigurationError,
  TransientToolError,
  ensureError,
  type ToolDescriptor,
  type ToolOutcome,
} from "agentry-shared";
import { Logger } from "agentry-kernel";
import type { InvokeOptions, ToolProvider } from "../tools/types";
import type { MCPServerConfig, MCPToolDefinition } from "./types";

const callResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .optional()
    .default([]),
  structuredContent: z.record(z.string(), z.unknown()).optional(),
  isError: z.boolean().optional(),
});

const TRANSIENT_CODES: ReadonlySet<number> = new Set([ErrorCode.ConnectionClosed, ErrorCode.RequestTimeout]);

export class McpToolProvider implements ToolProvider {
  private log = Logger.for(this);
  private clients = new Map<string, Client>();
  private tools = new Map<string, MCPToolDefinition>();
  private listed = false;

  constructor(
    private readonly servers: MCPServerConfig[],
    private readonly clientInfo = { name: "agentry", version: "0.1.0" },
  ) {}

  /**
   * Connect to an MCP server, reusing an open connection.
   */
  async connect(config: MCPServerConfig): Promise<Client> {
    const existing = this.clients.get(config.serverName);
    if (existing) {
      return existing;
    }

    const client = new Client(this.clientInfo, { capabilities: {} });
    await client.connect(this.createTransport(config));

    client.onclose = () => {
      this.forget(config.serverName);
      this.log.warn({ serverName: config.serverName }, "MCP client disconnected");
    };
    client.onerror = (error) => {
      this.log.error({ err: error, serverName: config.serverName }, "MCP client error");
    };

    this.clients.set(config.serverName, client);
    return client;
  }

  /**
   * List tools across all servers. A server that cannot be reached fails the
   * listing with a TransientToolError so the caller may retry.
   */
  async listTools(): Promise<ToolDescriptor[]> {
    const tools = new Map<string, MCPToolDefinition>();

    for (const server of this.servers) {
      let listing: Awaited<ReturnType<Client["listTools"]>>;
      try {
        const client = await this.connect(server);
        listing = await client.listTools();
      } catch (error) {
        this.forget(server.serverName);
        if (error instanceof ConfigurationError) {
          throw error;
        }
        throw new TransientToolError(
          server.serverName,
          `Failed to list tools of MCP server '${server.serverName}': ${ensureError(error).message}`,
          "TOOL_TRANSIENT",
          ensureError(error),
        );
      }

      for (const tool of listing.tools) {
        if (tools.has(tool.name)) {
          this.log.warn({ tool: tool.name, serverName: server.serverName }, "Duplicate MCP tool name ignored");
          continue;
        }
        tools.set(tool.name, {
          name: tool.name,
          description: tool.description ?? "",
          inputSchema: { ...tool.inputSchema },
          serverName: server.serverName,
        });
      }
    }

    this.tools = tools;
    this.listed = true;
    return Array.from(tools.values(), (tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      group: tool.serverName,
    }));
  }

  async invoke(name: string, args: Record<string, unknown>, options: InvokeOptions = {}): Promise<ToolOutcome> {
    if (!this.listed) {
      await this.listTools();
    }
    const definition = this.tools.get(name);
    if (!definition) {
      return { ok: false, kind: "not_found", message: `Tool '${name}' not found on any MCP server` };
    }

    const server = this.servers.find((s) => s.serverName === definition.serverName);
    if (!server) {
      return { ok: false, kind: "not_found", message: `MCP server '${definition.serverName}' is not configured` };
    }

    let raw: unknown;
    try {
      const client = await this.connect(server);
      raw = await client.callTool({ name, arguments: args }, undefined, { signal: options.signal });
    } catch (error) {
      if (error instanceof McpError && !TRANSIENT_CODES.has(error.code)) {
        return { ok: false, kind: "invocation_failed", message: error.message };
      }
      this.forget(server.serverName);
      throw new TransientToolError(name, ensureError(error).message, "TOOL_TRANSIENT", ensureError(error));
    }

    const parsed = callResultSchema.safeParse(raw);
    if (!parsed.success) {
      return { ok: false, kind: "invocation_failed", message: "MCP server returned an unreadable tool result" };
    }

    const text = parsed.data.content
      .filter((block) => block.type === "text" && block.text !== undefined)
      .map((block) => block.text)
      .join("\n");

    if (parsed.data.isError) {
      return { ok: false, kind: "invocation_failed", message: text || `Tool '${name}' reported an error` };
    }
    return { ok: true, value: parsed.data.structuredContent ?? text };
  }

  async close(): Promise<void> {
    const clients = Array.from(this.clients.values());
    this.clients.clear();
    this.tools.clear();
    this.listed = false;
    await Promise.all(clients.map((client) => client.close()));
  }

  private forget(serverName: string): void {
    this.clients.delete(serverName);
    this.listed = false;
  }

  private createTransport(config: MCPServerConfig): Transport {
    if (config.createTransport) {
      return config.createTransport();
    }
    if (!config.url) {
      throw new ConfigurationError(
        `MCP server '${config.serverName}' needs a url or a transport factory`,
        "CONFIG_INVALID",
        { serverName: config.serverName },
      );
    }
    const url = new URL(config.url);
    return config.transport === "sse" ? new SSEClientTransport(url) : new StreamableHTTPClientTransport(url);
  }
}
