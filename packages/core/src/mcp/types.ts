/**
 * MCP (Model Context Protocol) Types
 *
 * Configuration for the MCP tool provider, built on @modelcontextprotocol/sdk.
 */

import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

/**
 * MCP transport types
 * - `streamable-http`: Streamable HTTP (current MCP remote transport)
 * - `sse`: legacy HTTP+SSE transport
 */
export type MCPTransport = "streamable-http" | "sse";

export interface MCPServerConfig {
  /**
   * Unique name of the server. Tools exposed by the server belong to a group
   * with this name, so agents can declare the whole server.
   */
  serverName: string;
  /** Default: streamable-http */
  transport?: MCPTransport;
  url?: string;
  /** Supplies a ready transport instead of `url` (e.g. an in-memory pair) */
  createTransport?: () => Transport;
}

export interface MCPToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  serverName: string;
}
