export { McpToolProvider } from "./provider";
export type { MCPServerConfig, MCPToolDefinition, MCPTransport } from "./types";
