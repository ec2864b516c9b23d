export type { ToolProvider, InvokeOptions } from "./types";
export { LocalToolProvider, defineTool } from "./local";
export type { LocalTool, LocalToolDefinition } from "./local";
export { CompositeToolProvider } from "./composite";
