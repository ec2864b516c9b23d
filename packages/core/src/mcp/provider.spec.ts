import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { ConfigurationError, TransientToolError } from "agentry-shared";
import { McpToolProvider } from "./provider";

const addSchema = {
  type: "object" as const,
  properties: { a: { type: "number" }, b: { type: "number" } },
  required: ["a", "b"],
};

/**
 * Start an in-process MCP server and return the client end of its transport.
 */
async function startServer(toolNames: string[] = ["add", "explode", "refuse"]): Promise<Transport> {
  const server = new Server({ name: "test-server", version: "1.0.0" }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolNames.map((name) => ({ name, description: `${name} tool`, inputSchema: addSchema })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const args = request.params.arguments ?? {};
    switch (request.params.name) {
      case "add":
        return { content: [{ type: "text" as const, text: String(Number(args.a) + Number(args.b)) }] };
      case "refuse":
        return { content: [{ type: "text" as const, text: "quota exhausted" }], isError: true };
      default:
        throw new Error("boom");
    }
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  return clientTransport;
}

describe("McpToolProvider", () => {
  let provider: McpToolProvider;

  afterEach(async () => {
    await provider.close();
  });

  it("lists tools grouped by server", async () => {
    const transport = await startServer(["add"]);
    provider = new McpToolProvider([{ serverName: "math", createTransport: () => transport }]);

    await expect(provider.listTools()).resolves.toEqual([
      { name: "add", description: "add tool", inputSchema: addSchema, group: "math" },
    ]);
  });

  it("invokes a tool and returns its text", async () => {
    const transport = await startServer();
    provider = new McpToolProvider([{ serverName: "math", createTransport: () => transport }]);

    await expect(provider.invoke("add", { a: 2, b: 3 })).resolves.toEqual({ ok: true, value: "5" });
  });

  it("reports tool-level errors as failed invocations", async () => {
    const transport = await startServer();
    provider = new McpToolProvider([{ serverName: "math", createTransport: () => transport }]);
    await provider.listTools();

    await expect(provider.invoke("refuse", {})).resolves.toEqual({
      ok: false,
      kind: "invocation_failed",
      message: "quota exhausted",
    });

    const thrown = await provider.invoke("explode", {});
    expect(thrown).toMatchObject({ ok: false, kind: "invocation_failed" });
    expect(thrown.ok ? "" : thrown.message).toContain("boom");
  });

  it("returns not_found for a tool no server exposes", async () => {
    const transport = await startServer(["add"]);
    provider = new McpToolProvider([{ serverName: "math", createTransport: () => transport }]);

    await expect(provider.invoke("missing", {})).resolves.toEqual({
      ok: false,
      kind: "not_found",
      message: "Tool 'missing' not found on any MCP server",
    });
  });

  it("keeps the first server's tool when names collide", async () => {
    const first = await startServer(["add"]);
    const second = await startServer(["add", "refuse"]);
    provider = new McpToolProvider([
      { serverName: "primary", createTransport: () => first },
      { serverName: "secondary", createTransport: () => second },
    ]);

    const tools = await provider.listTools();

    expect(tools.map((tool) => `${tool.group}/${tool.name}`)).toEqual(["primary/add", "secondary/refuse"]);
  });

  it("fails listing with a transient error when a server is unreachable", async () => {
    provider = new McpToolProvider([
      {
        serverName: "offline",
        createTransport: () => {
          throw new Error("connection refused");
        },
      },
    ]);

    const error = await provider.listTools().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientToolError);
    expect(error).toHaveProperty(
      "message",
      "Failed to list tools of MCP server 'offline': connection refused",
    );
  });

  it("rejects a server with neither url nor transport", async () => {
    provider = new McpToolProvider([{ serverName: "blank" }]);

    await expect(provider.listTools()).rejects.toBeInstanceOf(ConfigurationError);
  });
});
