import { ConfigurationError } from "agentry-shared";
import { OpenAIChatModel } from "agentry-openai";
import { ScriptedChatModel } from "agentry-shared/testing";
import { loadConfig } from "./config";
import { createModel } from "./setup";
import { calculate } from "./tools";

describe("loadConfig", () => {
  it("fills defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      LOG_LEVEL: "info",
      AGENT_CONCURRENCY: 4,
      AGENT_QUEUE_CAPACITY: 100,
      SYNC_RUN_TIMEOUT_MS: 120_000,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ PORT: "8080", AGENT_CONCURRENCY: "2", AGENT_RUN_TIMEOUT_MS: "60000" });

    expect(config.PORT).toBe(8080);
    expect(config.AGENT_CONCURRENCY).toBe(2);
    expect(config.AGENT_RUN_TIMEOUT_MS).toBe(60_000);
  });

  it("parses the MCP server map", () => {
    const config = loadConfig({ MCP_SERVERS: '{"ledger":"http://localhost:7001/mcp"}' });

    expect(config.MCP_SERVERS).toEqual({ ledger: "http://localhost:7001/mcp" });
  });

  it("rejects an MCP server map that is not JSON", () => {
    expect(() => loadConfig({ MCP_SERVERS: "ledger=http://localhost" })).toThrow(
      "Invalid server environment: MCP_SERVERS: must be a JSON object of server name to URL",
    );
  });

  it("lists every invalid variable", () => {
    try {
      loadConfig({ PORT: "0", LOG_LEVEL: "loud" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: "CONFIG_INVALID" });
      expect(error).toHaveProperty("details.issues", expect.arrayContaining([expect.stringMatching(/^PORT: /)]));
      expect(error).toHaveProperty(
        "details.issues",
        expect.arrayContaining([expect.stringMatching(/^LOG_LEVEL: /)]),
      );
    }
  });
});

describe("createModel", () => {
  it("uses a canned model without an API key", () => {
    expect(createModel(loadConfig({}))).toBeInstanceOf(ScriptedChatModel);
  });

  it("uses OpenAI with an API key", () => {
    expect(createModel(loadConfig({ OPENAI_API_KEY: "test-key" }))).toBeInstanceOf(OpenAIChatModel);
  });
});

describe("calculate", () => {
  it("applies the operation", () => {
    expect(calculate({ operation: "multiply", a: 6, b: 7 })).toBe(42);
    expect(calculate({ operation: "subtract", a: 1, b: 3 })).toBe(-2);
  });

  it("refuses to divide by zero", () => {
    expect(() => calculate({ operation: "divide", a: 1, b: 0 })).toThrow("Cannot divide by zero");
  });
});
