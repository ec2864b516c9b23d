/**
 * Tests for the agentry control API router
 */

import { AgentEngine, InMemoryRunStore, type AgentDefinition, type EngineConfigInput } from "agentry";
import type { Agent } from "agentry-shared";
import { ScriptedChatModel } from "agentry-shared/testing";
import type { Router } from "express";
import { createAgentryRouter } from "../middleware/create-middleware";
import { SSETransport } from "../transports/sse";
import { dispatch, sseFrames, type MockRequestInit } from "./mock-http";

const definition: AgentDefinition = {
  name: "Support Agent",
  prompt: "Help {{customer}}.",
  config: { model: "test-model", enableMultiTurn: false },
  inputVariables: [{ name: "customer", required: true }],
};

describe("createAgentryRouter", () => {
  let engine: AgentEngine;
  let transport: SSETransport;
  let router: Router;

  function setup(config: EngineConfigInput = {}): void {
    engine = new AgentEngine({
      store: new InMemoryRunStore(),
      model: new ScriptedChatModel(),
      config: { concurrency: 1, retry: { baseDelayMs: 0, maxDelayMs: 0 }, ...config },
    });
    transport = new SSETransport({ heartbeatInterval: 60_000 });
    router = createAgentryRouter({ engine, transport });
  }

  function request(init: MockRequestInit) {
    return dispatch(router, init);
  }

  async function createAgent(headers: Record<string, string> = {}): Promise<Agent> {
    return engine.createAgent(definition, { owner: headers["x-agentry-owner"] });
  }

  beforeEach(() => {
    setup();
  });

  afterEach(async () => {
    transport.disconnect();
    await engine.stop();
  });

  it("reports health", async () => {
    const res = await request({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ status: "Healthy" });
  });

  describe("agents", () => {
    it("creates an agent", async () => {
      const res = await request({ method: "POST", url: "/agents", body: definition });

      expect(res.statusCode).toBe(201);
      expect(res.body).toMatchObject({ name: "Support Agent", owner: "default", entityType: "agent" });
      const agents = await engine.listAgents();
      expect(res.headers.Location).toBe(`/agents/${agents[0]?.id}`);
    });

    it("rejects an invalid definition", async () => {
      const res = await request({ method: "POST", url: "/agents", body: { prompt: "x", config: { model: "m" } } });

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ error: { code: "VALIDATION_CONSTRAINT", details: { field: "name" } } });
    });

    it("rejects a prompt referencing an undeclared variable", async () => {
      const res = await request({
        method: "POST",
        url: "/agents",
        body: { name: "A", prompt: "Hi {{who}}", config: { model: "m" } },
      });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: "VALIDATION_FORMAT",
          message: "Prompt template references undeclared variables: who",
          details: { field: "prompt" },
        },
      });
    });

    it("returns 404 for an unknown agent", async () => {
      const res = await request({ method: "GET", url: "/agents/nope" });

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ error: { code: "NOT_FOUND_AGENT", message: "Agent 'nope' not found" } });
    });

    it("scopes agents to the owner header", async () => {
      const agent = await createAgent({ "x-agentry-owner": "team-a" });

      const other = await request({ method: "GET", url: `/agents/${agent.id}` });
      const mine = await request({
        method: "GET",
        url: `/agents/${agent.id}`,
        headers: { "X-Agentry-Owner": "team-a" },
      });

      expect(other.statusCode).toBe(404);
      expect(mine.statusCode).toBe(200);
    });

    it("updates and deletes an agent", async () => {
      const agent = await createAgent();

      const updated = await request({
        method: "PUT",
        url: `/agents/${agent.id}`,
        body: { ...definition, description: "v2" },
      });
      const deleted = await request({ method: "DELETE", url: `/agents/${agent.id}` });
      const listed = await request({ method: "GET", url: "/agents" });

      expect(updated.body).toMatchObject({ id: agent.id, description: "v2" });
      expect(deleted.statusCode).toBe(204);
      expect(listed.body).toEqual([]);
    });
  });

  describe("runs", () => {
    it("queues a run", async () => {
      const agent = await createAgent();

      const res = await request({
        method: "POST",
        url: `/agents/${agent.id}/run-async`,
        body: { customer: "Ada" },
      });

      expect(res.statusCode).toBe(202);
      const [run] = await engine.listRuns(agent.id);
      expect(res.body).toEqual({ runId: run?.id, agentId: agent.id, status: "queued" });
      expect(res.headers.Location).toBe(`/runs/${agent.id}/${run?.id}`);
      expect(run?.inputValues).toEqual({ customer: "Ada" });
    });

    it("rejects a missing required input", async () => {
      const agent = await createAgent();

      const res = await request({ method: "POST", url: `/agents/${agent.id}/run-async`, body: {} });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: "VALIDATION_REQUIRED",
          message: "Input 'customer' is required",
          details: { field: "inputValues.customer" },
        },
      });
    });

    it("rejects a body that is not an object", async () => {
      const agent = await createAgent();

      const res = await request({ method: "POST", url: `/agents/${agent.id}/run-async`, body: ["Ada"] });

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ error: { code: "VALIDATION_FORMAT" } });
    });

    it("answers 503 when the queue is full", async () => {
      setup({ queueCapacity: 1 });
      const agent = await createAgent();
      await request({ method: "POST", url: `/agents/${agent.id}/run-async`, body: { customer: "Ada" } });

      const res = await request({ method: "POST", url: `/agents/${agent.id}/run-async`, body: { customer: "Bo" } });

      expect(res.statusCode).toBe(503);
      expect(res.body).toEqual({ error: { code: "QUEUE_FULL", message: "Execution queue is full (capacity 1)" } });
    });

    it("runs an agent synchronously", async () => {
      engine.start();
      const agent = await createAgent();

      const res = await request({ method: "POST", url: `/agents/${agent.id}/run`, body: { customer: "Ada" } });

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({ agentId: agent.id, status: "completed", result: "Completed", turnCount: 1 });
    });

    it("reads a run only under its own agent", async () => {
      const agent = await createAgent();
      const runId = await engine.enqueue(agent.id, { customer: "Ada" });

      const found = await request({ method: "GET", url: `/runs/${agent.id}/${runId}` });
      const wrongAgent = await request({ method: "GET", url: `/runs/other-agent/${runId}` });

      expect(found.body).toMatchObject({ id: runId, status: "pending" });
      expect(wrongAgent.statusCode).toBe(404);
      expect(wrongAgent.body).toMatchObject({ error: { code: "NOT_FOUND_RUN" } });
    });

    it("lists runs of an agent", async () => {
      const agent = await createAgent();
      const runId = await engine.enqueue(agent.id, { customer: "Ada" });

      const res = await request({ method: "GET", url: `/agents/${agent.id}/runs` });

      expect(res.body).toEqual([expect.objectContaining({ id: runId })]);
    });

    it("lists active runs", async () => {
      const res = await request({ method: "GET", url: "/runs/active" });

      expect(res.body).toEqual({ activeRuns: [], count: 0 });
    });
  });

  describe("control", () => {
    it("pauses, resumes and cancels a queued run", async () => {
      const agent = await createAgent();
      const runId = await engine.enqueue(agent.id, { customer: "Ada" });
      const base = `/runs/${agent.id}/${runId}`;

      const paused = await request({ method: "POST", url: `${base}/pause` });
      const resumed = await request({ method: "POST", url: `${base}/resume` });
      const cancelled = await request({ method: "POST", url: `${base}/cancel` });

      expect(paused.body).toEqual({ message: "Pause requested", runId, status: "pending" });
      expect(resumed.body).toEqual({ message: "Resume requested", runId, status: "pending" });
      expect(cancelled.body).toEqual({ message: "Cancellation requested", runId, status: "cancelled" });
    });

    it("answers 409 for a terminal run", async () => {
      const agent = await createAgent();
      const runId = await engine.enqueue(agent.id, { customer: "Ada" });
      await engine.cancel(runId);

      const res = await request({ method: "POST", url: `/runs/${agent.id}/${runId}/pause` });

      expect(res.statusCode).toBe(409);
      expect(res.body).toEqual({
        error: { code: "STATE_TERMINAL", message: `Cannot pause run '${runId}': run is already cancelled` },
      });
    });
  });

  describe("events", () => {
    it("streams run events until the run stops", async () => {
      const agent = await createAgent();
      const runId = await engine.enqueue(agent.id, { customer: "Ada" });

      const res = await request({ method: "GET", url: `/runs/${agent.id}/${runId}/events` });
      expect(res.headers["Content-Type"]).toBe("text/event-stream");
      expect(transport.size).toBe(1);

      await engine.cancel(runId);

      const frames = sseFrames(res);
      expect(frames.map((frame) => frame.event)).toEqual(["connected", "status", "status"]);
      expect(frames[0]?.data).toMatchObject({ run: { id: runId, status: "pending" } });
      expect(frames[2]?.data).toMatchObject({ type: "status", previous: "cancelling", status: "cancelled" });
      expect(res.writableEnded).toBe(true);
      expect(transport.size).toBe(0);
    });

    it("returns 404 before streaming an unknown run", async () => {
      const agent = await createAgent();

      const res = await request({ method: "GET", url: `/runs/${agent.id}/missing/events` });

      expect(res.statusCode).toBe(404);
      expect(res.written).toEqual([]);
    });
  });
});
