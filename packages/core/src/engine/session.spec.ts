import { InvalidStateError, NotFoundError, type RunEvent } from "agentry-shared";
import { ChannelHub } from "agentry-kernel";
import { createAgent, createRun, resetTestIds } from "agentry-shared/testing";
import { InMemoryRunStore } from "../store";
import { KeyedLock } from "./keyed-lock";
import { ActiveRunRegistry } from "./registry";
import { RunSession, applyTransition, type SessionDeps } from "./session";
import { RunSignals } from "./signals";

const NOW = new Date("2024-03-01T12:00:00.000Z");

describe("applyTransition", () => {
  const run = createRun(createAgent(), { status: "pending" });

  it("stamps startedAt on the first start only", () => {
    const started = applyTransition(run, "running", "2024-03-01T00:00:00.000Z");
    expect(started.startedAt).toBe("2024-03-01T00:00:00.000Z");

    const paused = applyTransition(started, "paused", "2024-03-02T00:00:00.000Z");
    const resumed = applyTransition(paused, "running", "2024-03-03T00:00:00.000Z");
    expect(resumed).toMatchObject({ startedAt: "2024-03-01T00:00:00.000Z", pausedAt: null });
  });

  it("stamps completedAt and outcome fields on terminal statuses", () => {
    const running = applyTransition(run, "running", "2024-03-01T00:00:00.000Z");
    const done = applyTransition(running, "completed", "2024-03-01T00:05:00.000Z", { result: "Completed" });
    expect(done).toMatchObject({ status: "completed", completedAt: "2024-03-01T00:05:00.000Z", result: "Completed" });
  });

  it("rejects edges outside the lifecycle", () => {
    expect(() => applyTransition(run, "completed", "t")).toThrow(InvalidStateError);
    expect(() => applyTransition(run, "completed", "t")).toThrow(/cannot move from pending to completed/);
  });
});

describe("RunSession", () => {
  let deps: SessionDeps;
  let store: InMemoryRunStore;
  let events: ChannelHub<RunEvent>;

  beforeEach(() => {
    resetTestIds();
    store = new InMemoryRunStore();
    events = new ChannelHub<RunEvent>("runs");
    deps = { store, events, lock: new KeyedLock(), registry: new ActiveRunRegistry(), now: () => NOW };
  });

  async function seed() {
    const agent = createAgent();
    const run = await store.createRun(createRun(agent, { status: "running" }));
    return { agent, run, session: new RunSession(deps, run.id) };
  }

  it("numbers turns consecutively and publishes them", async () => {
    const { run, session } = await seed();
    const seen: RunEvent[] = [];
    events.subscribe(run.id, (event) => seen.push(event));

    const first = await session.appendTurn({ role: "assistant", content: "one" });
    const second = await session.appendTurn({ role: "user", content: "two" });

    expect([first.turnNumber, second.turnNumber]).toEqual([1, 2]);
    expect(first.timestamp).toBe(NOW.toISOString());
    expect(seen.map((event) => event.type)).toEqual(["turn", "turn"]);
    expect((await store.getRun(run.id))?.conversationHistory).toHaveLength(2);
  });

  it("records run logs", async () => {
    const { run, session } = await seed();

    await session.log("warn", "Model call failed", { attempt: 1 });

    expect((await store.getRun(run.id))?.logs).toEqual([
      { timestamp: NOW.toISOString(), level: "warn", message: "Model call failed", data: { attempt: 1 } },
    ]);
  });

  it("publishes status changes with the previous status", async () => {
    const { agent, run, session } = await seed();
    const seen: RunEvent[] = [];
    events.subscribeAll((event) => seen.push(event));

    await session.transact((tx) => tx.transition("paused"));

    expect(seen).toEqual([{ type: "status", runId: run.id, agentId: agent.id, status: "paused", previous: "running" }]);
    expect(session.run.pausedAt).toBe(NOW.toISOString());
  });

  it("reloads the stored run in every section", async () => {
    const { run, session } = await seed();
    const other = new RunSession(deps, run.id);

    await other.appendTurn({ role: "assistant", content: "from another writer" });
    await session.appendTurn({ role: "user", content: "next" });

    expect(session.run.conversationHistory.map((turn) => turn.turnNumber)).toEqual([1, 2]);
  });

  it("keeps the registry entry in step", async () => {
    const { agent, run, session } = await seed();
    deps.registry.tryClaim({
      runId: run.id,
      agentId: agent.id,
      workerId: "worker-1",
      status: "running",
      turnCount: 0,
      maxTurns: 10,
      claimedAt: NOW.toISOString(),
      signals: new RunSignals(run.id, agent.id),
    });

    await session.update({ turnCount: 3 });

    expect(deps.registry.get(run.id)?.turnCount).toBe(3);
  });

  it("refuses writes after a terminal transition in the same section", async () => {
    const { run, session } = await seed();
    const updateRun = vi.spyOn(store, "updateRun");

    const section = session.transact(async (tx) => {
      await tx.transition("cancelling");
      await tx.transition("cancelled");
      await tx.log("info", "too late");
    });

    await expect(section).rejects.toMatchObject({ name: "InvalidStateError", code: "STATE_TERMINAL" });
    expect(updateRun).toHaveBeenCalledTimes(2);
    expect((await store.getRun(run.id))?.logs).toEqual([]);
  });

  it("keeps a log written just before the terminal transition", async () => {
    const { run, session } = await seed();

    await session.transact(async (tx) => {
      await tx.transition("cancelling");
      await tx.log("info", "Run cancelled");
      await tx.transition("cancelled");
    });

    const stored = await store.getRun(run.id);
    expect(stored?.status).toBe("cancelled");
    expect(stored?.logs.map((entry) => entry.message)).toEqual(["Run cancelled"]);
  });

  it("fails for an unknown run", async () => {
    const session = new RunSession(deps, "missing");
    await expect(session.load()).rejects.toBeInstanceOf(NotFoundError);
    expect(() => session.run).toThrow(NotFoundError);
  });
});
