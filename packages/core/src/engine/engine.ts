import { randomUUID } from "node:crypto";
import {
  AbortError,
  DEFAULT_OWNER,
  InvalidStateError,
  NotFoundError,
  ValidationError,
  isTerminalStatus,
  type Agent,
  type AgentRun,
  type ChatModel,
  type RunEvent,
  type RunStatus,
  type RunSummary,
} from "agentry-shared";
import { ChannelHub, Context, Logger, sanitizeForLog, type ChannelHandler } from "agentry-kernel";
import { parseAgentDefinition, toAgent, type AgentDefinition } from "../agents";
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from "../config";
import type { RunStore } from "../store";
import { LocalToolProvider, type ToolProvider } from "../tools";
import { KeyedLock } from "./keyed-lock";
import { ExecutionQueue } from "./queue";
import { ActiveRunRegistry } from "./registry";
import { RunSession, type SessionDeps } from "./session";
import { RunSignals } from "./signals";
import { RESULT_CANCELLED, TurnLoop, type LoopOutcome } from "./turn-loop";
import { WorkerPool } from "./worker-pool";

export interface AgentEngineOptions {
  store: RunStore;
  model: ChatModel;
  /** Default: a provider with no tools */
  tools?: ToolProvider;
  config?: EngineConfigInput;
  /** Clock for run timestamps */
  now?: () => Date;
  generateId?: () => string;
}

export interface OwnerOptions {
  owner?: string;
}

export interface WaitOptions {
  /** Reject with an AbortError after this long (default: wait forever) */
  timeoutMs?: number;
}

/**
 * Runs agents in the background and controls their lifecycle.
 *
 * One engine owns its queue, worker pool, active-run registry and run event
 * channel. Every change to a run goes through that run's lock, so a worker and
 * concurrent pause, resume or cancel calls never overwrite each other.
 *
 * @example
 * ```typescript
 * const engine = new AgentEngine({ store: new InMemoryRunStore(), model });
 * engine.start();
 *
 * const agent = await engine.createAgent({
 *   name: 'Researcher',
 *   prompt: 'Research {{topic}}.',
 *   config: { model: 'gpt-4o-mini', goalCompletionPrompt: 'A summary was written' },
 *   inputVariables: [{ name: 'topic', required: true }],
 * });
 * const runId = await engine.enqueue(agent.id, { topic: 'heat pumps' });
 * const run = await engine.waitForRun(runId);
 * ```
 */
export class AgentEngine {
  readonly config: EngineConfig;

  private readonly log = Logger.for(this);
  private readonly store: RunStore;
  private readonly events = new ChannelHub<RunEvent>("runs");
  private readonly lock = new KeyedLock();
  private readonly registry = new ActiveRunRegistry();
  private readonly signals = new Map<string, RunSignals>();
  private readonly queue: ExecutionQueue;
  private readonly pool: WorkerPool;
  private readonly loop: TurnLoop;
  private readonly sessionDeps: SessionDeps;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: AgentEngineOptions) {
    this.config = resolveEngineConfig(options.config);
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.queue = new ExecutionQueue(this.config.queueCapacity);
    this.loop = new TurnLoop({
      model: options.model,
      tools: options.tools ?? new LocalToolProvider(),
      config: this.config,
      now: this.now,
    });
    this.pool = new WorkerPool(this.queue, (runId, workerId) => this.process(runId, workerId), {
      concurrency: this.config.concurrency,
      prefix: this.config.workerPrefix,
    });
    this.sessionDeps = {
      store: this.store,
      events: this.events,
      lock: this.lock,
      registry: this.registry,
      now: this.now,
    };
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  start(): void {
    if (this.queue.isClosed) {
      throw new InvalidStateError("stopped", "Engine has been stopped and cannot be restarted");
    }
    this.pool.start();
  }

  /**
   * Stop taking work, ask every active run to pause at its next boundary and
   * wait for the workers to exit. Runs still queued stay pending; resumed
   * runs no worker took go back to paused.
   */
  async stop(): Promise<void> {
    const queued = this.queue.close();
    for (const summary of this.registry.list()) {
      this.registry.get(summary.runId)?.signals.requestPause();
    }
    await this.pool.join();
    for (const runId of queued) {
      await this.session(runId).transact(async (tx) => {
        if (tx.run.status === "running" && !this.registry.has(runId)) {
          await tx.transition("paused");
          await tx.log("info", "Run paused on shutdown before a worker resumed it");
        }
      });
    }
    this.events.destroy();
  }

  // ===========================================================================
  // Agents
  // ===========================================================================

  async createAgent(definition: AgentDefinition, options: OwnerOptions = {}): Promise<Agent> {
    const parsed = parseAgentDefinition(definition);
    const at = this.timestamp();
    return this.store.createAgent(
      toAgent(parsed, {
        id: this.generateId(),
        owner: options.owner ?? DEFAULT_OWNER,
        createdAt: at,
        updatedAt: at,
      }),
    );
  }

  /**
   * @throws NotFoundError
   */
  async getAgent(agentId: string, options: OwnerOptions = {}): Promise<Agent> {
    const agent = await this.store.getAgent(agentId, options.owner);
    if (!agent) {
      throw new NotFoundError("agent", agentId);
    }
    return agent;
  }

  listAgents(options: OwnerOptions = {}): Promise<Agent[]> {
    return this.store.listAgents(options.owner);
  }

  async updateAgent(agentId: string, definition: AgentDefinition, options: OwnerOptions = {}): Promise<Agent> {
    const existing = await this.getAgent(agentId, options);
    const parsed = parseAgentDefinition(definition);
    return this.store.updateAgent(
      toAgent(parsed, {
        id: existing.id,
        owner: existing.owner,
        createdAt: existing.createdAt,
        updatedAt: this.timestamp(),
      }),
    );
  }

  async deleteAgent(agentId: string, options: OwnerOptions = {}): Promise<void> {
    const deleted = await this.store.deleteAgent(agentId, options.owner);
    if (!deleted) {
      throw new NotFoundError("agent", agentId);
    }
  }

  // ===========================================================================
  // Runs
  // ===========================================================================

  /**
   * Create a pending run and queue it.
   *
   * @throws NotFoundError when the agent does not exist
   * @throws ValidationError when a required input is missing or blank
   * @throws QueueFullError when the queue has no free slot; no run is created
   */
  async enqueue(
    agentId: string,
    inputValues: Record<string, unknown> = {},
    options: OwnerOptions = {},
  ): Promise<string> {
    const agent = await this.getAgent(agentId, options);
    const inputs = this.validateInputs(agent, inputValues);

    const reservation = this.queue.reserve();
    try {
      const at = this.timestamp();
      const run: AgentRun = {
        id: this.generateId(),
        agentId: agent.id,
        owner: agent.owner,
        entityType: "agent-run",
        inputValues: inputs,
        status: "pending",
        result: null,
        error: null,
        logs: [],
        conversationHistory: [],
        turnCount: 0,
        maxTurns: agent.config.maxTurns,
        goal: agent.config.goalCompletionPrompt?.trim() || null,
        goalAchieved: false,
        createdAt: at,
        startedAt: null,
        pausedAt: null,
        completedAt: null,
        lastUpdated: at,
      };
      await this.store.createRun(run);
      this.signals.set(run.id, new RunSignals(run.id, agent.id));
      reservation.commit(run.id);
      this.log.info({ runId: run.id, agentId: agent.id }, "Run queued");
      return run.id;
    } catch (error) {
      reservation.release();
      throw error;
    }
  }

  /**
   * Ask a run to pause at its next turn boundary. Idempotent.
   *
   * @throws NotFoundError when the run does not exist
   * @throws InvalidStateError when the run is already terminal
   */
  async pause(runId: string): Promise<AgentRun> {
    const session = this.session(runId);
    await session.transact((tx) => {
      const { status } = tx.run;
      if (isTerminalStatus(status)) {
        throw InvalidStateError.terminal(runId, status, "pause");
      }
      if (status === "pending" || status === "running") {
        this.signalsOf(tx.run).requestPause();
        this.log.info({ runId: sanitizeForLog(runId) }, "Pause requested");
      }
    });
    return session.run;
  }

  /**
   * Continue a paused run from where it stopped, or withdraw a pause request
   * not yet acted on. Idempotent.
   *
   * @throws QueueFullError when the queue has no room; the run stays paused
   */
  async resume(runId: string): Promise<AgentRun> {
    const session = this.session(runId);
    await session.transact(async (tx) => {
      const { status } = tx.run;
      if (isTerminalStatus(status)) {
        throw InvalidStateError.terminal(runId, status, "resume");
      }
      if (status !== "paused") {
        this.signals.get(runId)?.clearPause();
        return;
      }

      const reservation = this.queue.reserve();
      try {
        await tx.transition("running");
        await tx.log("info", "Run resumed");
      } catch (error) {
        reservation.release();
        throw error;
      }
      this.signals.set(runId, new RunSignals(runId, tx.run.agentId));
      reservation.commit(runId);
    });
    return session.run;
  }

  /**
   * Cancel a run. A queued or paused run is cancelled at once; a run held by
   * a worker moves to cancelling and stops at its next boundary. Idempotent.
   */
  async cancel(runId: string): Promise<AgentRun> {
    const session = this.session(runId);
    await session.transact(async (tx) => {
      const { status } = tx.run;
      if (isTerminalStatus(status)) {
        throw InvalidStateError.terminal(runId, status, "cancel");
      }
      if (status === "cancelling") {
        return;
      }

      const signals = this.signalsOf(tx.run);
      signals.requestCancel();

      if (this.registry.has(runId)) {
        // Pending runs held by a worker are cancelled when it starts them.
        if (status === "running") {
          await tx.transition("cancelling");
          await tx.log("info", "Cancellation requested");
        }
        return;
      }

      this.queue.remove(runId);
      await tx.transition("cancelling");
      await tx.log("info", status === "paused" ? "Run cancelled while paused" : "Run cancelled before execution");
      await tx.transition("cancelled", { result: RESULT_CANCELLED });
      this.forgetSignals(runId, signals);
    });
    return session.run;
  }

  /**
   * @throws NotFoundError
   */
  async getRun(runId: string, agentId?: string): Promise<AgentRun> {
    const run = await this.store.getRun(runId, agentId);
    if (!run) {
      throw new NotFoundError("run", runId);
    }
    return run;
  }

  async listRuns(agentId: string, options: OwnerOptions = {}): Promise<AgentRun[]> {
    await this.getAgent(agentId, options);
    return this.store.listRunsByAgent(agentId, options.owner);
  }

  listActive(): RunSummary[] {
    return this.registry.list();
  }

  get queuedCount(): number {
    return this.queue.size;
  }

  subscribe(runId: string, handler: ChannelHandler<RunEvent>): () => void {
    return this.events.subscribe(runId, handler);
  }

  subscribeAll(handler: ChannelHandler<RunEvent>): () => void {
    return this.events.subscribeAll(handler);
  }

  /**
   * Resolve with the run once it is paused or terminal.
   */
  async waitForRun(runId: string, options: WaitOptions = {}): Promise<AgentRun> {
    // Reads queue behind the run's lock so the section that published the
    // status change has finished.
    const read = () => this.lock.withLock(runId, () => this.getRun(runId));

    return new Promise<AgentRun>((resolve, reject) => {
      let done = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (action: () => void): void => {
        if (done) return;
        done = true;
        unsubscribe();
        if (timer) clearTimeout(timer);
        action();
      };

      const unsubscribe = this.events.subscribe(runId, (event) => {
        if (event.type === "status" && isStopped(event.status)) {
          finish(() => {
            read().then(resolve, reject);
          });
        }
      });

      const { timeoutMs } = options;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          finish(() =>
            reject(new AbortError(`Run '${runId}' did not stop within ${timeoutMs}ms`, "ABORT_TIMEOUT", { runId, timeoutMs })),
          );
        }, timeoutMs);
      }

      read().then(
        (run) => {
          if (isStopped(run.status)) {
            finish(() => resolve(run));
          }
        },
        (error: unknown) => finish(() => reject(error)),
      );
    });
  }

  /**
   * Queue a run and wait for it to stop.
   */
  async execute(
    agentId: string,
    inputValues: Record<string, unknown> = {},
    options: OwnerOptions & WaitOptions = {},
  ): Promise<AgentRun> {
    const runId = await this.enqueue(agentId, inputValues, options);
    return this.waitForRun(runId, options);
  }

  // ===========================================================================
  // Worker side
  // ===========================================================================

  private async process(runId: string, workerId: string): Promise<void> {
    const signals = this.signals.get(runId);
    if (!signals) {
      this.log.warn({ runId }, "Dequeued run has no control state, skipping");
      return;
    }
    const claimed = this.registry.tryClaim({
      runId,
      agentId: signals.agentId,
      workerId,
      status: "pending",
      turnCount: 0,
      maxTurns: 0,
      claimedAt: this.timestamp(),
      signals,
    });
    if (!claimed) {
      this.log.warn({ runId }, "Run is already held by another worker");
      return;
    }

    const session = this.session(runId);
    try {
      await Context.fork({ runId, agentId: signals.agentId }, async () => {
        const started = await this.begin(session, signals, workerId);
        if (!started) {
          return;
        }
        const outcome = await this.drive(session, signals);
        await this.settle(session, signals, workerId, outcome);
      });
    } finally {
      if (this.registry.get(runId)?.workerId === workerId) {
        this.registry.release(runId, workerId);
      }
    }
  }

  /**
   * Move a claimed run to running, or cancel it if that was requested while
   * it waited.
   * @returns false when there is nothing to run
   */
  private begin(session: RunSession, signals: RunSignals, workerId: string): Promise<boolean> {
    return session.transact(async (tx) => {
      const { status } = tx.run;
      this.registry.update(tx.run.id, { turnCount: tx.run.turnCount, maxTurns: tx.run.maxTurns });

      if (status === "pending" && signals.cancelRequested) {
        await tx.transition("cancelling");
        await tx.log("info", "Run cancelled before execution");
        await tx.transition("cancelled", { result: RESULT_CANCELLED });
        this.releaseClaim(tx.run.id, workerId, signals);
        return false;
      }
      if (status === "pending") {
        await tx.transition("running");
        await tx.log("info", `Run started by ${workerId}`);
        return true;
      }
      if (status === "running") {
        return true;
      }
      this.log.debug({ status }, "Dequeued run is not runnable, skipping");
      this.releaseClaim(tx.run.id, workerId, signals);
      return false;
    });
  }

  private async drive(session: RunSession, signals: RunSignals): Promise<LoopOutcome> {
    const agent = await this.store.getAgent(session.run.agentId, session.run.owner);
    if (!agent) {
      const error = `Agent '${session.run.agentId}' not found`;
      await session.log("error", `Run failed: ${error}`);
      return { status: "failed", error };
    }
    return this.loop.drive(session, agent, signals);
  }

  /**
   * Persist the outcome and release the claim in one locked section.
   */
  private async settle(
    session: RunSession,
    signals: RunSignals,
    workerId: string,
    outcome: LoopOutcome,
  ): Promise<void> {
    await session.transact(async (tx) => {
      // A cancel that raced the end of the loop takes precedence.
      const effective: LoopOutcome = tx.run.status === "cancelling" ? { status: "cancelled" } : outcome;
      switch (effective.status) {
        case "completed":
          await tx.transition("completed", {
            result: effective.result,
            goalAchieved: effective.goalAchieved,
          });
          break;
        case "failed":
          await tx.transition("failed", { error: effective.error });
          break;
        case "paused":
          await tx.transition("paused");
          await tx.log("info", `Run paused after turn ${tx.run.turnCount}`);
          break;
        case "cancelled":
          if (tx.run.status === "running") {
            await tx.transition("cancelling");
          }
          await tx.log("info", "Run cancelled");
          await tx.transition("cancelled", { result: RESULT_CANCELLED });
          break;
      }
      this.releaseClaim(tx.run.id, workerId, signals);
      this.log.info({ status: tx.run.status }, "Run stopped");
    });
  }

  private releaseClaim(runId: string, workerId: string, signals: RunSignals): void {
    this.registry.release(runId, workerId);
    this.forgetSignals(runId, signals);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private session(runId: string): RunSession {
    return new RunSession(this.sessionDeps, runId);
  }

  private signalsOf(run: AgentRun): RunSignals {
    let signals = this.signals.get(run.id);
    if (!signals) {
      signals = new RunSignals(run.id, run.agentId);
      this.signals.set(run.id, signals);
    }
    return signals;
  }

  private forgetSignals(runId: string, signals: RunSignals): void {
    if (this.signals.get(runId) === signals) {
      this.signals.delete(runId);
    }
  }

  private validateInputs(agent: Agent, inputValues: Record<string, unknown>): Record<string, string> {
    const inputs: Record<string, string> = {};
    for (const [name, value] of Object.entries(inputValues)) {
      if (typeof value !== "string") {
        throw ValidationError.type(`inputValues.${name}`, "a string", typeof value);
      }
      inputs[name] = value;
    }
    for (const variable of agent.inputVariables) {
      if (variable.required && !inputs[variable.name]?.trim()) {
        throw ValidationError.required(`inputValues.${variable.name}`, `Input '${variable.name}' is required`);
      }
    }
    return inputs;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function isStopped(status: RunStatus): boolean {
  return status === "paused" || isTerminalStatus(status);
}
