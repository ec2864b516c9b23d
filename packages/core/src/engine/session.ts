import {
  InvalidStateError,
  NotFoundError,
  canTransition,
  isTerminalStatus,
  type AgentRun,
  type RunEvent,
  type RunLog,
  type RunLogLevel,
  type RunStatus,
  type Turn,
} from "agentry-shared";
import { Logger, type ChannelHub } from "agentry-kernel";
import type { RunStore } from "../store";
import type { KeyedLock } from "./keyed-lock";
import type { ActiveRunRegistry } from "./registry";

export interface SessionDeps {
  store: RunStore;
  events: ChannelHub<RunEvent>;
  lock: KeyedLock;
  registry: ActiveRunRegistry;
  now?: () => Date;
}

export type TurnInput = Omit<Turn, "turnNumber" | "timestamp">;

export type OutcomeFields = Partial<Pick<AgentRun, "result" | "error" | "goalAchieved">>;

/**
 * Apply a status change and its timestamps to a copy of the run.
 *
 * @throws InvalidStateError when the edge is not allowed
 */
export function applyTransition(
  run: AgentRun,
  to: RunStatus,
  at: string,
  fields: OutcomeFields = {},
): AgentRun {
  if (!canTransition(run.status, to)) {
    throw InvalidStateError.transition(run.id, run.status, to);
  }
  const next: AgentRun = { ...run, ...fields, status: to, lastUpdated: at };
  if (to === "running") {
    next.startedAt = run.startedAt ?? at;
    next.pausedAt = null;
  } else if (to === "paused") {
    next.pausedAt = at;
  } else if (isTerminalStatus(to)) {
    next.completedAt = at;
  }
  return next;
}

/**
 * Writes against one run while its lock is held. Every write replaces the
 * stored record and publishes the matching run event.
 */
export class RunTransaction {
  constructor(
    private readonly deps: SessionDeps,
    private current: AgentRun,
  ) {}

  get run(): AgentRun {
    return this.current;
  }

  async transition(to: RunStatus, fields: OutcomeFields = {}): Promise<void> {
    const previous = this.current.status;
    const next = applyTransition(this.current, to, this.timestamp(), fields);
    await this.save(next, [
      { type: "status", runId: next.id, agentId: next.agentId, status: to, previous },
    ]);
  }

  async appendTurn(input: TurnInput): Promise<Turn> {
    const turn: Turn = {
      ...input,
      turnNumber: this.current.conversationHistory.length + 1,
      timestamp: this.timestamp(),
    };
    await this.save(
      { ...this.current, conversationHistory: [...this.current.conversationHistory, turn] },
      [{ type: "turn", runId: this.current.id, agentId: this.current.agentId, turn }],
    );
    return turn;
  }

  async log(level: RunLogLevel, message: string, data?: Record<string, unknown>): Promise<void> {
    const entry: RunLog = { timestamp: this.timestamp(), level, message };
    if (data) entry.data = data;

    Logger.for("AgentRun")[level]({ ...data }, message);

    await this.save({ ...this.current, logs: [...this.current.logs, entry] }, [
      { type: "log", runId: this.current.id, agentId: this.current.agentId, log: entry },
    ]);
  }

  async update(patch: Partial<Pick<AgentRun, "turnCount" | "goalAchieved">>): Promise<void> {
    await this.save({ ...this.current, ...patch }, []);
  }

  /**
   * @throws InvalidStateError once the run is terminal; a terminal
   * transition must be the last write of a section
   */
  private async save(next: AgentRun, events: RunEvent[]): Promise<void> {
    if (isTerminalStatus(this.current.status)) {
      throw InvalidStateError.terminal(this.current.id, this.current.status, "update");
    }
    next.lastUpdated = this.timestamp();
    this.current = await this.deps.store.updateRun(next);
    this.deps.registry.update(this.current.id, {
      status: this.current.status,
      turnCount: this.current.turnCount,
    });
    for (const event of events) {
      this.deps.events.publish(this.current.id, event);
    }
  }

  private timestamp(): string {
    return (this.deps.now?.() ?? new Date()).toISOString();
  }
}

/**
 * Serialized write path for one run.
 *
 * Each `transact` section reloads the run from the store under the run's
 * lock, so the owning worker and control operations never write over each
 * other. `run` is the record as of the last finished section.
 */
export class RunSession {
  private snapshot: AgentRun | null = null;

  constructor(
    private readonly deps: SessionDeps,
    readonly runId: string,
  ) {}

  get run(): AgentRun {
    if (!this.snapshot) {
      throw new NotFoundError("run", this.runId, `Run '${this.runId}' has not been loaded`);
    }
    return this.snapshot;
  }

  /**
   * @throws NotFoundError when the run does not exist
   */
  async transact<T>(fn: (tx: RunTransaction) => Promise<T> | T): Promise<T> {
    return this.deps.lock.withLock(this.runId, async () => {
      const stored = await this.deps.store.getRun(this.runId);
      if (!stored) {
        throw new NotFoundError("run", this.runId);
      }
      const tx = new RunTransaction(this.deps, stored);
      try {
        return await fn(tx);
      } finally {
        this.snapshot = tx.run;
      }
    });
  }

  /**
   * Refresh `run` from the store.
   */
  load(): Promise<AgentRun> {
    return this.transact((tx) => tx.run);
  }

  appendTurn(input: TurnInput): Promise<Turn> {
    return this.transact((tx) => tx.appendTurn(input));
  }

  log(level: RunLogLevel, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.transact((tx) => tx.log(level, message, data));
  }

  update(patch: Partial<Pick<AgentRun, "turnCount" | "goalAchieved">>): Promise<void> {
    return this.transact((tx) => tx.update(patch));
  }
}
