import type { RunStatus, RunSummary } from "agentry-shared";
import type { RunSignals } from "./signals";

export interface ActiveRunEntry {
  runId: string;
  agentId: string;
  workerId: string;
  status: RunStatus;
  turnCount: number;
  maxTurns: number;
  claimedAt: string;
  signals: RunSignals;
}

export type ActiveRunPatch = Partial<Pick<ActiveRunEntry, "status" | "turnCount" | "maxTurns">>;

/**
 * Runs currently held by a worker. At most one worker holds a run at a time.
 */
export class ActiveRunRegistry {
  private readonly entries = new Map<string, ActiveRunEntry>();

  /**
   * Claim a run for a worker.
   * @returns false when another worker already holds it
   */
  tryClaim(entry: ActiveRunEntry): boolean {
    if (this.entries.has(entry.runId)) {
      return false;
    }
    this.entries.set(entry.runId, { ...entry });
    return true;
  }

  get(runId: string): ActiveRunEntry | undefined {
    return this.entries.get(runId);
  }

  has(runId: string): boolean {
    return this.entries.has(runId);
  }

  update(runId: string, patch: ActiveRunPatch): void {
    const entry = this.entries.get(runId);
    if (entry) {
      Object.assign(entry, patch);
    }
  }

  /**
   * Release a claim. Only the holding worker can release it.
   */
  release(runId: string, workerId: string): boolean {
    const entry = this.entries.get(runId);
    if (!entry || entry.workerId !== workerId) {
      return false;
    }
    this.entries.delete(runId);
    return true;
  }

  /**
   * Point-in-time copy of every held run.
   */
  list(): RunSummary[] {
    return Array.from(this.entries.values(), (entry) => ({
      runId: entry.runId,
      agentId: entry.agentId,
      status: entry.status,
      turnCount: entry.turnCount,
      maxTurns: entry.maxTurns,
      workerId: entry.workerId,
      claimedAt: entry.claimedAt,
      pauseRequested: entry.signals.pauseRequested,
      cancelRequested: entry.signals.cancelRequested,
    }));
  }

  get size(): number {
    return this.entries.size;
  }
}
