/**
 * In-Memory Run Store
 *
 * Map-based storage for development and testing.
 */

import {
  DEFAULT_OWNER,
  InvalidStateError,
  NotFoundError,
  ValidationError,
  isTerminalStatus,
  type Agent,
  type AgentRun,
} from "agentry-shared";
import type { RunStore } from "./types";

export interface InMemoryData {
  agents: Map<string, Agent>;
  runs: Map<string, AgentRun>;
}

export function createInMemoryData(): InMemoryData {
  return {
    agents: new Map(),
    runs: new Map(),
  };
}

export class InMemoryRunStore implements RunStore {
  constructor(private readonly data: InMemoryData = createInMemoryData()) {}

  async createAgent(agent: Agent): Promise<Agent> {
    if (this.data.agents.has(agent.id)) {
      throw new ValidationError("id", `Agent '${agent.id}' already exists`);
    }
    this.data.agents.set(agent.id, structuredClone(agent));
    return structuredClone(agent);
  }

  async getAgent(id: string, owner?: string): Promise<Agent | null> {
    const agent = this.data.agents.get(id);
    if (!agent || (owner !== undefined && agent.owner !== owner)) {
      return null;
    }
    return structuredClone(agent);
  }

  async listAgents(owner: string = DEFAULT_OWNER): Promise<Agent[]> {
    return Array.from(this.data.agents.values())
      .filter((agent) => agent.owner === owner)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((agent) => structuredClone(agent));
  }

  async updateAgent(agent: Agent): Promise<Agent> {
    const existing = this.data.agents.get(agent.id);
    if (!existing || existing.owner !== agent.owner) {
      throw new NotFoundError("agent", agent.id);
    }
    this.data.agents.set(agent.id, structuredClone(agent));
    return structuredClone(agent);
  }

  async deleteAgent(id: string, owner: string = DEFAULT_OWNER): Promise<boolean> {
    const existing = this.data.agents.get(id);
    if (!existing || existing.owner !== owner) {
      return false;
    }
    return this.data.agents.delete(id);
  }

  async createRun(run: AgentRun): Promise<AgentRun> {
    if (this.data.runs.has(run.id)) {
      throw new ValidationError("id", `Run '${run.id}' already exists`);
    }
    this.data.runs.set(run.id, structuredClone(run));
    return structuredClone(run);
  }

  async getRun(id: string, agentId?: string): Promise<AgentRun | null> {
    const run = this.data.runs.get(id);
    if (!run || (agentId !== undefined && run.agentId !== agentId)) {
      return null;
    }
    return structuredClone(run);
  }

  async listRunsByAgent(agentId: string, owner?: string): Promise<AgentRun[]> {
    return Array.from(this.data.runs.values())
      .filter((run) => run.agentId === agentId && (owner === undefined || run.owner === owner))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((run) => structuredClone(run));
  }

  async updateRun(run: AgentRun): Promise<AgentRun> {
    const existing = this.data.runs.get(run.id);
    if (!existing) {
      throw new NotFoundError("run", run.id);
    }
    if (isTerminalStatus(existing.status)) {
      throw InvalidStateError.terminal(run.id, existing.status, "update");
    }
    this.data.runs.set(run.id, structuredClone(run));
    return structuredClone(run);
  }

  /** Remove every record */
  clear(): void {
    this.data.agents.clear();
    this.data.runs.clear();
  }
}
