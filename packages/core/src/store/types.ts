import type { Agent, AgentRun } from "agentry-shared";

/**
 * Persistence contract for agents and runs.
 *
 * Implementations return copies: mutating a returned record never changes
 * stored state. `owner` scopes records in multi-tenant deployments and
 * defaults to "default".
 */
export interface RunStore {
  createAgent(agent: Agent): Promise<Agent>;
  getAgent(id: string, owner?: string): Promise<Agent | null>;
  listAgents(owner?: string): Promise<Agent[]>;
  /** @throws NotFoundError when the agent does not exist */
  updateAgent(agent: Agent): Promise<Agent>;
  /** @returns false when there was nothing to delete */
  deleteAgent(id: string, owner?: string): Promise<boolean>;

  /** @throws ValidationError when a run with the same id exists */
  createRun(run: AgentRun): Promise<AgentRun>;
  getRun(id: string, agentId?: string): Promise<AgentRun | null>;
  /** Newest first */
  listRunsByAgent(agentId: string, owner?: string): Promise<AgentRun[]>;
  /**
   * Replace a stored run.
   * @throws NotFoundError when the run does not exist
   * @throws InvalidStateError when the stored run is already terminal
   */
  updateRun(run: AgentRun): Promise<AgentRun>;
}
