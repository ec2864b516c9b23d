/**
 * Test Fixtures
 *
 * Factory functions for agents, runs and turns with sensible defaults.
 * All functions accept partial overrides.
 */

import type { Agent, AgentConfig, AgentRun, Turn } from "../runs";
import type { ToolDescriptor } from "../tools";

// =============================================================================
// ID Generation
// =============================================================================

let idCounter = 0;

/**
 * Generate a unique test ID
 */
export function testId(prefix: string = "test"): string {
  return `${prefix}-${++idCounter}`;
}

/**
 * Reset the ID counter (call in beforeEach)
 */
export function resetTestIds(): void {
  idCounter = 0;
}

const FIXED_TIME = "2024-01-01T00:00:00.000Z";

// =============================================================================
// Agents
// =============================================================================

export function createAgentConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    model: "test-model",
    temperature: 0.7,
    maxTokens: 800,
    maxTurns: 10,
    enableMultiTurn: true,
    ...overrides,
  };
}

export function createAgent(
  overrides: Omit<Partial<Agent>, "config"> & { config?: Partial<AgentConfig> } = {},
): Agent {
  const { config, ...rest } = overrides;
  return {
    id: testId("agent"),
    owner: "default",
    entityType: "agent",
    name: "Test Agent",
    description: "Agent used in tests",
    prompt: "You are a helpful assistant.",
    tools: [],
    inputVariables: [],
    createdAt: FIXED_TIME,
    updatedAt: FIXED_TIME,
    ...rest,
    config: createAgentConfig(config),
  };
}

// =============================================================================
// Runs
// =============================================================================

export function createRun(agent: Agent, overrides: Partial<AgentRun> = {}): AgentRun {
  return {
    id: testId("run"),
    agentId: agent.id,
    owner: agent.owner,
    entityType: "agent-run",
    inputValues: {},
    status: "pending",
    result: null,
    error: null,
    logs: [],
    conversationHistory: [],
    turnCount: 0,
    maxTurns: agent.config.maxTurns,
    goal: agent.config.goalCompletionPrompt ?? null,
    goalAchieved: false,
    createdAt: FIXED_TIME,
    startedAt: null,
    pausedAt: null,
    completedAt: null,
    lastUpdated: FIXED_TIME,
    ...overrides,
  };
}

export function createTurn(
  turnNumber: number,
  role: Turn["role"],
  content: string,
  overrides: Partial<Turn> = {},
): Turn {
  return {
    turnNumber,
    role,
    content,
    timestamp: FIXED_TIME,
    ...overrides,
  };
}

// =============================================================================
// Tools
// =============================================================================

export function createToolDescriptor(
  name: string,
  overrides: Partial<ToolDescriptor> = {},
): ToolDescriptor {
  return {
    name,
    description: `${name} tool`,
    inputSchema: { type: "object", properties: {} },
    ...overrides,
  };
}
