/**
 * # Run engine
 *
 * Queue, worker pool, turn loop and run lifecycle control.
 *
 * @module agentry/engine
 */

export { AgentEngine } from "./engine";
export type { AgentEngineOptions, OwnerOptions, WaitOptions } from "./engine";

export { TurnLoop, RESULT_CANCELLED, RESULT_COMPLETED, RESULT_GOAL_ACHIEVED, RESULT_MAX_TURNS } from "./turn-loop";
export type { LoopOutcome, TurnLoopDeps } from "./turn-loop";
export { GoalEvaluator, isAffirmative, GOAL_EVALUATION_PREFIX } from "./goal-evaluator";
export type { GoalVerdict, GoalEvaluatorOptions } from "./goal-evaluator";
export { buildMessages, parseCompletion, formatTranscript } from "./completion";

export { ExecutionQueue } from "./queue";
export type { QueueReservation } from "./queue";
export { ActiveRunRegistry } from "./registry";
export type { ActiveRunEntry, ActiveRunPatch } from "./registry";
export { RunSignals } from "./signals";
export type { SuspensionRequest } from "./signals";
export { RunSession, RunTransaction, applyTransition } from "./session";
export type { SessionDeps, TurnInput, OutcomeFields } from "./session";
export { WorkerPool } from "./worker-pool";
export type { WorkerPoolOptions, RunProcessor } from "./worker-pool";
export { KeyedLock } from "./keyed-lock";
