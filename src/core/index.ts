/**
 * Core module - session state, state machine, budgets and the control loop
 * This module must not import from ui/ or spawn processes directly.
 */

export type { SessionEvent, TransitionResult } from './state-machine';
export { isValidTransition, transition, getStatusDescription, isTerminalStatus } from './state-machine';

export type { StopReason, StopConditionResult } from './budget-policy';
export { checkDispatchBudget, checkVerdictBudget, checkLoopRecurrence, checkPlanningFailures } from './budget-policy';

export type { ExecutionStateOptions } from './execution-state';
export { ExecutionState } from './execution-state';

export type { SessionProgress, OrchestratorDependencies, RunOptions } from './orchestrator';
export { SessionOrchestrator } from './orchestrator';
