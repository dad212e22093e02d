/**
 * Session records
 * History entries, state snapshots and the two possible session outputs
 */

import type { Plan, Step } from './plan.schema';
import type { StepResult, SourceRef } from './step-result.schema';
import type { Decision } from './decision.schema';
import type { Scratchpad } from './scratchpad.schema';

export type SessionStatus =
  | 'planning'
  | 'executing'
  | 'judging'
  | 'finalizing'
  | 'completed'
  | 'error'
  | 'human_review';

export interface ExecutionHistoryEntry {
  /** Copy of the step as it was dispatched */
  step: Step;
  result: StepResult;
  decision: Decision;
  planVersion: number;
  recordedAt: string;
}

export interface SessionCounters {
  /** Dispatcher invocations */
  dispatches: number;
  replans: number;
  loopsDetected: number;
  planningFailures: number;
}

export interface ExecutionStateSnapshot {
  runId: string;
  query: string;
  status: SessionStatus;
  plan?: Plan;
  scratchpad: Scratchpad;
  history: ExecutionHistoryEntry[];
  counters: SessionCounters;
  frozen: boolean;
  capturedAt: string;
}

export interface FinalAnswer {
  text: string;
  /** Distinct sources from the step results in history */
  citations: SourceRef[];
  limitations: string[];
}

export interface HumanReviewRequest {
  reason: string;
  decision?: Decision;
  snapshot: ExecutionStateSnapshot;
  /** Where the snapshot was persisted, if it was */
  snapshotPath?: string;
}

/**
 * What a session hands back to its caller
 */
export type SessionOutcome =
  | { kind: 'answer'; runId: string; answer: FinalAnswer; snapshot: ExecutionStateSnapshot }
  | { kind: 'human_review'; runId: string; request: HumanReviewRequest }
  | { kind: 'error'; runId: string; message: string; snapshot: ExecutionStateSnapshot };
