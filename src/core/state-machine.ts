/**
 * Explicit session state machine
 *
 * Models a question-answering session as typed status transitions with a
 * single centralized location for all transition logic. `judging` is the
 * only state that branches; `completed`, `error` and `human_review` are
 * terminal.
 */

import type { SessionStatus, Verdict } from '../schemas';

/**
 * Events that trigger status transitions
 */
export type SessionEvent =
  | { type: 'PLAN_READY'; stepCount: number }
  | { type: 'STEP_EXECUTED'; stepNumber: number }
  | { type: 'VERDICT'; verdict: Verdict }
  | { type: 'ANSWER_READY' }
  | { type: 'ESCALATE'; reason: string }
  | { type: 'FAIL'; error: Error };

export interface TransitionResult {
  /** Status after the event (unchanged when the event was invalid) */
  status: SessionStatus;
  valid: boolean;
  description: string;
}

/**
 * Valid status transitions
 * Key: current status, Value: statuses reachable from it
 */
const VALID_TRANSITIONS: Record<SessionStatus, SessionStatus[]> = {
  planning: ['executing', 'human_review', 'error'],
  executing: ['judging', 'human_review', 'error'],
  judging: ['executing', 'planning', 'finalizing', 'human_review', 'error'],
  finalizing: ['completed', 'human_review', 'error'],
  completed: [],
  error: [],
  human_review: [],
};

/**
 * Status the orchestrator routes to for each verdict
 */
const VERDICT_TARGETS: Record<Verdict, SessionStatus> = {
  CONTINUE: 'executing',
  REPLAN: 'planning',
  FINALIZE: 'finalizing',
  HUMAN_REVIEW: 'human_review',
};

export function isValidTransition(from: SessionStatus, to: SessionStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Process an event and return the resulting status
 */
export function transition(current: SessionStatus, event: SessionEvent): TransitionResult {
  let next: SessionStatus = current;
  let description = '';

  switch (event.type) {
    case 'PLAN_READY':
      if (current === 'planning') {
        next = 'executing';
        description = `Plan ready with ${event.stepCount} step(s)`;
      }
      break;

    case 'STEP_EXECUTED':
      if (current === 'executing') {
        next = 'judging';
        description = `Step ${event.stepNumber} executed, judging result`;
      }
      break;

    case 'VERDICT':
      if (current === 'judging') {
        next = VERDICT_TARGETS[event.verdict];
        description = `Verdict ${event.verdict}`;
      }
      break;

    case 'ANSWER_READY':
      if (current === 'finalizing') {
        next = 'completed';
        description = 'Final answer produced';
      }
      break;

    case 'ESCALATE':
      next = 'human_review';
      description = `Escalated: ${event.reason}`;
      break;

    case 'FAIL':
      next = 'error';
      description = `Error: ${event.error.message}`;
      break;
  }

  const valid = next !== current && isValidTransition(current, next);

  return {
    status: valid ? next : current,
    valid,
    description: valid ? description : `Invalid transition from ${current} via ${event.type}`,
  };
}

export function getStatusDescription(status: SessionStatus): string {
  const descriptions: Record<SessionStatus, string> = {
    planning: 'Building or revising the plan',
    executing: 'Running the current step',
    judging: 'Judging the latest step result',
    finalizing: 'Composing the final answer',
    completed: 'Answer delivered',
    error: 'Stopped on an unrecoverable failure',
    human_review: 'Waiting for a human reviewer',
  };
  return descriptions[status];
}

export function isTerminalStatus(status: SessionStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
