/**
 * Budget policies
 *
 * Centralizes the session's work ceilings. The judge consults these before
 * any verdict is honored, and the orchestrator checks the step budget again
 * before every dispatch.
 */

import type { SessionLimits } from '../types/agent-config';
import type { Verdict } from '../schemas';

export type StopReason =
  | 'MAX_STEPS_EXCEEDED'
  | 'MAX_REPLANS_EXCEEDED'
  | 'REPEATED_LOOP'
  | 'PLANNING_FAILED'
  | 'USER_CANCELLED';

export interface StopConditionResult {
  shouldStop: boolean;
  reason?: StopReason;
  message: string;
  /** Suggestions for the operator */
  nextSteps?: string[];
}

/**
 * Whether another dispatcher invocation fits in the budget
 */
export function checkDispatchBudget(limits: SessionLimits, dispatches: number): StopConditionResult {
  if (dispatches >= limits.maxSteps) {
    return {
      shouldStop: true,
      reason: 'MAX_STEPS_EXCEEDED',
      message: `Reached maximum steps (${limits.maxSteps})`,
      nextSteps: ['Increase --max-steps to allow more evidence gathering'],
    };
  }
  return {
    shouldStop: false,
    message: `Step budget ${dispatches}/${limits.maxSteps}`,
  };
}

/**
 * Whether a verdict may stand given the work already done. Only FINALIZE
 * survives an exhausted step budget.
 */
export function checkVerdictBudget(
  limits: SessionLimits,
  verdict: Verdict,
  dispatches: number,
  replans: number
): StopConditionResult {
  if (verdict === 'HUMAN_REVIEW' || verdict === 'FINALIZE') {
    return { shouldStop: false, message: `${verdict} needs no further budget` };
  }

  const steps = checkDispatchBudget(limits, dispatches);
  if (steps.shouldStop) {
    return steps;
  }

  if (verdict === 'REPLAN' && replans >= limits.maxReplans) {
    return {
      shouldStop: true,
      reason: 'MAX_REPLANS_EXCEEDED',
      message: `Reached maximum replans (${limits.maxReplans})`,
      nextSteps: ['Refine the question or increase --max-replans'],
    };
  }

  return {
    shouldStop: false,
    message: `Within budget (steps ${dispatches}/${limits.maxSteps}, replans ${replans}/${limits.maxReplans})`,
  };
}

/**
 * A loop seen again after one recovery attempt is escalated
 */
export function checkLoopRecurrence(loopsAlreadyDetected: number): StopConditionResult {
  if (loopsAlreadyDetected > 0) {
    return {
      shouldStop: true,
      reason: 'REPEATED_LOOP',
      message: `Repeated the same step again after ${loopsAlreadyDetected} earlier loop(s)`,
      nextSteps: ['Check whether the document index covers the question'],
    };
  }
  return { shouldStop: false, message: 'First loop in session; trying a different strategy' };
}

/**
 * A planning failure that recurs after one retry is escalated
 */
export function checkPlanningFailures(failures: number): StopConditionResult {
  if (failures > 1) {
    return {
      shouldStop: true,
      reason: 'PLANNING_FAILED',
      message: `Planning failed ${failures} times`,
      nextSteps: ['Rephrase the question with the governing document or domain'],
    };
  }
  return { shouldStop: false, message: failures === 1 ? 'Retrying planning once' : 'No planning failures' };
}
