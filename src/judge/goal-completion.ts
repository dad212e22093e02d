/**
 * Goal completion assessment
 */

import { RESERVED_SCRATCHPAD_KEYS } from '../schemas';
import type { ExecutionHistoryEntry, GoalRequirements, Scratchpad, Step, StepResult } from '../schemas';

export interface GoalAssessment {
  missingFacts: string[];
  factsComplete: boolean;
  computationRequired: boolean;
  computationDone: boolean;
}

function hasValue(scratchpad: Scratchpad, key: string): boolean {
  const value = scratchpad[key];
  if (value === undefined) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return typeof value !== 'string' || value.trim().length > 0;
}

/**
 * Compare the goal's requirements against the scratchpad as it will be
 * after the current step's facts are merged. A goal that names no facts
 * needs at least one discovered fact.
 */
export function assessGoal(
  requirements: GoalRequirements,
  scratchpad: Scratchpad,
  history: ExecutionHistoryEntry[],
  current: { step: Step; result: StepResult }
): GoalAssessment {
  const missingFacts = requirements.facts.filter((fact) => !hasValue(scratchpad, fact));
  const factsComplete =
    requirements.facts.length > 0
      ? missingFacts.length === 0
      : Object.keys(scratchpad).some((key) => !RESERVED_SCRATCHPAD_KEYS.includes(key));

  const computed = [...history, current].some(
    (entry) => entry.step.tool === 'calculate' && entry.result.status === 'success'
  );

  return {
    missingFacts,
    factsComplete,
    computationRequired: requirements.computation,
    computationDone: computed,
  };
}
