/**
 * Semantic checks on planner output
 *
 * A draft that parses but cannot be executed (empty goal, no steps, an
 * unknown tool, parameters the tool does not take) is rejected here.
 */

import { ScratchpadKey, validateStepDraft } from '../schemas';
import type { GoalRequirements, PlanDraft, RawPlanDraft, RawStepDraft, ScratchpadSeed, ScratchpadUpdate, Step, StepDraft } from '../schemas';
import { Result, ok, err } from '../types/result';

export function validateStepDrafts(raw: RawStepDraft[]): Result<StepDraft[], string[]> {
  const issues: string[] = [];
  const steps: StepDraft[] = [];
  raw.forEach((candidate, index) => {
    const result = validateStepDraft(candidate);
    if (result.success) {
      steps.push(result.data);
    } else {
      issues.push(...result.errors.map((e) => `steps.${index}.${e}`));
    }
  });
  return issues.length > 0 ? err(issues) : ok(steps);
}

function validateRequirements(requirements: GoalRequirements): string[] {
  const issues: string[] = [];
  if (requirements.facts.some((fact) => fact.trim().length === 0)) {
    issues.push('requirements.facts: fact keys cannot be empty');
  }
  if (requirements.formula !== undefined && !requirements.computation) {
    issues.push('requirements.formula: only allowed when computation is true');
  }
  return issues;
}

export function toPlanDraft(raw: RawPlanDraft): Result<PlanDraft, string[]> {
  const issues: string[] = [];
  if (raw.goal.trim().length === 0) {
    issues.push('goal: cannot be empty');
  }
  if (raw.steps.length === 0) {
    issues.push('steps: at least one step is required');
  }
  issues.push(...validateRequirements(raw.requirements));

  const steps = validateStepDrafts(raw.steps);
  if (!steps.ok) {
    issues.push(...steps.error);
  }
  if (issues.length > 0 || !steps.ok) {
    return err(issues);
  }

  const draft: PlanDraft = {
    goal: raw.goal.trim(),
    requirements: raw.requirements,
    steps: steps.value,
  };
  if (raw.scratchpad) {
    draft.scratchpad = raw.scratchpad;
  }
  return ok(draft);
}

/**
 * Number drafts consecutively from `firstNumber` as pending steps
 */
export function numberSteps(drafts: StepDraft[], firstNumber: number): Step[] {
  return drafts.map((draft, index): Step => ({ ...draft, number: firstNumber + index, status: 'pending' }));
}

/**
 * Scratchpad update that records the planner's seed facts
 */
export function seedUpdate(seed: ScratchpadSeed | undefined): ScratchpadUpdate {
  const update: ScratchpadUpdate = {};
  if (!seed) {
    return update;
  }
  const set: Record<string, string> = {};
  const append: Record<string, string[]> = {};
  if (seed.queryDomain && seed.queryDomain.trim().length > 0) {
    set[ScratchpadKey.QUERY_DOMAIN] = seed.queryDomain.trim();
  }
  if (seed.priorityDocuments && seed.priorityDocuments.length > 0) {
    append[ScratchpadKey.PRIORITY_DOCUMENTS] = seed.priorityDocuments;
  }
  if (seed.searchHypotheses && seed.searchHypotheses.length > 0) {
    append[ScratchpadKey.SEARCH_HYPOTHESES] = seed.searchHypotheses;
  }
  if (Object.keys(set).length > 0) {
    update.set = set;
  }
  if (Object.keys(append).length > 0) {
    update.append = append;
  }
  return update;
}
