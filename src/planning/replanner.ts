/**
 * Replanning
 *
 * Replaces the remaining steps of the current plan. Completed steps, the
 * goal and the requirements never change; new steps continue the step
 * numbering.
 */

import { ScratchpadKey, parseRawPlanDraft } from '../schemas';
import type {
  ExecutionHistoryEntry,
  GoalRequirements,
  Plan,
  ReplanInstructions,
  Scratchpad,
  StepDraft,
} from '../schemas';
import type { Logger } from '../types/logger';
import { InvalidTransitionError, PlanValidationError } from '../types/errors';
import type { LanguageModel } from '../llm/language-model';
import { completeStructured } from '../llm/structured-output';
import { REPLANNER_PROMPT, formatForPrompt, renderStage } from '../templates';
import type { ExecutionState } from '../core/execution-state';
import { isRejectedSource, readList } from '../judge/relevance';
import { expressionVariables } from '../tools/calculator';
import { numberSteps, validateStepDrafts } from './plan-validation';

export interface ReplannerOptions {
  model: LanguageModel;
  logger: Logger;
  maxParseRetries: number;
}

/**
 * The calculation implied by the requirements, if they carry a formula
 */
export function calculationFromRequirements(requirements: GoalRequirements): StepDraft | undefined {
  if (!requirements.formula) {
    return undefined;
  }
  // Each name the formula reads is bound to the fact of the same name;
  // required facts the formula does not use (text facts) stay unbound
  const names = expressionVariables(requirements.formula);
  const variables: Record<string, string> = {};
  for (const name of names.ok ? names.value : []) {
    variables[name] = name;
  }
  const outputVariable = requirements.outputVariable ?? 'result';
  return {
    tool: 'calculate',
    action: `Compute ${outputVariable} = ${requirements.formula}`,
    parameters: { formula: requirements.formula, variables, outputVariable },
  };
}

/**
 * Remove rejected documents from search restrictions; a search that only
 * targeted rejected documents is dropped
 */
export function withoutRejectedSources(drafts: StepDraft[], scratchpad: Scratchpad): StepDraft[] {
  const kept: StepDraft[] = [];
  for (const draft of drafts) {
    if (draft.tool !== 'search' || draft.parameters.expectedDocuments.length === 0) {
      kept.push(draft);
      continue;
    }
    const expectedDocuments = draft.parameters.expectedDocuments.filter((doc) => !isRejectedSource(scratchpad, doc));
    if (expectedDocuments.length > 0) {
      kept.push({ ...draft, parameters: { ...draft.parameters, expectedDocuments } });
    }
  }
  return kept;
}

function describeCompleted(plan: Plan, history: ExecutionHistoryEntry[]): string {
  const done = plan.steps.filter((step) => step.status === 'done');
  if (done.length === 0) {
    return '(none)';
  }
  return done
    .map((step) => {
      const entry = [...history].reverse().find((e) => e.step.number === step.number);
      const outcome = entry ? `${entry.result.status}${entry.result.summary ? `: ${entry.result.summary}` : ''}` : 'done';
      return `${step.number}. [${step.tool}] ${step.action} -> ${outcome}`;
    })
    .join('\n');
}

export class Replanner {
  constructor(private readonly options: ReplannerOptions) {}

  /**
   * Apply a replan to the state
   * @throws ParseError when the model output never parses
   * @throws PlanValidationError when no usable step comes back
   */
  async replan(state: ExecutionState, instructions: ReplanInstructions): Promise<Plan> {
    const plan = state.getPlan();
    if (!plan) {
      throw new InvalidTransitionError('Cannot replan before a plan is installed');
    }
    const { logger } = this.options;
    const scratchpad = state.getScratchpad();
    logger.event('stage_started', `Replanning (${instructions.strategy})`, { stage: 'replanner' });

    let drafts: StepDraft[];
    const injected =
      instructions.strategy === 'FORM_CALCULATION_STEP' ? calculationFromRequirements(plan.requirements) : undefined;
    if (injected) {
      drafts = [injected];
    } else {
      drafts = await this.proposeSteps(state, plan, instructions);
    }

    if (instructions.strategy === 'FORM_CALCULATION_STEP') {
      const calculation = drafts.find((draft) => draft.tool === 'calculate');
      if (!calculation) {
        throw new PlanValidationError(['steps: a calculate step is required']);
      }
      drafts = [calculation];
    }
    if (!instructions.allowRejectedSources) {
      drafts = withoutRejectedSources(drafts, scratchpad);
    }
    if (drafts.length === 0) {
      throw new PlanValidationError(['steps: no usable step remains after removing rejected sources']);
    }

    const steps = numberSteps(drafts, state.nextStepNumber());
    state.replaceRemainingSteps(steps);
    const replans = state.recordReplan();

    const updated = state.getPlan();
    if (!updated) {
      throw new InvalidTransitionError('Plan disappeared during replanning');
    }
    logger.event(
      'replan_applied',
      `Plan v${updated.version}: ${instructions.strategy}, steps ${steps.map((s) => s.number).join(', ')}`,
      { stage: 'replanner', strategy: instructions.strategy, replans }
    );
    return updated;
  }

  private async proposeSteps(state: ExecutionState, plan: Plan, instructions: ReplanInstructions): Promise<StepDraft[]> {
    const { model, logger, maxParseRetries } = this.options;
    const scratchpad = state.getScratchpad();
    const request = renderStage(REPLANNER_PROMPT, {
      query: state.query,
      goal: plan.goal,
      strategy: instructions.strategy,
      details: instructions.details,
      completedSteps: describeCompleted(plan, state.getHistory()),
      scratchpad: formatForPrompt(scratchpad),
      rejectedSources: formatForPrompt(readList(scratchpad, ScratchpadKey.REJECTED_SOURCES).join(', ')),
    });
    const raw = await completeStructured(model, request, {
      stage: 'replanner',
      parse: parseRawPlanDraft,
      maxRetries: maxParseRetries,
      logger,
    });

    const drafts = validateStepDrafts(raw.steps);
    if (!drafts.ok) {
      throw new PlanValidationError(drafts.error);
    }
    const hypotheses = raw.scratchpad?.searchHypotheses ?? [];
    if (hypotheses.length > 0) {
      state.mergeScratchpad({ append: { [ScratchpadKey.SEARCH_HYPOTHESES]: hypotheses } });
    }
    return drafts.value;
  }
}
