/**
 * Initial planning
 */

import { parseRawPlanDraft } from '../schemas';
import type { PlanDraft, Scratchpad } from '../schemas';
import type { Logger } from '../types/logger';
import { PlanValidationError } from '../types/errors';
import type { LanguageModel } from '../llm/language-model';
import { completeStructured } from '../llm/structured-output';
import { PLANNER_PROMPT, formatForPrompt, renderStage } from '../templates';
import { toPlanDraft } from './plan-validation';

export interface PlannerOptions {
  model: LanguageModel;
  logger: Logger;
  maxParseRetries: number;
}

export class Planner {
  constructor(private readonly options: PlannerOptions) {}

  /**
   * Ask the model for a plan
   * @throws ParseError when the output never parses
   * @throws PlanValidationError when it parses but cannot be executed
   */
  async plan(query: string, scratchpad: Scratchpad): Promise<PlanDraft> {
    const { model, logger, maxParseRetries } = this.options;
    logger.event('stage_started', 'Planning', { stage: 'planner' });

    const raw = await completeStructured(
      model,
      renderStage(PLANNER_PROMPT, { query, scratchpad: formatForPrompt(scratchpad) }),
      { stage: 'planner', parse: parseRawPlanDraft, maxRetries: maxParseRetries, logger }
    );

    const draft = toPlanDraft(raw);
    if (!draft.ok) {
      throw new PlanValidationError(draft.error);
    }
    logger.debug(`Plan has ${draft.value.steps.length} steps`, { stage: 'planner' });
    return draft.value;
  }
}
