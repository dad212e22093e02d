/**
 * Optional model-backed advisor for the judge
 *
 * The advisor only proposes; `decide` applies its proposal after the rule
 * stages and only where they left the verdict open.
 */

import type { AdvisorProposal, GoalRequirements, Scratchpad, Step, StepResult } from '../schemas';
import { parseAdvisorProposal } from '../schemas';
import type { Logger } from '../types/logger';
import type { LanguageModel } from '../llm/language-model';
import { completeStructured } from '../llm/structured-output';
import { JUDGE_ADVISOR_PROMPT, formatForPrompt, renderStage } from '../templates';

export interface AdvisorContext {
  query: string;
  step: Step;
  result: StepResult;
  scratchpad: Scratchpad;
  requirements: GoalRequirements;
}

export interface JudgeAdvisor {
  propose(context: AdvisorContext): Promise<AdvisorProposal>;
}

export interface ModelJudgeAdvisorOptions {
  model: LanguageModel;
  logger: Logger;
  maxParseRetries: number;
}

export class ModelJudgeAdvisor implements JudgeAdvisor {
  constructor(private readonly options: ModelJudgeAdvisorOptions) {}

  async propose(context: AdvisorContext): Promise<AdvisorProposal> {
    const request = renderStage(JUDGE_ADVISOR_PROMPT, {
      query: context.query,
      requirements: formatForPrompt(context.requirements),
      step: formatForPrompt(context.step),
      result: formatForPrompt(context.result),
      scratchpad: formatForPrompt(context.scratchpad),
    });
    return completeStructured(this.options.model, request, {
      stage: 'judge-advisor',
      parse: parseAdvisorProposal,
      maxRetries: this.options.maxParseRetries,
      logger: this.options.logger,
    });
  }
}
