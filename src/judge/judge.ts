/**
 * Decision engine
 *
 * Runs once per executed step as an ordered pipeline: status check,
 * relevance scoring, consistency check, loop detection, goal completion and
 * the budget guard. Each stage may override the verdict of the stages
 * before it; the budget guard has the last word.
 *
 * `decide` is pure: the same inputs always yield the same decision.
 */

import { ScratchpadKey } from '../schemas';
import type {
  AdvisorProposal,
  Decision,
  ExecutionHistoryEntry,
  GoalRequirements,
  ReplanStrategy,
  Scratchpad,
  ScratchpadUpdate,
  SessionCounters,
  Step,
  StepResult,
  StructuredFacts,
  ToolName,
  Verdict,
} from '../schemas';
import type { JudgeThresholds, SessionLimits } from '../types/agent-config';
import type { Logger } from '../types/logger';
import { errorMessage } from '../types/errors';
import { checkVerdictBudget, checkLoopRecurrence } from '../core/budget-policy';
import type { StopConditionResult } from '../core/budget-policy';
import type { ExecutionState } from '../core/execution-state';
import { scoreSourceRelevance } from './relevance';
import { checkConsistency, describeContradictions } from './consistency';
import { detectLoop, chooseLoopEscapeStrategy } from './loop-detection';
import { assessGoal } from './goal-completion';
import type { JudgeAdvisor } from './judge-advisor';

export interface JudgeInput {
  step: Step;
  result: StepResult;
  /** Scratchpad before this step's facts are merged */
  scratchpad: Scratchpad;
  /** History before this step is recorded */
  history: ExecutionHistoryEntry[];
  requirements: GoalRequirements;
  /** Whether the plan has no pending step left after this one */
  planExhausted: boolean;
  /** Tools of the pending steps after this one */
  pendingTools: ToolName[];
  counters: SessionCounters;
  advisorProposal?: AdvisorProposal;
}

export interface JudgePolicy {
  limits: SessionLimits;
  thresholds: JudgeThresholds;
}

/**
 * Replan strategy a step outcome biases toward, if any
 */
export function statusBias(tool: ToolName, status: StepResult['status']): ReplanStrategy | undefined {
  if (status === 'not_found') {
    return tool === 'search' ? 'CHANGE_KEYWORDS' : 'FORM_NEW_HYPOTHESIS';
  }
  if (status === 'error') {
    switch (tool) {
      case 'search':
        return 'REFINE_AND_RESTRICT_SEARCH';
      case 'calculate':
        return 'FORM_CALCULATION_STEP';
      case 'other':
        return 'FORM_NEW_HYPOTHESIS';
    }
  }
  return undefined;
}

function previouslyContradicted(history: ExecutionHistoryEntry[]): Set<string> {
  const keys = new Set<string>();
  for (const entry of history) {
    for (const key of entry.decision.contradictedKeys ?? []) {
      keys.add(key);
    }
  }
  return keys;
}

export interface JudgeRuling {
  decision: Decision;
  /** Set when the budget guard overrode the verdict */
  budgetStop?: StopConditionResult;
}

export function decide(input: JudgeInput, policy: JudgePolicy): Decision {
  return rule(input, policy).decision;
}

/**
 * Run the decision pipeline, keeping the budget guard's stop condition
 */
export function rule(input: JudgeInput, policy: JudgePolicy): JudgeRuling {
  const { step, result, scratchpad, history, requirements, counters } = input;
  const reasons: string[] = [];
  const acc: { verdict: Verdict; strategy?: ReplanStrategy; humanReviewReason?: string; revisitRejected?: boolean } = {
    verdict: 'CONTINUE',
  };

  const replan = (next: ReplanStrategy, reason: string): void => {
    if (acc.verdict === 'HUMAN_REVIEW') {
      return;
    }
    acc.verdict = 'REPLAN';
    acc.strategy = next;
    reasons.push(reason);
  };
  const escalate = (reason: string): void => {
    acc.verdict = 'HUMAN_REVIEW';
    acc.strategy = undefined;
    acc.humanReviewReason = acc.humanReviewReason ?? reason;
    reasons.push(reason);
  };

  // 1. Status
  const bias = statusBias(step.tool, result.status);
  if (bias) {
    const detail = result.error ? `: ${result.error.message}` : '';
    replan(bias, `Step ${step.number} returned ${result.status}${detail}`);
  }

  // 2. Relevance
  const sourceRelevance = scoreSourceRelevance(step.tool, result.source, scratchpad);
  const relevant = sourceRelevance >= policy.thresholds.sourceRelevance;
  const rejected: string[] = [];
  if (!relevant && result.source) {
    rejected.push(result.source.documentName);
    replan(
      'REFINE_AND_RESTRICT_SEARCH',
      `Source "${result.source.documentName}" is outside the query domain (relevance ${sourceRelevance.toFixed(2)})`
    );
  }

  // 3. Consistency
  const consistency = checkConsistency(
    relevant ? result.structuredOutput : undefined,
    scratchpad,
    policy.thresholds.numericTolerance
  );
  const contradictedKeys = consistency.contradictions.map((c) => c.key);
  const contradictionDetails =
    consistency.contradictions.length > 0 ? describeContradictions(consistency.contradictions) : undefined;
  if (contradictionDetails) {
    const earlier = previouslyContradicted(history);
    const repeated = contradictedKeys.filter((key) => earlier.has(key));
    if (repeated.length > 0) {
      escalate(`Contradiction persists after replanning for ${repeated.join(', ')}`);
    } else {
      replan('FORM_NEW_HYPOTHESIS', `New facts contradict recorded ones (${contradictionDetails})`);
    }
  }

  // 4. Loop
  const isLoopDetected = detectLoop(history, step, policy.limits.loopWindow);
  if (isLoopDetected) {
    const recurrence = checkLoopRecurrence(counters.loopsDetected);
    if (recurrence.shouldStop) {
      escalate(recurrence.message);
    } else {
      const escape = chooseLoopEscapeStrategy(history, policy.limits.loopWindow, acc.strategy);
      replan(escape, `Same step repeated ${policy.limits.loopWindow} times in a row`);
    }
  }

  // 5. Goal completion, only when nothing above objected
  const facts: StructuredFacts = { ...consistency.accepted };
  if (acc.verdict === 'CONTINUE' && input.advisorProposal?.facts) {
    const advisorFacts = checkConsistency(
      input.advisorProposal.facts,
      { ...scratchpad, ...facts },
      policy.thresholds.numericTolerance
    );
    Object.assign(facts, advisorFacts.accepted);
  }
  if (acc.verdict === 'CONTINUE') {
    const merged: Scratchpad = { ...scratchpad, ...facts };
    const goal = assessGoal(requirements, merged, history, { step, result });
    const calculationPending = input.pendingTools.includes('calculate');
    const advisor = input.advisorProposal;

    if (goal.factsComplete && (!goal.computationRequired || goal.computationDone)) {
      acc.verdict = 'FINALIZE';
      reasons.push('All required facts are present');
    } else if (goal.factsComplete && !calculationPending) {
      replan('FORM_CALCULATION_STEP', 'Required facts are present but the computation has not run');
    } else if (input.planExhausted) {
      replan(
        'FORM_NEW_HYPOTHESIS',
        goal.missingFacts.length > 0
          ? `Plan exhausted; missing ${goal.missingFacts.join(', ')}`
          : 'Plan exhausted without any usable fact'
      );
    } else if (advisor && advisor.verdict === 'REPLAN') {
      replan(advisor.strategy ?? 'CHANGE_KEYWORDS', `Advisor: ${advisor.reasoning}`);
      acc.revisitRejected = advisor.revisitRejectedSources === true;
    } else if (advisor && advisor.verdict === 'HUMAN_REVIEW') {
      escalate(`Advisor: ${advisor.reasoning}`);
    } else {
      reasons.push(
        goal.missingFacts.length > 0 ? `Still missing ${goal.missingFacts.join(', ')}` : 'Continuing with the plan'
      );
    }
  }

  // 6. Budget
  const budget = checkVerdictBudget(policy.limits, acc.verdict, counters.dispatches, counters.replans);
  if (budget.shouldStop) {
    escalate(budget.message);
  }

  const scratchpadUpdate: ScratchpadUpdate = {};
  if (Object.keys(facts).length > 0) {
    scratchpadUpdate.set = facts;
  }
  if (rejected.length > 0) {
    scratchpadUpdate.append = { [ScratchpadKey.REJECTED_SOURCES]: rejected };
  }

  const decision: Decision = {
    verdict: acc.verdict,
    reasoning: reasons.join('; '),
    scores: {
      sourceRelevance,
      contextConsistency: consistency.score,
    },
    isLoopDetected,
  };
  if (contradictionDetails) {
    decision.contradictionDetails = contradictionDetails;
    decision.contradictedKeys = contradictedKeys;
  }
  if (acc.verdict === 'REPLAN' && acc.strategy) {
    decision.replanInstructions = { strategy: acc.strategy, details: reasons.join('; ') };
    if (acc.revisitRejected) {
      decision.replanInstructions.allowRejectedSources = true;
    }
  }
  if (scratchpadUpdate.set || scratchpadUpdate.append) {
    decision.scratchpadUpdate = scratchpadUpdate;
  }
  if (acc.verdict === 'HUMAN_REVIEW') {
    decision.humanReviewReason = acc.humanReviewReason;
  }
  return budget.shouldStop ? { decision, budgetStop: budget } : { decision };
}

export interface JudgeOptions extends JudgePolicy {
  logger: Logger;
  /** Consulted for an advisory verdict when present */
  advisor?: JudgeAdvisor;
}

/**
 * Builds the judge input from the execution state and logs the verdict
 */
export class Judge {
  private readonly policy: JudgePolicy;
  private readonly logger: Logger;
  private readonly advisor?: JudgeAdvisor;

  constructor(options: JudgeOptions) {
    this.policy = { limits: options.limits, thresholds: options.thresholds };
    this.logger = options.logger;
    this.advisor = options.advisor;
  }

  async evaluate(state: ExecutionState, step: Step, result: StepResult): Promise<Decision> {
    const input = buildJudgeInput(state, step, result);
    if (this.advisor) {
      input.advisorProposal = await this.consultAdvisor(state, input);
    }

    const { decision, budgetStop } = rule(input, this.policy);

    if (decision.isLoopDetected) {
      this.logger.event('loop_detected', `Step ${step.number} repeats the previous steps`, { step: step.number });
    }
    if (budgetStop) {
      this.logger.event('budget_exceeded', budgetStop.message, { step: step.number, reason: budgetStop.reason });
    }
    this.logger.event('verdict_emitted', `${decision.verdict}: ${decision.reasoning}`, {
      step: step.number,
      verdict: decision.verdict,
      strategy: decision.replanInstructions?.strategy,
      sourceRelevance: decision.scores.sourceRelevance,
      contextConsistency: decision.scores.contextConsistency,
    });
    return decision;
  }

  private async consultAdvisor(state: ExecutionState, input: JudgeInput): Promise<AdvisorProposal | undefined> {
    if (!this.advisor) {
      return undefined;
    }
    try {
      return await this.advisor.propose({
        query: state.query,
        step: input.step,
        result: input.result,
        scratchpad: input.scratchpad,
        requirements: input.requirements,
      });
    } catch (error) {
      this.logger.warn(`Judge advisor unavailable, using rules only: ${errorMessage(error)}`, {
        step: input.step.number,
      });
      return undefined;
    }
  }
}

export function buildJudgeInput(state: ExecutionState, step: Step, result: StepResult): JudgeInput {
  const plan = state.getPlan();
  const pending = (plan?.steps ?? []).filter((s) => s.status === 'pending' && s.number !== step.number);
  return {
    step,
    result,
    scratchpad: state.getScratchpad(),
    history: state.getHistory(),
    requirements: plan?.requirements ?? { facts: [], computation: false },
    planExhausted: pending.length === 0,
    pendingTools: pending.map((s) => s.tool),
    counters: state.getCounters(),
  };
}
