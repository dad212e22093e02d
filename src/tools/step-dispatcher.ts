/**
 * Step dispatcher
 *
 * Executes the step at the plan cursor with the tool it names and returns
 * a StepResult. Tool failures become error results; they never throw out
 * of `dispatch`. The cursor only advances when the step produced a usable
 * outcome, so a failed step stays current until a replan replaces it.
 */

import type { CalculateStep, OtherStep, SearchStep, SourceRef, Step, StepResult } from '../schemas';
import type { SessionLimits, TimeoutConfig } from '../types/agent-config';
import type { Clock } from '../types/clock';
import { TimeoutError } from '../types/clock';
import type { Logger } from '../types/logger';
import { InvalidTransitionError, ModelCallError, ModelUnavailableError, ParseError, ToolError } from '../types/errors';
import type { ExecutionState } from '../core/execution-state';
import { checkDispatchBudget } from '../core/budget-policy';
import type { StopConditionResult } from '../core/budget-policy';
import { normalizeName } from '../judge/relevance';
import { runCalculation } from './calculator';
import type { DocumentAnalyzer, Reasoner } from './document-analyzer';
import type { DocumentHit, SearchTool } from './search-tool';
import { hitDocumentName, hitLocator } from './search-tool';

export interface StepDispatcherOptions {
  search: SearchTool;
  analyzer: DocumentAnalyzer;
  reasoner: Reasoner;
  clock: Clock;
  logger: Logger;
  limits: SessionLimits;
  timeouts: TimeoutConfig;
  /** Documents requested per search */
  hits: number;
}

export type DispatchOutcome =
  | { kind: 'executed'; step: Step; result: StepResult }
  | { kind: 'budget_exhausted'; stop: StopConditionResult };

type ToolOutcome = Omit<StepResult, 'attempts'>;

const RETRYABLE_CODES: ReadonlySet<ToolError['code']> = new Set(['TIMEOUT', 'UNAVAILABLE', 'MALFORMED_RESPONSE']);

/**
 * Pick the hit the analysis names, falling back to the top hit
 */
export function selectSource(hits: DocumentHit[], documentName?: string, locator?: string): SourceRef | undefined {
  const named = documentName ? normalizeName(documentName) : undefined;
  const match = named
    ? hits.find((candidate) => {
        const name = normalizeName(hitDocumentName(candidate));
        return name.includes(named) || named.includes(name) || normalizeName(candidate.docCode) === named;
      })
    : undefined;
  const hit: DocumentHit | undefined = match ?? hits[0];
  if (!hit) {
    return undefined;
  }
  const source: SourceRef = { documentName: hitDocumentName(hit), locator: locator || hitLocator(hit) };
  if (hit.title) {
    source.domain = hit.title;
  }
  return source;
}

export class StepDispatcher {
  constructor(private readonly options: StepDispatcherOptions) {}

  async dispatch(state: ExecutionState): Promise<DispatchOutcome> {
    const step = state.currentStep();
    if (!step) {
      throw new InvalidTransitionError('No pending step to dispatch');
    }
    const { limits, logger } = this.options;

    const budget = checkDispatchBudget(limits, state.getCounters().dispatches);
    if (budget.shouldStop) {
      logger.event('budget_exceeded', budget.message, { step: step.number });
      return { kind: 'budget_exhausted', stop: budget };
    }

    const dispatches = state.recordDispatch();
    logger.event('step_dispatched', `Step ${step.number} [${step.tool}] ${step.action}`, {
      step: step.number,
      tool: step.tool,
      dispatches,
    });

    const result = await this.runWithRetries(state, step);
    if (result.status === 'error') {
      logger.event('tool_failed', `Step ${step.number} failed: ${result.error?.message ?? 'unknown error'}`, {
        step: step.number,
        code: result.error?.code,
        attempts: result.attempts,
      });
    } else {
      state.advanceStep();
    }
    return { kind: 'executed', step, result };
  }

  private async runWithRetries(state: ExecutionState, step: Step): Promise<StepResult> {
    const maxAttempts = this.options.limits.maxToolRetries + 1;
    let attempts = 0;
    for (;;) {
      attempts++;
      try {
        const outcome = await this.execute(state, step);
        return { ...outcome, attempts };
      } catch (error) {
        if (error instanceof ParseError) {
          return { status: 'error', error: { code: 'PARSE_FAILED', message: error.message }, attempts };
        }
        const toolError = asToolError(error);
        if (!toolError) {
          throw error;
        }
        if (!RETRYABLE_CODES.has(toolError.code) || attempts >= maxAttempts) {
          return { status: 'error', error: { code: toolError.code, message: toolError.message }, attempts };
        }
        this.options.logger.debug(`Retrying step ${step.number}: ${toolError.message}`, { step: step.number });
      }
    }
  }

  private execute(state: ExecutionState, step: Step): Promise<ToolOutcome> {
    switch (step.tool) {
      case 'search':
        return this.executeSearch(state.query, step);
      case 'calculate':
        return this.executeCalculation(state, step);
      case 'other':
        return this.executeReasoning(state, step);
    }
  }

  private async executeSearch(query: string, step: SearchStep): Promise<ToolOutcome> {
    const { search, analyzer, clock, timeouts, hits: limit } = this.options;
    const request = new AbortController();
    let hits: DocumentHit[];
    try {
      hits = await clock.withTimeout(
        search.search(
          { keywords: step.parameters.keywords, expectedDocuments: step.parameters.expectedDocuments, hits: limit },
          request.signal
        ),
        timeouts.toolMs,
        `Search did not answer within ${timeouts.toolMs}ms`
      );
    } catch (error) {
      // a request that outlived its deadline is cancelled
      request.abort();
      throw error;
    }
    if (hits.length === 0) {
      return { status: 'not_found', summary: `No documents matched: ${step.parameters.keywords.join(', ')}` };
    }

    const analysis = await this.callModel(step, analyzer.analyze(query, step, hits));
    if (analysis.status === 'not_found') {
      return { status: 'not_found', summary: analysis.summary || 'The retrieved documents do not answer the step' };
    }
    const outcome: ToolOutcome = {
      status: analysis.status,
      structuredOutput: analysis.facts,
      summary: analysis.summary,
    };
    const source = selectSource(hits, analysis.documentName, analysis.locator);
    if (source) {
      outcome.source = source;
    }
    return outcome;
  }

  private async executeCalculation(state: ExecutionState, step: CalculateStep): Promise<ToolOutcome> {
    const facts = runCalculation(step.parameters, state.getScratchpad());
    const value = facts[step.parameters.outputVariable];
    return {
      status: 'success',
      structuredOutput: facts,
      summary: `${step.parameters.outputVariable} = ${String(value)}`,
    };
  }

  private async executeReasoning(state: ExecutionState, step: OtherStep): Promise<ToolOutcome> {
    const output = await this.callModel(step, this.options.reasoner.reason(state.query, step, state.getScratchpad()));
    return { status: 'success', structuredOutput: output.facts, summary: output.summary };
  }

  /**
   * Model work inside a step is part of the tool call: it shares the tool
   * deadline and its failures become tool errors. Only an exhausted
   * provider chain escapes.
   */
  private async callModel<T>(step: Step, operation: Promise<T>): Promise<T> {
    const { clock, timeouts } = this.options;
    try {
      return await clock.withTimeout(operation, timeouts.toolMs, `Step ${step.number} did not finish within ${timeouts.toolMs}ms`);
    } catch (error) {
      if (error instanceof ModelUnavailableError || error instanceof ParseError || error instanceof ToolError) {
        throw error;
      }
      if (error instanceof ModelCallError) {
        throw new ToolError(error.timedOut ? 'TIMEOUT' : 'UNAVAILABLE', error.message, error);
      }
      if (error instanceof TimeoutError) {
        throw new ToolError('TIMEOUT', error.message, error);
      }
      if (error instanceof Error) {
        throw new ToolError('UNAVAILABLE', error.message, error);
      }
      throw error;
    }
  }
}

function asToolError(error: unknown): ToolError | undefined {
  if (error instanceof ToolError) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return new ToolError('TIMEOUT', error.message, error);
  }
  return undefined;
}
