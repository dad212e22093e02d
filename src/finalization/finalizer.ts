/**
 * Finalizer
 *
 * Builds the answer from the scratchpad and cites only sources that appear
 * in history on a usable result. An optional composer may word the answer;
 * the citations are never taken from it.
 */

import { RESERVED_SCRATCHPAD_KEYS, parseComposedAnswer } from '../schemas';
import type {
  ComposedAnswer,
  ExecutionHistoryEntry,
  FactValue,
  FinalAnswer,
  Plan,
  Scratchpad,
  SourceRef,
} from '../schemas';
import type { Logger } from '../types/logger';
import { InvalidTransitionError, errorMessage } from '../types/errors';
import type { LanguageModel } from '../llm/language-model';
import { completeStructured } from '../llm/structured-output';
import { ANSWER_PROMPT, formatForPrompt, renderStage } from '../templates';
import type { ExecutionState } from '../core/execution-state';
import { isRejectedSource } from '../judge/relevance';

/**
 * Distinct sources of successful or partial results, in history order
 */
export function collectCitations(history: ExecutionHistoryEntry[], scratchpad: Scratchpad): SourceRef[] {
  const seen = new Set<string>();
  const citations: SourceRef[] = [];
  for (const entry of history) {
    const { source, status } = entry.result;
    if (!source || (status !== 'success' && status !== 'partial')) {
      continue;
    }
    if (isRejectedSource(scratchpad, source.documentName)) {
      continue;
    }
    const key = `${source.documentName}\u0000${source.locator}`;
    if (!seen.has(key)) {
      seen.add(key);
      citations.push(source);
    }
  }
  return citations;
}

/**
 * Non-reserved facts, required ones first
 */
export function answerFacts(plan: Plan | undefined, scratchpad: Scratchpad): Array<[string, FactValue]> {
  const required = plan?.requirements.facts ?? [];
  const output = plan?.requirements.outputVariable;
  const keys = Object.keys(scratchpad).filter((key) => !RESERVED_SCRATCHPAD_KEYS.includes(key));
  const rank = (key: string): number => {
    if (key === output) return 0;
    const index = required.indexOf(key);
    return index === -1 ? required.length + 1 : index + 1;
  };
  const ordered = [...keys].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));

  const facts: Array<[string, FactValue]> = [];
  for (const key of ordered) {
    const value = scratchpad[key];
    if (!Array.isArray(value)) {
      facts.push([key, value]);
    }
  }
  return facts;
}

export function deriveLimitations(plan: Plan | undefined, scratchpad: Scratchpad, citations: SourceRef[]): string[] {
  const limitations: string[] = [];
  const missing = (plan?.requirements.facts ?? []).filter((fact) => scratchpad[fact] === undefined);
  if (missing.length > 0) {
    limitations.push(`Not established: ${missing.join(', ')}`);
  }
  if (citations.length === 0) {
    limitations.push('No retrieved document supports this answer');
  }
  return limitations;
}

export function formatAnswerText(goal: string, facts: Array<[string, FactValue]>, citations: SourceRef[]): string {
  const lines = [goal];
  for (const [key, value] of facts) {
    lines.push(`- ${key}: ${String(value)}`);
  }
  if (citations.length > 0) {
    lines.push(`Sources: ${citations.map((c) => `${c.documentName} (${c.locator})`).join('; ')}`);
  }
  return lines.join('\n');
}

export interface AnswerComposer {
  compose(input: {
    query: string;
    goal: string;
    facts: Array<[string, FactValue]>;
    citations: SourceRef[];
  }): Promise<ComposedAnswer>;
}

export interface ModelAnswerComposerOptions {
  model: LanguageModel;
  logger: Logger;
  maxParseRetries: number;
}

export class ModelAnswerComposer implements AnswerComposer {
  constructor(private readonly options: ModelAnswerComposerOptions) {}

  compose(input: Parameters<AnswerComposer['compose']>[0]): Promise<ComposedAnswer> {
    const request = renderStage(ANSWER_PROMPT, {
      query: input.query,
      goal: input.goal,
      facts: formatForPrompt(Object.fromEntries(input.facts)),
      sources: formatForPrompt(input.citations.map((c) => `${c.documentName} (${c.locator})`).join('\n')),
    });
    return completeStructured(this.options.model, request, {
      stage: 'composer',
      parse: parseComposedAnswer,
      maxRetries: this.options.maxParseRetries,
      logger: this.options.logger,
    });
  }
}

export interface FinalizerOptions {
  logger: Logger;
  composer?: AnswerComposer;
}

export class Finalizer {
  constructor(private readonly options: FinalizerOptions) {}

  /**
   * Produce the answer and complete the session
   */
  async finalize(state: ExecutionState): Promise<FinalAnswer> {
    if (state.getStatus() !== 'finalizing') {
      throw new InvalidTransitionError(`Cannot finalize from status ${state.getStatus()}`);
    }
    const { logger, composer } = this.options;
    logger.event('stage_started', 'Finalizing', { stage: 'finalizer' });

    const plan = state.getPlan();
    const scratchpad = state.getScratchpad();
    const citations = collectCitations(state.getHistory(), scratchpad);
    const facts = answerFacts(plan, scratchpad);
    const goal = plan?.goal ?? state.query;
    const limitations = deriveLimitations(plan, scratchpad, citations);

    let text = formatAnswerText(goal, facts, citations);
    if (composer) {
      try {
        const composed = await composer.compose({ query: state.query, goal, facts, citations });
        text = composed.text;
        for (const limitation of composed.limitations) {
          if (!limitations.includes(limitation)) {
            limitations.push(limitation);
          }
        }
      } catch (error) {
        logger.warn(`Answer composer failed, using the fact summary: ${errorMessage(error)}`, { stage: 'finalizer' });
      }
    }

    state.applyEvent({ type: 'ANSWER_READY' });
    state.freeze();
    return { text, citations, limitations };
  }
}
