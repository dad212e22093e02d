/**
 * Model-backed tools: fact extraction from retrieved documents, and
 * reasoning over gathered facts
 */

import { parseDocumentAnalysis, parseReasoningOutput } from '../schemas';
import type { DocumentAnalysis, OtherStep, ReasoningOutput, Scratchpad, SearchStep } from '../schemas';
import type { Logger } from '../types/logger';
import type { LanguageModel } from '../llm/language-model';
import { completeStructured } from '../llm/structured-output';
import { ANALYZER_PROMPT, REASONING_PROMPT, formatForPrompt, renderStage } from '../templates';
import type { DocumentHit } from './search-tool';
import { hitDocumentName, hitLocator } from './search-tool';

const MAX_EXCERPT_CHARS = 4000;

export function formatHits(hits: DocumentHit[]): string {
  return hits
    .map((hit, index) => {
      const text = hit.text || hit.snippet;
      const excerpt = text.length > MAX_EXCERPT_CHARS ? `${text.slice(0, MAX_EXCERPT_CHARS)}...` : text;
      return `[${index + 1}] ${hitDocumentName(hit)} (${hitLocator(hit)})\n${excerpt}`;
    })
    .join('\n\n');
}

export interface ModelToolOptions {
  model: LanguageModel;
  logger: Logger;
  maxParseRetries: number;
}

export class DocumentAnalyzer {
  constructor(private readonly options: ModelToolOptions) {}

  /**
   * @throws ParseError when the model output never validates
   */
  async analyze(query: string, step: SearchStep, hits: DocumentHit[]): Promise<DocumentAnalysis> {
    const { model, logger, maxParseRetries } = this.options;
    const request = renderStage(ANALYZER_PROMPT, { query, action: step.action, documents: formatHits(hits) });
    return completeStructured(model, request, {
      stage: 'analyzer',
      parse: parseDocumentAnalysis,
      maxRetries: maxParseRetries,
      logger,
    });
  }
}

export class Reasoner {
  constructor(private readonly options: ModelToolOptions) {}

  /**
   * @throws ParseError when the model output never validates
   */
  async reason(query: string, step: OtherStep, scratchpad: Scratchpad): Promise<ReasoningOutput> {
    const { model, logger, maxParseRetries } = this.options;
    const request = renderStage(REASONING_PROMPT, {
      query,
      instruction: step.parameters.instruction,
      scratchpad: formatForPrompt(scratchpad),
    });
    return completeStructured(model, request, {
      stage: 'reasoning',
      parse: parseReasoningOutput,
      maxRetries: maxParseRetries,
      logger,
    });
  }
}
