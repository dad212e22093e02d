/**
 * Shapes the language model is asked to produce outside planning
 */

import type { StructuredFacts } from './step-result.schema';

/**
 * Facts extracted from retrieved documents for one search step
 */
export interface DocumentAnalysis {
  status: 'success' | 'partial' | 'not_found';
  /** Name of the retrieved document the facts come from */
  documentName?: string;
  locator?: string;
  facts: StructuredFacts;
  summary: string;
}

/**
 * Output of a reasoning step
 */
export interface ReasoningOutput {
  facts: StructuredFacts;
  summary: string;
}

/**
 * Prose answer composed from the gathered facts
 */
export interface ComposedAnswer {
  text: string;
  limitations: string[];
}
