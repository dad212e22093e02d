/**
 * Step result model
 * Produced once per executed step; never modified afterwards
 */

import type { FactValue } from './scratchpad.schema';

export type StepResultStatus = 'success' | 'partial' | 'not_found' | 'error';

export interface SourceRef {
  documentName: string;
  /** Page, clause or table inside the document */
  locator: string;
  /** Subject area reported by the document index */
  domain?: string;
}

export type StructuredFacts = Record<string, FactValue>;

export type ToolErrorCode =
  | 'TIMEOUT'
  | 'MALFORMED_RESPONSE'
  | 'UNAVAILABLE'
  | 'INVALID_PARAMETERS'
  | 'CALCULATION_FAILED'
  | 'PARSE_FAILED';

export interface StepResult {
  status: StepResultStatus;
  source?: SourceRef;
  structuredOutput?: StructuredFacts;
  summary?: string;
  error?: {
    code: ToolErrorCode;
    message: string;
  };
  /** Tool invocations made for this step, retries included */
  attempts: number;
}
