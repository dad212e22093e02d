/**
 * Decision model
 * The judge's verdict for one executed step
 */

import type { StructuredFacts } from './step-result.schema';
import type { ScratchpadUpdate } from './scratchpad.schema';

export type Verdict = 'CONTINUE' | 'REPLAN' | 'FINALIZE' | 'HUMAN_REVIEW';

export const VERDICTS: readonly Verdict[] = ['CONTINUE', 'REPLAN', 'FINALIZE', 'HUMAN_REVIEW'];

export type ReplanStrategy =
  | 'REFINE_AND_RESTRICT_SEARCH'
  | 'CHANGE_KEYWORDS'
  | 'FORM_NEW_HYPOTHESIS'
  | 'FORM_CALCULATION_STEP';

export const REPLAN_STRATEGIES: readonly ReplanStrategy[] = [
  'REFINE_AND_RESTRICT_SEARCH',
  'CHANGE_KEYWORDS',
  'FORM_NEW_HYPOTHESIS',
  'FORM_CALCULATION_STEP',
];

export interface DecisionScores {
  /** 0-1 agreement between the source domain and the query domain */
  sourceRelevance: number;
  /** 0-1 share of compared facts that agree with the scratchpad */
  contextConsistency: number;
}

export interface ReplanInstructions {
  strategy: ReplanStrategy;
  details: string;
  /** Permit steps that target previously rejected sources; set from an advisor replan that asks to revisit them */
  allowRejectedSources?: boolean;
}

export interface Decision {
  verdict: Verdict;
  reasoning: string;
  scores: DecisionScores;
  contradictionDetails?: string;
  /** Scratchpad keys whose new values contradicted the stored ones */
  contradictedKeys?: string[];
  isLoopDetected: boolean;
  replanInstructions?: ReplanInstructions;
  scratchpadUpdate?: ScratchpadUpdate;
  humanReviewReason?: string;
}

/**
 * Verdict proposed by the language model; only advisory
 */
export interface AdvisorProposal {
  verdict: Verdict;
  reasoning: string;
  strategy?: ReplanStrategy;
  facts?: StructuredFacts;
  /** A rejected source deserves another look; honoured only with REPLAN */
  revisitRejectedSources?: boolean;
}
