/**
 * Plan and step model
 * Ordered task structure produced by planning and consumed by the dispatcher
 */

import type { ScratchpadSeed } from './scratchpad.schema';

export type ToolName = 'search' | 'calculate' | 'other';

export const TOOL_NAMES: readonly ToolName[] = ['search', 'calculate', 'other'];

export type StepStatus = 'pending' | 'done';

export interface SearchParameters {
  /** Ordered keywords sent to the document index */
  keywords: string[];
  /** Document codes the search is restricted to (empty = any) */
  expectedDocuments: string[];
}

export interface CalculateParameters {
  /** Arithmetic expression over the variable names */
  formula: string;
  /** Literal numbers, or scratchpad keys resolved at dispatch time */
  variables: Record<string, number | string>;
  /** Scratchpad key the result is stored under */
  outputVariable: string;
}

export interface ReasoningParameters {
  instruction: string;
}

interface StepBase {
  /** Unique and monotonic across plan versions */
  number: number;
  action: string;
  status: StepStatus;
}

export interface SearchStep extends StepBase {
  tool: 'search';
  parameters: SearchParameters;
}

export interface CalculateStep extends StepBase {
  tool: 'calculate';
  parameters: CalculateParameters;
}

/**
 * A reasoning step answered by the language model from scratchpad facts
 */
export interface OtherStep extends StepBase {
  tool: 'other';
  parameters: ReasoningParameters;
}

export type Step = SearchStep | CalculateStep | OtherStep;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A step as proposed by the planner, before it is numbered
 */
export type StepDraft = DistributiveOmit<Step, 'number' | 'status'>;

/**
 * What must be true before the goal may be finalized
 */
export interface GoalRequirements {
  /** Scratchpad keys that must hold a value */
  facts: string[];
  /** Whether a calculate step must have succeeded */
  computation: boolean;
  /** Expression over `facts` used when a calculation step is injected */
  formula?: string;
  /** Scratchpad key for the computed value */
  outputVariable?: string;
}

/**
 * Cursor into `Plan.steps`: the index of a pending step, or 'exhausted'
 */
export type StepCursor = number | 'exhausted';

export interface Plan {
  goal: string;
  requirements: GoalRequirements;
  steps: Step[];
  currentStepIndex: StepCursor;
  /** Incremented by every replan */
  version: number;
}

/**
 * Planner output
 */
export interface PlanDraft {
  goal: string;
  requirements: GoalRequirements;
  steps: StepDraft[];
  /** Initial durable facts (query domain, priority documents, hypotheses) */
  scratchpad?: ScratchpadSeed;
}
