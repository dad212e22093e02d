/**
 * Schemas module - domain records and their runtime validation
 */

export type {
  ToolName,
  StepStatus,
  SearchParameters,
  CalculateParameters,
  ReasoningParameters,
  SearchStep,
  CalculateStep,
  OtherStep,
  Step,
  StepDraft,
  GoalRequirements,
  StepCursor,
  Plan,
  PlanDraft,
} from './plan.schema';
export { TOOL_NAMES } from './plan.schema';

export type { FactValue, ScratchpadValue, Scratchpad, ScratchpadUpdate, ScratchpadSeed } from './scratchpad.schema';
export { ScratchpadKey, RESERVED_SCRATCHPAD_KEYS } from './scratchpad.schema';

export type { StepResultStatus, SourceRef, StructuredFacts, ToolErrorCode, StepResult } from './step-result.schema';

export type {
  Verdict,
  ReplanStrategy,
  DecisionScores,
  ReplanInstructions,
  Decision,
  AdvisorProposal,
} from './decision.schema';
export { VERDICTS, REPLAN_STRATEGIES } from './decision.schema';

export type {
  SessionStatus,
  ExecutionHistoryEntry,
  SessionCounters,
  ExecutionStateSnapshot,
  FinalAnswer,
  HumanReviewRequest,
  SessionOutcome,
} from './session.schema';

export type { DocumentAnalysis, ReasoningOutput, ComposedAnswer } from './model-output.schema';

export type { ValidationResult, RawPlanDraft, RawStepDraft } from './validators';
export {
  extractJson,
  validateRawPlanDraft,
  parseRawPlanDraft,
  validateStepDraft,
  validateDocumentAnalysis,
  parseDocumentAnalysis,
  parseReasoningOutput,
  parseComposedAnswer,
  parseAdvisorProposal,
  validateDecision,
} from './validators';
