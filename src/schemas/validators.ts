/**
 * Schema validation with Zod
 * Every structure that crosses the language-model boundary is validated here
 * before it reaches planning or judgment.
 */

import { z } from 'zod';
import { Result, ok, err } from '../types/result';
import type { AdvisorProposal, Decision } from './decision.schema';
import type { StepDraft } from './plan.schema';
import type { ComposedAnswer, DocumentAnalysis, ReasoningOutput } from './model-output.schema';

export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: string[] };

function validateWith<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)),
  };
}

/**
 * Pull a JSON value out of model text: the whole text, a fenced block, or
 * the outermost braces, in that order
 */
export function extractJson(text: string): Result<unknown, string> {
  const candidates: string[] = [text.trim()];
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (fenced) {
    candidates.push(fenced[1].trim());
  }
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }

  let lastError = 'No JSON object found';
  for (const candidate of candidates) {
    if (candidate.length === 0) {
      continue;
    }
    try {
      const value: unknown = JSON.parse(candidate);
      return ok(value);
    } catch (e) {
      lastError = `Invalid JSON: ${e instanceof Error ? e.message : String(e)}`;
    }
  }
  return err(lastError);
}

function parseWith<T>(text: string, validate: (data: unknown) => ValidationResult<T>): ValidationResult<T> {
  const json = extractJson(text);
  if (!json.ok) {
    return { success: false, errors: [json.error] };
  }
  return validate(json.value);
}

// =============================================================================
// Shared pieces
// =============================================================================

const factValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const structuredFactsSchema = z.record(factValueSchema);
const scratchpadValueSchema = z.union([factValueSchema, z.array(z.string())]);
const verdictSchema = z.enum(['CONTINUE', 'REPLAN', 'FINALIZE', 'HUMAN_REVIEW']);
const strategySchema = z.enum([
  'REFINE_AND_RESTRICT_SEARCH',
  'CHANGE_KEYWORDS',
  'FORM_NEW_HYPOTHESIS',
  'FORM_CALCULATION_STEP',
]);

// =============================================================================
// Plan drafts
// =============================================================================

/**
 * Structural shape of planner output. Tools and parameters are checked
 * separately so that a well-formed but unusable plan is a validation error,
 * not a parse error.
 */
const rawPlanDraftSchema = z.object({
  goal: z.string(),
  requirements: z
    .object({
      facts: z.array(z.string()).default([]),
      computation: z.boolean().default(false),
      formula: z.string().optional(),
      outputVariable: z.string().optional(),
    })
    .default({}),
  steps: z.array(
    z.object({
      action: z.string(),
      tool: z.string(),
      parameters: z.record(z.unknown()).default({}),
    })
  ),
  scratchpad: z
    .object({
      queryDomain: z.string().optional(),
      priorityDocuments: z.array(z.string()).optional(),
      searchHypotheses: z.array(z.string()).optional(),
    })
    .optional(),
});

export type RawPlanDraft = z.output<typeof rawPlanDraftSchema>;

export type RawStepDraft = RawPlanDraft['steps'][number];

const stepDraftSchema = z.discriminatedUnion('tool', [
  z.object({
    tool: z.literal('search'),
    action: z.string().min(1, 'Action cannot be empty'),
    parameters: z.object({
      keywords: z.array(z.string().min(1)).min(1, 'At least one keyword is required'),
      expectedDocuments: z.array(z.string().min(1)).default([]),
    }),
  }),
  z.object({
    tool: z.literal('calculate'),
    action: z.string().min(1, 'Action cannot be empty'),
    parameters: z.object({
      formula: z.string().min(1, 'Formula cannot be empty'),
      variables: z.record(z.union([z.number(), z.string().min(1)])).default({}),
      outputVariable: z.string().min(1, 'Output variable cannot be empty'),
    }),
  }),
  z.object({
    tool: z.literal('other'),
    action: z.string().min(1, 'Action cannot be empty'),
    parameters: z.object({
      instruction: z.string().min(1, 'Instruction cannot be empty'),
    }),
  }),
]);

export function validateRawPlanDraft(data: unknown): ValidationResult<RawPlanDraft> {
  return validateWith(rawPlanDraftSchema, data);
}

export function parseRawPlanDraft(text: string): ValidationResult<RawPlanDraft> {
  return parseWith(text, validateRawPlanDraft);
}

/**
 * Validate one step against the parameters its tool takes
 */
export function validateStepDraft(data: unknown): ValidationResult<StepDraft> {
  return validateWith(stepDraftSchema, data);
}

// =============================================================================
// Model outputs used by the dispatcher and finalizer
// =============================================================================

const documentAnalysisSchema = z.object({
  status: z.enum(['success', 'partial', 'not_found']),
  documentName: z.string().min(1).optional(),
  locator: z.string().optional(),
  facts: structuredFactsSchema.default({}),
  summary: z.string().default(''),
});

export function validateDocumentAnalysis(data: unknown): ValidationResult<DocumentAnalysis> {
  return validateWith(documentAnalysisSchema, data);
}

export function parseDocumentAnalysis(text: string): ValidationResult<DocumentAnalysis> {
  return parseWith(text, validateDocumentAnalysis);
}

const reasoningOutputSchema = z.object({
  facts: structuredFactsSchema.default({}),
  summary: z.string().min(1, 'Summary cannot be empty'),
});

export function parseReasoningOutput(text: string): ValidationResult<ReasoningOutput> {
  return parseWith(text, (data) => validateWith(reasoningOutputSchema, data));
}

const composedAnswerSchema = z.object({
  text: z.string().min(1, 'Answer text cannot be empty'),
  limitations: z.array(z.string()).default([]),
});

export function parseComposedAnswer(text: string): ValidationResult<ComposedAnswer> {
  return parseWith(text, (data) => validateWith(composedAnswerSchema, data));
}

const advisorProposalSchema = z.object({
  verdict: verdictSchema,
  reasoning: z.string().min(1, 'Reasoning cannot be empty'),
  strategy: strategySchema.optional(),
  facts: structuredFactsSchema.optional(),
  revisitRejectedSources: z.boolean().optional(),
});

export function parseAdvisorProposal(text: string): ValidationResult<AdvisorProposal> {
  return parseWith(text, (data) => validateWith(advisorProposalSchema, data));
}

// =============================================================================
// Decisions
// =============================================================================

const unitScore = z.number().min(0).max(1);

const decisionSchema = z.object({
  verdict: verdictSchema,
  reasoning: z.string().min(1, 'Reasoning cannot be empty'),
  scores: z.object({
    sourceRelevance: unitScore,
    contextConsistency: unitScore,
  }),
  contradictionDetails: z.string().optional(),
  contradictedKeys: z.array(z.string()).optional(),
  isLoopDetected: z.boolean(),
  replanInstructions: z
    .object({
      strategy: strategySchema,
      details: z.string(),
      allowRejectedSources: z.boolean().optional(),
    })
    .optional(),
  scratchpadUpdate: z
    .object({
      set: z.record(scratchpadValueSchema).optional(),
      append: z.record(z.array(z.string())).optional(),
      remove: z.array(z.string()).optional(),
    })
    .optional(),
  humanReviewReason: z.string().optional(),
});

/**
 * Validate a decision before the orchestrator routes on it. A REPLAN must
 * say how to replan.
 */
export function validateDecision(data: unknown): ValidationResult<Decision> {
  const result = validateWith(decisionSchema, data);
  if (result.success && result.data.verdict === 'REPLAN' && !result.data.replanInstructions) {
    return { success: false, errors: ['replanInstructions: required when verdict is REPLAN'] };
  }
  return result;
}
