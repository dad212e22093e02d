import type { StagePrompt } from './prompt-template';

const PLAN_FORMAT = `{
  "goal": "what a complete answer must establish",
  "requirements": {
    "facts": ["snake_case keys that must be known before answering"],
    "computation": false,
    "formula": "optional expression over the fact keys, when computation is true",
    "outputVariable": "optional key for the computed value"
  },
  "steps": [
    { "action": "...", "tool": "search", "parameters": { "keywords": ["..."], "expectedDocuments": ["document codes"] } },
    { "action": "...", "tool": "calculate", "parameters": { "formula": "a * b", "variables": { "a": "fact_key", "b": 2 }, "outputVariable": "result" } },
    { "action": "...", "tool": "other", "parameters": { "instruction": "reason over gathered facts" } }
  ],
  "scratchpad": {
    "queryDomain": "subject area of the question",
    "priorityDocuments": ["documents most likely to hold the answer"],
    "searchHypotheses": ["where the answer is expected to be"]
  }
}`;

/**
 * Planning prompt: turns the question into an initial plan
 */
export const PLANNER_PROMPT: StagePrompt = {
  role: 'ROLE: planner',
  system: `ROLE: planner

You plan how to answer a domain expert's question from a library of regulatory and technical documents.
Available tools:
- search: keyword search over the document index, optionally restricted to document codes
- calculate: arithmetic over facts already gathered
- other: reasoning over gathered facts, without new sources

Rules:
- Name every fact the answer depends on in requirements.facts, as snake_case keys.
- Set requirements.computation to true only if the answer must be computed from gathered values.
- Prefer few, precise search steps; put a calculate step after the searches that feed it.
- Respond with a single JSON object in this format and nothing else:
${PLAN_FORMAT}`,
  user: {
    description: 'Initial plan for a question',
    requiredVariables: ['query', 'scratchpad'],
    template: `Question:
{{query}}

Known facts:
{{scratchpad}}`,
  },
};

/**
 * Replanning prompt: replaces the remaining steps using a named strategy
 */
export const REPLANNER_PROMPT: StagePrompt = {
  role: 'ROLE: replanner',
  system: `ROLE: replanner

You revise the remaining steps of a plan for answering a domain expert's question.
Completed steps stay as they are; you only propose the steps that come next.
Strategies:
- REFINE_AND_RESTRICT_SEARCH: narrow the search to the most specific documents and terms
- CHANGE_KEYWORDS: search again with different wording, synonyms or document terminology
- FORM_NEW_HYPOTHESIS: assume the answer lives elsewhere and search there
- FORM_CALCULATION_STEP: add the calculation that turns gathered facts into the answer

Never target a rejected source unless the instructions allow it.
Respond with a single JSON object in the planner format and nothing else:
${PLAN_FORMAT}`,
  user: {
    description: 'Revised remaining steps',
    requiredVariables: ['query', 'goal', 'strategy', 'details', 'completedSteps', 'scratchpad', 'rejectedSources'],
    template: `Question:
{{query}}

Goal:
{{goal}}

Strategy: {{strategy}}
Why: {{details}}

Completed steps:
{{completedSteps}}

Known facts:
{{scratchpad}}

Rejected sources:
{{rejectedSources}}`,
  },
};
