import type { StagePrompt } from './prompt-template';

/**
 * Extracts structured facts from the documents a search returned
 */
export const ANALYZER_PROMPT: StagePrompt = {
  role: 'ROLE: document analyst',
  system: `ROLE: document analyst

You read excerpts of regulatory and technical documents and extract the facts a step asks for.
Only report what the excerpts state. Use snake_case keys and plain numbers for values (units go in the key, e.g. cover_mm).
Respond with a single JSON object and nothing else:
{
  "status": "success | partial | not_found",
  "documentName": "name of the excerpt the facts come from",
  "locator": "clause, table or page",
  "facts": { "key": 25 },
  "summary": "one or two sentences"
}`,
  user: {
    description: 'Fact extraction for a search step',
    requiredVariables: ['query', 'action', 'documents'],
    template: `Question:
{{query}}

Step:
{{action}}

Excerpts:
{{documents}}`,
  },
};

/**
 * Answers a reasoning step from the facts already gathered
 */
export const REASONING_PROMPT: StagePrompt = {
  role: 'ROLE: reasoning step',
  system: `ROLE: reasoning step

You work only from the facts provided; you have no access to documents.
Respond with a single JSON object and nothing else:
{ "facts": { "key": "value" }, "summary": "what you concluded and why" }`,
  user: {
    description: 'Reasoning over gathered facts',
    requiredVariables: ['query', 'instruction', 'scratchpad'],
    template: `Question:
{{query}}

Instruction:
{{instruction}}

Known facts:
{{scratchpad}}`,
  },
};
