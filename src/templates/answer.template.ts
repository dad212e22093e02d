import type { StagePrompt } from './prompt-template';

/**
 * Composes the prose answer from gathered facts and their sources
 */
export const ANSWER_PROMPT: StagePrompt = {
  role: 'ROLE: answer composer',
  system: `ROLE: answer composer

You write the final answer to a domain expert's question using only the facts and sources provided.
Refer to sources by their document name. State the limitations of the answer.
Respond with a single JSON object and nothing else:
{ "text": "the answer", "limitations": ["..."] }`,
  user: {
    description: 'Final answer',
    requiredVariables: ['query', 'goal', 'facts', 'sources'],
    template: `Question:
{{query}}

Goal:
{{goal}}

Facts:
{{facts}}

Sources:
{{sources}}`,
  },
};
