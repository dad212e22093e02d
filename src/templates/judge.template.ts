import type { StagePrompt } from './prompt-template';

/**
 * Advisory verdict; the rule pipeline decides whether it is used
 */
export const JUDGE_ADVISOR_PROMPT: StagePrompt = {
  role: 'ROLE: judge advisor',
  system: `ROLE: judge advisor

You review the latest step of a question-answering session and advise on what to do next.
Verdicts: CONTINUE, REPLAN, FINALIZE, HUMAN_REVIEW.
Strategies for REPLAN: REFINE_AND_RESTRICT_SEARCH, CHANGE_KEYWORDS, FORM_NEW_HYPOTHESIS, FORM_CALCULATION_STEP.
You may report facts the step established that the extraction missed.
With REPLAN, set "revisitRejectedSources": true only when a source listed under rejected_sources was rejected wrongly.
Respond with a single JSON object and nothing else:
{ "verdict": "CONTINUE", "reasoning": "...", "strategy": "CHANGE_KEYWORDS", "facts": { "key": 1 } }`,
  user: {
    description: 'Review of one step',
    requiredVariables: ['query', 'requirements', 'step', 'result', 'scratchpad'],
    template: `Question:
{{query}}

Required facts:
{{requirements}}

Step:
{{step}}

Result:
{{result}}

Known facts:
{{scratchpad}}`,
  },
};
