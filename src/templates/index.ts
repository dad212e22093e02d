export type { PromptTemplate, StagePrompt } from './prompt-template';
export { interpolateTemplate, formatForPrompt, renderStage } from './prompt-template';
export { PLANNER_PROMPT, REPLANNER_PROMPT } from './planner.template';
export { ANALYZER_PROMPT, REASONING_PROMPT } from './analysis.template';
export { JUDGE_ADVISOR_PROMPT } from './judge.template';
export { ANSWER_PROMPT } from './answer.template';
