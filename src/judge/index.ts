export type { JudgeInput, JudgePolicy, JudgeOptions, JudgeRuling } from './judge';
export { decide, rule, statusBias, buildJudgeInput, Judge } from './judge';
export type { AdvisorContext, JudgeAdvisor, ModelJudgeAdvisorOptions } from './judge-advisor';
export { ModelJudgeAdvisor } from './judge-advisor';
export { scoreSourceRelevance, tokenize, normalizeName, isRejectedSource } from './relevance';
export type { Contradiction, ConsistencyReport } from './consistency';
export { checkConsistency, valuesContradict, describeContradictions } from './consistency';
export { stepSignature, detectLoop, chooseLoopEscapeStrategy } from './loop-detection';
export type { GoalAssessment } from './goal-completion';
export { assessGoal } from './goal-completion';
