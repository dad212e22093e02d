export type { PlannerOptions } from './planner';
export { Planner } from './planner';
export type { ReplannerOptions } from './replanner';
export { Replanner, calculationFromRequirements, withoutRejectedSources } from './replanner';
export { toPlanDraft, validateStepDrafts, numberSteps, seedUpdate } from './plan-validation';
