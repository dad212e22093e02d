export type { AnswerComposer, ModelAnswerComposerOptions, FinalizerOptions } from './finalizer';
export {
  Finalizer,
  ModelAnswerComposer,
  collectCitations,
  answerFacts,
  deriveLimitations,
  formatAnswerText,
} from './finalizer';
export type { EscalationGateOptions } from './escalation-gate';
export { EscalationGate } from './escalation-gate';
