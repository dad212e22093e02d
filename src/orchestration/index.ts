/**
 * Orchestration module - wires configuration into a runnable session
 */

export type { SessionServices, Session } from './session-factory';
export { createSession, createSearchTool, createSessionLogger, logLevelFor } from './session-factory';
