/**
 * Logging module - structured logging implementations
 */

export { ConsoleLogger, createConsoleLogger, formatPretty } from './console-logger';
export type { ConsoleLoggerOptions } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';
export { formatSessionSummary, outcomeSnapshot } from './session-summary';
