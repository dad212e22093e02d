/**
 * Logger interface
 * Structured logging with session event types and metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the question-answering session lifecycle
 */
export type LogEventType =
  // Session lifecycle
  | 'session_started'
  | 'session_completed'
  | 'session_failed'
  // Stage transitions
  | 'stage_started'
  // Execution
  | 'step_dispatched'
  | 'tool_failed'
  // Judgment
  | 'verdict_emitted'
  | 'loop_detected'
  | 'budget_exceeded'
  | 'replan_applied'
  // Language model output
  | 'parse_failed'
  | 'model_fallback'
  // Escalation
  | 'escalated'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Metadata attached to log events
 */
export interface LogMetadata {
  /** Session identifier */
  runId?: string;
  /** Stage currently active (planning, executing, judging, ...) */
  stage?: string;
  /** Number of the step being executed or judged */
  step?: number;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  includeTimestamp?: boolean;
  jsonOutput?: boolean;
  /** Patterns to redact from log output */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations can write to the console or a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; the level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set context (runId, ...) merged into all subsequent events
   */
  setContext(context: Partial<LogMetadata>): void;

  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  child(additionalContext: Partial<LogMetadata>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Level used for an event type when it is logged through `event()`
 */
export function levelForEvent(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'session_failed':
      return 'error';
    case 'warn':
    case 'tool_failed':
    case 'parse_failed':
    case 'loop_detected':
    case 'budget_exceeded':
    case 'escalated':
    case 'model_fallback':
      return 'warn';
    case 'debug':
    case 'step_dispatched':
    case 'stage_started':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Secret patterns redacted from log output
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  /Bearer\s+[a-zA-Z0-9._-]+/gi,
  /sk-ant-[a-zA-Z0-9-_]{20,}/gi,
  /(?:password|secret|token)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // global regexes keep state between calls
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
