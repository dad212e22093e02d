/**
 * Console logger
 * Every line goes to stderr; stdout is reserved for the answer.
 */

import type { LogEvent, LogLevel, Logger, LoggerOptions } from '../types/logger';
import { RecordingLogger } from './recording-logger';

export interface ConsoleLoggerOptions extends LoggerOptions {
  /** Line sink, stderr unless given */
  write?: (line: string) => void;
}

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
};

/** Metadata keys shown inline, in this order, by the pretty format */
const INLINE_KEYS = ['stage', 'step', 'verdict', 'strategy', 'tool', 'code'] as const;

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

/**
 * Renders one event as `12:00:00 WRN [run] (tool_failed) message stage=executing step=2`
 */
export function formatPretty(event: LogEvent, includeTimestamp: boolean): string {
  const parts: string[] = [];
  if (includeTimestamp) {
    parts.push(event.timestamp.slice(11, 19));
  }
  parts.push(LEVEL_TAGS[event.level]);
  if (typeof event.metadata.runId === 'string') {
    parts.push(`[${event.metadata.runId}]`);
  }
  if (event.eventType !== event.level) {
    parts.push(`(${event.eventType})`);
  }
  parts.push(event.message);
  for (const key of INLINE_KEYS) {
    const value = event.metadata[key];
    if (typeof value === 'string' || typeof value === 'number') {
      parts.push(`${key}=${value}`);
    }
  }
  return parts.join(' ');
}

export class ConsoleLogger extends RecordingLogger {
  private readonly options: ConsoleLoggerOptions;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}, events: LogEvent[] = []) {
    super('info', options, events);
    this.options = options;
    this.write = options.write ?? writeStderr;
  }

  protected spawn(events: LogEvent[]): ConsoleLogger {
    return new ConsoleLogger(this.options, events);
  }

  protected emit(event: LogEvent): void {
    this.write(
      this.options.jsonOutput ? JSON.stringify(event) : formatPretty(event, this.options.includeTimestamp ?? true)
    );
  }
}

export function createConsoleLogger(options?: ConsoleLoggerOptions): Logger {
  return new ConsoleLogger(options);
}
