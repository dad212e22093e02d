/**
 * Buffer logger
 * Keeps events in memory for assertions; writes nothing.
 */

import type { LogEvent, LogEventType, LogLevel, LoggerOptions } from '../types/logger';
import { RecordingLogger } from './recording-logger';

export class BufferLogger extends RecordingLogger {
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}, events: LogEvent[] = []) {
    // Everything is captured unless a test narrows it
    super('debug', options, events);
    this.options = options;
  }

  protected spawn(events: LogEvent[]): BufferLogger {
    return new BufferLogger(this.options, events);
  }

  protected emit(): void {
    // recorded only
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  getEventsMatching(pattern: RegExp): LogEvent[] {
    return this.events.filter((e) => pattern.test(e.message));
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  getLastEvent(): LogEvent | undefined {
    return this.events[this.events.length - 1];
  }

  /**
   * Verdicts in the order the judge emitted them
   */
  verdicts(): string[] {
    return this.getEventsByType('verdict_emitted').flatMap((e) =>
      typeof e.metadata.verdict === 'string' ? [e.metadata.verdict] : []
    );
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
