import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  levelForEvent,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

/**
 * Shared machinery for loggers that keep every accepted event.
 * Children append to the parent's event list, so a session's stages,
 * steps and tools all land in one ordered record.
 */
export abstract class RecordingLogger implements Logger {
  private context: Partial<LogMetadata> = {};
  private minLevel: LogLevel;
  protected readonly redactPatterns: RegExp[];

  protected constructor(
    defaultLevel: LogLevel,
    options: LoggerOptions,
    protected readonly events: LogEvent[]
  ) {
    this.minLevel = options.minLevel ?? defaultLevel;
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  /** Build an empty logger of the same kind sharing `events` */
  protected abstract spawn(events: LogEvent[]): RecordingLogger;

  /** Called once per accepted event, after it has been recorded */
  protected abstract emit(event: LogEvent): void;

  debug(message: string, metadata?: LogMetadata): void {
    this.record('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.record('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.record('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.record('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.record(levelForEvent(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const child = this.spawn(this.events);
    child.setContext({ ...this.context, ...additionalContext });
    child.setMinLevel(this.minLevel);
    return child;
  }

  private record(level: LogLevel, eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }
    const merged: LogMetadata = {};
    for (const [key, value] of Object.entries({ ...this.context, ...metadata })) {
      if (value === undefined) continue;
      merged[key] = typeof value === 'string' ? redactSecrets(value, this.redactPatterns) : value;
    }
    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: redactSecrets(message, this.redactPatterns),
      metadata: merged,
    };
    this.events.push(event);
    this.emit(event);
  }
}
