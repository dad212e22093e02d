/**
 * Clock interface
 * Abstracts time so timeouts and timestamps are deterministic in tests
 */

/**
 * Raised when an operation outlives its deadline
 */
export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number, message?: string) {
    super(message ?? `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export interface Clock {
  now(): Date;

  /** Unix timestamp in milliseconds */
  timestamp(): number;

  /** ISO 8601 string for the current time */
  iso(): string;

  delay(ms: number): Promise<void>;

  /**
   * Race a promise against a deadline; rejects with TimeoutError when the
   * deadline passes first. A non-positive `ms` disables the deadline.
   */
  withTimeout<T>(operation: Promise<T>, ms: number, message?: string): Promise<T>;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }

  delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  withTimeout<T>(operation: Promise<T>, ms: number, message?: string): Promise<T> {
    if (ms <= 0) {
      return operation;
    }
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new TimeoutError(ms, message)), ms);
      operation.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }
}

interface PendingTimer {
  time: number;
  fire: () => void;
}

/**
 * Mock implementation of Clock for testing
 * Time only moves when `advance` or `setTime` is called.
 */
export class MockClock implements Clock {
  private currentTime: Date;
  private timers: PendingTimer[] = [];

  constructor(initialTime?: Date) {
    this.currentTime = initialTime ?? new Date('2025-01-01T00:00:00.000Z');
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime.getTime();
  }

  iso(): string {
    return this.currentTime.toISOString();
  }

  delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.timers.push({ time: this.timestamp() + ms, fire: resolve });
    });
  }

  withTimeout<T>(operation: Promise<T>, ms: number, message?: string): Promise<T> {
    if (ms <= 0) {
      return operation;
    }
    return new Promise<T>((resolve, reject) => {
      const timer: PendingTimer = {
        time: this.timestamp() + ms,
        fire: () => reject(new TimeoutError(ms, message)),
      };
      this.timers.push(timer);
      operation.then(
        (value) => {
          this.timers = this.timers.filter((t) => t !== timer);
          resolve(value);
        },
        (error: unknown) => {
          this.timers = this.timers.filter((t) => t !== timer);
          reject(error);
        }
      );
    });
  }

  /**
   * Advance time and fire any timers that are now due
   */
  advance(ms: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + ms);
    this.fireDue();
  }

  setTime(time: Date): void {
    this.currentTime = new Date(time);
    this.fireDue();
  }

  /** Number of timers still waiting */
  pendingTimers(): number {
    return this.timers.length;
  }

  private fireDue(): void {
    const now = this.timestamp();
    const due = this.timers.filter((t) => t.time <= now);
    this.timers = this.timers.filter((t) => t.time > now);
    due.forEach((t) => t.fire());
  }
}
