/**
 * Language model interface
 * Standardized interface for every provider the agent can talk to
 */

import type { Clock } from '../types/clock';
import { TimeoutError } from '../types/clock';
import { ModelCallError, errorMessage } from '../types/errors';

export interface ModelRequest {
  /** Stage instructions */
  system: string;
  /** Stage input */
  prompt: string;
}

export interface LanguageModel {
  /** Provider name ('anthropic', 'claude-cli', 'mock') */
  readonly name: string;

  /**
   * Send one request and return the raw text response
   */
  complete(request: ModelRequest): Promise<string>;
}

export interface LanguageModelOptions {
  clock: Clock;
  /** Extra attempts after a failed call (default: 1) */
  retries?: number;
  retryDelayMs?: number;
  /** Per-call deadline; 0 disables it */
  timeoutMs?: number;
}

/**
 * Base class with retry and timeout handling
 */
export abstract class BaseLanguageModel implements LanguageModel {
  abstract readonly name: string;
  protected readonly clock: Clock;
  protected readonly retries: number;
  protected readonly retryDelayMs: number;
  protected readonly timeoutMs: number;

  constructor(options: LanguageModelOptions) {
    this.clock = options.clock;
    this.retries = options.retries ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  /**
   * Provider-specific single call
   */
  protected abstract completeOnce(request: ModelRequest): Promise<string>;

  /**
   * Whether a failure is worth another attempt
   */
  protected isRetryable(_error: unknown): boolean {
    return true;
  }

  async complete(request: ModelRequest): Promise<string> {
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        return await this.clock.withTimeout(
          this.completeOnce(request),
          this.timeoutMs,
          `${this.name} did not answer within ${this.timeoutMs}ms`
        );
      } catch (error) {
        lastError = error;
        if (attempt === this.retries || !this.isRetryable(error)) {
          break;
        }
        await this.clock.delay(this.retryDelayMs * (attempt + 1));
      }
    }
    throw new ModelCallError(
      this.name,
      `${this.name} failed: ${errorMessage(lastError)}`,
      lastError instanceof TimeoutError,
      lastError
    );
  }
}
