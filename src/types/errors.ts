/**
 * Error classes for the session control loop
 *
 * Expected failures are carried as Result values; these classes name the
 * failure so each stage can decide whether to retry, replan or escalate.
 */

/**
 * Model output could not be parsed into the required structure after the
 * allowed number of re-prompts
 */
export class ParseError extends Error {
  constructor(
    readonly stage: string,
    readonly attempts: number,
    readonly issues: string[]
  ) {
    super(`${stage} output failed validation after ${attempts} attempt(s): ${issues.join('; ')}`);
    this.name = 'ParseError';
  }
}

/**
 * An external tool call failed or timed out
 */
export class ToolError extends Error {
  constructor(
    readonly code: 'TIMEOUT' | 'MALFORMED_RESPONSE' | 'UNAVAILABLE' | 'INVALID_PARAMETERS' | 'CALCULATION_FAILED',
    message: string,
    readonly underlying?: unknown
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

/**
 * One provider gave up on a request after its own retries. `timedOut` is
 * set when the last attempt hit the call deadline.
 */
export class ModelCallError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly timedOut: boolean,
    readonly underlying?: unknown
  ) {
    super(message);
    this.name = 'ModelCallError';
  }
}

/**
 * A plan or step is malformed (empty goal, unknown tool, no steps)
 */
export class PlanValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid plan: ${issues.join('; ')}`);
    this.name = 'PlanValidationError';
  }
}

/**
 * Every configured language model provider failed
 */
export class ModelUnavailableError extends Error {
  constructor(
    readonly providers: string[],
    readonly causes: unknown[]
  ) {
    super(`No language model provider available (tried: ${providers.join(', ')})`);
    this.name = 'ModelUnavailableError';
  }
}

/**
 * A status change not permitted by the session state machine
 */
export class InvalidTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Mutation attempted after the state was frozen for human review
 */
export class StateFrozenError extends Error {
  constructor(operation: string) {
    super(`Execution state is frozen; ${operation} rejected`);
    this.name = 'StateFrozenError';
  }
}

/**
 * A configuration file exists but could not be used
 */
export class ConfigError extends Error {
  constructor(
    readonly path: string,
    readonly issues: string[]
  ) {
    super(`Invalid configuration in ${path}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
