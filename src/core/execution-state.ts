/**
 * Execution state
 *
 * The single mutable record of one question-answering session. Every stage
 * reads and extends it through this API; nothing else holds session data.
 */

import type {
  ExecutionHistoryEntry,
  ExecutionStateSnapshot,
  Plan,
  Scratchpad,
  ScratchpadUpdate,
  ScratchpadValue,
  SessionCounters,
  SessionStatus,
  Step,
} from '../schemas';
import type { Clock } from '../types/clock';
import { InvalidTransitionError, StateFrozenError } from '../types/errors';
import { SessionEvent, TransitionResult, isValidTransition, transition } from './state-machine';

export interface ExecutionStateOptions {
  runId: string;
  query: string;
  clock: Clock;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneValue(value: ScratchpadValue): ScratchpadValue {
  return Array.isArray(value) ? [...value] : value;
}

export class ExecutionState {
  readonly runId: string;
  readonly query: string;

  private readonly clock: Clock;
  private status: SessionStatus = 'planning';
  private plan: Plan | undefined;
  private scratchpad: Scratchpad = {};
  private readonly history: ExecutionHistoryEntry[] = [];
  private counters: SessionCounters = { dispatches: 0, replans: 0, loopsDetected: 0, planningFailures: 0 };
  private lastStepNumber = 0;
  private frozen = false;

  constructor(options: ExecutionStateOptions) {
    this.runId = options.runId;
    this.query = options.query;
    this.clock = options.clock;
  }

  /**
   * Read any value by dot path over the snapshot, e.g. `plan.goal`,
   * `scratchpad.query_domain` or `history.0.result.status`
   */
  get(path: string): unknown {
    let current: unknown = this.snapshot();
    for (const segment of path.split('.')) {
      if (Array.isArray(current)) {
        const index = Number(segment);
        current = Number.isInteger(index) ? current[index] : undefined;
      } else if (isRecord(current)) {
        current = current[segment];
      } else {
        return undefined;
      }
    }
    return current;
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getPlan(): Plan | undefined {
    return this.plan ? structuredClone(this.plan) : undefined;
  }

  getScratchpad(): Scratchpad {
    return structuredClone(this.scratchpad);
  }

  getHistory(): ExecutionHistoryEntry[] {
    return structuredClone(this.history);
  }

  getCounters(): SessionCounters {
    return { ...this.counters };
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * The step at the cursor, or undefined when there is no plan or it is exhausted
   */
  currentStep(): Step | undefined {
    if (!this.plan || this.plan.currentStepIndex === 'exhausted') {
      return undefined;
    }
    return structuredClone(this.plan.steps[this.plan.currentStepIndex]);
  }

  isPlanExhausted(): boolean {
    return this.plan !== undefined && this.plan.currentStepIndex === 'exhausted';
  }

  /**
   * Next step number; numbers never repeat within a session
   */
  nextStepNumber(): number {
    return this.lastStepNumber + 1;
  }

  /**
   * Apply a state machine event; invalid events throw
   */
  applyEvent(event: SessionEvent): TransitionResult {
    this.assertWritable(`event ${event.type}`);
    const result = transition(this.status, event);
    if (!result.valid) {
      throw new InvalidTransitionError(result.description);
    }
    this.status = result.status;
    return result;
  }

  setStatus(next: SessionStatus): void {
    this.assertWritable(`status ${next}`);
    if (!isValidTransition(this.status, next)) {
      throw new InvalidTransitionError(`Invalid transition from ${this.status} to ${next}`);
    }
    this.status = next;
  }

  /**
   * Install the first plan of the session
   */
  installPlan(plan: Omit<Plan, 'currentStepIndex' | 'version'>): void {
    this.assertWritable('installPlan');
    this.plan = {
      goal: plan.goal,
      requirements: structuredClone(plan.requirements),
      steps: [],
      currentStepIndex: 'exhausted',
      version: 0,
    };
    this.replaceRemainingSteps(plan.steps);
  }

  /**
   * Replace every step that is not done; completed steps are kept as they are
   */
  replaceRemainingSteps(steps: Step[]): void {
    this.assertWritable('replaceRemainingSteps');
    if (!this.plan) {
      throw new InvalidTransitionError('No plan installed');
    }
    for (const step of steps) {
      if (step.number <= this.lastStepNumber) {
        throw new InvalidTransitionError(`Step number ${step.number} is not above ${this.lastStepNumber}`);
      }
      this.lastStepNumber = step.number;
    }
    const done = this.plan.steps.filter((step) => step.status === 'done');
    const pending = steps.map((step): Step => ({ ...structuredClone(step), status: 'pending' }));
    this.plan.steps = [...done, ...pending];
    this.plan.version += 1;
    this.plan.currentStepIndex = pending.length > 0 ? done.length : 'exhausted';
  }

  /**
   * Mark the current step done and move the cursor to the next pending step
   */
  advanceStep(): void {
    this.assertWritable('advanceStep');
    if (!this.plan || this.plan.currentStepIndex === 'exhausted') {
      throw new InvalidTransitionError('No current step to advance from');
    }
    const index = this.plan.currentStepIndex;
    this.plan.steps[index] = { ...this.plan.steps[index], status: 'done' };
    const next = this.plan.steps.findIndex((step, i) => i > index && step.status === 'pending');
    this.plan.currentStepIndex = next === -1 ? 'exhausted' : next;
  }

  /**
   * Merge an update: `set` overwrites, `append` extends lists without
   * duplicates, and only `remove` deletes keys
   */
  mergeScratchpad(update: ScratchpadUpdate): void {
    this.assertWritable('mergeScratchpad');
    for (const [key, value] of Object.entries(update.set ?? {})) {
      this.scratchpad[key] = cloneValue(value);
    }
    for (const [key, items] of Object.entries(update.append ?? {})) {
      const existing = this.scratchpad[key];
      const list: string[] = existing === undefined ? [] : Array.isArray(existing) ? [...existing] : [String(existing)];
      for (const item of items) {
        if (!list.includes(item)) {
          list.push(item);
        }
      }
      this.scratchpad[key] = list;
    }
    for (const key of update.remove ?? []) {
      delete this.scratchpad[key];
    }
  }

  appendHistory(entry: Omit<ExecutionHistoryEntry, 'recordedAt'>): ExecutionHistoryEntry {
    this.assertWritable('appendHistory');
    const recorded: ExecutionHistoryEntry = { ...structuredClone(entry), recordedAt: this.clock.iso() };
    this.history.push(recorded);
    return structuredClone(recorded);
  }

  recordDispatch(): number {
    this.assertWritable('recordDispatch');
    this.counters.dispatches += 1;
    return this.counters.dispatches;
  }

  recordReplan(): number {
    this.assertWritable('recordReplan');
    this.counters.replans += 1;
    return this.counters.replans;
  }

  recordLoop(): number {
    this.assertWritable('recordLoop');
    this.counters.loopsDetected += 1;
    return this.counters.loopsDetected;
  }

  recordPlanningFailure(): number {
    this.assertWritable('recordPlanningFailure');
    this.counters.planningFailures += 1;
    return this.counters.planningFailures;
  }

  /**
   * Stop all further mutation
   */
  freeze(): void {
    this.frozen = true;
  }

  snapshot(): ExecutionStateSnapshot {
    return {
      runId: this.runId,
      query: this.query,
      status: this.status,
      plan: this.getPlan(),
      scratchpad: this.getScratchpad(),
      history: this.getHistory(),
      counters: this.getCounters(),
      frozen: this.frozen,
      capturedAt: this.clock.iso(),
    };
  }

  private assertWritable(operation: string): void {
    if (this.frozen) {
      throw new StateFrozenError(operation);
    }
  }
}
