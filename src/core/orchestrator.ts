/**
 * Session orchestrator
 *
 * Drives one session through plan -> dispatch -> judge until the judge
 * finalizes or escalates. Every stage runs to completion and its effects
 * are applied to the ExecutionState before the next stage starts.
 * Collaborators are injected; see orchestration/session-factory for the
 * production wiring.
 */

import { validateDecision } from '../schemas';
import type { Decision, ReplanInstructions, SessionOutcome, Step, StepResult } from '../schemas';
import type { Clock } from '../types/clock';
import type { Logger } from '../types/logger';
import { ParseError, PlanValidationError, errorMessage } from '../types/errors';
import type { Planner } from '../planning/planner';
import type { Replanner } from '../planning/replanner';
import { numberSteps, seedUpdate } from '../planning/plan-validation';
import type { StepDispatcher } from '../tools/step-dispatcher';
import type { Judge } from '../judge/judge';
import type { Finalizer } from '../finalization/finalizer';
import type { EscalationGate } from '../finalization/escalation-gate';
import { ExecutionState } from './execution-state';
import { checkPlanningFailures } from './budget-policy';
import { isTerminalStatus } from './state-machine';

/**
 * Stage notifications for progress display
 */
export interface SessionProgress {
  stageStarted(label: string): void;
  stageFinished(): void;
}

export interface OrchestratorDependencies {
  planner: Planner;
  replanner: Replanner;
  dispatcher: StepDispatcher;
  judge: Judge;
  finalizer: Finalizer;
  escalationGate: EscalationGate;
  clock: Clock;
  logger: Logger;
  progress?: SessionProgress;
}

export interface RunOptions {
  runId: string;
  /** Checked between stages; an aborted session goes to human review */
  signal?: AbortSignal;
}

const CANCELLED_REASON = 'Session cancelled';

export class SessionOrchestrator {
  constructor(private readonly deps: OrchestratorDependencies) {}

  async run(query: string, options: RunOptions): Promise<SessionOutcome> {
    const { clock, logger } = this.deps;
    const state = new ExecutionState({ runId: options.runId, query, clock });
    const startedAt = clock.timestamp();
    logger.event('session_started', `Session ${options.runId} started`, { runId: options.runId });

    try {
      const outcome = await this.drive(state, options.signal);
      if (outcome.kind === 'answer') {
        const snapshot = outcome.snapshot;
        logger.event(
          'session_completed',
          `Answered after ${snapshot.counters.dispatches} step(s) and ${snapshot.counters.replans} replan(s)`,
          { runId: options.runId, durationMs: clock.timestamp() - startedAt }
        );
      }
      return outcome;
    } catch (error) {
      return this.fail(state, error);
    } finally {
      this.deps.progress?.stageFinished();
    }
  }

  private async drive(state: ExecutionState, signal?: AbortSignal): Promise<SessionOutcome> {
    const planned = await this.plan(state);
    if (planned) {
      return planned;
    }

    for (;;) {
      if (signal?.aborted) {
        return this.humanReview(state, CANCELLED_REASON);
      }
      if (state.isPlanExhausted()) {
        return this.humanReview(state, 'Plan has no step left to execute');
      }

      this.stage(`Executing step ${state.currentStep()?.number ?? '?'}`);
      const dispatched = await this.deps.dispatcher.dispatch(state);
      if (dispatched.kind === 'budget_exhausted') {
        return this.humanReview(state, dispatched.stop.message);
      }
      const { step, result } = dispatched;
      state.applyEvent({ type: 'STEP_EXECUTED', stepNumber: step.number });
      if (signal?.aborted) {
        return this.humanReview(state, CANCELLED_REASON);
      }

      this.stage(`Judging step ${step.number}`);
      const decision = await this.deps.judge.evaluate(state, step, result);
      const checked = validateDecision(decision);
      if (!checked.success) {
        return this.humanReview(state, `Judge produced an invalid decision: ${checked.errors.join('; ')}`);
      }
      this.record(state, step, result, checked.data);
      state.applyEvent({ type: 'VERDICT', verdict: checked.data.verdict });

      switch (checked.data.verdict) {
        case 'CONTINUE':
          break;
        case 'REPLAN': {
          const instructions = checked.data.replanInstructions;
          if (!instructions) {
            return this.humanReview(state, 'REPLAN without instructions', checked.data);
          }
          const replanned = await this.replan(state, instructions);
          if (replanned) {
            return replanned;
          }
          break;
        }
        case 'FINALIZE': {
          this.stage('Composing answer');
          const answer = await this.deps.finalizer.finalize(state);
          return { kind: 'answer', runId: state.runId, answer, snapshot: state.snapshot() };
        }
        case 'HUMAN_REVIEW':
          return this.humanReview(
            state,
            checked.data.humanReviewReason ?? checked.data.reasoning,
            checked.data
          );
      }
    }
  }

  /**
   * Apply the judge's effects: merge facts, then record history
   */
  private record(state: ExecutionState, step: Step, result: StepResult, decision: Decision): void {
    if (decision.scratchpadUpdate) {
      state.mergeScratchpad(decision.scratchpadUpdate);
    }
    state.appendHistory({ step, result, decision, planVersion: state.getPlan()?.version ?? 0 });
    if (decision.isLoopDetected) {
      state.recordLoop();
    }
  }

  /**
   * Install the initial plan; returns an outcome only when planning gave up
   */
  private async plan(state: ExecutionState): Promise<SessionOutcome | undefined> {
    for (;;) {
      this.stage('Planning');
      try {
        const draft = await this.deps.planner.plan(state.query, state.getScratchpad());
        state.mergeScratchpad(seedUpdate(draft.scratchpad));
        const steps = numberSteps(draft.steps, state.nextStepNumber());
        state.installPlan({ goal: draft.goal, requirements: draft.requirements, steps });
        state.applyEvent({ type: 'PLAN_READY', stepCount: steps.length });
        return undefined;
      } catch (error) {
        const gaveUp = await this.onPlanningFailure(state, error);
        if (gaveUp) {
          return gaveUp;
        }
      }
    }
  }

  private async replan(state: ExecutionState, instructions: ReplanInstructions): Promise<SessionOutcome | undefined> {
    for (;;) {
      this.stage(`Replanning (${instructions.strategy})`);
      try {
        const plan = await this.deps.replanner.replan(state, instructions);
        const pending = plan.steps.filter((s) => s.status === 'pending').length;
        state.applyEvent({ type: 'PLAN_READY', stepCount: pending });
        return undefined;
      } catch (error) {
        const gaveUp = await this.onPlanningFailure(state, error);
        if (gaveUp) {
          return gaveUp;
        }
      }
    }
  }

  /**
   * Unparseable output escalates at once; an invalid plan is retried once
   */
  private async onPlanningFailure(state: ExecutionState, error: unknown): Promise<SessionOutcome | undefined> {
    if (error instanceof ParseError) {
      return this.humanReview(state, `Planner output could not be parsed: ${error.message}`);
    }
    if (!(error instanceof PlanValidationError)) {
      throw error;
    }
    const failures = state.recordPlanningFailure();
    const stop = checkPlanningFailures(failures);
    if (stop.shouldStop) {
      return this.humanReview(state, `${stop.message}: ${error.issues.join('; ')}`);
    }
    this.deps.logger.warn(`Plan rejected, retrying: ${error.issues.join('; ')}`, { stage: 'planner' });
    return undefined;
  }

  private async humanReview(state: ExecutionState, reason: string, decision?: Decision): Promise<SessionOutcome> {
    this.deps.progress?.stageFinished();
    const request = await this.deps.escalationGate.escalate(state, reason, decision);
    return { kind: 'human_review', runId: state.runId, request };
  }

  private fail(state: ExecutionState, error: unknown): SessionOutcome {
    const message = errorMessage(error);
    if (!state.isFrozen() && !isTerminalStatus(state.getStatus())) {
      state.applyEvent({ type: 'FAIL', error: error instanceof Error ? error : new Error(message) });
    }
    state.freeze();
    this.deps.logger.event('session_failed', `Session failed: ${message}`, {
      runId: state.runId,
      errorName: error instanceof Error ? error.name : undefined,
    });
    return { kind: 'error', runId: state.runId, message, snapshot: state.snapshot() };
  }

  private stage(label: string): void {
    this.deps.progress?.stageStarted(label);
  }
}
