/**
 * SessionOrchestrator control flow: planning failures, cancellation,
 * unexpected errors and progress notifications
 */

import { describe, it, expect } from 'vitest';
import { createSession } from '../orchestration/session-factory';
import { ScriptedLanguageModel, ModelScript } from '../llm/mock-model';
import { MemorySearchTool } from '../tools/memory-search-tool';
import { MemoryFileSystem } from '../io/memory-file-system';
import { BufferLogger } from '../logging/buffer-logger';
import { MockClock } from '../types/clock';
import type { SessionProgress } from './orchestrator';
import { testConfig } from '../../tests/fixtures/builders';

const QUERY = 'What is the minimum concrete cover for a slab?';

const PLAN = JSON.stringify({
  goal: 'Minimum concrete cover for a slab',
  requirements: { facts: ['min_cover_mm'] },
  steps: [
    { action: 'Look up cover', tool: 'search', parameters: { keywords: ['cover'], expectedDocuments: ['SP 63'] } },
  ],
});

const ANALYSIS = JSON.stringify({
  status: 'success',
  documentName: 'SP 63',
  locator: 'page 12',
  facts: { min_cover_mm: 20 },
  summary: 'Cover is 20 mm',
});

const INVALID_PLAN = JSON.stringify({ goal: '', steps: [] });

class RecordingProgress implements SessionProgress {
  readonly stages: string[] = [];
  finished = 0;

  stageStarted(label: string): void {
    this.stages.push(label);
  }

  stageFinished(): void {
    this.finished += 1;
  }
}

async function setup(scripts: ModelScript[], fallbackResponse?: string | Error) {
  const model = new ScriptedLanguageModel({ scripts, fallbackResponse });
  const logger = new BufferLogger();
  const progress = new RecordingProgress();
  const session = await createSession(testConfig(), {
    logger,
    fs: new MemoryFileSystem('/work'),
    clock: new MockClock(),
    processRunner: {
      spawn: async () => ({ exitCode: 1, durationMs: 0, stdout: '', stderr: '', timedOut: false }),
    },
    env: {},
    progress,
    model,
    search: new MemorySearchTool([
      { id: 'sp63-p12', title: 'Concrete structures', docCode: 'SP 63', pageNumber: 12, text: 'Minimum cover 20 mm' },
    ]),
  });
  if (!session.ok) {
    throw session.error;
  }
  return { orchestrator: session.value.orchestrator, model, logger, progress };
}

describe('SessionOrchestrator', () => {
  it('should report each stage and finish the progress display', async () => {
    const { orchestrator, progress } = await setup([
      { match: 'ROLE: planner', responses: [PLAN] },
      { match: 'ROLE: document analyst', responses: [ANALYSIS] },
    ]);

    const outcome = await orchestrator.run(QUERY, { runId: 'run-test' });

    expect(outcome.kind).toBe('answer');
    expect(progress.stages).toEqual(['Planning', 'Executing step 1', 'Judging step 1', 'Composing answer']);
    expect(progress.finished).toBeGreaterThan(0);
  });

  it('should escalate when planner output never parses', async () => {
    const { orchestrator, model } = await setup([{ match: 'ROLE: planner', responses: ['I cannot help with that'] }]);

    const outcome = await orchestrator.run(QUERY, { runId: 'run-test' });

    expect(outcome.kind).toBe('human_review');
    if (outcome.kind === 'human_review') {
      expect(outcome.request.reason.startsWith('Planner output could not be parsed: planner output failed validation after 4 attempt(s)')).toBe(true);
    }
    // maxParseRetries 3: one call plus three re-prompts
    expect(model.callsMatching('ROLE: planner')).toHaveLength(4);
  });

  it('should retry an invalid plan once', async () => {
    const { orchestrator, logger } = await setup([
      { match: 'ROLE: planner', responses: [INVALID_PLAN, PLAN] },
      { match: 'ROLE: document analyst', responses: [ANALYSIS] },
    ]);

    const outcome = await orchestrator.run(QUERY, { runId: 'run-test' });

    expect(outcome.kind).toBe('answer');
    expect(logger.getEventsMatching(/^Plan rejected, retrying/)).toHaveLength(1);
    if (outcome.kind === 'answer') {
      expect(outcome.snapshot.counters.planningFailures).toBe(1);
    }
  });

  it('should escalate when the plan is invalid twice', async () => {
    const { orchestrator } = await setup([{ match: 'ROLE: planner', responses: [INVALID_PLAN] }]);

    const outcome = await orchestrator.run(QUERY, { runId: 'run-test' });

    expect(outcome.kind).toBe('human_review');
    if (outcome.kind === 'human_review') {
      expect(outcome.request.reason).toBe(
        'Planning failed 2 times: goal: cannot be empty; steps: at least one step is required'
      );
    }
  });

  it('should hand a cancelled session to review before dispatching', async () => {
    const { orchestrator } = await setup([{ match: 'ROLE: planner', responses: [PLAN] }]);
    const controller = new AbortController();
    controller.abort();

    const outcome = await orchestrator.run(QUERY, { runId: 'run-test', signal: controller.signal });

    expect(outcome.kind).toBe('human_review');
    if (outcome.kind === 'human_review') {
      expect(outcome.request.reason).toBe('Session cancelled');
      expect(outcome.request.snapshot.counters.dispatches).toBe(0);
    }
  });

  it('should hand a step whose analysis times out to the judge', async () => {
    const timedOut = new Error('anthropic failed: anthropic did not answer within 120000ms');
    const { orchestrator } = await setup([
      { match: 'ROLE: planner', responses: [PLAN] },
      { match: 'ROLE: document analyst', responses: [timedOut, timedOut, ANALYSIS] },
      {
        match: 'ROLE: replanner',
        responses: [
          JSON.stringify({
            goal: 'Minimum concrete cover for a slab',
            steps: [
              {
                action: 'Look up slab cover',
                tool: 'search',
                parameters: { keywords: ['cover', 'slab'], expectedDocuments: ['SP 63'] },
              },
            ],
          }),
        ],
      },
    ]);

    const outcome = await orchestrator.run(QUERY, { runId: 'run-test' });

    expect(outcome.kind).toBe('answer');
    if (outcome.kind !== 'answer') return;
    const [failed, answered] = outcome.snapshot.history;
    expect(failed.result).toEqual({
      status: 'error',
      error: { code: 'UNAVAILABLE', message: 'anthropic failed: anthropic did not answer within 120000ms' },
      attempts: 2,
    });
    expect(failed.decision.verdict).toBe('REPLAN');
    expect(failed.decision.replanInstructions?.strategy).toBe('REFINE_AND_RESTRICT_SEARCH');
    expect(answered.decision.verdict).toBe('FINALIZE');
  });

  it('should end in error when the language model is unavailable', async () => {
    const { orchestrator, logger } = await setup([], new Error('connection refused'));

    const outcome = await orchestrator.run(QUERY, { runId: 'run-test' });

    expect(outcome.kind).toBe('error');
    if (outcome.kind === 'error') {
      expect(outcome.message).toBe('connection refused');
      expect(outcome.snapshot.status).toBe('error');
      expect(outcome.snapshot.frozen).toBe(true);
    }
    expect(logger.hasEventType('session_failed')).toBe(true);
  });
});
