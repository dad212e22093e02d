import { describe, it, expect } from 'vitest';
import { StepDispatcher, selectSource } from './step-dispatcher';
import { DocumentAnalyzer, Reasoner } from './document-analyzer';
import type { DocumentHit, SearchRequest, SearchTool } from './search-tool';
import { ScriptedLanguageModel, ModelScript } from '../llm/mock-model';
import { BufferLogger } from '../logging/buffer-logger';
import { MockClock } from '../types/clock';
import { ModelCallError, ModelUnavailableError, ToolError } from '../types/errors';
import type { LanguageModel } from '../llm/language-model';
import { DEFAULT_CONFIG } from '../types/agent-config';
import type { SessionLimits } from '../types/agent-config';
import type { Step } from '../schemas';
import { calculateStep, createState, reasoningStep, searchStep } from '../../tests/fixtures/builders';

const HIT: DocumentHit = {
  id: 'sp63-p12',
  title: 'Concrete structures',
  docCode: 'SP 63',
  pageNumber: 12,
  snippet: 'Minimum cover 20 mm',
  text: 'Minimum cover 20 mm',
};

/**
 * Search tool that replays a queue of outcomes
 */
class QueuedSearchTool implements SearchTool {
  readonly name = 'queued';
  readonly requests: SearchRequest[] = [];

  constructor(private readonly outcomes: Array<DocumentHit[] | Error>) {}

  async search(request: SearchRequest): Promise<DocumentHit[]> {
    this.requests.push(request);
    const next = this.outcomes.length > 1 ? this.outcomes.shift() : this.outcomes[0];
    if (next === undefined) {
      return [];
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/**
 * Model that never answers
 */
class SilentModel implements LanguageModel {
  readonly name = 'silent';
  calls = 0;

  complete(): Promise<string> {
    this.calls += 1;
    return new Promise<string>(() => undefined);
  }
}

/**
 * Search tool that never answers and keeps the signals it was given
 */
class StalledSearchTool implements SearchTool {
  readonly name = 'stalled';
  readonly signals: Array<AbortSignal | undefined> = [];

  search(_request: SearchRequest, signal?: AbortSignal): Promise<DocumentHit[]> {
    this.signals.push(signal);
    return new Promise<DocumentHit[]>(() => undefined);
  }
}

function setupWithModel(search: SearchTool, model: LanguageModel, limits: Partial<SessionLimits> = {}) {
  const logger = new BufferLogger();
  const clock = new MockClock();
  const tools = { model, logger, maxParseRetries: 0 };
  const dispatcher = new StepDispatcher({
    search,
    analyzer: new DocumentAnalyzer(tools),
    reasoner: new Reasoner(tools),
    clock,
    logger,
    limits: { ...DEFAULT_CONFIG.limits, ...limits },
    timeouts: DEFAULT_CONFIG.timeouts,
    hits: 3,
  });
  return { dispatcher, logger, clock };
}

function setup(search: SearchTool, scripts: ModelScript[] = [], limits: Partial<SessionLimits> = {}) {
  const model = new ScriptedLanguageModel({ scripts });
  return { ...setupWithModel(search, model, limits), model };
}

function stateWith(steps: Step[]) {
  const state = createState();
  state.installPlan({ goal: 'Slab cover', requirements: { facts: ['min_cover_mm'], computation: false }, steps });
  return state;
}

const ANALYSIS_SCRIPT: ModelScript = {
  match: 'ROLE: document analyst',
  responses: [
    JSON.stringify({ status: 'success', documentName: 'SP 63', locator: 'clause 10.3', facts: { min_cover_mm: 20 }, summary: 'Cover is 20 mm' }),
  ],
};

describe('selectSource', () => {
  const other: DocumentHit = { ...HIT, id: 'sp70-p3', title: 'Concrete works', docCode: 'SP 70', pageNumber: 3 };

  it('should pick the hit the analysis names', () => {
    expect(selectSource([other, HIT], 'sp 63', 'clause 10.3')).toEqual({
      documentName: 'SP 63 Concrete structures',
      locator: 'clause 10.3',
      domain: 'Concrete structures',
    });
  });

  it('should fall back to the top hit and its page', () => {
    expect(selectSource([other, HIT], 'GOST 1')).toEqual({
      documentName: 'SP 70 Concrete works',
      locator: 'page 3',
      domain: 'Concrete works',
    });
  });

  it('should have no source without hits', () => {
    expect(selectSource([], 'SP 63')).toBeUndefined();
  });
});

describe('StepDispatcher', () => {
  it('should search, analyze and advance the cursor', async () => {
    const search = new QueuedSearchTool([[HIT]]);
    const { dispatcher, model } = setup(search, [ANALYSIS_SCRIPT]);
    const state = stateWith([searchStep(1, ['cover'], ['SP 63'])]);

    const outcome = await dispatcher.dispatch(state);

    expect(outcome).toEqual({
      kind: 'executed',
      step: searchStep(1, ['cover'], ['SP 63']),
      result: {
        status: 'success',
        structuredOutput: { min_cover_mm: 20 },
        summary: 'Cover is 20 mm',
        source: { documentName: 'SP 63 Concrete structures', locator: 'clause 10.3', domain: 'Concrete structures' },
        attempts: 1,
      },
    });
    expect(search.requests).toEqual([{ keywords: ['cover'], expectedDocuments: ['SP 63'], hits: 3 }]);
    expect(model.calls[0].prompt).toContain('[1] SP 63 Concrete structures (page 12)');
    expect(state.getCounters().dispatches).toBe(1);
    expect(state.isPlanExhausted()).toBe(true);
  });

  it('should report not_found without calling the analyzer when nothing matches', async () => {
    const { dispatcher, model } = setup(new QueuedSearchTool([[]]));
    const state = stateWith([searchStep(1, ['timber', 'beam'])]);

    const outcome = await dispatcher.dispatch(state);

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'not_found',
      summary: 'No documents matched: timber, beam',
      attempts: 1,
    });
    expect(model.calls).toHaveLength(0);
    expect(state.isPlanExhausted()).toBe(true);
  });

  it('should retry a transient search failure', async () => {
    const search = new QueuedSearchTool([new ToolError('UNAVAILABLE', 'Search endpoint returned 503'), [HIT]]);
    const { dispatcher } = setup(search, [ANALYSIS_SCRIPT]);

    const outcome = await dispatcher.dispatch(stateWith([searchStep(1, ['cover'])]));

    expect(search.requests).toHaveLength(2);
    expect(outcome.kind === 'executed' && outcome.result.attempts).toBe(2);
    expect(outcome.kind === 'executed' && outcome.result.status).toBe('success');
  });

  it('should return an error result once retries run out and keep the step current', async () => {
    const search = new QueuedSearchTool([new ToolError('TIMEOUT', 'Search did not answer')]);
    const { dispatcher, logger } = setup(search, [], { maxToolRetries: 1 });
    const state = stateWith([searchStep(1, ['cover'])]);

    const outcome = await dispatcher.dispatch(state);

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'error',
      error: { code: 'TIMEOUT', message: 'Search did not answer' },
      attempts: 2,
    });
    expect(state.currentStep()?.number).toBe(1);
    expect(logger.getEventsByType('tool_failed').map((e) => e.message)).toEqual(['Step 1 failed: Search did not answer']);
  });

  it('should turn unparseable analysis into a PARSE_FAILED error', async () => {
    const { dispatcher } = setup(new QueuedSearchTool([[HIT]]), [{ match: 'ROLE: document analyst', responses: ['not json'] }]);

    const outcome = await dispatcher.dispatch(stateWith([searchStep(1, ['cover'])]));

    expect(outcome.kind === 'executed' && outcome.result.status).toBe('error');
    expect(outcome.kind === 'executed' && outcome.result.error?.code).toBe('PARSE_FAILED');
  });

  it('should turn a timed-out analysis call into a TIMEOUT error result', async () => {
    const timedOut = new ModelCallError('anthropic', 'anthropic failed: anthropic did not answer within 120000ms', true);
    const search = new QueuedSearchTool([[HIT]]);
    const { dispatcher } = setup(search, [{ match: 'ROLE: document analyst', responses: [timedOut] }]);
    const state = stateWith([searchStep(1, ['cover'])]);

    const outcome = await dispatcher.dispatch(state);

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'error',
      error: { code: 'TIMEOUT', message: 'anthropic failed: anthropic did not answer within 120000ms' },
      attempts: 2,
    });
    expect(search.requests).toHaveLength(2);
    expect(state.currentStep()?.number).toBe(1);
  });

  it('should report a failing reasoning call as UNAVAILABLE', async () => {
    const { dispatcher } = setup(
      new QueuedSearchTool([]),
      [{ match: 'ROLE: reasoning step', responses: [new Error('connection reset')] }],
      { maxToolRetries: 0 }
    );

    const outcome = await dispatcher.dispatch(stateWith([reasoningStep(1, 'Decide which code governs')]));

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'error',
      error: { code: 'UNAVAILABLE', message: 'connection reset' },
      attempts: 1,
    });
  });

  it('should bound model work inside a step by the tool timeout', async () => {
    const model = new SilentModel();
    const { dispatcher, clock } = setupWithModel(new QueuedSearchTool([[HIT]]), model, { maxToolRetries: 0 });

    const pending = dispatcher.dispatch(stateWith([searchStep(1, ['cover'])]));
    for (let i = 0; i < 50 && model.calls === 0; i++) {
      await Promise.resolve();
    }
    expect(clock.pendingTimers()).toBe(1);
    clock.advance(DEFAULT_CONFIG.timeouts.toolMs);
    const outcome = await pending;

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'error',
      error: { code: 'TIMEOUT', message: 'Step 1 did not finish within 30000ms' },
      attempts: 1,
    });
  });

  it('should let an exhausted provider chain end the dispatch', async () => {
    const { dispatcher } = setup(new QueuedSearchTool([[HIT]]), [
      { match: 'ROLE: document analyst', responses: [new ModelUnavailableError(['anthropic', 'claude-cli'], [])] },
    ]);

    await expect(dispatcher.dispatch(stateWith([searchStep(1, ['cover'])]))).rejects.toThrow(
      'No language model provider available (tried: anthropic, claude-cli)'
    );
  });

  it('should cancel a search that outlives the tool timeout', async () => {
    const search = new StalledSearchTool();
    const { dispatcher, clock } = setup(search, [], { maxToolRetries: 0 });

    const pending = dispatcher.dispatch(stateWith([searchStep(1, ['cover'])]));
    clock.advance(DEFAULT_CONFIG.timeouts.toolMs);
    const outcome = await pending;

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'error',
      error: { code: 'TIMEOUT', message: 'Search did not answer within 30000ms' },
      attempts: 1,
    });
    expect(search.signals).toHaveLength(1);
    expect(search.signals[0]?.aborted).toBe(true);
  });

  it('should compute from scratchpad facts', async () => {
    const { dispatcher } = setup(new QueuedSearchTool([]));
    const state = stateWith([calculateStep(1, 'q * k', { q: 'live_load_kpa', k: 1.2 }, 'design_load_kpa')]);
    state.mergeScratchpad({ set: { live_load_kpa: 2 } });

    const outcome = await dispatcher.dispatch(state);

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'success',
      structuredOutput: { design_load_kpa: 2.4 },
      summary: 'design_load_kpa = 2.4',
      attempts: 1,
    });
  });

  it('should not retry a calculation with an unknown fact', async () => {
    const { dispatcher } = setup(new QueuedSearchTool([]));
    const state = stateWith([calculateStep(1, 'q * 2', { q: 'live_load_kpa' })]);

    const outcome = await dispatcher.dispatch(state);

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'error',
      error: { code: 'INVALID_PARAMETERS', message: 'Variable q refers to unknown fact "live_load_kpa"' },
      attempts: 1,
    });
  });

  it('should run reasoning steps through the model', async () => {
    const { dispatcher } = setup(new QueuedSearchTool([]), [
      { match: 'ROLE: reasoning step', responses: [JSON.stringify({ facts: { governing: 'SP 63' }, summary: 'SP 63 governs' })] },
    ]);

    const outcome = await dispatcher.dispatch(stateWith([reasoningStep(1, 'Decide which code governs')]));

    expect(outcome.kind === 'executed' && outcome.result).toEqual({
      status: 'success',
      structuredOutput: { governing: 'SP 63' },
      summary: 'SP 63 governs',
      attempts: 1,
    });
  });

  it('should refuse to dispatch past the step budget', async () => {
    const search = new QueuedSearchTool([[HIT]]);
    const { dispatcher, logger } = setup(search, [ANALYSIS_SCRIPT], { maxSteps: 1 });
    const state = stateWith([searchStep(1, ['cover']), searchStep(2, ['slab'])]);

    await dispatcher.dispatch(state);
    const second = await dispatcher.dispatch(state);

    expect(second.kind).toBe('budget_exhausted');
    if (second.kind === 'budget_exhausted') {
      expect(second.stop.message).toBe('Reached maximum steps (1)');
    }
    expect(search.requests).toHaveLength(1);
    expect(logger.hasEventType('budget_exceeded')).toBe(true);
  });

  it('should throw when no step is pending', async () => {
    const { dispatcher } = setup(new QueuedSearchTool([]));

    await expect(dispatcher.dispatch(createState())).rejects.toThrow('No pending step to dispatch');
  });
});
