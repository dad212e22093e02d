import { describe, it, expect } from 'vitest';
import { Planner } from './planner';
import { ScriptedLanguageModel } from '../llm/mock-model';
import { BufferLogger } from '../logging/buffer-logger';
import { ParseError, PlanValidationError } from '../types/errors';

const QUERY = 'What is the design live load for an office floor?';

function planner(responses: string[]) {
  const model = new ScriptedLanguageModel({ scripts: [{ match: 'ROLE: planner', responses }] });
  return { model, planner: new Planner({ model, logger: new BufferLogger(), maxParseRetries: 1 }) };
}

describe('Planner', () => {
  it('should return a validated draft', async () => {
    const { planner: p, model } = planner([
      JSON.stringify({
        goal: 'Office design live load',
        requirements: { facts: ['live_load_kpa', 'reliability_factor'], computation: true, formula: 'live_load_kpa * reliability_factor', outputVariable: 'design_load_kpa' },
        steps: [{ action: 'Find office load', tool: 'search', parameters: { keywords: ['office', 'load'], expectedDocuments: ['SP 20'] } }],
        scratchpad: { queryDomain: 'loads and actions' },
      }),
    ]);

    const draft = await p.plan(QUERY, {});

    expect(draft.goal).toBe('Office design live load');
    expect(draft.requirements.outputVariable).toBe('design_load_kpa');
    expect(draft.steps).toEqual([
      { action: 'Find office load', tool: 'search', parameters: { keywords: ['office', 'load'], expectedDocuments: ['SP 20'] } },
    ]);
    expect(draft.scratchpad).toEqual({ queryDomain: 'loads and actions' });
    expect(model.calls[0].prompt).toContain(QUERY);
  });

  it('should accept a plan wrapped in a fenced block', async () => {
    const body = JSON.stringify({ goal: 'g', steps: [{ action: 'think', tool: 'other', parameters: { instruction: 'compare' } }] });
    const { planner: p } = planner([`Here is the plan:\n\`\`\`json\n${body}\n\`\`\``]);

    const draft = await p.plan(QUERY, {});

    expect(draft.requirements).toEqual({ facts: [], computation: false });
  });

  it('should throw ParseError when the output never parses', async () => {
    const { planner: p, model } = planner(['no plan today']);

    await expect(p.plan(QUERY, {})).rejects.toBeInstanceOf(ParseError);
    expect(model.calls).toHaveLength(2);
  });

  it('should throw PlanValidationError for an unknown tool', async () => {
    const { planner: p } = planner([
      JSON.stringify({ goal: 'g', steps: [{ action: 'browse', tool: 'browser', parameters: {} }] }),
    ]);

    const error = await p.plan(QUERY, {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlanValidationError);
    if (error instanceof PlanValidationError) {
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0].startsWith('steps.0.tool: ')).toBe(true);
    }
  });
});
