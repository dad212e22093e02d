import { describe, it, expect } from 'vitest';
import { EscalationGate } from './escalation-gate';
import { MemoryFileSystem } from '../io/memory-file-system';
import { BufferLogger } from '../logging/buffer-logger';
import { StateFrozenError } from '../types/errors';
import { continueDecision, createState } from '../../tests/fixtures/builders';

function setup() {
  const fs = new MemoryFileSystem('/work');
  const logger = new BufferLogger();
  return { fs, logger, gate: new EscalationGate({ fs, logger, artifactBaseDir: '/work' }) };
}

describe('EscalationGate', () => {
  it('should move the session to human review, freeze it and write the snapshot', async () => {
    const { fs, logger, gate } = setup();
    const state = createState();
    const decision = continueDecision({ verdict: 'HUMAN_REVIEW', humanReviewReason: 'Contradiction persists' });

    const request = await gate.escalate(state, 'Contradiction persists', decision);

    expect(state.getStatus()).toBe('human_review');
    expect(state.isFrozen()).toBe(true);
    expect(request.snapshotPath).toBe('/work/.evidence-loop/reviews/run-test.json');
    expect(request.snapshot.status).toBe('human_review');
    expect(request.decision).toEqual(decision);

    const written = fs.getFile('/work/.evidence-loop/reviews/run-test.json');
    expect(JSON.parse(written ?? '{}')).toMatchObject({
      reason: 'Contradiction persists',
      snapshot: { query: 'What is the minimum concrete cover for a slab?', frozen: true },
    });
    expect(logger.getEventsByType('escalated').map((e) => e.message)).toEqual([
      'Human review required: Contradiction persists',
    ]);
  });

  it('should leave later mutations rejected', async () => {
    const { gate } = setup();
    const state = createState();

    await gate.escalate(state, 'Reached maximum steps (12)');

    expect(() => state.mergeScratchpad({ set: { min_cover_mm: 20 } })).toThrow(StateFrozenError);
  });

  it('should still return the request when the snapshot cannot be written', async () => {
    const { fs, logger, gate } = setup();
    // a directory where the snapshot file should go
    fs.setFile('/work/.evidence-loop/reviews/run-test.json/placeholder', '');

    const request = await gate.escalate(createState(), 'Session cancelled');

    expect(request.snapshotPath).toBeUndefined();
    expect(request.reason).toBe('Session cancelled');
    expect(logger.getEventsByLevel('error').map((e) => e.message)).toEqual([
      'Could not persist review snapshot: Not a file: /work/.evidence-loop/reviews/run-test.json',
    ]);
  });
});
