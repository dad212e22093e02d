import { describe, it, expect } from 'vitest';
import { ConsoleLogger, formatPretty } from './console-logger';
import type { LogEvent } from '../types/logger';

function capture(options: { jsonOutput?: boolean; minLevel?: 'debug' | 'info' | 'warn' | 'error' } = {}) {
  const lines: string[] = [];
  const logger = new ConsoleLogger({ ...options, includeTimestamp: false, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('formatPretty', () => {
  const event: LogEvent = {
    timestamp: '2025-01-01T09:30:15.000Z',
    level: 'info',
    eventType: 'verdict_emitted',
    message: 'REPLAN: source off topic',
    metadata: { runId: 'run-1', stage: 'judging', step: 2, verdict: 'REPLAN', strategy: 'refine_query', score: 0.2 },
  };

  it('should put run, event type and inline keys around the message', () => {
    expect(formatPretty(event, true)).toBe(
      '09:30:15 INF [run-1] (verdict_emitted) REPLAN: source off topic stage=judging step=2 verdict=REPLAN strategy=refine_query'
    );
  });

  it('should leave out the event type for plain level calls', () => {
    expect(formatPretty({ ...event, eventType: 'info', metadata: {} }, false)).toBe('INF REPLAN: source off topic');
  });
});

describe('ConsoleLogger', () => {
  it('should write accepted events and drop those below the level', () => {
    const { logger, lines } = capture();

    logger.debug('hidden');
    logger.warn('Search slow', { tool: 'vespa' });

    expect(lines).toEqual(['WRN Search slow tool=vespa']);
  });

  it('should write JSON lines when asked', () => {
    const { logger, lines } = capture({ jsonOutput: true });

    logger.info('ready');

    expect(JSON.parse(lines[0])).toMatchObject({ level: 'info', eventType: 'info', message: 'ready', metadata: {} });
  });

  it('should redact secrets in messages and metadata', () => {
    const { logger, lines } = capture();

    logger.error('Request failed with Bearer test-secret', { code: 'Bearer test-secret' });

    expect(lines).toEqual(['ERR Request failed with Bear[REDACTED] code=Bear[REDACTED]']);
  });

  it('should share one event record across children', () => {
    const { logger, lines } = capture();
    const child = logger.child({ runId: 'run-1', stage: 'executing' });

    child.event('tool_failed', 'Step 1 failed', { step: 1 });
    logger.info('done');

    expect(lines).toEqual(['WRN [run-1] (tool_failed) Step 1 failed stage=executing step=1', 'INF done']);
    expect(logger.getEvents().map((e) => e.message)).toEqual(['Step 1 failed', 'done']);
  });
});
