/**
 * Tests for the session state machine
 */

import { describe, it, expect } from 'vitest';
import { isValidTransition, transition, getStatusDescription, isTerminalStatus } from './state-machine';

describe('State Machine', () => {
  describe('isValidTransition', () => {
    it('should allow planning to executing', () => {
      expect(isValidTransition('planning', 'executing')).toBe(true);
    });

    it('should not allow executing to finalizing', () => {
      expect(isValidTransition('executing', 'finalizing')).toBe(false);
    });

    it('should allow judging to branch to every routing target', () => {
      expect(isValidTransition('judging', 'executing')).toBe(true);
      expect(isValidTransition('judging', 'planning')).toBe(true);
      expect(isValidTransition('judging', 'finalizing')).toBe(true);
      expect(isValidTransition('judging', 'human_review')).toBe(true);
    });

    it('should not allow leaving terminal statuses', () => {
      expect(isValidTransition('completed', 'planning')).toBe(false);
      expect(isValidTransition('human_review', 'executing')).toBe(false);
      expect(isValidTransition('error', 'planning')).toBe(false);
    });
  });

  describe('transition', () => {
    it('should move from planning to executing when the plan is ready', () => {
      const result = transition('planning', { type: 'PLAN_READY', stepCount: 2 });
      expect(result).toEqual({ status: 'executing', valid: true, description: 'Plan ready with 2 step(s)' });
    });

    it('should route each verdict from judging', () => {
      expect(transition('judging', { type: 'VERDICT', verdict: 'CONTINUE' }).status).toBe('executing');
      expect(transition('judging', { type: 'VERDICT', verdict: 'REPLAN' }).status).toBe('planning');
      expect(transition('judging', { type: 'VERDICT', verdict: 'FINALIZE' }).status).toBe('finalizing');
      expect(transition('judging', { type: 'VERDICT', verdict: 'HUMAN_REVIEW' }).status).toBe('human_review');
    });

    it('should reject a verdict outside judging', () => {
      const result = transition('executing', { type: 'VERDICT', verdict: 'FINALIZE' });
      expect(result.valid).toBe(false);
      expect(result.status).toBe('executing');
      expect(result.description).toBe('Invalid transition from executing via VERDICT');
    });

    it('should escalate from any non-terminal status', () => {
      expect(transition('planning', { type: 'ESCALATE', reason: 'x' }).status).toBe('human_review');
      expect(transition('executing', { type: 'ESCALATE', reason: 'x' }).status).toBe('human_review');
      expect(transition('finalizing', { type: 'ESCALATE', reason: 'x' }).status).toBe('human_review');
    });

    it('should not escalate a completed session', () => {
      const result = transition('completed', { type: 'ESCALATE', reason: 'late' });
      expect(result.valid).toBe(false);
      expect(result.status).toBe('completed');
    });

    it('should fail into error with the error message', () => {
      const result = transition('planning', { type: 'FAIL', error: new Error('provider down') });
      expect(result).toEqual({ status: 'error', valid: true, description: 'Error: provider down' });
    });

    it('should complete only from finalizing', () => {
      expect(transition('finalizing', { type: 'ANSWER_READY' }).status).toBe('completed');
      expect(transition('judging', { type: 'ANSWER_READY' }).valid).toBe(false);
    });
  });

  describe('isTerminalStatus', () => {
    it('should treat completed, error and human_review as terminal', () => {
      expect(isTerminalStatus('completed')).toBe(true);
      expect(isTerminalStatus('error')).toBe(true);
      expect(isTerminalStatus('human_review')).toBe(true);
      expect(isTerminalStatus('judging')).toBe(false);
    });
  });

  describe('getStatusDescription', () => {
    it('should describe every status', () => {
      expect(getStatusDescription('judging')).toBe('Judging the latest step result');
    });
  });
});
