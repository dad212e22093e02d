/**
 * Builders for plans, steps, results and decisions used across tests
 */

import type {
  CalculateStep,
  Decision,
  OtherStep,
  SearchStep,
  StepResult,
  StructuredFacts,
  SourceRef,
} from '../../src/schemas';
import { ExecutionState } from '../../src/core/execution-state';
import { AgentConfig, DEFAULT_CONFIG } from '../../src/types/agent-config';
import { MockClock } from '../../src/types/clock';

export function searchStep(number: number, keywords: string[], expectedDocuments: string[] = []): SearchStep {
  return {
    number,
    action: `Search for ${keywords.join(' ')}`,
    tool: 'search',
    parameters: { keywords, expectedDocuments },
    status: 'pending',
  };
}

export function calculateStep(
  number: number,
  formula: string,
  variables: Record<string, number | string>,
  outputVariable = 'result'
): CalculateStep {
  return {
    number,
    action: `Calculate ${formula}`,
    tool: 'calculate',
    parameters: { formula, variables, outputVariable },
    status: 'pending',
  };
}

export function reasoningStep(number: number, instruction: string): OtherStep {
  return {
    number,
    action: instruction,
    tool: 'other',
    parameters: { instruction },
    status: 'pending',
  };
}

export function successResult(facts: StructuredFacts, source?: SourceRef): StepResult {
  return { status: 'success', structuredOutput: facts, source, attempts: 1 };
}

export function notFoundResult(): StepResult {
  return { status: 'not_found', attempts: 1 };
}

export function errorResult(message = 'Search backend timed out'): StepResult {
  return { status: 'error', error: { code: 'TIMEOUT', message }, attempts: 2 };
}

export function continueDecision(overrides: Partial<Decision> = {}): Decision {
  return {
    verdict: 'CONTINUE',
    reasoning: 'More facts needed',
    scores: { sourceRelevance: 1, contextConsistency: 1 },
    isLoopDetected: false,
    ...overrides,
  };
}

export const COVER_SOURCE: SourceRef = {
  documentName: 'SP-63 Concrete and reinforced concrete structures',
  locator: 'clause 10.3.2',
  domain: 'concrete structures',
};

export function createState(query = 'What is the minimum concrete cover for a slab?'): ExecutionState {
  return new ExecutionState({ runId: 'run-test', query, clock: new MockClock() });
}

export function testConfig(overrides: Partial<Pick<AgentConfig, 'limits' | 'model' | 'search' | 'thresholds'>> = {}): AgentConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    query: 'What is the minimum concrete cover for a slab?',
    runId: 'run-test',
    resolvedAt: '2025-01-01T00:00:00.000Z',
    paths: { workingDirectory: '/work', artifactBaseDir: '/work' },
    sources: {},
  };
}
