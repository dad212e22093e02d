/**
 * Loop detection over the execution history
 */

import type { ExecutionHistoryEntry, ReplanStrategy, Step } from '../schemas';

function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

function sortedUnique(values: string[]): string[] {
  return [...new Set(values.map(normalizeText))].sort();
}

/**
 * Canonical `(tool, parameters)` key for a step; wording of the action and
 * the order of keywords do not matter
 */
export function stepSignature(step: Step): string {
  switch (step.tool) {
    case 'search':
      return JSON.stringify([
        'search',
        sortedUnique(step.parameters.keywords),
        sortedUnique(step.parameters.expectedDocuments),
      ]);
    case 'calculate':
      return JSON.stringify([
        'calculate',
        step.parameters.formula.replace(/\s+/g, ''),
        Object.entries(step.parameters.variables).sort(([a], [b]) => a.localeCompare(b)),
        step.parameters.outputVariable,
      ]);
    case 'other':
      return JSON.stringify(['other', normalizeText(step.parameters.instruction)]);
  }
}

/**
 * True when the current step and the `window - 1` most recent history
 * entries all share one signature
 */
export function detectLoop(history: ExecutionHistoryEntry[], current: Step, window: number): boolean {
  if (window < 2) {
    return false;
  }
  const recent = history.slice(-(window - 1));
  if (recent.length < window - 1) {
    return false;
  }
  const signature = stepSignature(current);
  return recent.every((entry) => stepSignature(entry.step) === signature);
}

const LOOP_ESCAPE_ORDER: readonly ReplanStrategy[] = [
  'CHANGE_KEYWORDS',
  'REFINE_AND_RESTRICT_SEARCH',
  'FORM_NEW_HYPOTHESIS',
];

/**
 * Strategy for breaking a loop: the first one not already tried inside the
 * loop window
 */
export function chooseLoopEscapeStrategy(
  history: ExecutionHistoryEntry[],
  window: number,
  currentBias: ReplanStrategy | undefined
): ReplanStrategy {
  const tried = new Set<ReplanStrategy>();
  for (const entry of history.slice(-(window - 1))) {
    const strategy = entry.decision.replanInstructions?.strategy;
    if (strategy) {
      tried.add(strategy);
    }
  }
  if (tried.size === 0 && currentBias) {
    tried.add(currentBias);
  }
  return LOOP_ESCAPE_ORDER.find((strategy) => !tried.has(strategy)) ?? 'FORM_NEW_HYPOTHESIS';
}
