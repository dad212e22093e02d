/**
 * Contextual consistency between new facts and the scratchpad
 */

import { RESERVED_SCRATCHPAD_KEYS } from '../schemas';
import type { FactValue, Scratchpad, ScratchpadValue, StructuredFacts } from '../schemas';

export interface Contradiction {
  key: string;
  existing: FactValue;
  incoming: FactValue;
}

export interface ConsistencyReport {
  /** 1 - contradictions / compared; 1 when nothing was compared */
  score: number;
  compared: number;
  contradictions: Contradiction[];
  /** New facts that agree with or extend the scratchpad */
  accepted: StructuredFacts;
}

const NUMERIC = /^[-+]?\d+(?:[.,]\d+)?$/;

function asNumber(value: FactValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && NUMERIC.test(value.trim())) {
    return Number(value.trim().replace(',', '.'));
  }
  return undefined;
}

/**
 * Whether two fact values disagree. Numbers differ when their relative
 * difference exceeds `tolerance`; text differs after trimming and case folding.
 */
export function valuesContradict(existing: FactValue, incoming: FactValue, tolerance: number): boolean {
  const a = asNumber(existing);
  const b = asNumber(incoming);
  if (a !== undefined && b !== undefined) {
    const scale = Math.max(Math.abs(a), Math.abs(b));
    return scale === 0 ? false : Math.abs(a - b) / scale > tolerance;
  }
  if (typeof existing === 'boolean' || typeof incoming === 'boolean') {
    return existing !== incoming;
  }
  return String(existing).trim().toLowerCase() !== String(incoming).trim().toLowerCase();
}

function isComparable(value: ScratchpadValue | undefined): value is FactValue {
  return value !== undefined && !Array.isArray(value);
}

export function checkConsistency(
  facts: StructuredFacts | undefined,
  scratchpad: Scratchpad,
  tolerance: number
): ConsistencyReport {
  const contradictions: Contradiction[] = [];
  const accepted: StructuredFacts = {};
  let compared = 0;

  for (const [key, incoming] of Object.entries(facts ?? {})) {
    if (RESERVED_SCRATCHPAD_KEYS.includes(key)) {
      continue;
    }
    const existing = scratchpad[key];
    if (isComparable(existing)) {
      compared += 1;
      if (valuesContradict(existing, incoming, tolerance)) {
        contradictions.push({ key, existing, incoming });
        continue;
      }
    }
    accepted[key] = incoming;
  }

  return {
    score: compared === 0 ? 1 : (compared - contradictions.length) / compared,
    compared,
    contradictions,
    accepted,
  };
}

export function describeContradictions(contradictions: Contradiction[]): string {
  return contradictions
    .map((c) => `${c.key}: recorded ${JSON.stringify(c.existing)}, new ${JSON.stringify(c.incoming)}`)
    .join('; ');
}
