/**
 * Scratchpad model
 * Durable facts accumulated across the steps of one session
 */

export type FactValue = string | number | boolean;

export type ScratchpadValue = FactValue | string[];

export type Scratchpad = Record<string, ScratchpadValue>;

/**
 * Well-known scratchpad keys
 */
export const ScratchpadKey = {
  PRIORITY_DOCUMENTS: 'priority_documents',
  QUERY_DOMAIN: 'query_domain',
  REJECTED_SOURCES: 'rejected_sources',
  SEARCH_HYPOTHESES: 'search_hypotheses',
} as const;

export const RESERVED_SCRATCHPAD_KEYS: readonly string[] = Object.values(ScratchpadKey);

/**
 * A scratchpad mutation. `set` overwrites, `append` extends list values
 * without duplicates, and `remove` is the only way a key disappears.
 */
export interface ScratchpadUpdate {
  set?: Record<string, ScratchpadValue>;
  append?: Record<string, string[]>;
  remove?: string[];
}

/**
 * Facts the planner seeds before the first step runs
 */
export interface ScratchpadSeed {
  queryDomain?: string;
  priorityDocuments?: string[];
  searchHypotheses?: string[];
}
