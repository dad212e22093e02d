/**
 * Source relevance scoring
 */

import { ScratchpadKey } from '../schemas';
import type { Scratchpad, SourceRef, ToolName } from '../schemas';

/**
 * Lowercased word tokens of at least two characters, deduplicated
 */
export function tokenize(text: string): string[] {
  const tokens = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length >= 2);
  return [...new Set(tokens)];
}

export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Read a list-valued scratchpad entry; a scalar counts as a one-item list
 */
export function readList(scratchpad: Scratchpad, key: string): string[] {
  const value = scratchpad[key];
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [String(value)];
}

function matchesAny(documentName: string, names: string[]): boolean {
  const doc = normalizeName(documentName);
  return names.some((name) => {
    const candidate = normalizeName(name);
    return candidate.length > 0 && (doc.includes(candidate) || candidate.includes(doc));
  });
}

export function isRejectedSource(scratchpad: Scratchpad, documentName: string): boolean {
  return matchesAny(documentName, readList(scratchpad, ScratchpadKey.REJECTED_SOURCES));
}

/**
 * Agreement in [0, 1] between a search result's source and the query domain.
 *
 * Rejected sources score 0. Priority documents, results without a source
 * and sessions without a declared domain score 1. Otherwise the score is
 * the share of query-domain tokens found in the source's domain and name.
 */
export function scoreSourceRelevance(tool: ToolName, source: SourceRef | undefined, scratchpad: Scratchpad): number {
  if (tool !== 'search' || !source) {
    return 1;
  }
  if (isRejectedSource(scratchpad, source.documentName)) {
    return 0;
  }
  if (matchesAny(source.documentName, readList(scratchpad, ScratchpadKey.PRIORITY_DOCUMENTS))) {
    return 1;
  }

  const domainValue = scratchpad[ScratchpadKey.QUERY_DOMAIN];
  const domainTokens = typeof domainValue === 'string' ? tokenize(domainValue) : [];
  if (domainTokens.length === 0) {
    return 1;
  }

  const sourceTokens = new Set([...tokenize(source.domain ?? ''), ...tokenize(source.documentName)]);
  const shared = domainTokens.filter((token) => sourceTokens.has(token)).length;
  return shared / domainTokens.length;
}
