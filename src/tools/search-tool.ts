/**
 * Document search interface
 */

export interface DocumentHit {
  id: string;
  title: string;
  /** Document code, e.g. "SP 63.13330.2018" */
  docCode: string;
  pageNumber?: number;
  snippet: string;
  text: string;
}

export interface SearchRequest {
  keywords: string[];
  /** Document codes to restrict to; empty searches everything */
  expectedDocuments: string[];
  hits: number;
}

export interface SearchTool {
  readonly name: string;
  /** `signal` is aborted when the caller stops waiting */
  search(request: SearchRequest, signal?: AbortSignal): Promise<DocumentHit[]>;
}

/**
 * Name a hit is cited under
 */
export function hitDocumentName(hit: DocumentHit): string {
  if (hit.docCode && hit.title) {
    return `${hit.docCode} ${hit.title}`;
  }
  return hit.docCode || hit.title || hit.id;
}

export function hitLocator(hit: DocumentHit): string {
  return hit.pageNumber !== undefined ? `page ${hit.pageNumber}` : hit.id;
}

/**
 * Compare document codes ignoring case and whitespace ("SP 63" matches "SP63.13330")
 */
export function docCodeMatches(docCode: string, expected: string): boolean {
  const compact = (value: string): string => value.toLowerCase().replace(/\s+/g, '');
  const wanted = compact(expected);
  return wanted.length > 0 && compact(docCode).includes(wanted);
}
