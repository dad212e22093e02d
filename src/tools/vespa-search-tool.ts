/**
 * Search over a Vespa document index
 */

import fetch from 'node-fetch';
import { z } from 'zod';
import { ToolError, errorMessage } from '../types/errors';
import type { DocumentHit, SearchRequest, SearchTool } from './search-tool';

const vespaResponseSchema = z.object({
  root: z.object({
    children: z
      .array(
        z.object({
          id: z.string().optional(),
          fields: z
            .object({
              id: z.string().optional(),
              title: z.string().optional(),
              doc_code: z.string().optional(),
              page_number: z.number().optional(),
              snippet: z.string().optional(),
              text: z.string().optional(),
            })
            .default({}),
        })
      )
      .default([]),
  }),
});

function quoteYql(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * YQL selecting pages that match the user query, optionally restricted to
 * document codes
 */
export function buildYql(expectedDocuments: string[]): string {
  const base = 'select id,title,doc_code,page_number,snippet,text from pdf_page where userQuery()';
  const conditions = expectedDocuments
    .map((doc) => doc.trim())
    .filter((doc) => doc.length > 0)
    .map((doc) => {
      const compact = doc.replace(/\s+/g, '');
      return compact === doc
        ? `doc_code contains ${quoteYql(doc)}`
        : `(doc_code contains ${quoteYql(doc)} or doc_code contains ${quoteYql(compact)})`;
    });
  return conditions.length > 0 ? `${base} and (${conditions.join(' or ')})` : base;
}

export function buildSearchBody(request: SearchRequest): Record<string, unknown> {
  return {
    yql: buildYql(request.expectedDocuments),
    query: request.keywords.join(' '),
    ranking: 'bm25',
    hits: request.hits,
    timeout: '10s',
  };
}

export interface VespaSearchToolOptions {
  /** Base URL, e.g. http://localhost:8080 */
  endpoint: string;
}

export class VespaSearchTool implements SearchTool {
  readonly name = 'vespa';
  private readonly url: string;

  constructor(options: VespaSearchToolOptions) {
    this.url = `${options.endpoint.replace(/\/+$/, '')}/search/`;
  }

  async search(request: SearchRequest, signal?: AbortSignal): Promise<DocumentHit[]> {
    let body: unknown;
    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(buildSearchBody(request)),
        signal,
      });
      if (!res.ok) {
        throw new ToolError('UNAVAILABLE', `Search endpoint returned ${res.status}`);
      }
      body = await res.json();
    } catch (error) {
      if (error instanceof ToolError) {
        throw error;
      }
      const code = error instanceof SyntaxError ? 'MALFORMED_RESPONSE' : 'UNAVAILABLE';
      throw new ToolError(code, `Search request failed: ${errorMessage(error)}`, error);
    }

    const parsed = vespaResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ToolError('MALFORMED_RESPONSE', `Unexpected search response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    return parsed.data.root.children.map((child, index): DocumentHit => {
      const fields = child.fields;
      const text = fields.text ?? '';
      return {
        id: fields.id ?? child.id ?? `hit-${index}`,
        title: fields.title ?? '',
        docCode: fields.doc_code ?? '',
        pageNumber: fields.page_number,
        snippet: fields.snippet ?? text.slice(0, 300),
        text,
      };
    });
  }
}
