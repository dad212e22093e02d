/**
 * Keyword search over an in-memory corpus
 * Used for offline runs (`--corpus`) and tests.
 */

import { z } from 'zod';
import type { FileSystem } from '../types/file-system';
import { Result, ok, err } from '../types/result';
import { tokenize } from '../judge/relevance';
import type { DocumentHit, SearchRequest, SearchTool } from './search-tool';
import { docCodeMatches } from './search-tool';

export interface CorpusDocument {
  id: string;
  title: string;
  docCode: string;
  pageNumber?: number;
  text: string;
}

const corpusSchema = z.array(
  z.object({
    id: z.string().min(1),
    title: z.string(),
    docCode: z.string(),
    pageNumber: z.number().int().optional(),
    text: z.string(),
  })
);

/**
 * Read a corpus from a JSON array of documents
 */
export async function loadCorpus(fs: FileSystem, path: string): Promise<Result<CorpusDocument[], string>> {
  const content = await fs.readFile(path);
  if (!content.ok) {
    return err(`Cannot read corpus ${path}: ${content.error.message}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(content.value);
  } catch (e) {
    return err(`Corpus ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = corpusSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(`Corpus ${path} is invalid: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`);
  }
  return ok(parsed.data);
}

export class MemorySearchTool implements SearchTool {
  readonly name = 'memory';
  /** Every request received, for test assertions */
  readonly requests: SearchRequest[] = [];

  constructor(private readonly documents: CorpusDocument[]) {}

  async search(request: SearchRequest): Promise<DocumentHit[]> {
    this.requests.push(request);
    const terms = tokenize(request.keywords.join(' '));

    const scored = this.documents
      .filter(
        (doc) =>
          request.expectedDocuments.length === 0 ||
          request.expectedDocuments.some((expected) => docCodeMatches(doc.docCode, expected))
      )
      .map((doc) => {
        const words = new Set(tokenize(`${doc.title} ${doc.text}`));
        return { doc, score: terms.filter((term) => words.has(term)).length };
      })
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score || a.doc.id.localeCompare(b.doc.id));

    return scored.slice(0, request.hits).map(
      ({ doc }): DocumentHit => ({
        id: doc.id,
        title: doc.title,
        docCode: doc.docCode,
        pageNumber: doc.pageNumber,
        snippet: doc.text.slice(0, 300),
        text: doc.text,
      })
    );
  }
}
