import { describe, it, expect } from 'vitest';
import { MemorySearchTool, loadCorpus, CorpusDocument } from './memory-search-tool';
import { MemoryFileSystem } from '../io/memory-file-system';

const DOCUMENTS: CorpusDocument[] = [
  { id: 'a', title: 'Concrete structures', docCode: 'SP 63', pageNumber: 12, text: 'Minimum concrete cover for slabs is 20 mm.' },
  { id: 'b', title: 'Concrete works', docCode: 'SP 70', pageNumber: 3, text: 'Cover tolerance during concrete works.' },
  { id: 'c', title: 'Loads and actions', docCode: 'SP 20', text: 'Office floors carry 2.0 kPa.' },
];

describe('MemorySearchTool', () => {
  const tool = new MemorySearchTool(DOCUMENTS);

  it('should rank documents by matched keywords', async () => {
    const hits = await tool.search({ keywords: ['slab', 'cover', 'slabs'], expectedDocuments: [], hits: 3 });

    expect(hits.map((h) => h.id)).toEqual(['a', 'b']);
    expect(hits[0]).toMatchObject({ docCode: 'SP 63', pageNumber: 12, snippet: 'Minimum concrete cover for slabs is 20 mm.' });
  });

  it('should restrict to expected document codes, ignoring spacing', async () => {
    const hits = await tool.search({ keywords: ['cover'], expectedDocuments: ['sp70'], hits: 3 });

    expect(hits.map((h) => h.id)).toEqual(['b']);
  });

  it('should break ties by id and honour the hit limit', async () => {
    const hits = await tool.search({ keywords: ['concrete'], expectedDocuments: [], hits: 1 });

    expect(hits.map((h) => h.id)).toEqual(['a']);
  });

  it('should record every request', async () => {
    const recording = new MemorySearchTool(DOCUMENTS);
    await recording.search({ keywords: ['timber'], expectedDocuments: [], hits: 3 });

    expect(recording.requests).toEqual([{ keywords: ['timber'], expectedDocuments: [], hits: 3 }]);
  });
});

describe('loadCorpus', () => {
  it('should read a JSON array of documents', async () => {
    const fs = new MemoryFileSystem('/work');
    fs.setFile('/work/corpus.json', JSON.stringify(DOCUMENTS.slice(0, 1)));

    expect(await loadCorpus(fs, '/work/corpus.json')).toEqual({ ok: true, value: DOCUMENTS.slice(0, 1) });
  });

  it('should report invalid JSON', async () => {
    const fs = new MemoryFileSystem('/work');
    fs.setFile('/work/corpus.json', '[{');

    const result = await loadCorpus(fs, '/work/corpus.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith('Corpus /work/corpus.json is not valid JSON: ')).toBe(true);
    }
  });

  it('should name the first invalid field', async () => {
    const fs = new MemoryFileSystem('/work');
    fs.setFile('/work/corpus.json', JSON.stringify([{ id: '', title: 't', docCode: 'SP 1', text: 'x' }]));

    expect(await loadCorpus(fs, '/work/corpus.json')).toEqual({
      ok: false,
      error: 'Corpus /work/corpus.json is invalid: 0.id: String must contain at least 1 character(s)',
    });
  });

  it('should report a missing file', async () => {
    const result = await loadCorpus(new MemoryFileSystem('/work'), '/work/missing.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith('Cannot read corpus /work/missing.json: ')).toBe(true);
    }
  });
});
