import { describe, expect, it } from 'vitest';
import HashEmbedding from '@/models/embeddings/hash';
import { chunkId, splitIntoChunks } from '@/rag/chunker';
import { InMemoryDocumentStore } from '@/rag/document-store';
import { DocumentIndexer } from '@/rag/indexer';

function alphabetText(length: number): string {
  return Array.from({ length }, (_, i) => String.fromCharCode(97 + (i % 26))).join('');
}

describe('splitIntoChunks', () => {
  it('splits 1700 characters into three overlapping windows', () => {
    const text = alphabetText(1700);
    const windows = splitIntoChunks(text, 800, 200);

    expect(windows.map((w) => [w.start, w.text.length])).toEqual([
      [0, 800],
      [600, 800],
      [1200, 500],
    ]);
    expect(windows[0].text.slice(-200)).toBe(windows[1].text.slice(0, 200));
    expect(windows[1].text.slice(-200)).toBe(windows[2].text.slice(0, 200));
    expect(windows.map((w) => w.text.length).every((n) => n <= 800)).toBe(true);
  });

  it('keeps a short text in one window', () => {
    expect(splitIntoChunks('Короткий текст', 800, 200)).toEqual([{ index: 0, start: 0, text: 'Короткий текст' }]);
  });

  it('returns nothing for blank text', () => {
    expect(splitIntoChunks('  \n ', 800, 200)).toEqual([]);
  });

  it('rejects an overlap that does not advance', () => {
    expect(() => splitIntoChunks('abc', 10, 10)).toThrow(RangeError);
  });
});

describe('chunkId', () => {
  it('depends on source, position and text only', () => {
    const id = chunkId('https://example.org/a', 0, 'text');

    expect(chunkId('https://example.org/a', 0, 'text')).toBe(id);
    expect(chunkId('https://example.org/a', 1, 'text')).not.toBe(id);
    expect(chunkId('https://example.org/b', 0, 'text')).not.toBe(id);
    expect(id).toHaveLength(32);
  });
});

describe('DocumentIndexer', () => {
  const source = {
    url: 'https://example.org/services/passport',
    title: 'Замена паспорта',
    category: 'documents',
    text: alphabetText(1700),
  };

  function setup() {
    const store = new InMemoryDocumentStore();
    const indexer = new DocumentIndexer(store, new HashEmbedding({ dim: 32 }), { chunkSize: 800, chunkOverlap: 200 });
    return { store, indexer };
  }

  it('re-ingesting the same source yields the same chunk set', async () => {
    const { store, indexer } = setup();

    const first = await indexer.ingest(source);
    const second = await indexer.ingest(source);

    expect(second.map((c) => c.id)).toEqual(first.map((c) => c.id));
    expect(await store.count()).toBe(3);
  });

  it('replaces the previous chunks of a changed source', async () => {
    const { store, indexer } = setup();

    await indexer.ingest(source);
    await indexer.ingest({ ...source, text: 'Новый короткий текст о замене паспорта.' });

    expect(await store.count()).toBe(1);
  });

  it('rejects a document without text before embedding anything', async () => {
    const { store, indexer } = setup();

    await expect(indexer.ingest({ ...source, text: '' })).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    expect(await store.count()).toBe(0);
  });
});
