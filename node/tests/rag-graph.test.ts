import { describe, expect, it } from 'vitest';
import { NO_DOCUMENTS_NOTICE } from '@/agent/messages';
import { RagGraph, type RagGraphOptions } from '@/agent/rag-graph';
import { contextDocuments, createGraphState } from '@/agent/state';
import BaseEmbedding from '@/models/base/embedding';
import HashEmbedding from '@/models/embeddings/hash';
import { gradeDocuments, parseGrade } from '@/rag/document-grader';
import { InMemoryDocumentStore } from '@/rag/document-store';
import { DocumentIndexer } from '@/rag/indexer';
import { HybridRetriever } from '@/rag/retriever';
import { FakeLLM, routerWith, userText } from './helpers';

const PASSPORT_URL = 'https://example.org/services/passport';
const WEATHER_URL = 'https://example.org/news/weather';

const embedder = new HashEmbedding({ dim: 64 });

async function seededStore(): Promise<InMemoryDocumentStore> {
  const store = new InMemoryDocumentStore();
  const indexer = new DocumentIndexer(store, embedder, { chunkSize: 800, chunkOverlap: 200 });
  await indexer.ingestAll([
    {
      url: PASSPORT_URL,
      title: 'Замена паспорта',
      category: 'documents',
      text: 'Паспорт меняют в 20 и 45 лет. Заявление принимают МФЦ и портал госуслуг.',
    },
    {
      url: WEATHER_URL,
      title: 'Погода',
      category: 'news',
      text: 'Погода в городе: на выходных ожидается дождь и ветер.',
    },
  ]);
  return store;
}

function retrieverFor(store: InMemoryDocumentStore, embedding: BaseEmbedding<unknown> = embedder): HybridRetriever {
  return new HybridRetriever(store, embedding, {
    topK: 5,
    overfetch: 2,
    vectorWeight: 0.5,
    bm25Weight: 0.5,
    embeddingTimeoutMs: 1000,
    retryDelayMs: 0,
  });
}

const defaults: RagGraphOptions = { useQueryRewriting: true, useDocumentGrading: true, maxRetries: 1 };

describe('parseGrade', () => {
  it('reads the leading word', () => {
    expect(parseGrade('Yes.')).toBe('relevant');
    expect(parseGrade('no, unrelated')).toBe('irrelevant');
    expect(parseGrade('Нет')).toBe('irrelevant');
    expect(parseGrade('')).toBe('relevant');
  });
});

describe('gradeDocuments', () => {
  it('marks chunks the model rejects as irrelevant', async () => {
    const store = await seededStore();
    const docs = await retrieverFor(store).retrieve('паспорт');
    const llm = new FakeLLM({ grade: (input) => (userText(input).includes('Погода') ? 'no' : 'yes') });

    const { grades, failed } = await gradeDocuments(routerWith(llm), 'паспорт', docs);
    const kept = contextDocuments({ retrievedDocs: docs, docGrades: grades });

    expect(failed).toEqual([]);
    expect(kept.map((d) => d.chunk.sourceUrl)).toEqual([PASSPORT_URL]);
  });

  it('keeps a chunk whose grading call fails', async () => {
    const store = await seededStore();
    const docs = await retrieverFor(store).retrieve('паспорт');
    const llm = new FakeLLM({
      grade: (input) => {
        if (userText(input).includes('Погода')) throw new Error('grader down');
        return 'yes';
      },
    });

    const { grades, failed } = await gradeDocuments(routerWith(llm), 'паспорт', docs);
    const weather = docs.find((d) => d.chunk.sourceUrl === WEATHER_URL);

    expect(weather).toBeDefined();
    expect(failed).toEqual([weather?.chunk.id]);
    expect(grades[weather?.chunk.id ?? '']).toBe('relevant');
  });
});

describe('RagGraph', () => {
  it('answers with citations from the documents the model cites', async () => {
    const llm = new FakeLLM({
      rewrite: () => 'замена паспорта',
      grade: (input) => (userText(input).includes('Погода') ? 'no' : 'yes'),
      answer: () => 'Паспорт меняют в 20 и 45 лет [1].',
    });
    const graph = new RagGraph({ router: routerWith(llm), retriever: retrieverFor(await seededStore()), options: defaults });

    const state = await graph.run(createGraphState('Когда менять паспорт?', 'RAG'), { history: [] });

    expect(state.trace).toEqual(['rag:rewrite', 'rag:retrieve', 'rag:grade', 'rag:generate']);
    expect(state.rewrittenQuery).toBe('замена паспорта');
    expect(state.citations).toEqual([{ source: PASSPORT_URL, kind: 'document', title: 'Замена паспорта' }]);
    expect(state.grounded).toBe(true);
    expect(state.finalAnswer).toBe('Паспорт меняют в 20 и 45 лет [1].');
  });

  it('never passes rejected chunks to generation', async () => {
    const llm = new FakeLLM({
      rewrite: () => 'замена паспорта',
      grade: (input) => (userText(input).includes('Погода') ? 'no' : 'yes'),
      answer: () => 'Ответ.',
    });
    const graph = new RagGraph({ router: routerWith(llm), retriever: retrieverFor(await seededStore()), options: defaults });

    await graph.run(createGraphState('Когда менять паспорт?', 'RAG'), { history: [] });
    const prompt = userText(llm.callsFor('answer')[0]);

    expect(prompt).toContain(PASSPORT_URL);
    expect(prompt).not.toContain(WEATHER_URL);
  });

  it('broadens the query once, then answers with the limitation notice', async () => {
    const llm = new FakeLLM({ rewrite: () => 'запрос', grade: () => 'no', answer: () => 'Информации недостаточно.' });
    const graph = new RagGraph({ router: routerWith(llm), retriever: retrieverFor(await seededStore()), options: defaults });

    const state = await graph.run(createGraphState('Сколько стоит парковка?', 'RAG'), { history: [] });

    expect(state.trace).toEqual([
      'rag:rewrite',
      'rag:retrieve',
      'rag:grade',
      'rag:rewrite',
      'rag:retrieve',
      'rag:grade',
      'rag:generate',
    ]);
    expect(state.retryCount).toBe(1);
    expect(userText(llm.callsFor('rewrite')[1])).toContain('Сформулируй запрос шире');
    expect(state.citations).toEqual([]);
    expect(state.finalAnswer).toBe(`${NO_DOCUMENTS_NOTICE}\n\nИнформации недостаточно.`);
  });

  it('does not retry when RAG_MAX_RETRIES is 0', async () => {
    const llm = new FakeLLM({ rewrite: () => 'запрос', grade: () => 'no', answer: () => 'Нет данных.' });
    const graph = new RagGraph({
      router: routerWith(llm),
      retriever: retrieverFor(await seededStore()),
      options: { ...defaults, maxRetries: 0 },
    });

    const state = await graph.run(createGraphState('Сколько стоит парковка?', 'RAG'), { history: [] });

    expect(state.trace).toEqual(['rag:rewrite', 'rag:retrieve', 'rag:grade', 'rag:generate']);
  });

  it('drops the rewrite state and the retry edge when rewriting is off', async () => {
    const llm = new FakeLLM({ grade: () => 'no', answer: () => 'Нет данных.' });
    const graph = new RagGraph({
      router: routerWith(llm),
      retriever: retrieverFor(await seededStore()),
      options: { ...defaults, useQueryRewriting: false },
    });

    const state = await graph.run(createGraphState('Сколько стоит парковка?', 'RAG'), { history: [] });

    expect(graph.states()).toEqual(['retrieve', 'grade', 'generate']);
    expect(state.trace).toEqual(['rag:retrieve', 'rag:grade', 'rag:generate']);
    expect(llm.callsFor('rewrite')).toHaveLength(0);
  });

  it('drops the grade state when grading is off', async () => {
    const llm = new FakeLLM({ rewrite: () => 'паспорт', answer: () => 'Ответ [1].' });
    const graph = new RagGraph({
      router: routerWith(llm),
      retriever: retrieverFor(await seededStore()),
      options: { ...defaults, useDocumentGrading: false },
    });

    const state = await graph.run(createGraphState('паспорт', 'RAG'), { history: [] });

    expect(graph.states()).toEqual(['rewrite', 'retrieve', 'generate']);
    expect(state.trace).toEqual(['rag:rewrite', 'rag:retrieve', 'rag:generate']);
    expect(llm.callsFor('grade')).toHaveLength(0);
  });

  it('keeps the original query when rewriting fails', async () => {
    const llm = new FakeLLM({ grade: () => 'yes', answer: () => 'Ответ [1].' });
    const graph = new RagGraph({ router: routerWith(llm), retriever: retrieverFor(await seededStore()), options: defaults });

    const state = await graph.run(createGraphState('паспорт', 'RAG'), { history: [] });

    expect(state.rewrittenQuery).toBe('паспорт');
    expect(state.degradations.map((d) => d.stage)).toEqual(['rewrite']);
    expect(state.grounded).toBe(true);
  });

  it('answers from empty context when retrieval fails, without retrying', async () => {
    class BrokenEmbedding extends BaseEmbedding<null> {
      async embedText(): Promise<number[][]> {
        throw new Error('embedding service unavailable');
      }
    }
    const llm = new FakeLLM({ rewrite: () => 'паспорт', grade: () => 'yes', answer: () => 'Не знаю.' });
    const graph = new RagGraph({
      router: routerWith(llm),
      retriever: retrieverFor(await seededStore(), new BrokenEmbedding(null)),
      options: defaults,
    });

    const state = await graph.run(createGraphState('паспорт', 'RAG'), { history: [] });

    expect(state.trace).toEqual(['rag:rewrite', 'rag:retrieve', 'rag:grade', 'rag:generate']);
    expect(state.degradations.map((d) => d.stage)).toEqual(['retrieve']);
    expect(state.finalAnswer.startsWith(NO_DOCUMENTS_NOTICE)).toBe(true);
  });
});
