import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '@/config/app.config';
import { buildPipeline } from '@/services/pipeline-deps';
import { FakeLLM, testConfig } from './helpers';

const base = { NODE_ENV: 'test', EMBEDDING_PROVIDER: 'hash' };

describe('loadConfig', () => {
  it('applies the documented defaults', () => {
    const config = loadConfig(base);

    expect(config.rag).toMatchObject({
      chunkSize: 800,
      chunkOverlap: 200,
      topK: 5,
      useQueryRewriting: true,
      useDocumentGrading: true,
      maxRetries: 1,
    });
    expect(config.routing).toEqual({ confidenceThreshold: 0.6, historyWindow: 6 });
    expect(config.models.chatModel).toBe('gpt-4.1-mini');
    expect(config.city.regionId).toBe('78');
  });

  it('coerces numbers and booleans from strings', () => {
    const config = loadConfig({ ...base, TOP_K: '3', RAG_USE_DOCUMENT_GRADING: 'false', RAG_MAX_RETRIES: '0' });

    expect(config.rag.topK).toBe(3);
    expect(config.rag.useDocumentGrading).toBe(false);
    expect(config.rag.maxRetries).toBe(0);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ ...base, CHUNK_SIZE: '200', CHUNK_OVERLAP: '200' })).toThrow(
      'CHUNK_OVERLAP: must be smaller than CHUNK_SIZE (200)',
    );
  });

  it('rejects TOP_K below 1', () => {
    expect(() => loadConfig({ ...base, TOP_K: '0' })).toThrow(ConfigError);
  });

  it('rejects a boolean flag it cannot read', () => {
    expect(() => loadConfig({ ...base, RAG_USE_QUERY_REWRITING: 'maybe' })).toThrow('expected a boolean, got "maybe"');
  });

  it('requires an API key for OpenAI embeddings outside tests', () => {
    let caught: unknown;
    try {
      loadConfig({ NODE_ENV: 'production', EMBEDDING_PROVIDER: 'openai' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.issues : []).toEqual([
      'OPENAI_API_KEY: required when EMBEDDING_PROVIDER=openai',
    ]);
  });

  it('strips trailing slashes from the city API URLs', () => {
    const config = loadConfig({ ...base, CITY_SITE_API_URL: 'http://site.test/' });
    expect(config.city.siteApiUrl).toBe('http://site.test');
  });
});

describe('buildPipeline', () => {
  function issuesOf(build: () => unknown): string[] {
    try {
      build();
    } catch (error) {
      if (error instanceof ConfigError) return error.issues;
      throw error;
    }
    return [];
  }

  it('reports a missing API key for the chat models as a configuration error', () => {
    expect(() => buildPipeline(testConfig())).toThrow(ConfigError);
    expect(issuesOf(() => buildPipeline(testConfig()))).toEqual(['OPENAI_API_KEY: required for model gpt-4.1-mini']);
  });

  it('reports a missing API key for OpenAI embeddings as a configuration error', () => {
    const llm = new FakeLLM({});
    const config = testConfig({ EMBEDDING_PROVIDER: 'openai' });

    expect(issuesOf(() => buildPipeline(config, { chatModel: llm, smallModel: llm }))).toEqual([
      'OPENAI_API_KEY: required for EMBEDDING_PROVIDER=openai',
    ]);
  });
});
