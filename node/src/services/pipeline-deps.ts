// node/src/services/pipeline-deps.ts: builds the assistant pipeline from config, shared by the server and the ingest script

import type { AxiosInstance } from 'axios';
import { HybridGraph } from '@/agent/hybrid-graph';
import { IntentClassifier, KeywordIntentMatcher } from '@/agent/intent-classifier';
import { RagGraph } from '@/agent/rag-graph';
import { SupervisorGraph } from '@/agent/supervisor-graph';
import { ToolPlanner } from '@/agent/tool-planner';
import { ConfigError, type AppConfig } from '@/config/app.config';
import type { ConversationStore } from '@/memory/conversation-store';
import { InMemoryConversationStore } from '@/memory/InMemoryConversationStore';
import { RedisConversationStore } from '@/memory/RedisConversationStore';
import type BaseEmbedding from '@/models/base/embedding';
import type BaseLLM from '@/models/base/llm';
import HashEmbedding from '@/models/embeddings/hash';
import OpenAIEmbedding from '@/models/embeddings/openai';
import OpenAILLM from '@/models/llms/openai';
import { InMemoryDocumentStore } from '@/rag/document-store';
import { DocumentIndexer } from '@/rag/indexer';
import { HybridRetriever } from '@/rag/retriever';
import { logger } from '@/services/logger';
import { ModelRouter } from '@/services/model-router';
import { ToxicityFilter } from '@/services/toxicity';
import { CityApiClient, createCityHttpClient } from '@/tools/city-api-client';
import { createCityToolHandlers, ToolLayer } from '@/tools/tool-layer';

/** Replaces external collaborators, mostly for tests. */
export interface PipelineOverrides {
  chatModel?: BaseLLM<unknown>;
  smallModel?: BaseLLM<unknown>;
  embedding?: BaseEmbedding<unknown>;
  http?: AxiosInstance;
  conversations?: ConversationStore;
  store?: InMemoryDocumentStore;
  clock?: () => Date;
}

export interface Pipeline {
  supervisor: SupervisorGraph;
  store: InMemoryDocumentStore;
  indexer: DocumentIndexer;
  conversations: ConversationStore;
  /** Releases timers and connections owned by the pipeline. */
  close(): Promise<void>;
}

function requireApiKey(config: AppConfig, purpose: string): string {
  const { apiKey } = config.models;
  if (!apiKey) {
    throw new ConfigError([`OPENAI_API_KEY: required for ${purpose}`]);
  }
  return apiKey;
}

export function createEmbedding(config: AppConfig): BaseEmbedding<unknown> {
  const { models } = config;
  if (models.embeddingProvider === 'hash') {
    return new HashEmbedding({ dim: models.hashEmbeddingDim });
  }
  return new OpenAIEmbedding({
    model: models.embeddingModel,
    apiKey: requireApiKey(config, 'EMBEDDING_PROVIDER=openai'),
    baseURL: models.baseURL,
  });
}

function createChatModel(config: AppConfig, model: string): BaseLLM<unknown> {
  return new OpenAILLM({ model, apiKey: requireApiKey(config, `model ${model}`), baseURL: config.models.baseURL });
}

function createConversationStore(config: AppConfig, closers: Array<() => Promise<void>>): ConversationStore {
  const { redisUrl, ttlMinutes } = config.memory;
  if (redisUrl) {
    const redis = new RedisConversationStore(redisUrl, ttlMinutes);
    closers.push(() => redis.disconnect());
    logger.info('pipeline:conversations', { backend: 'redis' });
    return redis;
  }
  const memory = new InMemoryConversationStore(ttlMinutes);
  closers.push(async () => memory.destroy());
  logger.info('pipeline:conversations', { backend: 'memory' });
  return memory;
}

export function buildPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Pipeline {
  const { models, rag, routing, tools, city } = config;
  const closers: Array<() => Promise<void>> = [];

  const chatModel = overrides.chatModel ?? createChatModel(config, models.chatModel);
  const smallModel = overrides.smallModel ?? createChatModel(config, models.smallModel);
  const embedding = overrides.embedding ?? createEmbedding(config);

  const router = new ModelRouter(
    { small: smallModel, main: chatModel },
    { timeoutMs: models.llmTimeoutMs, maxRetries: models.llmMaxRetries, retryDelayMs: config.retryBaseDelayMs },
  );

  const store = overrides.store ?? new InMemoryDocumentStore();
  const indexer = new DocumentIndexer(store, embedding, { chunkSize: rag.chunkSize, chunkOverlap: rag.chunkOverlap });
  const retriever = new HybridRetriever(store, embedding, {
    topK: rag.topK,
    overfetch: rag.overfetch,
    vectorWeight: rag.vectorWeight,
    bm25Weight: rag.bm25Weight,
    embeddingTimeoutMs: models.embeddingTimeoutMs,
    retryDelayMs: config.retryBaseDelayMs,
  });

  const http = overrides.http ?? createCityHttpClient({ ...city, timeoutMs: tools.timeoutMs });
  const toolLayer = new ToolLayer(createCityToolHandlers(new CityApiClient(http, city)), {
    timeoutMs: tools.timeoutMs,
    maxRetries: tools.maxRetries,
    retryDelayMs: config.retryBaseDelayMs,
  });

  const keywords = new KeywordIntentMatcher();
  const ragGraph = new RagGraph({
    router,
    retriever,
    options: {
      useQueryRewriting: rag.useQueryRewriting,
      useDocumentGrading: rag.useDocumentGrading,
      maxRetries: rag.maxRetries,
    },
  });
  const hybridGraph = new HybridGraph({
    router,
    planner: new ToolPlanner({ router, keywords, clock: overrides.clock }),
    tools: toolLayer,
    rag: ragGraph,
  });

  const conversations = overrides.conversations ?? createConversationStore(config, closers);

  const supervisor = new SupervisorGraph({
    router,
    classifier: new IntentClassifier({ router, keywords, confidenceThreshold: routing.confidenceThreshold }),
    rag: ragGraph,
    hybrid: hybridGraph,
    conversations,
    toxicity: new ToxicityFilter(),
    historyWindow: routing.historyWindow,
  });

  return {
    supervisor,
    store,
    indexer,
    conversations,
    close: async () => {
      await Promise.all(closers.map((close) => close()));
    },
  };
}
