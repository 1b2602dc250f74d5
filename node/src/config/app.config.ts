/**
 * App configuration.
 *
 * Every tunable is read from the environment once at startup, validated with zod and
 * passed explicitly to the components that need it. Nothing below reads process.env
 * after `loadConfig` returns.
 */
import { z } from 'zod';

const booleanFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(4000),
    LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    CORS_ORIGIN: z.string().optional(),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    CHAT_MODEL: z.string().min(1).default('gpt-4.1-mini'),
    SMALL_MODEL: z.string().min(1).default('gpt-4o-mini'),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_PROVIDER: z.enum(['openai', 'hash']).default('openai'),
    HASH_EMBEDDING_DIM: z.coerce.number().int().positive().default(256),

    CHUNK_SIZE: z.coerce.number().int().positive().default(800),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    TOP_K: z.coerce.number().int().min(1).default(5),
    RAG_OVERFETCH: z.coerce.number().int().min(1).default(2),
    RAG_VECTOR_WEIGHT: z.coerce.number().min(0).max(1).default(0.5),
    RAG_BM25_WEIGHT: z.coerce.number().min(0).max(1).default(0.5),
    RAG_USE_QUERY_REWRITING: booleanFromEnv.default(true),
    RAG_USE_DOCUMENT_GRADING: booleanFromEnv.default(true),
    RAG_MAX_RETRIES: z.coerce.number().int().nonnegative().default(1),

    ROUTING_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
    // previous turns, each a user message and its answer
    HISTORY_WINDOW: z.coerce.number().int().nonnegative().default(6),

    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    LLM_MAX_RETRIES: z.coerce.number().int().nonnegative().default(1),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
    TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    TOOL_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),

    CITY_GEO_API_URL: z.string().url().default('https://yazzh-geo.gate.petersburg.ru'),
    CITY_SITE_API_URL: z.string().url().default('https://yazzh.gate.petersburg.ru'),
    CITY_REGION_ID: z.string().min(1).default('78'),

    REDIS_URL: z.string().min(1).optional(),
    CONVERSATION_TTL_MINUTES: z.coerce.number().int().positive().default(60),
    INDEX_PATH: z.string().min(1).default('data/index.json'),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: `must be smaller than CHUNK_SIZE (${env.CHUNK_SIZE})`,
      });
    }
    if (env.EMBEDDING_PROVIDER === 'openai' && env.NODE_ENV !== 'test' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'required when EMBEDDING_PROVIDER=openai',
      });
    }
  });

export type LogLevelName = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface RagConfig {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  overfetch: number;
  vectorWeight: number;
  bm25Weight: number;
  useQueryRewriting: boolean;
  useDocumentGrading: boolean;
  maxRetries: number;
}

export interface AppConfig {
  server: {
    nodeEnv: 'development' | 'production' | 'test';
    port: number;
    logLevel: LogLevelName;
    corsOrigins: string[];
    requestTimeoutMs: number;
  };
  models: {
    apiKey?: string;
    baseURL?: string;
    chatModel: string;
    smallModel: string;
    embeddingModel: string;
    embeddingProvider: 'openai' | 'hash';
    hashEmbeddingDim: number;
    llmTimeoutMs: number;
    llmMaxRetries: number;
    embeddingTimeoutMs: number;
  };
  rag: RagConfig;
  routing: {
    confidenceThreshold: number;
    historyWindow: number;
  };
  tools: {
    timeoutMs: number;
    maxRetries: number;
  };
  city: {
    geoApiUrl: string;
    siteApiUrl: string;
    regionId: string;
  };
  memory: {
    redisUrl?: string;
    ttlMinutes: number;
  };
  retryBaseDelayMs: number;
  indexPath: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parses an environment map into an AppConfig. Throws ConfigError listing every
 * offending key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    server: {
      nodeEnv: e.NODE_ENV,
      port: e.PORT,
      logLevel: e.LOG_LEVEL,
      corsOrigins: e.CORS_ORIGIN?.split(',').map((o) => o.trim()).filter(Boolean) ?? ['http://localhost:3000'],
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    models: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
      chatModel: e.CHAT_MODEL,
      smallModel: e.SMALL_MODEL,
      embeddingModel: e.EMBEDDING_MODEL,
      embeddingProvider: e.EMBEDDING_PROVIDER,
      hashEmbeddingDim: e.HASH_EMBEDDING_DIM,
      llmTimeoutMs: e.LLM_TIMEOUT_MS,
      llmMaxRetries: e.LLM_MAX_RETRIES,
      embeddingTimeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    rag: {
      chunkSize: e.CHUNK_SIZE,
      chunkOverlap: e.CHUNK_OVERLAP,
      topK: e.TOP_K,
      overfetch: e.RAG_OVERFETCH,
      vectorWeight: e.RAG_VECTOR_WEIGHT,
      bm25Weight: e.RAG_BM25_WEIGHT,
      useQueryRewriting: e.RAG_USE_QUERY_REWRITING,
      useDocumentGrading: e.RAG_USE_DOCUMENT_GRADING,
      maxRetries: e.RAG_MAX_RETRIES,
    },
    routing: {
      confidenceThreshold: e.ROUTING_CONFIDENCE_THRESHOLD,
      historyWindow: e.HISTORY_WINDOW,
    },
    tools: {
      timeoutMs: e.TOOL_TIMEOUT_MS,
      maxRetries: e.TOOL_MAX_RETRIES,
    },
    city: {
      geoApiUrl: e.CITY_GEO_API_URL.replace(/\/+$/, ''),
      siteApiUrl: e.CITY_SITE_API_URL.replace(/\/+$/, ''),
      regionId: e.CITY_REGION_ID,
    },
    memory: {
      redisUrl: e.REDIS_URL,
      ttlMinutes: e.CONVERSATION_TTL_MINUTES,
    },
    retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
    indexPath: e.INDEX_PATH,
  };
}
