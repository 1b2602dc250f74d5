// Shared fakes: scripted LLM, in-process city gateway, test configuration.

import type { AxiosInstance } from 'axios';
import { loadConfig, type AppConfig } from '@/config/app.config';
import type { ConversationEntry, ConversationStore } from '@/memory/conversation-store';
import BaseLLM from '@/models/base/llm';
import type { GenerateTextInput, GenerateTextOutput, LlmTask } from '@/models/types';
import { ModelRouter } from '@/services/model-router';
import { createCityHttpClient } from '@/tools/city-api-client';

export const GEO_URL = 'http://geo.test';
export const SITE_URL = 'http://site.test';

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    EMBEDDING_PROVIDER: 'hash',
    RETRY_BASE_DELAY_MS: '0',
    CITY_GEO_API_URL: GEO_URL,
    CITY_SITE_API_URL: SITE_URL,
    ...env,
  });
}

type Responder = (input: GenerateTextInput) => string | Promise<string>;

/** Answers by task; a task without a responder fails like an unreachable model. */
export class FakeLLM extends BaseLLM<{ name: string }> {
  readonly calls: GenerateTextInput[] = [];

  constructor(
    private readonly responders: Partial<Record<LlmTask, Responder>>,
    name = 'fake',
  ) {
    super({ name });
  }

  async generateText(input: GenerateTextInput): Promise<GenerateTextOutput> {
    this.calls.push(input);
    const respond = this.responders[input.task];
    if (!respond) {
      throw new Error(`model unavailable for ${input.task}`);
    }
    return { content: await respond(input) };
  }

  callsFor(task: LlmTask): GenerateTextInput[] {
    return this.calls.filter((call) => call.task === task);
  }
}

/** Text of the last user message of a call. */
export function userText(input: GenerateTextInput): string {
  return [...input.messages].reverse().find((m) => m.role === 'user')?.content ?? '';
}

export function routerWith(llm: BaseLLM<unknown>, maxRetries = 0): ModelRouter {
  return new ModelRouter({ small: llm, main: llm }, { timeoutMs: 1000, maxRetries, retryDelayMs: 0 });
}

export interface FakeResponse {
  status: number;
  data: unknown;
}

export interface RecordedRequest {
  url: string;
  params: Record<string, unknown>;
  region: unknown;
}

/** Axios instance configured like production, answered in process. */
export function fakeCityHttp(
  respond: (url: string, params: Record<string, unknown>) => FakeResponse | Promise<FakeResponse>,
): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const http = createCityHttpClient({ geoApiUrl: GEO_URL, siteApiUrl: SITE_URL, regionId: '78', timeoutMs: 1000 });
  http.defaults.adapter = async (config) => {
    const url = config.url ?? '';
    const params: Record<string, unknown> = config.params ?? {};
    requests.push({ url, params, region: config.headers['region'] });
    const { status, data } = await respond(url, params);
    return { data, status, statusText: String(status), headers: {}, config };
  };
  return { http, requests };
}

/** Conversation store double that can be told to fail. */
export class FakeConversationStore implements ConversationStore {
  readonly sessions = new Map<string, ConversationEntry[]>();
  failReads = false;
  failWrites = false;

  async get(sessionId: string, limit: number): Promise<ConversationEntry[]> {
    if (this.failReads) throw new Error('store offline');
    return (this.sessions.get(sessionId) ?? []).slice(-limit);
  }

  async append(sessionId: string, ...entries: ConversationEntry[]): Promise<void> {
    if (this.failWrites) throw new Error('store offline');
    this.sessions.set(sessionId, [...(this.sessions.get(sessionId) ?? []), ...entries]);
  }
}
