/**
 * Chat completions through the OpenAI SDK (or any compatible gateway via `baseURL`).
 */

import OpenAI from 'openai';
import BaseLLM from '../base/llm';
import type { GenerateOptions, GenerateTextInput, GenerateTextOutput, Message, TokenUsage } from '../types';

export interface OpenAILLMConfig {
  model: string; // e.g. 'gpt-4o-mini', 'gpt-4.1-mini'
  apiKey?: string;
  baseURL?: string;
  /** Defaults applied when a call passes no options of its own. */
  defaults?: GenerateOptions;
}

type ChatParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

const BASE_DEFAULTS: GenerateOptions = { temperature: 0.2, maxTokens: 1200 };

function chatMessage({ role, content }: Message): ChatMessage {
  if (role === 'system') return { role, content };
  if (role === 'assistant') return { role, content };
  return { role, content };
}

function usageOf(usage: OpenAI.CompletionUsage | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

class OpenAILLM extends BaseLLM<OpenAILLMConfig> {
  private readonly client: OpenAI;
  private readonly defaults: GenerateOptions;

  constructor(config: OpenAILLMConfig) {
    super(config);
    if (!config.apiKey) {
      throw new Error('Missing OpenAI API key. Set OPENAI_API_KEY');
    }
    this.defaults = { ...BASE_DEFAULTS, ...config.defaults };
    // The model router owns retries and deadlines.
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
  }

  private paramsFor(input: GenerateTextInput): ChatParams {
    const opts: GenerateOptions = { ...this.defaults, ...input.options };
    const params: ChatParams = {
      model: this.config.model,
      messages: input.messages.map(chatMessage),
      temperature: opts.temperature,
      max_tokens: opts.maxTokens,
      top_p: opts.topP,
      stop: opts.stopSequences,
    };
    if (opts.json) {
      params.response_format = { type: 'json_object' };
    }
    return params;
  }

  async generateText(input: GenerateTextInput): Promise<GenerateTextOutput> {
    const completion = await this.client.chat.completions.create(this.paramsFor(input), { signal: input.signal });
    const [first] = completion.choices;
    return {
      content: first?.message.content ?? '',
      finishReason: first?.finish_reason,
      usage: usageOf(completion.usage),
    };
  }
}

export default OpenAILLM;
