/**
 * LLM Types: shapes exchanged with chat and embedding models.
 */

/**
 * Message format for LLM conversations
 */
export type Message = {
  role: 'user' | 'assistant' | 'system';
  content: string;
};

/**
 * What a call is for. Adapters may ignore it; the router uses it to pick a model
 * and to attribute failures.
 */
export type LlmTask = 'classify' | 'rewrite' | 'grade' | 'plan' | 'answer' | 'converse';

/**
 * Options for text generation
 */
export type GenerateOptions = {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stopSequences?: string[];
  /** Ask the provider for a JSON object response. */
  json?: boolean;
};

/**
 * Input for text generation
 */
export type GenerateTextInput = {
  task: LlmTask;
  messages: Message[];
  options?: GenerateOptions;
  signal?: AbortSignal;
};

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

/**
 * Output from text generation
 */
export type GenerateTextOutput = {
  content: string;
  finishReason?: string;
  usage?: TokenUsage;
};

/** Anything with text that can be embedded. */
export type Embeddable = {
  text: string;
};
