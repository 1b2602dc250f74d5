// node/src/services/model-router.ts: central routing per task type

import type BaseLLM from '@/models/base/llm';
import type { GenerateOptions, LlmTask, Message } from '@/models/types';
import { componentLogger, type AppLogger } from '@/services/logger';
import {
  errorMessage,
  GenerationError,
  TurnCancelledError,
  type FailureStage,
} from '@/stability/errors';
import { retryWithBackoff } from '@/stability/retryWithBackoff';
import { withTimeout } from '@/stability/timeout';

export type ModelName = 'small' | 'main';

const TASK_MODEL: Record<LlmTask, ModelName> = {
  classify: 'small',
  rewrite: 'small',
  grade: 'small',
  plan: 'small',
  answer: 'main',
  converse: 'main',
};

const TASK_STAGE: Record<LlmTask, FailureStage> = {
  classify: 'classify',
  rewrite: 'rewrite',
  grade: 'grade',
  plan: 'plan',
  answer: 'generate',
  converse: 'direct',
};

const TASK_DEFAULTS: Record<LlmTask, GenerateOptions> = {
  classify: { temperature: 0, maxTokens: 100, json: true },
  rewrite: { temperature: 0, maxTokens: 200 },
  grade: { temperature: 0, maxTokens: 5 },
  plan: { temperature: 0, maxTokens: 500, json: true },
  answer: { temperature: 0.2, maxTokens: 1200 },
  converse: { temperature: 0.5, maxTokens: 600 },
};

export interface ModelRouterOptions {
  timeoutMs: number;
  /** Extra attempts after the first, with identical input. */
  maxRetries: number;
  retryDelayMs: number;
}

export type ModelSet = Record<ModelName, BaseLLM<unknown>>;

/**
 * Single entry point for every LLM call. Picks the model for the task, bounds the
 * call with a timeout and a small retry budget, and reports the final failure as a
 * GenerationError attributed to the task's stage.
 */
export class ModelRouter {
  private readonly log: AppLogger;

  constructor(
    private readonly models: ModelSet,
    private readonly options: ModelRouterOptions,
    log?: AppLogger,
  ) {
    this.log = log ?? componentLogger('llm');
  }

  async complete(
    task: LlmTask,
    messages: Message[],
    signal?: AbortSignal,
    overrides: GenerateOptions = {},
  ): Promise<string> {
    const stage = TASK_STAGE[task];
    const model = this.models[TASK_MODEL[task]];
    const options = { ...TASK_DEFAULTS[task], ...overrides };
    const started = Date.now();

    try {
      const output = await retryWithBackoff(
        async () => {
          const generated = await withTimeout(
            (callSignal) => model.generateText({ task, messages, options, signal: callSignal }),
            { timeoutMs: this.options.timeoutMs, label: `llm:${task}`, stage, signal },
          );
          const content = generated.content.trim();
          if (!content) {
            throw new GenerationError(`Empty ${task} response`, stage);
          }
          return { ...generated, content };
        },
        {
          maxRetries: this.options.maxRetries,
          initialDelay: this.options.retryDelayMs,
          shouldRetry: () => true,
          signal,
          stage,
          onRetry: (error, attempt) =>
            this.log.warn('llm:retry', { task, attempt, error: errorMessage(error) }),
        },
      );
      if (output.finishReason === 'length') {
        // the model hit maxTokens; the text is kept but may end mid-sentence
        this.log.warn('llm:truncated', { task, maxTokens: options.maxTokens, usage: output.usage });
      }
      this.log.debug('llm:call_done', {
        task,
        latencyMs: Date.now() - started,
        finishReason: output.finishReason,
        usage: output.usage,
      });
      return output.content;
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      this.log.warn('llm:call_failed', { task, latencyMs: Date.now() - started, error: errorMessage(error) });
      if (error instanceof GenerationError) throw error;
      throw new GenerationError(`${task} call failed: ${errorMessage(error)}`, stage, { cause: error });
    }
  }
}
