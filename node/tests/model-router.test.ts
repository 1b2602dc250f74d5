import { Logger, type ILogObj } from 'tslog';
import { describe, expect, it, vi } from 'vitest';
import BaseLLM from '@/models/base/llm';
import type { GenerateTextInput, GenerateTextOutput } from '@/models/types';
import { ModelRouter } from '@/services/model-router';
import { GenerationError } from '@/stability/errors';

/** Replays canned outputs in order, keeping what each call asked for. */
class ScriptedLLM extends BaseLLM<{ outputs: GenerateTextOutput[] }> {
  readonly calls: GenerateTextInput[] = [];

  async generateText(input: GenerateTextInput): Promise<GenerateTextOutput> {
    this.calls.push(input);
    const next = this.config.outputs[this.calls.length - 1];
    if (!next) throw new Error('no scripted output left');
    return next;
  }
}

const usage = { promptTokens: 120, completionTokens: 30, totalTokens: 150 };

function routerFor(outputs: GenerateTextOutput[], maxRetries = 0) {
  const llm = new ScriptedLLM({ outputs });
  const log = new Logger<ILogObj>({ type: 'hidden' });
  const router = new ModelRouter({ small: llm, main: llm }, { timeoutMs: 1000, maxRetries, retryDelayMs: 0 }, log);
  return { router, llm, debug: vi.spyOn(log, 'debug'), warn: vi.spyOn(log, 'warn') };
}

const messages = [{ role: 'user' as const, content: 'Привет' }];

describe('ModelRouter', () => {
  it('returns trimmed text and logs the finish reason and token usage', async () => {
    const { router, llm, debug, warn } = routerFor([{ content: '  Здравствуйте!  ', finishReason: 'stop', usage }]);

    await expect(router.complete('converse', messages)).resolves.toBe('Здравствуйте!');

    expect(llm.calls[0].options).toEqual({ temperature: 0.5, maxTokens: 600 });
    expect(debug).toHaveBeenCalledWith('llm:call_done', {
      task: 'converse',
      latencyMs: expect.any(Number),
      finishReason: 'stop',
      usage,
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns when the answer was cut off by the token limit', async () => {
    const { router, warn } = routerFor([{ content: 'Для замены паспорта', finishReason: 'length', usage }]);

    await expect(router.complete('answer', messages)).resolves.toBe('Для замены паспорта');

    expect(warn).toHaveBeenCalledWith('llm:truncated', { task: 'answer', maxTokens: 1200, usage });
  });

  it('reports the usage of the attempt that produced the text', async () => {
    const { router, debug } = routerFor(
      [
        { content: '   ', finishReason: 'stop' },
        { content: 'FACTUAL', finishReason: 'stop', usage },
      ],
      1,
    );

    await expect(router.complete('classify', messages)).resolves.toBe('FACTUAL');

    expect(debug).toHaveBeenCalledWith('llm:call_done', expect.objectContaining({ usage }));
  });

  it('fails with a GenerationError when every attempt is empty', async () => {
    const { router } = routerFor([{ content: '' }]);

    await expect(router.complete('rewrite', messages)).rejects.toThrow(GenerationError);
  });
});
