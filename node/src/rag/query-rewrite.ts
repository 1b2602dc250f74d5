import type { ConversationEntry } from '@/memory/conversation-store';
import { formatHistory } from '@/memory/conversation-store';
import type { ModelRouter } from '@/services/model-router';

const REWRITE_SYSTEM = `Ты модуль переформулирования запросов в справочной системе о городских услугах Санкт-Петербурга.

Твоя задача: превратить вопрос жителя в короткий поисковый запрос для базы знаний.
- Раскрой местоимения и отсылки к предыдущим сообщениям, используя историю диалога.
- Сохрани все сущности: названия услуг, документов, районов, адреса.
- Не добавляй новых фактов и условий.
- Ответь только текстом запроса, без кавычек и пояснений.`;

const BROADEN_HINT = `Предыдущий поиск не нашёл подходящих документов. Сформулируй запрос шире:
убери второстепенные детали, используй общие термины и синонимы.`;

export interface RewriteOptions {
  /** Second pass after an empty grading round. */
  broaden: boolean;
  signal?: AbortSignal;
}

/**
 * One LLM call. Returns the original query when the model answers with nothing
 * usable; GenerationError from the router propagates.
 */
export async function rewriteForRetrieval(
  router: ModelRouter,
  query: string,
  history: readonly ConversationEntry[],
  { broaden, signal }: RewriteOptions,
): Promise<string> {
  const parts: string[] = [];
  if (history.length > 0) {
    parts.push(`История диалога:\n${formatHistory(history)}`);
  }
  if (broaden) {
    parts.push(BROADEN_HINT);
  }
  parts.push(`Вопрос: ${query}`);

  const raw = await router.complete(
    'rewrite',
    [
      { role: 'system', content: REWRITE_SYSTEM },
      { role: 'user', content: parts.join('\n\n') },
    ],
    signal,
  );
  return cleanRewrite(raw) || query;
}

/** First non-empty line, without a label prefix or surrounding quotes. */
export function cleanRewrite(raw: string): string {
  const line = raw
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  if (!line) return '';
  return line
    .replace(/^(запрос|query)\s*:\s*/i, '')
    .replace(/^["'«„“]+|["'»“”]+$/g, '')
    .trim();
}
