// node/src/rag/answer-generator.ts: grounded answer generation with [n] citations

import type { Citation } from '@/agent/state';
import { formatHistory, type ConversationEntry } from '@/memory/conversation-store';
import type { ModelRouter } from '@/services/model-router';
import { toolTitles, type ToolName } from '@/tools/tool-contract';
import type { ScoredChunk } from './types';

const ANSWER_SYSTEM = `Ты городской помощник Санкт-Петербурга. Отвечаешь жителям на вопросы о городских и государственных услугах.

Правила:
- Отвечай только на основе предоставленного контекста, не выдумывай факты.
- Данные городских сервисов актуальны и важнее документов базы знаний.
- Ссылайся на документы базы знаний их номерами в квадратных скобках, например [1] или [2].
- Если в контексте нет ответа, честно скажи, что информации недостаточно.
- Отвечай на русском языке, кратко и по делу.`;

const EMPTY_CONTEXT = `Контекст пуст: ни база знаний, ни городские сервисы не дали подходящих сведений.
Честно сообщи об этом и подскажи, где можно уточнить информацию. Не приводи конкретных фактов.`;

export interface ToolContextBlock {
  toolName: ToolName;
  text: string;
}

export interface GroundedAnswerInput {
  question: string;
  history: readonly ConversationEntry[];
  documents: readonly ScoredChunk[];
  /** Authoritative live data, listed before the documents. */
  tools: readonly ToolContextBlock[];
  signal?: AbortSignal;
}

export interface GroundedAnswer {
  text: string;
  citations: Citation[];
}

export function buildContext(documents: readonly ScoredChunk[], tools: readonly ToolContextBlock[]): string {
  const sections: string[] = [];
  if (tools.length > 0) {
    sections.push(
      'Данные городских сервисов (актуальные):\n' +
        tools.map((block) => `[${toolTitles[block.toolName]}]\n${block.text}`).join('\n\n'),
    );
  }
  if (documents.length > 0) {
    sections.push(
      'Документы базы знаний:\n' +
        documents
          .map(({ chunk }, i) => {
            const title = chunk.metadata.title || chunk.sourceUrl;
            return `[${i + 1}] ${title} (${chunk.sourceUrl})\n${chunk.text}`;
          })
          .join('\n\n'),
    );
  }
  return sections.length > 0 ? sections.join('\n\n') : EMPTY_CONTEXT;
}

/** 1-based document numbers cited as `[n]` or `[n, m]`, ascending, within `1..count`. */
export function parseCitationMarkers(text: string, count: number): number[] {
  const cited = new Set<number>();
  for (const match of text.matchAll(/\[(\d+(?:\s*,\s*\d+)*)\]/g)) {
    for (const part of match[1].split(',')) {
      const n = Number.parseInt(part.trim(), 10);
      if (n >= 1 && n <= count) cited.add(n);
    }
  }
  return [...cited].sort((a, b) => a - b);
}

/**
 * One generation call over the merged context. Documents cited in the answer become
 * citations (all supplied documents when the model cites none); every tool block
 * becomes a `tool` citation.
 */
export async function generateGroundedAnswer(router: ModelRouter, input: GroundedAnswerInput): Promise<GroundedAnswer> {
  const { question, history, documents, tools, signal } = input;

  const parts: string[] = [];
  if (history.length > 0) {
    parts.push(`История диалога:\n${formatHistory(history)}`);
  }
  parts.push(buildContext(documents, tools));
  parts.push(`Вопрос: ${question}`);

  const text = await router.complete(
    'answer',
    [
      { role: 'system', content: ANSWER_SYSTEM },
      { role: 'user', content: parts.join('\n\n') },
    ],
    signal,
  );

  const markers = parseCitationMarkers(text, documents.length);
  const citedDocuments = markers.length > 0 ? markers.map((n) => documents[n - 1]) : [...documents];

  const seen = new Set<string>();
  const citations: Citation[] = [];
  for (const { chunk } of citedDocuments) {
    if (seen.has(chunk.sourceUrl)) continue;
    seen.add(chunk.sourceUrl);
    citations.push({ source: chunk.sourceUrl, kind: 'document', title: chunk.metadata.title || undefined });
  }
  for (const block of tools) {
    if (seen.has(block.toolName)) continue;
    seen.add(block.toolName);
    citations.push({ source: block.toolName, kind: 'tool', title: toolTitles[block.toolName] });
  }

  return { text, citations };
}
