import type { DocGrade } from '@/agent/state';
import type { ModelRouter } from '@/services/model-router';
import { componentLogger } from '@/services/logger';
import { errorMessage, TurnCancelledError } from '@/stability/errors';
import type { ScoredChunk } from './types';
import { tokenize } from './vector-utils';

const log = componentLogger('grader');

/** Characters of a chunk shown to the grader. */
export const GRADE_TEXT_LIMIT = 1000;

const GRADE_SYSTEM = `Ты оцениваешь, помогает ли документ ответить на вопрос пользователя.
Если документ содержит ключевые слова или смысл, связанные с вопросом, ответь "yes".
Иначе ответь "no". Ответь одним словом: yes или no.`;

export interface GradingOutcome {
  grades: Record<string, DocGrade>;
  /** Chunks kept because their grading call failed. */
  failed: string[];
}

/** Leading yes/да → relevant, no/нет → irrelevant, anything else is kept. */
export function parseGrade(raw: string): DocGrade {
  const [first] = tokenize(raw);
  if (first === 'no' || first === 'нет') return 'irrelevant';
  return 'relevant';
}

/**
 * One independent yes/no call per chunk, run concurrently. A failed call keeps its
 * chunk; cancellation aborts the whole round.
 */
export async function gradeDocuments(
  router: ModelRouter,
  question: string,
  docs: readonly ScoredChunk[],
  signal?: AbortSignal,
): Promise<GradingOutcome> {
  const failed: string[] = [];

  const graded = await Promise.all(
    docs.map(async ({ chunk }): Promise<[string, DocGrade]> => {
      try {
        const raw = await router.complete(
          'grade',
          [
            { role: 'system', content: GRADE_SYSTEM },
            {
              role: 'user',
              content: `Документ:\n${chunk.text.slice(0, GRADE_TEXT_LIMIT)}\n\nВопрос: ${question}`,
            },
          ],
          signal,
        );
        return [chunk.id, parseGrade(raw)];
      } catch (error) {
        if (error instanceof TurnCancelledError) throw error;
        log.warn('rag:grade_failed', { chunkId: chunk.id, error: errorMessage(error) });
        failed.push(chunk.id);
        return [chunk.id, 'relevant'];
      }
    }),
  );

  return { grades: Object.fromEntries(graded), failed };
}
