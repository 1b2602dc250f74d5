/**
 * Rule-based toxicity gate for incoming messages.
 *
 * Patterns live in data/toxicity-patterns.json, grouped by severity. A pattern only
 * matches at the start of a word; word boundaries are Unicode-aware so Cyrillic
 * text is handled.
 */
import { z } from 'zod';
import { readJsonData } from '@/utils/data-files';

export type ToxicityLevel = 'safe' | 'low' | 'medium' | 'high';

export interface ToxicityResult {
  isToxic: boolean;
  level: ToxicityLevel;
  matchedPatterns: string[];
  confidence: number;
  shouldBlock: boolean;
}

const patternsSchema = z.object({
  high: z.array(z.string().min(1)),
  medium: z.array(z.string().min(1)),
  low: z.array(z.string().min(1)),
});

export type ToxicityPatterns = z.infer<typeof patternsSchema>;

export const TOXIC_RESPONSES: Record<'high' | 'medium', string> = {
  high:
    'Извините, но я не могу отвечать на сообщения, содержащие грубую лексику. ' +
    'Пожалуйста, переформулируйте ваш вопрос в уважительной форме.',
  medium:
    'Пожалуйста, давайте общаться уважительно. ' +
    'Я с удовольствием помогу вам, если вы зададите вопрос в корректной форме.',
};

const SEVERITY_ORDER = ['high', 'medium', 'low'] as const;

export function loadToxicityPatterns(): ToxicityPatterns {
  return readJsonData('toxicity-patterns.json', patternsSchema);
}

export class ToxicityFilter {
  private readonly compiled: Array<{ level: Exclude<ToxicityLevel, 'safe'>; source: string; regex: RegExp }>;

  constructor(patterns: ToxicityPatterns = loadToxicityPatterns()) {
    this.compiled = SEVERITY_ORDER.flatMap((level) =>
      patterns[level].map((source) => ({
        level,
        source,
        regex: new RegExp(`(?<![\\p{L}\\p{N}_])(?:${source})`, 'iu'),
      })),
    );
  }

  check(text: string): ToxicityResult {
    if (!text.trim()) {
      return { isToxic: false, level: 'safe', matchedPatterns: [], confidence: 1, shouldBlock: false };
    }

    const matched = this.compiled.filter(({ regex }) => regex.test(text));
    // compiled is ordered by severity, so the first hit is the worst one
    const level: ToxicityLevel = matched.at(0)?.level ?? 'safe';
    const isToxic = level !== 'safe';

    return {
      isToxic,
      level,
      matchedPatterns: matched.map((m) => m.source),
      confidence: isToxic ? Math.min(1, matched.length * 0.3 + 0.4) : 1,
      shouldBlock: level === 'high' || level === 'medium',
    };
  }

  /** Fixed refusal for blocked levels, undefined otherwise. */
  responseFor(result: ToxicityResult): string | undefined {
    return result.level === 'high' || result.level === 'medium' ? TOXIC_RESPONSES[result.level] : undefined;
  }
}
