// node/src/agent/intent-classifier.ts: intent detection with a keyword fallback, and intent → route mapping

import { z } from 'zod';
import { formatHistory, type ConversationEntry } from '@/memory/conversation-store';
import { componentLogger, type AppLogger } from '@/services/logger';
import type { ModelRouter } from '@/services/model-router';
import { parseJsonAs } from '@/services/safe-parse-json';
import { GenerationError, RoutingAmbiguityError } from '@/stability/errors';
import type { ToolName } from '@/tools/tool-contract';
import { escapeRegExp, readJsonData } from '@/utils/data-files';
import type { RouteDecision } from './state';

export const INTENTS = [
  'facility_search',
  'district_info',
  'events',
  'sports',
  'general_knowledge',
  'chit_chat',
] as const;

export type Intent = (typeof INTENTS)[number];

/** Confidence reported for a keyword match. */
export const KEYWORD_CONFIDENCE = 0.75;

const intentSchema = z.enum(INTENTS);

const classificationSchema = z.object({
  intent: intentSchema,
  confidence: z.coerce.number().min(0).max(1),
});

export interface Classification {
  intent: Intent;
  confidence: number;
  source: 'llm' | 'keywords';
}

const keywordTableSchema = z.record(intentSchema, z.array(z.string().min(1)));

export type KeywordTable = Partial<Record<Intent, string[]>>;

export function loadIntentKeywords(): KeywordTable {
  return readJsonData('intent-keywords.json', keywordTableSchema);
}

/** Tool hinted for each tool-backed intent. */
export const INTENT_TOOL: Partial<Record<Intent, ToolName>> = {
  facility_search: 'facility_search',
  district_info: 'district_info',
  events: 'events_search',
  sports: 'sport_events_search',
};

const CLASSIFY_SYSTEM = `Ты классификатор запросов городского помощника Санкт-Петербурга.
Определи намерение пользователя и верни JSON вида {"intent": "...", "confidence": 0.0-1.0}.

Намерения:
- facility_search: поиск МФЦ, адреса, телефоны и часы работы центров госуслуг
- district_info: справочная информация о районе, администрации, поликлиниках, управляющих компаниях
- events: афиша, концерты, выставки, спектакли, куда сходить
- sports: спортивные мероприятия, соревнования, секции
- general_knowledge: как получить услугу, какие нужны документы, порядок оформления, льготы и выплаты
- chit_chat: приветствие, благодарность, вопросы о самом помощнике

Отвечай только JSON без пояснений.`;

/**
 * Keyword rules: a keyword matches at the start of a word, so a stem such as
 * "спорт" does not fire inside "паспорт". Intents are tried in table order.
 */
export class KeywordIntentMatcher {
  private readonly rules: Array<{ intent: Intent; patterns: RegExp[] }>;

  constructor(table: KeywordTable = loadIntentKeywords()) {
    this.rules = INTENTS.map((intent) => ({
      intent,
      patterns: (table[intent] ?? []).map(
        (keyword) => new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword.toLowerCase())}`, 'u'),
      ),
    }));
  }

  match(text: string): Intent | undefined {
    const normalized = text.toLowerCase().replace(/ё/g, 'е');
    return this.rules.find(({ patterns }) => patterns.some((p) => p.test(normalized)))?.intent;
  }
}

export interface IntentClassifierDeps {
  router: ModelRouter;
  keywords?: KeywordIntentMatcher;
  confidenceThreshold: number;
  log?: AppLogger;
}

export class IntentClassifier {
  private readonly keywords: KeywordIntentMatcher;
  private readonly log: AppLogger;

  constructor(private readonly deps: IntentClassifierDeps) {
    this.keywords = deps.keywords ?? new KeywordIntentMatcher();
    this.log = deps.log ?? componentLogger('classifier');
  }

  /**
   * One LLM call; keyword rules when the call fails or returns something unusable.
   *
   * @throws RoutingAmbiguityError when neither source yields an intent
   */
  async classify(
    text: string,
    history: readonly ConversationEntry[],
    signal?: AbortSignal,
  ): Promise<Classification> {
    const user = history.length > 0 ? `История диалога:\n${formatHistory(history)}\n\nЗапрос: ${text}` : `Запрос: ${text}`;

    try {
      const raw = await this.deps.router.complete(
        'classify',
        [
          { role: 'system', content: CLASSIFY_SYSTEM },
          { role: 'user', content: user },
        ],
        signal,
      );
      const parsed = parseJsonAs(raw, classificationSchema, 'classify');
      if (parsed) {
        return { intent: parsed.intent, confidence: parsed.confidence, source: 'llm' };
      }
      this.log.warn('classify:unusable_output', { raw: raw.slice(0, 200) });
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      this.log.warn('classify:llm_failed', { error: error.message });
    }

    const intent = this.keywords.match(text);
    if (!intent) {
      throw new RoutingAmbiguityError('No intent from the model or keyword rules');
    }
    return { intent, confidence: KEYWORD_CONFIDENCE, source: 'keywords' };
  }

  /** Pure mapping of a classification to a route. */
  decide(classification: Classification): RouteDecision {
    const { intent, confidence, source } = classification;
    if (confidence < this.deps.confidenceThreshold) {
      return { route: 'HYBRID', confidence, intent, reason: `low confidence (${source})` };
    }

    const tool = INTENT_TOOL[intent];
    if (tool) {
      return { route: 'HYBRID', confidence, intent, toolHint: [tool], reason: `intent ${intent} (${source})` };
    }
    return {
      route: intent === 'chit_chat' ? 'DIRECT' : 'RAG',
      confidence,
      intent,
      reason: `intent ${intent} (${source})`,
    };
  }
}
