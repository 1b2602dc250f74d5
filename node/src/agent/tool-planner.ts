// node/src/agent/tool-planner.ts: choose tools and their arguments for the hybrid graph

import { z } from 'zod';
import { formatHistory, type ConversationEntry } from '@/memory/conversation-store';
import { componentLogger, type AppLogger } from '@/services/logger';
import type { ModelRouter } from '@/services/model-router';
import { parseJsonAs } from '@/services/safe-parse-json';
import { GenerationError } from '@/stability/errors';
import { describeCatalog, isToolName, TOOL_NAMES, type ToolName } from '@/tools/tool-contract';
import { readJsonData } from '@/utils/data-files';
import { INTENT_TOOL, type KeywordIntentMatcher } from './intent-classifier';

export interface PlannedCall {
  tool: ToolName;
  arguments: Record<string, unknown>;
}

export interface ToolPlan {
  calls: PlannedCall[];
  source: 'llm' | 'heuristic';
}

const MAX_PLANNED_CALLS = 4;

/** Days covered by event searches when the user names no dates. */
export const DEFAULT_EVENT_WINDOW_DAYS = 7;

const STREET_WORD =
  '(?:улиц[а-яё]*|ул\\.|проспект[а-яё]*|пр-т|пр\\.|переул[а-яё]*|пер\\.|набережн[а-яё]*|наб\\.|шоссе|бульвар[а-яё]*|площад[а-яё]*|пл\\.|лини[а-яё]*)';
const PROPER_NAME = '[А-ЯЁ][а-яё-]+(?:\\s+[А-ЯЁ][а-яё-]+)?';
const HOUSE = '\\s*,?\\s*(?:д\\.\\s*|дом\\s+)?\\d+[а-яё]?(?:\\/\\d+)?(?:\\s*(?:корпус|корп\\.?|к)\\s*\\d+)?';
const WORD_START = '(?<![\\p{L}\\d-])';

/** A street word next to a capitalized name, optionally followed by a house number. */
const STREET_ADDRESS = new RegExp(
  `${WORD_START}(?:${PROPER_NAME}\\s+${STREET_WORD}|${STREET_WORD}\\s+${PROPER_NAME})(?:${HOUSE})?`,
  'u',
);

/** A name and a house number after a location preposition: "на Большевиков 68". */
const MARKED_ADDRESS = new RegExp(
  `${WORD_START}(?:[Рр]ядом с|[Оо]коло|[Вв]озле|[Нн]а|[Уу])\\s+(${PROPER_NAME}${HOUSE})`,
  'u',
);

const planSchema = z.object({
  calls: z.array(
    z.object({
      tool: z.string(),
      arguments: z.record(z.unknown()).default({}),
    }),
  ),
});

export function loadDistricts(): string[] {
  return readJsonData('districts.json', z.array(z.string().min(3)));
}

export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function addDays(date: Date, days: number): Date {
  const next = new Date(date);
  next.setDate(next.getDate() + days);
  return next;
}

/**
 * Argument extraction without a model: a street address (a street word such as
 * "проспект" or "ул." beside a capitalized name), district names by stem (so case
 * endings such as "в Невском районе" still match), and a default date window.
 */
export class HeuristicArguments {
  private readonly stems: Array<{ name: string; stem: string }>;

  constructor(districts: string[] = loadDistricts()) {
    this.stems = districts.map((name) => ({ name, stem: name.toLowerCase().slice(0, -2) }));
  }

  /** Street address in the query, with its position. */
  private findAddress(query: string): { text: string; index: number } | undefined {
    const street = STREET_ADDRESS.exec(query);
    if (street) return { text: street[0].trim(), index: street.index };
    const marked = MARKED_ADDRESS.exec(query);
    const name = marked?.[1];
    if (!marked || !name) return undefined;
    return { text: name.trim(), index: marked.index + marked[0].indexOf(name) };
  }

  address(query: string): string | undefined {
    return this.findAddress(query)?.text;
  }

  /** District named outside any street address, so "Невский проспект" is not the Невский district. */
  district(query: string): string | undefined {
    const found = this.findAddress(query);
    const rest = found ? query.slice(0, found.index) + query.slice(found.index + found.text.length) : query;
    const lower = rest.toLowerCase();
    return this.stems.find(({ stem }) => lower.includes(stem))?.name;
  }

  /** Arguments for one tool, or undefined when the query holds nothing usable. */
  forTool(tool: ToolName, query: string, today: Date): Record<string, unknown> | undefined {
    const district = this.district(query);
    const address = this.address(query);
    const startDate = formatDate(today);
    const endDate = formatDate(addDays(today, DEFAULT_EVENT_WINDOW_DAYS));

    switch (tool) {
      case 'facility_search':
      case 'district_info':
        if (address) return { address };
        if (district) return { district };
        return undefined;
      case 'events_search':
        return { startDate, endDate };
      case 'sport_events_search':
        return district ? { startDate, endDate, district } : { startDate, endDate };
    }
  }
}

export interface ToolPlannerDeps {
  router: ModelRouter;
  heuristics?: HeuristicArguments;
  /** Picks candidate tools when the model is unavailable and there is no hint. */
  keywords?: KeywordIntentMatcher;
  clock?: () => Date;
  log?: AppLogger;
}

function planSystemPrompt(tools: readonly ToolName[], today: string): string {
  return `Ты планировщик вызовов городских сервисов Санкт-Петербурга. Сегодня ${today}.
Выбери инструменты, нужные для ответа на запрос, и заполни их аргументы строго по JSON-схеме.
Даты указывай в формате YYYY-MM-DD. Если пользователь не называет даты, бери период с сегодняшнего дня на неделю вперёд.
Если ни один инструмент не нужен, верни пустой список.

Доступные инструменты:
${JSON.stringify(describeCatalog(tools), null, 2)}

Ответ только JSON: {"calls": [{"tool": "<имя>", "arguments": {...}}]}`;
}

export class ToolPlanner {
  private readonly heuristics: HeuristicArguments;
  private readonly clock: () => Date;
  private readonly log: AppLogger;

  constructor(private readonly deps: ToolPlannerDeps) {
    this.heuristics = deps.heuristics ?? new HeuristicArguments();
    this.clock = deps.clock ?? (() => new Date());
    this.log = deps.log ?? componentLogger('planner');
  }

  /**
   * One LLM call over the catalog (restricted to `hint` when given). Unknown tool
   * names are dropped. Falls back to heuristic arguments when the call fails or
   * yields nothing usable for a hinted tool.
   */
  async plan(
    query: string,
    hint: readonly ToolName[] | undefined,
    history: readonly ConversationEntry[],
    signal?: AbortSignal,
  ): Promise<ToolPlan> {
    const today = this.clock();
    const candidates: readonly ToolName[] = hint && hint.length > 0 ? hint : TOOL_NAMES;
    const user = history.length > 0 ? `История диалога:\n${formatHistory(history)}\n\nЗапрос: ${query}` : `Запрос: ${query}`;

    try {
      const raw = await this.deps.router.complete(
        'plan',
        [
          { role: 'system', content: planSystemPrompt(candidates, formatDate(today)) },
          { role: 'user', content: user },
        ],
        signal,
      );
      const parsed = parseJsonAs(raw, planSchema, 'plan');
      if (parsed) {
        const calls: PlannedCall[] = [];
        for (const call of parsed.calls) {
          if (!isToolName(call.tool) || !candidates.includes(call.tool)) {
            this.log.warn('plan:unknown_tool_dropped', { tool: call.tool });
            continue;
          }
          calls.push({ tool: call.tool, arguments: call.arguments });
        }
        if (calls.length > 0 || !hint || hint.length === 0) {
          this.log.debug('plan:done', { source: 'llm', tools: calls.map((c) => c.tool) });
          return { calls: calls.slice(0, MAX_PLANNED_CALLS), source: 'llm' };
        }
      }
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      this.log.warn('plan:llm_failed', { error: error.message });
    }

    const calls = this.heuristicPlan(query, hint, today);
    this.log.debug('plan:done', { source: 'heuristic', tools: calls.map((c) => c.tool) });
    return { calls, source: 'heuristic' };
  }

  private heuristicPlan(query: string, hint: readonly ToolName[] | undefined, today: Date): PlannedCall[] {
    let tools: readonly ToolName[] = hint ?? [];
    if (tools.length === 0) {
      const intent = this.deps.keywords?.match(query);
      const tool = intent ? INTENT_TOOL[intent] : undefined;
      tools = tool ? [tool] : [];
    }

    const calls: PlannedCall[] = [];
    for (const tool of tools) {
      const args = this.heuristics.forTool(tool, query, today);
      if (args) calls.push({ tool, arguments: args });
    }
    return calls;
  }
}
