// Fixed user-facing texts. Answers that start with one of the notices are already
// marked as not backed by sources.

import type { ToolName } from '@/tools/tool-contract';

export const APOLOGY_ANSWER =
  'Извините, сейчас я не могу ответить на ваш вопрос. Пожалуйста, попробуйте ещё раз через несколько минут.';

export const NOT_FOUND_ANSWER =
  'К сожалению, мне не удалось найти информацию по вашему запросу ни в базе знаний, ни в городских сервисах. ' +
  'Попробуйте уточнить вопрос или обратитесь на портал госуслуг Санкт-Петербурга (gu.spb.ru).';

export const NO_DOCUMENTS_NOTICE = 'Не удалось найти подтверждённую информацию в базе знаний.';

export const UNVERIFIED_NOTICE = 'Ответ не подтверждён источниками и может быть неточным.';

/** Asked instead of answering when a tool needs a locator the user has not given. */
export const CLARIFICATION_QUESTIONS = {
  facility_search:
    'Уточните, пожалуйста, ваш адрес (улицу и номер дома) или район, чтобы я нашёл ближайший МФЦ.',
  district_info: 'Уточните, пожалуйста, адрес или название района, о котором вы спрашиваете.',
} as const satisfies Partial<Record<ToolName, string>>;

export type LocatorTool = keyof typeof CLARIFICATION_QUESTIONS;

export function isLocatorTool(tool: ToolName): tool is LocatorTool {
  return tool in CLARIFICATION_QUESTIONS;
}

/** The tool a clarification question was asked for, if `answer` is one. */
export function clarifiedTool(answer: string): LocatorTool | undefined {
  if (answer === CLARIFICATION_QUESTIONS.facility_search) return 'facility_search';
  if (answer === CLARIFICATION_QUESTIONS.district_info) return 'district_info';
  return undefined;
}

export function isFlaggedUngrounded(answer: string): boolean {
  if (clarifiedTool(answer)) return true;
  return [APOLOGY_ANSWER, NOT_FOUND_ANSWER, NO_DOCUMENTS_NOTICE, UNVERIFIED_NOTICE].some((notice) => answer.startsWith(notice));
}
