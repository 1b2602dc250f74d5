/**
 * Contract for city-data tools: input schemas, normalized result shapes and the
 * frozen call record. The catalog is closed; the graphs only see ToolName values.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const TOOL_NAMES = ['facility_search', 'district_info', 'events_search', 'sport_events_search'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: unknown): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

/** YYYY-MM-DD naming a real calendar day: `2024-02-31` would roll over, so it is rejected. */
const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((value) => {
    const parsed = Date.parse(value);
    return !Number.isNaN(parsed) && new Date(parsed).toISOString().slice(0, 10) === value;
  }, 'not a calendar date');

const text = z.string().trim().min(1);

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

/** Input for facility_search: address, building id, district or coordinates. */
export const facilitySearchInput = z
  .object({
    address: text.min(3).optional(),
    buildingId: z.union([text, z.number().int().positive()]).transform(String).optional(),
    district: text.optional(),
    latitude: latitude.optional(),
    longitude: longitude.optional(),
  })
  .refine((v) => v.address || v.buildingId || v.district || (v.latitude !== undefined && v.longitude !== undefined), {
    message: 'one of address, buildingId, district or latitude+longitude is required',
  });

/** Input for district_info: address, district name or coordinates. */
export const districtInfoInput = z
  .object({
    address: text.min(3).optional(),
    district: text.optional(),
    latitude: latitude.optional(),
    longitude: longitude.optional(),
  })
  .refine((v) => v.address || v.district || (v.latitude !== undefined && v.longitude !== undefined), {
    message: 'one of address, district or latitude+longitude is required',
  });

/** Input for events_search: inclusive date range, optional category filters. */
export const eventsSearchInput = z
  .object({
    startDate: isoDate,
    endDate: isoDate,
    category: text.optional(),
    free: z.boolean().optional(),
    kids: z.boolean().optional(),
  })
  .refine((v) => v.startDate <= v.endDate, { message: 'startDate must not be after endDate', path: ['endDate'] });

/** Input for sport_events_search. */
export const sportEventsSearchInput = z
  .object({
    startDate: isoDate.optional(),
    endDate: isoDate.optional(),
    discipline: text.optional(),
    district: text.optional(),
  })
  .refine((v) => !v.startDate || !v.endDate || v.startDate <= v.endDate, {
    message: 'startDate must not be after endDate',
    path: ['endDate'],
  });

export const toolInputSchemas = {
  facility_search: facilitySearchInput,
  district_info: districtInfoInput,
  events_search: eventsSearchInput,
  sport_events_search: sportEventsSearchInput,
} satisfies Record<ToolName, z.ZodTypeAny>;

export type ToolInput<N extends ToolName> = z.infer<(typeof toolInputSchemas)[N]>;

/** True when `args` would pass validation for `tool`. */
export function acceptsArguments(tool: ToolName, args: unknown): boolean {
  return toolInputSchemas[tool].safeParse(args ?? {}).success;
}

export const toolDescriptions: Record<ToolName, string> = {
  facility_search:
    'Ищет многофункциональные центры (МФЦ) рядом с адресом или координатами, по идентификатору здания или в районе. Возвращает адрес, телефоны, часы работы и ближайшее метро.',
  district_info:
    'Справочная информация о районе города (администрация, поликлиники, управляющие компании и т.п.) по адресу, названию района или координатам.',
  events_search:
    'Афиша городских мероприятий (концерты, выставки, спектакли) за период дат, с фильтром по категории, бесплатности и детским событиям.',
  sport_events_search:
    'Спортивные мероприятия города за период дат, с фильтром по виду спорта и району.',
};

export const toolTitles: Record<ToolName, string> = {
  facility_search: 'Справочник МФЦ',
  district_info: 'Справка по району',
  events_search: 'Афиша мероприятий',
  sport_events_search: 'Спортивные мероприятия',
};

/** Catalog entries as shown to the planning model. */
export function describeCatalog(tools: readonly ToolName[] = TOOL_NAMES): Array<{
  name: ToolName;
  description: string;
  parameters: object;
}> {
  return tools.map((name) => ({
    name,
    description: toolDescriptions[name],
    parameters: zodToJsonSchema(toolInputSchemas[name], { target: 'openApi3', $refStrategy: 'none' }),
  }));
}

/** Normalized MFC record. */
export interface Facility {
  name: string;
  address?: string;
  nearestMetro?: string;
  phones: string[];
  workingHours?: string;
  distanceKm?: number;
  link?: string;
  services: string[];
}

export interface DistrictFact {
  label: string;
  value: string;
}

export interface DistrictReport {
  district?: string;
  address?: string;
  facts: DistrictFact[];
}

export interface CityEvent {
  id?: string;
  title: string;
  categories: string[];
  description?: string;
  startDate?: string;
  endDate?: string;
  place?: string;
  address?: string;
  ageLimit?: string;
}

export interface SportEvent {
  id?: string;
  title: string;
  disciplines: string[];
  description?: string;
  address?: string;
  district?: string;
  startDate?: string;
  startTime?: string;
  endDate?: string;
  accessible?: boolean;
  familyHour?: boolean;
}

export type ToolResult =
  | { tool: 'facility_search'; facilities: Facility[] }
  | { tool: 'district_info'; report: DistrictReport | null }
  | { tool: 'events_search'; events: CityEvent[] }
  | { tool: 'sport_events_search'; events: SportEvent[] };

export type ToolResultOf<N extends ToolName> = Extract<ToolResult, { tool: N }>;

export interface ToolFailure {
  code: string;
  message: string;
  retryable: boolean;
  status?: number;
}

export type ToolOutcome = { ok: true; result: ToolResult } | { ok: false; error: ToolFailure };

/** One attempt, frozen when it completes. A retry produces a new record. */
export interface ToolCall {
  readonly toolName: ToolName;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly outcome: Readonly<ToolOutcome>;
  readonly latencyMs: number;
  /** 1-based; 0 when the arguments were rejected before any request. */
  readonly attempt: number;
}

/** All attempts of one `invoke`, oldest first. The last one decides the outcome. */
export interface ToolInvocation {
  readonly toolName: ToolName;
  readonly calls: readonly ToolCall[];
  readonly final: ToolCall;
}

/** True when the tool answered with at least one record. */
export function hasData(result: ToolResult): boolean {
  switch (result.tool) {
    case 'facility_search':
      return result.facilities.length > 0;
    case 'district_info':
      return result.report !== null && result.report.facts.length > 0;
    case 'events_search':
    case 'sport_events_search':
      return result.events.length > 0;
  }
}
