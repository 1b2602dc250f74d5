// node/src/tools/city-api-client.ts: HTTP client for the city open-data gateway

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { CityEvent, DistrictFact, DistrictReport, Facility, SportEvent, ToolInput } from './tool-contract';

export interface CityApiConfig {
  geoApiUrl: string;
  siteApiUrl: string;
  regionId: string;
  timeoutMs: number;
}

/** Upstream failure. `retryable` follows the status: network, 408, 429 and 5xx. */
export class CityApiError extends Error {
  constructor(
    message: string,
    readonly status: number | undefined,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CityApiError';
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function createCityHttpClient(config: CityApiConfig): AxiosInstance {
  return axios.create({
    timeout: config.timeoutMs,
    headers: { region: config.regionId, Accept: 'application/json' },
  });
}

const MAX_COUNT = 10;
const SEARCH_DISTANCE_KM = 5;

const idSchema = z.union([z.string(), z.number()]).transform(String);
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined || v === '' ? undefined : String(v)));
const textList = z
  .union([z.string(), z.array(z.union([z.string(), z.number()]))])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return [];
    const list: Array<string | number> = Array.isArray(v) ? v : [v];
    return list.map(String).filter(Boolean);
  });

const buildingSchema = z.object({
  id: idSchema,
  full_address: optionalText,
  district: optionalText,
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
});

export type Building = z.infer<typeof buildingSchema>;

const mfcSchema = z.object({
  name: optionalText,
  address: optionalText,
  nearest_metro: optionalText,
  phone: textList,
  working_hours: optionalText,
  distance: z.union([z.number(), z.string()]).nullish(),
  link: optionalText,
  services: textList,
  district: optionalText,
});

const afishaSchema = z.object({
  id: idSchema.nullish(),
  title: z.string(),
  categories: textList,
  categoria: textList,
  description_short: optionalText,
  description: optionalText,
  start_date: optionalText,
  end_date: optionalText,
  location_title: optionalText,
  address: optionalText,
  age: optionalText,
});

const sportEventSchema = z.object({
  id: idSchema.nullish(),
  title: z.string(),
  type: optionalText,
  categoria: textList,
  description: optionalText,
  address: optionalText,
  district: optionalText,
  start_date: optionalText,
  start_time: optionalText,
  end_date: optionalText,
  ovz: z.boolean().nullish(),
  family_hour: z.boolean().nullish(),
});

/** Unwraps `{data: [...]}`, `{data: {...}}`, a bare list or a bare object into records. */
export function extractRecords(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (typeof payload !== 'object' || payload === null) return [];
  if ('data' in payload) {
    const { data } = payload;
    if (Array.isArray(data)) return data;
    if (typeof data === 'object' && data !== null) {
      // sport-events nests the page under data.data
      if ('data' in data && Array.isArray(data.data)) return data.data;
      return [data];
    }
    return [];
  }
  return Object.keys(payload).length > 0 ? [payload] : [];
}

function parseRecords<S extends z.ZodTypeAny>(records: unknown[], schema: S): Array<z.infer<S>> {
  const parsed: Array<z.infer<S>> = [];
  for (const record of records) {
    const result = schema.safeParse(record);
    if (result.success) parsed.push(result.data);
  }
  return parsed;
}

function toFacility(raw: z.infer<typeof mfcSchema>): Facility {
  const distance = typeof raw.distance === 'string' ? Number.parseFloat(raw.distance) : raw.distance;
  return {
    name: raw.name ?? 'МФЦ',
    address: raw.address,
    nearestMetro: raw.nearest_metro,
    phones: raw.phone,
    workingHours: raw.working_hours,
    distanceKm: typeof distance === 'number' && Number.isFinite(distance) ? distance : undefined,
    link: raw.link,
    services: raw.services,
  };
}

/** Flattens nested reference data into label/value pairs, breadth first. */
export function flattenFacts(payload: unknown, limit = 40): DistrictFact[] {
  const facts: DistrictFact[] = [];
  const queue: Array<{ label: string; value: unknown }> = [{ label: '', value: payload }];

  while (queue.length > 0 && facts.length < limit) {
    const item = queue.shift();
    if (!item) break;
    const { label, value } = item;
    if (value === null || value === undefined || value === '') continue;

    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      facts.push({ label: label || 'info', value: String(value) });
    } else if (Array.isArray(value)) {
      value.forEach((v) => queue.push({ label, value: v }));
    } else if (typeof value === 'object') {
      for (const [key, nested] of Object.entries(value)) {
        if (key === 'id' || key === 'coordinates') continue;
        queue.push({ label: label ? `${label}.${key}` : key, value: nested });
      }
    }
  }
  return facts;
}

/**
 * Thin wrapper over the gateway endpoints. Every method resolves to normalized
 * records or throws CityApiError; validation of tool input happens before this.
 */
export class CityApiClient {
  private readonly geoApi: string;
  private readonly siteApi: string;

  constructor(
    private readonly http: AxiosInstance,
    config: Pick<CityApiConfig, 'geoApiUrl' | 'siteApiUrl'>,
  ) {
    this.geoApi = `${config.geoApiUrl.replace(/\/+$/, '')}/api/v2`;
    this.siteApi = config.siteApiUrl.replace(/\/+$/, '');
  }

  private async getJson(url: string, params: Record<string, string | number | boolean | undefined>, signal?: AbortSignal): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(url, {
        params: Object.fromEntries(Object.entries(params).filter(([, v]) => v !== undefined)),
        signal,
        validateStatus: () => true,
      });
    } catch (error) {
      const reason = axios.isAxiosError(error) ? (error.code ?? error.message) : String(error);
      throw new CityApiError(`Request to ${url} failed: ${reason}`, undefined, true, { cause: error });
    }

    if (response.status !== 200) {
      throw new CityApiError(
        `Request to ${url} returned HTTP ${response.status}`,
        response.status,
        isRetryableStatus(response.status),
      );
    }
    if (typeof response.data !== 'object' || response.data === null) {
      throw new CityApiError(`Malformed JSON from ${url}`, response.status, false);
    }
    return response.data;
  }

  async searchBuilding(query: string, signal?: AbortSignal): Promise<Building | null> {
    const payload = await this.getJson(
      `${this.geoApi}/geo/buildings/search/`,
      { query, count: 1 },
      signal,
    );
    const [building] = parseRecords(extractRecords(payload), buildingSchema);
    return building ?? null;
  }

  async mfcByBuilding(buildingId: string, signal?: AbortSignal): Promise<Facility[]> {
    const payload = await this.getJson(`${this.siteApi}/mfc/`, { id_building: buildingId }, signal);
    return parseRecords(extractRecords(payload), mfcSchema).map(toFacility);
  }

  async mfcByDistrict(district: string, signal?: AbortSignal): Promise<Facility[]> {
    const payload = await this.getJson(`${this.siteApi}/mfc/district/`, { district }, signal);
    return parseRecords(extractRecords(payload), mfcSchema).map(toFacility);
  }

  async mfcNearest(latitude: number, longitude: number, signal?: AbortSignal): Promise<Facility[]> {
    const payload = await this.getJson(
      `${this.siteApi}/mfc/nearest/`,
      { lat: latitude, lon: longitude, distance: SEARCH_DISTANCE_KM },
      signal,
    );
    return parseRecords(extractRecords(payload), mfcSchema).map(toFacility);
  }

  /** District of the nearest MFC; the gateway has no reverse geocoding for districts. */
  async districtNear(latitude: number, longitude: number, signal?: AbortSignal): Promise<string | undefined> {
    const payload = await this.getJson(
      `${this.siteApi}/mfc/nearest/`,
      { lat: latitude, lon: longitude, distance: SEARCH_DISTANCE_KM },
      signal,
    );
    const [nearest] = parseRecords(extractRecords(payload), mfcSchema);
    return nearest?.district;
  }

  async districtInfoByBuilding(buildingId: string, signal?: AbortSignal): Promise<DistrictFact[]> {
    const payload = await this.getJson(
      `${this.siteApi}/districts-info/building-id/${encodeURIComponent(buildingId)}`,
      {},
      signal,
    );
    return flattenFacts(extractRecords(payload));
  }

  async districtInfoByName(district: string, signal?: AbortSignal): Promise<DistrictFact[]> {
    const payload = await this.getJson(`${this.siteApi}/districts-info/district/`, { district_name: district }, signal);
    return flattenFacts(extractRecords(payload));
  }

  async events(input: ToolInput<'events_search'>, signal?: AbortSignal): Promise<CityEvent[]> {
    const payload = await this.getJson(
      `${this.siteApi}/afisha/all/`,
      {
        start_date: `${input.startDate}T00:00:00`,
        end_date: `${input.endDate}T23:59:59`,
        count: MAX_COUNT,
        page: 1,
        categoria: input.category,
        free: input.free,
        kids: input.kids,
      },
      signal,
    );
    return extractRecords(payload)
      .map((record) => (typeof record === 'object' && record !== null && 'place' in record ? record.place : record))
      .flatMap((record) => parseRecords([record], afishaSchema))
      .map((raw) => ({
        id: raw.id ?? undefined,
        title: raw.title,
        categories: raw.categories.length > 0 ? raw.categories : raw.categoria,
        description: raw.description_short ?? raw.description,
        startDate: raw.start_date,
        endDate: raw.end_date,
        place: raw.location_title,
        address: raw.address,
        ageLimit: raw.age,
      }));
  }

  async sportEvents(input: ToolInput<'sport_events_search'>, signal?: AbortSignal): Promise<SportEvent[]> {
    const payload = await this.getJson(
      `${this.siteApi}/sport-events/`,
      {
        district: input.district,
        categoria: input.discipline,
        start_date: input.startDate,
        end_date: input.endDate,
        count: MAX_COUNT,
        page: 1,
      },
      signal,
    );
    return parseRecords(extractRecords(payload), sportEventSchema).map((raw) => ({
      id: raw.id ?? undefined,
      title: raw.title,
      disciplines: raw.categoria.length > 0 ? raw.categoria : raw.type ? [raw.type] : [],
      description: raw.description,
      address: raw.address,
      district: raw.district,
      startDate: raw.start_date,
      startTime: raw.start_time,
      endDate: raw.end_date,
      accessible: raw.ovz ?? undefined,
      familyHour: raw.family_hour ?? undefined,
    }));
  }

  /** Reference data for a district, resolved from whichever locator the input carries. */
  async districtReport(input: ToolInput<'district_info'>, signal?: AbortSignal): Promise<DistrictReport | null> {
    if (input.address) {
      const building = await this.searchBuilding(input.address, signal);
      if (!building) return null;
      return {
        district: building.district,
        address: building.full_address,
        facts: await this.districtInfoByBuilding(building.id, signal),
      };
    }

    const district =
      input.district ??
      (input.latitude !== undefined && input.longitude !== undefined
        ? await this.districtNear(input.latitude, input.longitude, signal)
        : undefined);
    if (!district) return null;
    return { district, facts: await this.districtInfoByName(district, signal) };
  }

  async facilities(input: ToolInput<'facility_search'>, signal?: AbortSignal): Promise<Facility[]> {
    if (input.buildingId) {
      return this.mfcByBuilding(input.buildingId, signal);
    }
    if (input.address) {
      const building = await this.searchBuilding(input.address, signal);
      return building ? this.mfcByBuilding(building.id, signal) : [];
    }
    if (input.latitude !== undefined && input.longitude !== undefined) {
      return this.mfcNearest(input.latitude, input.longitude, signal);
    }
    return input.district ? this.mfcByDistrict(input.district, signal) : [];
  }
}
