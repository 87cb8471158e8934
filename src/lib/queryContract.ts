import type { DataUnavailable, YearRange } from '@/types/incidents';

import type { DashboardQueryResult } from './dashboardQueries';

export type QueryParams = URLSearchParams | Record<string, string | string[] | undefined>;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type ApiQueryPayload<T> = {
  min_year: number;
  max_year: number;
  row_count: number;
  data: T;
};

export type ApiErrorPayload = {
  error: 'data_unavailable';
  source: string;
  cause: string;
};

export function readParam(params: QueryParams, key: string): string | null {
  if (params instanceof URLSearchParams) return params.get(key);
  const value = params[key];
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return null;
}

function parseStrictInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseYearRangeParams(params: QueryParams, defaults: YearRange): ParseResult<YearRange> {
  const minRaw = (readParam(params, 'minYear') ?? '').trim();
  const maxRaw = (readParam(params, 'maxYear') ?? '').trim();

  const minYear = minRaw ? parseStrictInteger(minRaw) : defaults.minYear;
  if (minYear === null) return { ok: false, error: `Invalid "minYear": ${minRaw}` };
  const maxYear = maxRaw ? parseStrictInteger(maxRaw) : defaults.maxYear;
  if (maxYear === null) return { ok: false, error: `Invalid "maxYear": ${maxRaw}` };

  if (minYear > maxYear) {
    return { ok: false, error: `"minYear" (${minYear}) must not exceed "maxYear" (${maxYear})` };
  }
  return { ok: true, value: { minYear, maxYear } };
}

export function parseLimitParam(raw: string | null, fallback: number, min: number, max: number): number {
  if (raw == null || !raw.trim()) return fallback;
  const parsed = parseStrictInteger(raw);
  if (parsed === null) return fallback;
  return Math.max(min, Math.min(max, parsed));
}

export function toApiError(error: DataUnavailable): ApiErrorPayload {
  return { error: 'data_unavailable', source: error.source, cause: error.cause };
}

export function toApiQueryPayload<T>(
  result: Extract<DashboardQueryResult<T>, { available: true }>,
): ApiQueryPayload<T> {
  return {
    min_year: result.range.minYear,
    max_year: result.range.maxYear,
    row_count: result.rowCount,
    data: result.data,
  };
}
