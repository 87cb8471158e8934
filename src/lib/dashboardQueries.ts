import type {
  ArrestRateByPeriod,
  CorrelationMatrix,
  DataUnavailable,
  DatasetSummary,
  DerivedIncident,
  DistrictCount,
  GeoPoint,
  LabeledMatrix,
  YearCount,
  YearRange,
} from '@/types/incidents';

import {
  arrestRateByPeriod,
  cooccurrenceMatrix,
  countByYear,
  crosstabTypeByPeriod,
  sampleGeoPoints,
  topDistricts,
} from './aggregations';
import { getDashboardConfig } from './config';
import { incidentTableCache, type IncidentTableCache } from './incidentCache';
import { filterByYear } from './yearFilter';

export type DashboardQueryContext = {
  cache?: IncidentTableCache;
  source?: string;
  random?: () => number;
};

export type DashboardQueryResult<T> =
  | { available: true; range: YearRange; rowCount: number; data: T }
  | { available: false; error: DataUnavailable };

export type DashboardSnapshot = {
  yearlyCounts: YearCount[];
  topDistricts: DistrictCount[];
  geoSample: GeoPoint[];
  arrestRateByPeriod: ArrestRateByPeriod;
  typePeriodCrosstab: LabeledMatrix<number>;
  cooccurrence: CorrelationMatrix;
};

export type DashboardLimits = {
  topDistricts?: number;
  geoSampleMax?: number;
  topTypes?: number;
};

type FilteredView =
  | { available: true; range: YearRange; rows: readonly DerivedIncident[] }
  | { available: false; error: DataUnavailable };

async function loadFilteredView(range: YearRange, context: DashboardQueryContext): Promise<FilteredView> {
  const cache = context.cache ?? incidentTableCache;
  const source = context.source ?? getDashboardConfig().source;
  const loaded = await cache.get(source);
  if (!loaded.ok) {
    return { available: false, error: loaded.error };
  }
  return { available: true, range, rows: filterByYear(loaded.table.rows, range) };
}

async function runQuery<T>(
  range: YearRange,
  context: DashboardQueryContext,
  aggregate: (rows: readonly DerivedIncident[]) => T,
): Promise<DashboardQueryResult<T>> {
  const view = await loadFilteredView(range, context);
  if (!view.available) return view;
  return { available: true, range: view.range, rowCount: view.rows.length, data: aggregate(view.rows) };
}

export function getYearlyCounts(
  range: YearRange,
  context: DashboardQueryContext = {},
): Promise<DashboardQueryResult<YearCount[]>> {
  return runQuery(range, context, countByYear);
}

export function getTopDistricts(
  range: YearRange,
  n = getDashboardConfig().topDistricts,
  context: DashboardQueryContext = {},
): Promise<DashboardQueryResult<DistrictCount[]>> {
  return runQuery(range, context, (rows) => topDistricts(rows, n));
}

export function getGeoSample(
  range: YearRange,
  maxPoints = getDashboardConfig().geoSampleMax,
  context: DashboardQueryContext = {},
): Promise<DashboardQueryResult<GeoPoint[]>> {
  return runQuery(range, context, (rows) => sampleGeoPoints(rows, maxPoints, context.random));
}

export function getArrestRateByPeriod(
  range: YearRange,
  context: DashboardQueryContext = {},
): Promise<DashboardQueryResult<ArrestRateByPeriod>> {
  return runQuery(range, context, arrestRateByPeriod);
}

export function getTypePeriodCrosstab(
  range: YearRange,
  topTypes = getDashboardConfig().topTypes,
  context: DashboardQueryContext = {},
): Promise<DashboardQueryResult<LabeledMatrix<number>>> {
  return runQuery(range, context, (rows) => crosstabTypeByPeriod(rows, topTypes));
}

export function getCooccurrenceMatrix(
  range: YearRange,
  context: DashboardQueryContext = {},
): Promise<DashboardQueryResult<CorrelationMatrix>> {
  return runQuery(range, context, cooccurrenceMatrix);
}

export async function getDashboardSnapshot(
  range: YearRange,
  limits: DashboardLimits = {},
  context: DashboardQueryContext = {},
): Promise<DashboardQueryResult<DashboardSnapshot>> {
  const cfg = getDashboardConfig();
  const view = await loadFilteredView(range, context);
  if (!view.available) return view;

  const { rows } = view;
  const yearly = countByYear(rows);
  const districts = topDistricts(rows, limits.topDistricts ?? cfg.topDistricts);
  const geo = sampleGeoPoints(rows, limits.geoSampleMax ?? cfg.geoSampleMax, context.random);
  const arrests = arrestRateByPeriod(rows);
  const crosstab = crosstabTypeByPeriod(rows, limits.topTypes ?? cfg.topTypes);
  const cooccurrence = cooccurrenceMatrix(rows);

  return {
    available: true,
    range: view.range,
    rowCount: rows.length,
    data: {
      yearlyCounts: yearly,
      topDistricts: districts,
      geoSample: geo,
      arrestRateByPeriod: arrests,
      typePeriodCrosstab: crosstab,
      cooccurrence,
    },
  };
}

export async function getDatasetSummary(
  context: DashboardQueryContext = {},
): Promise<{ available: true; summary: DatasetSummary } | { available: false; error: DataUnavailable }> {
  const cache = context.cache ?? incidentTableCache;
  const loaded = await cache.get(context.source ?? getDashboardConfig().source);
  if (!loaded.ok) {
    return { available: false, error: loaded.error };
  }

  const { table } = loaded;
  let unknownDateRows = 0;
  let minYear: number | null = null;
  let maxYear: number | null = null;
  for (const row of table.rows) {
    if (row.year === null) {
      unknownDateRows += 1;
      continue;
    }
    minYear = minYear === null ? row.year : Math.min(minYear, row.year);
    maxYear = maxYear === null ? row.year : Math.max(maxYear, row.year);
  }

  return {
    available: true,
    summary: {
      source: table.source,
      loadedAt: table.loadedAt,
      totalRows: table.rows.length,
      unknownDateRows,
      minYear,
      maxYear,
      parseWarnings: table.parseWarnings,
    },
  };
}
