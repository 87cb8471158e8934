import assert from 'node:assert/strict';
import test from 'node:test';

import type { IncidentRecord, LoadIncidentsResult } from '@/types/incidents';

import { invalidateDashboardConfigCache } from './config.ts';
import {
  getArrestRateByPeriod,
  getCooccurrenceMatrix,
  getDashboardSnapshot,
  getDatasetSummary,
  getGeoSample,
  getTopDistricts,
  getTypePeriodCrosstab,
  getYearlyCounts,
  type DashboardQueryContext,
} from './dashboardQueries.ts';
import { deriveIncidentFeatures, parseIncidentDate } from './features.ts';
import { IncidentTableCache } from './incidentCache.ts';

process.env.LOG_LEVEL = 'silent';
invalidateDashboardConfigCache();

const SOURCE = 'data/test-incidents.csv';

function record(date: string, arrest: boolean, extra: Partial<IncidentRecord> = {}): IncidentRecord {
  return {
    date: parseIncidentDate(date),
    primaryType: 'THEFT',
    district: '1',
    communityArea: '32',
    latitude: 41.88,
    longitude: -87.63,
    arrest,
    ...extra,
  };
}

function contextFor(records: IncidentRecord[]): { context: DashboardQueryContext; loads: () => number } {
  let loads = 0;
  const cache = new IncidentTableCache(async (source): Promise<LoadIncidentsResult> => {
    loads += 1;
    return {
      ok: true,
      table: {
        source,
        loadedAt: '2024-01-01T00:00:00.000Z',
        columns: [],
        rows: deriveIncidentFeatures(records),
        parseWarnings: ['Row 9: Too few fields'],
      },
    };
  });
  return { context: { cache, source: SOURCE, random: () => 0 }, loads: () => loads };
}

const threeRows = [
  record('2020-01-01T02:00', true),
  record('2020-06-15T14:00', false),
  record('unparsable', true),
];

test('getYearlyCounts and getArrestRateByPeriod on the three-row table', async () => {
  const { context } = contextFor(threeRows);
  const range = { minYear: 2020, maxYear: 2020 };

  const yearly = await getYearlyCounts(range, context);
  assert.deepEqual(yearly, { available: true, range, rowCount: 2, data: [{ year: 2020, count: 2 }] });

  const arrests = await getArrestRateByPeriod(range, context);
  assert.deepEqual(arrests, {
    available: true,
    range,
    rowCount: 2,
    data: { 'Early Morning': 100, Afternoon: 0 },
  });
});

test('queries reuse the cached table instead of reloading', async () => {
  const { context, loads } = contextFor(threeRows);
  const range = { minYear: 2015, maxYear: 2025 };
  await Promise.all([
    getYearlyCounts(range, context),
    getTopDistricts(range, 5, context),
    getGeoSample(range, 10, context),
    getArrestRateByPeriod(range, context),
    getTypePeriodCrosstab(range, 3, context),
    getCooccurrenceMatrix(range, context),
  ]);
  assert.equal(loads(), 1);
});

test('queries pass limits through to the aggregators', async () => {
  const { context } = contextFor([
    record('2019-01-01T08:00', false, { district: '7', primaryType: 'BATTERY' }),
    record('2019-01-01T09:00', false, { district: '7', primaryType: 'BATTERY', latitude: null }),
    record('2019-01-01T20:00', true, { district: '3' }),
  ]);
  const range = { minYear: 2019, maxYear: 2019 };

  const districts = await getTopDistricts(range, 1, context);
  assert.equal(districts.available, true);
  if (districts.available) assert.deepEqual(districts.data, [{ district: '7', count: 2 }]);

  const geo = await getGeoSample(range, 1, context);
  assert.equal(geo.available, true);
  if (geo.available) {
    assert.equal(geo.rowCount, 3);
    assert.equal(geo.data.length, 1);
    assert.equal(geo.data[0].primaryType, 'BATTERY');
  }

  const crosstab = await getTypePeriodCrosstab(range, 1, context);
  assert.equal(crosstab.available, true);
  if (crosstab.available) {
    assert.deepEqual(crosstab.data, { rowLabels: ['BATTERY'], columnLabels: ['Morning'], values: [[2]] });
  }
});

test('an empty range yields empty results for every query', async () => {
  const { context } = contextFor(threeRows);
  const snapshot = await getDashboardSnapshot({ minYear: 2001, maxYear: 2002 }, {}, context);
  assert.deepEqual(snapshot, {
    available: true,
    range: { minYear: 2001, maxYear: 2002 },
    rowCount: 0,
    data: {
      yearlyCounts: [],
      topDistricts: [],
      geoSample: [],
      arrestRateByPeriod: {},
      typePeriodCrosstab: { rowLabels: [], columnLabels: [], values: [] },
      cooccurrence: { rowLabels: [], columnLabels: [], values: [] },
    },
  });
});

test('getDashboardSnapshot computes every view from one filtered set', async () => {
  const { context } = contextFor(threeRows);
  const snapshot = await getDashboardSnapshot({ minYear: 2020, maxYear: 2020 }, { topDistricts: 3 }, context);
  assert.equal(snapshot.available, true);
  if (!snapshot.available) return;
  assert.equal(snapshot.rowCount, 2);
  assert.deepEqual(snapshot.data.yearlyCounts, [{ year: 2020, count: 2 }]);
  assert.deepEqual(snapshot.data.topDistricts, [{ district: '1', count: 2 }]);
  assert.equal(snapshot.data.geoSample.length, 2);
  assert.deepEqual(snapshot.data.typePeriodCrosstab, {
    rowLabels: ['THEFT'],
    columnLabels: ['Early Morning', 'Afternoon'],
    values: [[1, 1]],
  });
  assert.deepEqual(snapshot.data.cooccurrence, { rowLabels: ['THEFT'], columnLabels: ['THEFT'], values: [[null]] });
});

test('data unavailable propagates without aggregating', async () => {
  const cache = new IncidentTableCache(async (source) => ({
    ok: false,
    error: { kind: 'data_unavailable', source, cause: 'HTTP 503 while fetching incident data' },
  }));
  const error = { kind: 'data_unavailable', source: SOURCE, cause: 'HTTP 503 while fetching incident data' };

  const yearly = await getYearlyCounts({ minYear: 2015, maxYear: 2025 }, { cache, source: SOURCE });
  assert.deepEqual(yearly, { available: false, error });

  const summary = await getDatasetSummary({ cache, source: SOURCE });
  assert.deepEqual(summary, { available: false, error });
});

test('getDatasetSummary reports row counts and the year span', async () => {
  const { context } = contextFor([...threeRows, record('2017-03-03T03:00', false)]);
  const summary = await getDatasetSummary(context);
  assert.deepEqual(summary, {
    available: true,
    summary: {
      source: SOURCE,
      loadedAt: '2024-01-01T00:00:00.000Z',
      totalRows: 4,
      unknownDateRows: 1,
      minYear: 2017,
      maxYear: 2020,
      parseWarnings: ['Row 9: Too few fields'],
    },
  });
});
