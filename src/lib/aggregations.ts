import {
  TIME_PERIODS,
  type ArrestRateByPeriod,
  type CorrelationMatrix,
  type DerivedIncident,
  type DistrictCount,
  type GeoPoint,
  type LabeledMatrix,
  type TimePeriod,
  type YearCount,
} from '@/types/incidents';

export const DEFAULT_TOP_DISTRICTS = 15;
export const DEFAULT_TOP_TYPES = 10;

export function emptyMatrix<T>(): LabeledMatrix<T> {
  return { rowLabels: [], columnLabels: [], values: [] };
}

/** Counts keys in first-encounter order; `null` keys are skipped. */
function countBy<K>(rows: readonly DerivedIncident[], keyOf: (row: DerivedIncident) => K | null): Map<K, number> {
  const counts = new Map<K, number>();
  for (const row of rows) {
    const key = keyOf(row);
    if (key === null) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/** Descending by count; Array#sort is stable, so ties keep encounter order. */
function rankByCount<K>(counts: Map<K, number>): Array<[K, number]> {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

export function countByYear(rows: readonly DerivedIncident[]): YearCount[] {
  return [...countBy(rows, (row) => row.year).entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([year, count]) => ({ year, count }));
}

export function topDistricts(rows: readonly DerivedIncident[], n = DEFAULT_TOP_DISTRICTS): DistrictCount[] {
  const limit = Math.max(0, Math.floor(n));
  return rankByCount(countBy(rows, (row) => row.district))
    .slice(0, limit)
    .map(([district, count]) => ({ district, count }));
}

/**
 * Uniform sample without replacement over rows that carry both coordinates.
 * Selected points keep their original relative order.
 */
export function sampleGeoPoints(
  rows: readonly DerivedIncident[],
  maxPoints: number,
  random: () => number = Math.random,
): GeoPoint[] {
  const located: GeoPoint[] = [];
  for (const row of rows) {
    if (row.latitude === null || row.longitude === null) continue;
    located.push({
      latitude: row.latitude,
      longitude: row.longitude,
      primaryType: row.primaryType,
      year: row.year,
      timePeriod: row.timePeriod,
    });
  }

  const k = Math.max(0, Math.floor(maxPoints));
  if (located.length <= k) return located;

  // Partial Fisher-Yates over indices.
  const indices = located.map((_, index) => index);
  for (let i = 0; i < k; i += 1) {
    const j = i + Math.floor(random() * (indices.length - i));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  return indices
    .slice(0, k)
    .sort((a, b) => a - b)
    .map((index) => located[index]);
}

export function arrestRateByPeriod(rows: readonly DerivedIncident[]): ArrestRateByPeriod {
  const tallies = new Map<TimePeriod, { arrests: number; known: number }>();
  for (const row of rows) {
    if (row.timePeriod === null || row.arrest === null) continue;
    const tally = tallies.get(row.timePeriod) ?? { arrests: 0, known: 0 };
    tally.known += 1;
    if (row.arrest) tally.arrests += 1;
    tallies.set(row.timePeriod, tally);
  }

  const rates: ArrestRateByPeriod = {};
  for (const period of TIME_PERIODS) {
    const tally = tallies.get(period);
    if (!tally) continue;
    rates[period] = (tally.arrests / tally.known) * 100;
  }
  return rates;
}

export function crosstabTypeByPeriod(
  rows: readonly DerivedIncident[],
  topTypes = DEFAULT_TOP_TYPES,
): LabeledMatrix<number> {
  const limit = Math.max(0, Math.floor(topTypes));
  const types = rankByCount(countBy(rows, (row) => row.primaryType))
    .slice(0, limit)
    .map(([type]) => type);
  if (types.length === 0) return emptyMatrix();

  const typeIndex = new Map(types.map((type, index) => [type, index]));
  const cells = new Map<string, number>();
  const periodsSeen = new Set<TimePeriod>();
  for (const row of rows) {
    if (row.primaryType === null || row.timePeriod === null || !typeIndex.has(row.primaryType)) continue;
    periodsSeen.add(row.timePeriod);
    const key = `${row.primaryType}\u0000${row.timePeriod}`;
    cells.set(key, (cells.get(key) ?? 0) + 1);
  }

  const periods = TIME_PERIODS.filter((period) => periodsSeen.has(period));
  if (periods.length === 0) return emptyMatrix();

  return {
    rowLabels: types,
    columnLabels: [...periods],
    values: types.map((type) => periods.map((period) => cells.get(`${type}\u0000${period}`) ?? 0)),
  };
}

export function pearsonCorrelation(xs: readonly number[], ys: readonly number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i += 1) {
    sumX += xs[i];
    sumY += ys[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i += 1) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }
  if (varianceX === 0 || varianceY === 0) return null;

  const r = covariance / Math.sqrt(varianceX * varianceY);
  return Math.max(-1, Math.min(1, r));
}

/**
 * Pivots rows to (community area, hour) buckets with one count column per
 * primary type, then correlates every pair of type columns. Cells are `null`
 * where either column is constant across the buckets.
 */
export function cooccurrenceMatrix(rows: readonly DerivedIncident[]): CorrelationMatrix {
  const bucketIndex = new Map<string, number>();
  const columns = new Map<string, number[]>();
  const hits: Array<{ bucket: number; type: string }> = [];

  for (const row of rows) {
    if (row.communityArea === null || row.hour === null || row.primaryType === null) continue;
    const bucketKey = `${row.communityArea}\u0000${row.hour}`;
    let bucket = bucketIndex.get(bucketKey);
    if (bucket === undefined) {
      bucket = bucketIndex.size;
      bucketIndex.set(bucketKey, bucket);
    }
    hits.push({ bucket, type: row.primaryType });
  }
  if (hits.length === 0) return emptyMatrix();

  const bucketCount = bucketIndex.size;
  for (const { bucket, type } of hits) {
    let column = columns.get(type);
    if (!column) {
      column = new Array<number>(bucketCount).fill(0);
      columns.set(type, column);
    }
    column[bucket] += 1;
  }

  const labels = [...columns.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const series = labels.map((label) => columns.get(label) ?? []);
  const values = series.map((xs, i) =>
    series.map((ys, j) => {
      if (i === j) return pearsonCorrelation(xs, xs) === null ? null : 1;
      return pearsonCorrelation(xs, ys);
    }),
  );

  return { rowLabels: labels, columnLabels: [...labels], values };
}
