import type { DerivedIncident, YearRange } from '@/types/incidents';

export function isValidYearRange(range: YearRange): boolean {
  return Number.isInteger(range.minYear) && Number.isInteger(range.maxYear) && range.minYear <= range.maxYear;
}

export function filterByYear(rows: readonly DerivedIncident[], range: YearRange): readonly DerivedIncident[] {
  if (!isValidYearRange(range)) {
    throw new RangeError(`Invalid year range ${range.minYear}..${range.maxYear}`);
  }
  const { minYear, maxYear } = range;
  return Object.freeze(rows.filter((row) => row.year !== null && row.year >= minYear && row.year <= maxYear));
}
