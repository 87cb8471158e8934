import assert from 'node:assert/strict';
import test from 'node:test';

import { deriveIncidentFeatures, parseIncidentDate } from './features.ts';
import { filterByYear, isValidYearRange } from './yearFilter.ts';

const table = deriveIncidentFeatures(
  ['2015-03-01T10:00', '2017-05-02T11:00', 'unknown', '2016-07-03T12:00', '2019-09-04T13:00', '2017-01-05T14:00'].map(
    (date, index) => ({
      date: parseIncidentDate(date),
      primaryType: `TYPE_${index}`,
      district: null,
      communityArea: null,
      latitude: null,
      longitude: null,
      arrest: null,
    }),
  ),
);

test('filterByYear keeps inclusive bounds in original order', () => {
  const result = filterByYear(table, { minYear: 2016, maxYear: 2017 });
  assert.deepEqual(
    result.map((row) => row.primaryType),
    ['TYPE_1', 'TYPE_3', 'TYPE_5'],
  );
});

test('filterByYear excludes rows with an unknown year', () => {
  const result = filterByYear(table, { minYear: 1900, maxYear: 2100 });
  assert.equal(result.length, 5);
  assert.equal(
    result.some((row) => row.year === null),
    false,
  );
});

test('filterByYear is idempotent', () => {
  const range = { minYear: 2015, maxYear: 2017 };
  const once = filterByYear(table, range);
  const twice = filterByYear(once, range);
  assert.deepEqual(twice, once);
});

test('filterByYear is monotonic when widening the range', () => {
  const narrow = filterByYear(table, { minYear: 2016, maxYear: 2016 });
  const wide = filterByYear(table, { minYear: 2015, maxYear: 2019 });
  for (const row of narrow) {
    assert.ok(wide.includes(row));
  }
});

test('filterByYear leaves the source table untouched', () => {
  const before = table.map((row) => row.primaryType);
  const result = filterByYear(table, { minYear: 2019, maxYear: 2019 });
  assert.equal(result.length, 1);
  assert.deepEqual(
    table.map((row) => row.primaryType),
    before,
  );
  assert.equal(Object.isFrozen(result), true);
});

test('filterByYear rejects an inverted range', () => {
  assert.equal(isValidYearRange({ minYear: 2020, maxYear: 2019 }), false);
  assert.throws(() => filterByYear(table, { minYear: 2020, maxYear: 2019 }), RangeError);
});

test('filterByYear on an empty table returns an empty view', () => {
  assert.deepEqual(filterByYear([], { minYear: 2015, maxYear: 2025 }), []);
});
