import assert from 'node:assert/strict';
import test from 'node:test';

import {
  parseLimitParam,
  parseYearRangeParams,
  readParam,
  toApiError,
  toApiQueryPayload,
} from './queryContract.ts';

const DEFAULTS = { minYear: 2015, maxYear: 2025 };

test('parseYearRangeParams falls back to defaults', () => {
  assert.deepEqual(parseYearRangeParams(new URLSearchParams(), DEFAULTS), { ok: true, value: DEFAULTS });
  assert.deepEqual(parseYearRangeParams(new URLSearchParams('minYear=2019'), DEFAULTS), {
    ok: true,
    value: { minYear: 2019, maxYear: 2025 },
  });
});

test('parseYearRangeParams reads page search params', () => {
  const parsed = parseYearRangeParams({ minYear: ['2018', '2000'], maxYear: ' 2020 ', tab: 'spatial' }, DEFAULTS);
  assert.deepEqual(parsed, { ok: true, value: { minYear: 2018, maxYear: 2020 } });
});

test('parseYearRangeParams accepts a single-year range', () => {
  assert.deepEqual(parseYearRangeParams(new URLSearchParams('minYear=2020&maxYear=2020'), DEFAULTS), {
    ok: true,
    value: { minYear: 2020, maxYear: 2020 },
  });
});

test('parseYearRangeParams rejects non-integer years', () => {
  assert.deepEqual(parseYearRangeParams(new URLSearchParams('minYear=2019.5'), DEFAULTS), {
    ok: false,
    error: 'Invalid "minYear": 2019.5',
  });
  assert.deepEqual(parseYearRangeParams(new URLSearchParams('maxYear=soon'), DEFAULTS), {
    ok: false,
    error: 'Invalid "maxYear": soon',
  });
});

test('parseYearRangeParams rejects an inverted range', () => {
  assert.deepEqual(parseYearRangeParams(new URLSearchParams('minYear=2022&maxYear=2016'), DEFAULTS), {
    ok: false,
    error: '"minYear" (2022) must not exceed "maxYear" (2016)',
  });
});

test('parseLimitParam clamps and falls back', () => {
  assert.equal(parseLimitParam(null, 15, 1, 100), 15);
  assert.equal(parseLimitParam('', 15, 1, 100), 15);
  assert.equal(parseLimitParam('abc', 15, 1, 100), 15);
  assert.equal(parseLimitParam('5', 15, 1, 100), 5);
  assert.equal(parseLimitParam('0', 15, 1, 100), 1);
  assert.equal(parseLimitParam('250', 15, 1, 100), 100);
});

test('readParam returns null for absent keys', () => {
  assert.equal(readParam({}, 'tab'), null);
  assert.equal(readParam(new URLSearchParams('tab=spatial'), 'tab'), 'spatial');
});

test('toApiQueryPayload and toApiError shape the JSON responses', () => {
  assert.deepEqual(
    toApiQueryPayload({
      available: true,
      range: { minYear: 2016, maxYear: 2018 },
      rowCount: 42,
      data: [{ year: 2016, count: 42 }],
    }),
    { min_year: 2016, max_year: 2018, row_count: 42, data: [{ year: 2016, count: 42 }] },
  );
  assert.deepEqual(toApiError({ kind: 'data_unavailable', source: 'data/x.csv', cause: 'ENOENT' }), {
    error: 'data_unavailable',
    source: 'data/x.csv',
    cause: 'ENOENT',
  });
});
