import { NextResponse } from 'next/server';

import type { YearRange } from '@/types/incidents';

import { getDefaultYearRange } from './config';
import type { DashboardQueryResult } from './dashboardQueries';
import { logger } from './logger';
import { parseYearRangeParams, toApiError, toApiQueryPayload } from './queryContract';

export async function respondWithYearRangeQuery<T>(
  request: Request,
  run: (range: YearRange, searchParams: URLSearchParams) => Promise<DashboardQueryResult<T>>,
): Promise<NextResponse> {
  const { searchParams } = new URL(request.url);
  const range = parseYearRangeParams(searchParams, getDefaultYearRange());
  if (!range.ok) {
    return NextResponse.json({ error: range.error }, { status: 400 });
  }

  const result = await run(range.value, searchParams);
  if (!result.available) {
    logger.warn('api', 'Query answered without data', { path: new URL(request.url).pathname });
    return NextResponse.json(toApiError(result.error), { status: 503 });
  }
  return NextResponse.json(toApiQueryPayload(result));
}
