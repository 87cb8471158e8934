import { NextRequest } from 'next/server';

import { respondWithYearRangeQuery } from '@/lib/apiResponses';
import { getDashboardConfig } from '@/lib/config';
import { getTypePeriodCrosstab } from '@/lib/dashboardQueries';
import { parseLimitParam } from '@/lib/queryContract';

export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  return respondWithYearRangeQuery(request, (range, searchParams) =>
    getTypePeriodCrosstab(range, parseLimitParam(searchParams.get('topTypes'), getDashboardConfig().topTypes, 1, 50)),
  );
}
