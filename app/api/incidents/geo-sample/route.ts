import { NextRequest } from 'next/server';

import { respondWithYearRangeQuery } from '@/lib/apiResponses';
import { getDashboardConfig } from '@/lib/config';
import { getGeoSample } from '@/lib/dashboardQueries';
import { parseLimitParam } from '@/lib/queryContract';

export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  return respondWithYearRangeQuery(request, (range, searchParams) =>
    getGeoSample(range, parseLimitParam(searchParams.get('maxPoints'), getDashboardConfig().geoSampleMax, 1, 50000)),
  );
}
