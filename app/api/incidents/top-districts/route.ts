import { NextRequest } from 'next/server';

import { respondWithYearRangeQuery } from '@/lib/apiResponses';
import { getDashboardConfig } from '@/lib/config';
import { getTopDistricts } from '@/lib/dashboardQueries';
import { parseLimitParam } from '@/lib/queryContract';

export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  return respondWithYearRangeQuery(request, (range, searchParams) =>
    getTopDistricts(range, parseLimitParam(searchParams.get('n'), getDashboardConfig().topDistricts, 1, 100)),
  );
}
