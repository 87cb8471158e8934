import { NextRequest } from 'next/server';

import { respondWithYearRangeQuery } from '@/lib/apiResponses';
import { getArrestRateByPeriod } from '@/lib/dashboardQueries';

export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  return respondWithYearRangeQuery(request, (range) => getArrestRateByPeriod(range));
}
