import { NextRequest } from 'next/server';

import { respondWithYearRangeQuery } from '@/lib/apiResponses';
import { getCooccurrenceMatrix } from '@/lib/dashboardQueries';

export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  return respondWithYearRangeQuery(request, (range) => getCooccurrenceMatrix(range));
}
