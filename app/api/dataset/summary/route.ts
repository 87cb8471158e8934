import { NextResponse } from 'next/server';

import { getDatasetSummary } from '@/lib/dashboardQueries';
import { toApiError } from '@/lib/queryContract';

export const runtime = 'nodejs';

export async function GET() {
  const result = await getDatasetSummary();
  if (!result.available) {
    return NextResponse.json(toApiError(result.error), { status: 503 });
  }
  return NextResponse.json(result.summary);
}
