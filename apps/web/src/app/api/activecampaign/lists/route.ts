import { NextResponse } from 'next/server';
import { getNewsletterPushService } from '../../../../lib/activecampaign/service';
import { toRouteError } from '../../../../lib/activecampaign/http';
import { logError } from '../../../../lib/observability/logger';

export const runtime = 'nodejs';

/**
 * GET /api/activecampaign/lists[?refresh=1]
 */
export async function GET(request: Request) {
  const refresh = new URL(request.url).searchParams.get('refresh') === '1';

  try {
    const lists = await getNewsletterPushService().listAvailableLists({ refresh });
    return NextResponse.json({ lists });
  } catch (err: unknown) {
    logError('[activecampaign/lists] Failed to fetch lists', err);
    const { status, body } = toRouteError(err);
    return NextResponse.json(body, { status });
  }
}
