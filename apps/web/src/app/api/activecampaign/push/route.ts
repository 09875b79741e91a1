import { NextResponse } from 'next/server';
import { getNewsletterPushService } from '../../../../lib/activecampaign/service';
import { statusForPushResult, toRouteError } from '../../../../lib/activecampaign/http';
import { toPushRequestInput } from '../../../../lib/activecampaign/validator';
import { logError } from '../../../../lib/observability/logger';

export const runtime = 'nodejs';

/**
 * POST /api/activecampaign/push
 * Body: PushRequest JSON. Always answers with a PushResult unless the service is unconfigured.
 */
export async function POST(request: Request) {
  const body: unknown = await request.json().catch(() => null);

  try {
    const result = await getNewsletterPushService().pushNewsletter(toPushRequestInput(body), {
      signal: request.signal,
    });
    return NextResponse.json(result, { status: statusForPushResult(result) });
  } catch (err: unknown) {
    logError('[activecampaign/push] Push could not start', err);
    const { status, body: errorBody } = toRouteError(err);
    return NextResponse.json(errorBody, { status });
  }
}
