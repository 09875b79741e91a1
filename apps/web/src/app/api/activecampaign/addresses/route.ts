import { NextResponse } from 'next/server';
import { getNewsletterPushService } from '../../../../lib/activecampaign/service';
import { toRouteError } from '../../../../lib/activecampaign/http';
import { logError } from '../../../../lib/observability/logger';

export const runtime = 'nodejs';

export async function GET() {
  try {
    const addresses = await getNewsletterPushService().listMailingAddresses();
    return NextResponse.json({ addresses });
  } catch (err: unknown) {
    logError('[activecampaign/addresses] Failed to fetch addresses', err);
    const { status, body } = toRouteError(err);
    return NextResponse.json(body, { status });
  }
}
