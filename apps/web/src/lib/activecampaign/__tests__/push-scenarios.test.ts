import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ActiveCampaignClient } from '../client';
import { PushOrchestrator } from '../push-orchestrator';
import type { PushRequest } from '../types';
import { FakeClock } from '../../utils/__tests__/fake-clock';
import { BASE_URL, jsonResponse, routes, stubProvider } from './fake-provider';

const request: PushRequest = {
  listId: '1',
  campaignName: 'Jan',
  subject: 'Hi',
  htmlContent: '<p>x</p>',
  senderName: 'RA',
  senderEmail: 'n@x.com',
};

const created = {
  'POST messages': () => jsonResponse(201, { message: { id: '123' } }),
  'POST campaigns': () => jsonResponse(201, { campaign: { id: '456', status: '0' } }),
  'POST campaignMessages': () => jsonResponse(201, { campaignMessage: { id: '789' } }),
  'PUT campaigns/456': () => jsonResponse(200, { campaign: { id: '456', status: '5' } }),
};

describe('newsletter push against the provider API', () => {
  let clock: FakeClock;
  let orchestrator: PushOrchestrator;

  beforeEach(() => {
    clock = new FakeClock();
    const client = new ActiveCampaignClient({
      baseUrl: BASE_URL,
      apiToken: 'test-token',
      clock,
      retry: { random: () => 1 },
    });
    orchestrator = new PushOrchestrator(client, {
      newPushId: () => 'push-1',
      now: () => new Date('2026-01-15T12:00:00Z'),
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send a newsletter end to end', async () => {
    const { calls } = stubProvider(routes(created));

    const result = await orchestrator.push(request);

    expect(result).toEqual({
      success: true,
      campaignId: '456',
      messageId: '123',
      deliveryMode: 'immediate',
      message: 'Campaign sent successfully',
    });
    expect(calls.map((call) => `${call.method} ${call.path}`)).toEqual([
      'POST messages',
      'POST campaigns',
      'POST campaignMessages',
      'PUT campaigns/456',
    ]);
    expect(calls[2].body).toEqual({ campaignMessage: { campaignid: '456', messageid: '123' } });
    expect(calls[3].body).toEqual({ campaign: { status: 5 } });
  });

  it('should report the orphaned message when the account may not create campaigns', async () => {
    const { calls } = stubProvider(
      routes({
        ...created,
        'POST campaigns': () => jsonResponse(403, { message: 'Forbidden' }),
      })
    );

    const result = await orchestrator.push(request);

    expect(result).toEqual({
      success: false,
      errorKind: 'AuthError',
      message: 'Create campaign failed: Forbidden (HTTP 403)',
      lastCompletedStep: 'MESSAGE_CREATED',
      failedOperation: 'createCampaign',
      orphanedHandles: { messageId: '123' },
      deliveryMode: 'immediate',
    });
    expect(calls).toHaveLength(2);
  });

  it('should ride out rate limiting on the link step with exponential backoff', async () => {
    const tooMany = () => jsonResponse(429, { message: 'Too Many Requests' });
    const { calls } = stubProvider(
      routes({
        ...created,
        'POST campaignMessages': [
          tooMany,
          tooMany,
          tooMany,
          () => jsonResponse(201, { campaignMessage: { id: '789' } }),
        ],
        'GET campaigns/456/campaignMessages': () => jsonResponse(200, { campaignMessages: [] }),
      })
    );

    const result = await orchestrator.push(request);

    expect(result).toMatchObject({ success: true, campaignId: '456' });
    expect(clock.sleeps).toEqual([1000, 2000, 4000]);
    expect(calls.filter((call) => call.path === 'campaignMessages')).toHaveLength(4);
    expect(calls.filter((call) => call.method === 'PUT')).toHaveLength(1);
  });

  it('should schedule at the wall-clock time the request states', async () => {
    const { calls } = stubProvider(
      routes({
        ...created,
        'PUT campaigns/456': () => jsonResponse(200, { campaign: { id: '456', status: '1' } }),
      })
    );

    const result = await orchestrator.push({
      ...request,
      deliveryMode: 'scheduled',
      scheduledDate: '2026-01-20T10:00:00+02:00',
    });

    expect(result).toMatchObject({ success: true, deliveryMode: 'scheduled' });
    expect(calls[3].body).toEqual({ campaign: { status: 1, sdate: '2026-01-20 10:00:00' } });
  });

  it('should finish a failed push on resume without duplicating remote objects', async () => {
    stubProvider(
      routes({
        ...created,
        'POST campaignMessages': () => jsonResponse(404, { message: 'Campaign not found' }),
      })
    );
    const failed = await orchestrator.push(request);
    if (failed.success) {
      throw new Error('expected the first push to fail');
    }
    expect(failed.lastCompletedStep).toBe('CAMPAIGN_CREATED');

    const { calls } = stubProvider(
      routes({
        ...created,
        'GET campaigns/456/campaignMessages': () => jsonResponse(200, { campaignMessages: [] }),
      })
    );
    const resumed = await orchestrator.resume(failed, request);

    expect(resumed).toMatchObject({ success: true, campaignId: '456', messageId: '123' });
    expect(calls.map((call) => `${call.method} ${call.path}`)).toEqual([
      'GET campaigns/456/campaignMessages',
      'POST campaignMessages',
      'PUT campaigns/456',
    ]);
  });
});
