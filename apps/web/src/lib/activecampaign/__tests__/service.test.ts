import { describe, it, expect, vi } from 'vitest';
import {
  NewsletterPushService,
  createNewsletterPushService,
  withSenderDefaults,
  type ListSource,
} from '../service';
import { PushOrchestrator, type PushProvider } from '../push-orchestrator';
import { ConfigError } from '../../config/activecampaign';
import { FakeClock } from '../../utils/__tests__/fake-clock';

function fakeLists() {
  return {
    listAllSubscriberLists: vi.fn<ListSource['listAllSubscriberLists']>(async () => [
      { id: '1', name: 'Customers', subscriberCount: 42 },
    ]),
    listMailingAddresses: vi.fn<ListSource['listMailingAddresses']>(async () => [
      { id: '7', companyName: 'Acme', display: 'Acme' },
    ]),
  } satisfies ListSource;
}

function fakeProvider() {
  return {
    createMessage: vi.fn<PushProvider['createMessage']>(async () => ({ id: '123' })),
    createCampaign: vi.fn<PushProvider['createCampaign']>(async () => ({ id: '456', status: 'DRAFT' })),
    linkMessageToCampaign: vi.fn<PushProvider['linkMessageToCampaign']>(async () => '789'),
    listCampaignMessageLinks: vi.fn<PushProvider['listCampaignMessageLinks']>(async () => []),
    setCampaignStatus: vi.fn<PushProvider['setCampaignStatus']>(async (id, status) => ({ id, status })),
  } satisfies PushProvider;
}

describe('withSenderDefaults', () => {
  const sender = { senderName: 'Newsroom', senderEmail: 'news@x.com', replyTo: 'reply@x.com' };

  it('should fill blank sender fields', () => {
    expect(withSenderDefaults({ listId: '1', senderName: '  ' }, sender)).toEqual({
      listId: '1',
      senderName: 'Newsroom',
      senderEmail: 'news@x.com',
      replyTo: 'reply@x.com',
    });
  });

  it('should keep sender fields the request sets', () => {
    const filled = withSenderDefaults(
      { senderName: 'RA', senderEmail: 'n@x.com', replyTo: 'r@x.com' },
      sender
    );

    expect(filled).toEqual({ senderName: 'RA', senderEmail: 'n@x.com', replyTo: 'r@x.com' });
  });
});

describe('NewsletterPushService', () => {
  it('should cache lists until the TTL passes', async () => {
    const clock = new FakeClock();
    const lists = fakeLists();
    const service = new NewsletterPushService(lists, new PushOrchestrator(fakeProvider()), {
      listsCacheTtlMs: 60000,
      clock,
    });

    await service.listAvailableLists();
    clock.advance(59999);
    await service.listAvailableLists();
    expect(lists.listAllSubscriberLists).toHaveBeenCalledTimes(1);

    clock.advance(1);
    const fetched = await service.listAvailableLists();
    expect(lists.listAllSubscriberLists).toHaveBeenCalledTimes(2);
    expect(fetched).toEqual([{ id: '1', name: 'Customers', subscriberCount: 42 }]);
  });

  it('should bypass the cache on refresh', async () => {
    const lists = fakeLists();
    const service = new NewsletterPushService(lists, new PushOrchestrator(fakeProvider()), {
      clock: new FakeClock(),
    });

    await service.listAvailableLists();
    await service.listAvailableLists({ refresh: true });

    expect(lists.listAllSubscriberLists).toHaveBeenCalledTimes(2);
  });

  it('should pass mailing addresses through', async () => {
    const service = new NewsletterPushService(fakeLists(), new PushOrchestrator(fakeProvider()));

    await expect(service.listMailingAddresses()).resolves.toEqual([
      { id: '7', companyName: 'Acme', display: 'Acme' },
    ]);
  });

  it('should push with the configured sender when the request has none', async () => {
    const provider = fakeProvider();
    const service = new NewsletterPushService(fakeLists(), new PushOrchestrator(provider), {
      sender: { senderName: 'Newsroom', senderEmail: 'news@x.com' },
    });

    const result = await service.pushNewsletter({
      listId: '1',
      campaignName: 'Jan',
      subject: 'Hi',
      htmlContent: '<p>x</p>',
    });

    expect(result).toMatchObject({ success: true, campaignId: '456' });
    expect(provider.createMessage).toHaveBeenCalledWith(
      expect.objectContaining({ fromName: 'Newsroom', fromEmail: 'news@x.com', replyTo: 'news@x.com' })
    );
    expect(provider.createCampaign).toHaveBeenCalledWith(expect.objectContaining({ name: 'Jan' }));
  });

  it('should resume a failed push through the orchestrator', async () => {
    const provider = fakeProvider();
    const service = new NewsletterPushService(fakeLists(), new PushOrchestrator(provider), {
      sender: { senderName: 'Newsroom', senderEmail: 'news@x.com' },
    });

    const result = await service.resumePush(
      {
        success: false,
        errorKind: 'TransportError',
        message: 'network down',
        lastCompletedStep: 'LINKED',
        failedOperation: 'setCampaignStatus',
        orphanedHandles: { messageId: '123', campaignId: '456' },
      },
      { listId: '1', campaignName: 'Jan', subject: 'Hi', htmlContent: '<p>x</p>' }
    );

    expect(result).toMatchObject({ success: true });
    expect(provider.setCampaignStatus).toHaveBeenCalledWith('456', 'COMPLETED');
    expect(provider.createMessage).not.toHaveBeenCalled();
  });
});

describe('createNewsletterPushService', () => {
  it('should fail with ConfigError when the account is not configured', () => {
    expect(() => createNewsletterPushService({})).toThrow(ConfigError);
  });

  it('should build a service from the environment', () => {
    const service = createNewsletterPushService({
      ACTIVECAMPAIGN_URL: 'https://acct.api-us1.com',
      ACTIVECAMPAIGN_API_KEY: 'test-token',
    });

    expect(service).toBeInstanceOf(NewsletterPushService);
  });
});
