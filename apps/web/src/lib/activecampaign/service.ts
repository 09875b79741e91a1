/**
 * Newsletter Push Service
 * What the editor routes and ops scripts call: list the audience lists, push a newsletter,
 * resume a failed push.
 */

import { loadActiveCampaignConfig, type SenderDefaults } from '../config/activecampaign';
import { systemClock, type Clock } from '../utils/clock';
import { TtlCache } from '../utils/ttl-cache';
import { logInfo } from '../observability/logger';
import { ActiveCampaignClient } from './client';
import { PushOrchestrator, type PushOptions } from './push-orchestrator';
import type { PushRequestInput } from './validator';
import type { MailingAddress, PushFailure, PushResult, SubscriberList } from './types';

export type ListSource = Pick<ActiveCampaignClient, 'listAllSubscriberLists' | 'listMailingAddresses'>;

export interface NewsletterPushServiceOptions {
  sender?: SenderDefaults;
  listsCacheTtlMs?: number;
  clock?: Clock;
}

const LISTS_CACHE_KEY = 'lists';

/**
 * Fill sender fields the request leaves blank from the configured defaults
 */
export function withSenderDefaults(input: PushRequestInput, sender: SenderDefaults): PushRequestInput {
  const blank = (value: unknown) =>
    value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

  return {
    ...input,
    senderName: blank(input.senderName) ? sender.senderName : input.senderName,
    senderEmail: blank(input.senderEmail) ? sender.senderEmail : input.senderEmail,
    replyTo: blank(input.replyTo) ? sender.replyTo : input.replyTo,
  };
}

export class NewsletterPushService {
  private readonly sender: SenderDefaults;
  private readonly listsCache: TtlCache<string, SubscriberList[]>;

  constructor(
    private readonly lists: ListSource,
    private readonly orchestrator: PushOrchestrator,
    options: NewsletterPushServiceOptions = {}
  ) {
    this.sender = options.sender ?? {};
    this.listsCache = new TtlCache(options.listsCacheTtlMs ?? 60000, options.clock ?? systemClock);
  }

  /**
   * All subscriber lists, served from a short-lived cache unless `refresh` is set
   */
  async listAvailableLists(options: { refresh?: boolean } = {}): Promise<SubscriberList[]> {
    if (!options.refresh) {
      const cached = this.listsCache.get(LISTS_CACHE_KEY);
      if (cached) {
        return cached;
      }
    }

    const lists = await this.lists.listAllSubscriberLists();
    this.listsCache.set(LISTS_CACHE_KEY, lists);
    logInfo('Fetched ActiveCampaign lists', { listCount: lists.length });
    return lists;
  }

  listMailingAddresses(): Promise<MailingAddress[]> {
    return this.lists.listMailingAddresses();
  }

  pushNewsletter(input: PushRequestInput, options: PushOptions = {}): Promise<PushResult> {
    return this.orchestrator.push(withSenderDefaults(input, this.sender), options);
  }

  resumePush(failure: PushFailure, input: PushRequestInput): Promise<PushResult> {
    return this.orchestrator.resume(failure, withSenderDefaults(input, this.sender));
  }
}

/**
 * Build a service from environment config; the client and its rate limiter are shared by all pushes
 */
export function createNewsletterPushService(
  env: Record<string, string | undefined> = process.env
): NewsletterPushService {
  const config = loadActiveCampaignConfig(env);
  const client = new ActiveCampaignClient({
    baseUrl: config.baseUrl,
    apiToken: config.apiToken,
    timeoutMs: config.timeoutMs,
  });

  return new NewsletterPushService(client, new PushOrchestrator(client), {
    sender: config.sender,
    listsCacheTtlMs: config.listsCacheTtlMs,
  });
}

let serviceInstance: NewsletterPushService | null = null;

/**
 * Get or create the process-wide service (one rate limiter per account)
 */
export function getNewsletterPushService(): NewsletterPushService {
  if (!serviceInstance) {
    serviceInstance = createNewsletterPushService();
  }
  return serviceInstance;
}
