/**
 * ActiveCampaign API v3 Client
 * One method per endpoint the newsletter push needs. Every request goes through the
 * shared rate limiter, carries a timeout, and backs off on 429s and network failures.
 */

import { z } from 'zod';
import { retryWithBackoff, type RetryOptions } from '../utils/retry';
import { systemClock, type Clock } from '../utils/clock';
import { logDebug, logWarn } from '../observability/logger';
import { RateLimiter } from './rate-limiter';
import {
  ProviderClientError,
  ProviderError,
  TransportError,
  RateLimitedError,
  classifyHttpError,
} from './errors';
import {
  CampaignStatus,
  campaignStatusName,
  type CampaignHandle,
  type CampaignMessageLink,
  type CampaignStatusName,
  type MailingAddress,
  type MessageHandle,
  type SubscriberList,
} from './types';

export interface ActiveCampaignClientOptions {
  baseUrl: string;
  apiToken: string;
  rateLimiter?: RateLimiter;
  clock?: Clock;
  /** Per-request timeout; message creation uses the larger of this and 60s */
  timeoutMs?: number;
  retry?: Pick<RetryOptions, 'maxRetries' | 'initialDelay' | 'maxDelay' | 'random'>;
}

export interface CreateMessageParams {
  fromName: string;
  fromEmail: string;
  replyTo: string;
  subject: string;
  html: string;
  text?: string;
}

export interface CreateCampaignParams {
  name: string;
  listId: string;
  trackLinks?: 'all' | 'mime' | 'html' | 'text' | 'none';
  trackOpens?: boolean;
  addressId?: string;
}

type HttpMethod = 'GET' | 'POST' | 'PUT';

interface ProviderRequest<T> {
  operation: string;
  method: HttpMethod;
  path: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  query?: Record<string, string | number>;
  body?: unknown;
  timeoutMs?: number;
}

export const LISTS_PAGE_SIZE = 100;
const MESSAGE_TIMEOUT_MS = 60000;
const FALLBACK_TEXT = 'Please view this email in an HTML-compatible email client.';

// Provider ids arrive as strings or numbers depending on the endpoint
const id = z.union([z.string(), z.number()]).transform(String);

const listsResponse = z.object({
  lists: z.array(
    z.object({
      id,
      name: z.string(),
      subscriber_count: z.coerce.number().int().nonnegative().optional(),
    })
  ),
  meta: z.object({ total: z.coerce.number().int().nonnegative() }).optional(),
});

const addressesResponse = z.object({
  addresses: z.array(
    z.object({
      id,
      companyName: z.string().nullish(),
      address1: z.string().nullish(),
      city: z.string().nullish(),
      state: z.string().nullish(),
    })
  ),
});

const messageResponse = z.object({ message: z.object({ id }) });

const campaignResponse = z.object({
  campaign: z.object({
    id,
    status: z.coerce.number().int().optional(),
  }),
});

const campaignMessageResponse = z.object({ campaignMessage: z.object({ id }) });

const campaignMessagesResponse = z.object({
  campaignMessages: z.array(z.object({ id, campaignid: id, messageid: id })),
});

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Pull the provider's human-readable detail out of an error body
 */
function extractErrorDetail(text: string, fallback: string): string {
  try {
    const body: unknown = JSON.parse(text);
    const parsed = z
      .object({
        errors: z.array(z.object({ title: z.string() })).optional(),
        message: z.string().optional(),
      })
      .safeParse(body);

    if (parsed.success) {
      if (parsed.data.errors?.length) {
        return parsed.data.errors.map((e) => e.title).join('; ');
      }
      if (parsed.data.message) {
        return parsed.data.message;
      }
    }
  } catch {
    // not JSON; use the raw text below
  }
  return text.trim() || fallback;
}

function describeAddress(address: z.infer<typeof addressesResponse>['addresses'][number]): string {
  const cityState = [address.city, address.state].filter(Boolean).join(', ');
  const parts = [address.companyName, address.address1, cityState].filter(Boolean);
  return parts.length ? parts.join(' - ') : `Address #${address.id}`;
}

export class ActiveCampaignClient {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly rateLimiter: RateLimiter;
  private readonly clock: Clock;
  private readonly timeoutMs: number;
  private readonly retryOptions: NonNullable<ActiveCampaignClientOptions['retry']>;

  constructor(options: ActiveCampaignClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiToken = options.apiToken;
    this.clock = options.clock ?? systemClock;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter({ clock: this.clock });
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.retryOptions = options.retry ?? {};
  }

  /**
   * GET lists, one page
   */
  async listSubscriberLists(limit = LISTS_PAGE_SIZE, offset = 0): Promise<SubscriberList[]> {
    const page = await this.fetchListsPage(limit, offset);
    return page.lists;
  }

  /**
   * GET lists, following pagination until the provider's total is reached
   */
  async listAllSubscriberLists(): Promise<SubscriberList[]> {
    const all: SubscriberList[] = [];

    for (let offset = 0; ; offset += LISTS_PAGE_SIZE) {
      const page = await this.fetchListsPage(LISTS_PAGE_SIZE, offset);
      all.push(...page.lists);

      const total = page.total ?? all.length;
      if (page.lists.length < LISTS_PAGE_SIZE || all.length >= total) {
        return all;
      }
    }
  }

  async listMailingAddresses(): Promise<MailingAddress[]> {
    const data = await this.execute({
      operation: 'Get addresses',
      method: 'GET',
      path: 'addresses',
      schema: addressesResponse,
    });

    return data.addresses.map((address) => ({
      id: address.id,
      companyName: address.companyName ?? '',
      display: describeAddress(address),
    }));
  }

  async createMessage(params: CreateMessageParams): Promise<MessageHandle> {
    const data = await this.execute({
      operation: 'Create message',
      method: 'POST',
      path: 'messages',
      schema: messageResponse,
      timeoutMs: Math.max(this.timeoutMs, MESSAGE_TIMEOUT_MS),
      body: {
        message: {
          fromname: params.fromName,
          fromemail: params.fromEmail,
          reply2: params.replyTo,
          subject: params.subject,
          html: params.html,
          text: params.text ?? FALLBACK_TEXT,
        },
      },
    });

    return { id: data.message.id };
  }

  /**
   * POST campaigns; the campaign starts as a draft targeting one list
   */
  async createCampaign(params: CreateCampaignParams): Promise<CampaignHandle> {
    const { name, listId, trackLinks = 'all', trackOpens = true, addressId } = params;

    const data = await this.execute({
      operation: 'Create campaign',
      method: 'POST',
      path: 'campaigns',
      schema: campaignResponse,
      body: {
        campaign: {
          type: 'single',
          name,
          status: CampaignStatus.DRAFT,
          public: 1,
          tracklinks: trackLinks,
          trackreads: trackOpens ? 1 : 0,
          trackreplies: 0,
          htmlunsub: 1,
          textunsub: 1,
          analytics_campaign_name: name,
          addressid: addressId ?? 0,
          p: { [listId]: listId },
        },
      },
    });

    return {
      id: data.campaign.id,
      status: this.statusFrom(data.campaign.status, 'DRAFT', 'Create campaign'),
    };
  }

  /**
   * GET campaigns/{id}/campaignMessages
   */
  async listCampaignMessageLinks(campaignId: string): Promise<CampaignMessageLink[]> {
    const data = await this.execute(this.linksRequest(campaignId));
    return data.campaignMessages.map((link) => ({
      id: link.id,
      campaignId: link.campaignid,
      messageId: link.messageid,
    }));
  }

  /**
   * POST campaignMessages.
   * Whether the provider tolerates a duplicate link is undocumented, so every retry
   * first looks for an existing link between the pair and reuses it.
   */
  async linkMessageToCampaign(campaignId: string, messageId: string): Promise<string> {
    const operation = 'Link message to campaign';

    return this.withRetry(operation, async (attempt) => {
      if (attempt > 0) {
        const links = await this.send(this.linksRequest(campaignId));
        const existing = links.campaignMessages.find(
          (link) => link.campaignid === campaignId && link.messageid === messageId
        );
        if (existing) {
          logDebug('Reusing existing campaign message link', {
            campaignId,
            messageId,
            linkId: existing.id,
          });
          return existing.id;
        }
      }

      const data = await this.send({
        operation,
        method: 'POST',
        path: 'campaignMessages',
        schema: campaignMessageResponse,
        body: { campaignMessage: { campaignid: campaignId, messageid: messageId } },
      });
      return data.campaignMessage.id;
    });
  }

  /**
   * PUT campaigns/{id} with a numeric status; COMPLETED means send now.
   * `sendDate` is the provider's YYYY-MM-DD HH:mm:ss, sent as given.
   */
  async setCampaignStatus(
    campaignId: string,
    status: CampaignStatusName,
    sendDate?: string
  ): Promise<CampaignHandle> {
    const campaign: Record<string, string | number> = { status: CampaignStatus[status] };
    if (sendDate) {
      campaign.sdate = sendDate;
    }

    const data = await this.execute({
      operation: 'Update campaign status',
      method: 'PUT',
      path: `campaigns/${encodeURIComponent(campaignId)}`,
      schema: campaignResponse,
      body: { campaign },
    });

    return {
      id: data.campaign.id,
      status: this.statusFrom(data.campaign.status, status, 'Update campaign status'),
    };
  }

  private async fetchListsPage(
    limit: number,
    offset: number
  ): Promise<{ lists: SubscriberList[]; total?: number }> {
    const data = await this.execute({
      operation: 'Get lists',
      method: 'GET',
      path: 'lists',
      schema: listsResponse,
      query: { limit, offset },
    });

    return {
      lists: data.lists.map((list) => ({
        id: list.id,
        name: list.name,
        subscriberCount: list.subscriber_count ?? 0,
      })),
      total: data.meta?.total,
    };
  }

  private linksRequest(campaignId: string): ProviderRequest<z.infer<typeof campaignMessagesResponse>> {
    return {
      operation: 'Get campaign message links',
      method: 'GET',
      path: `campaigns/${encodeURIComponent(campaignId)}/campaignMessages`,
      schema: campaignMessagesResponse,
    };
  }

  private statusFrom(
    code: number | undefined,
    fallback: CampaignStatusName,
    operation: string
  ): CampaignStatusName {
    if (code === undefined) {
      return fallback;
    }
    const name = campaignStatusName(code);
    if (!name) {
      throw new ProviderError(`${operation} failed: unknown campaign status ${code}`);
    }
    return name;
  }

  private execute<T>(request: ProviderRequest<T>): Promise<T> {
    return this.withRetry(request.operation, () => this.send(request));
  }

  private withRetry<T>(operation: string, fn: (attempt: number) => Promise<T>): Promise<T> {
    return retryWithBackoff(fn, {
      ...this.retryOptions,
      shouldRetry: (error) => error instanceof ProviderClientError && error.retryable,
      minDelayFor: (error) => (error instanceof RateLimitedError ? error.retryAfterMs : undefined),
      onRetry: (error, attempt, delay) =>
        logWarn('Retrying ActiveCampaign request', {
          operation,
          attempt,
          delayMs: Math.round(delay),
          errorKind: error instanceof ProviderClientError ? error.kind : 'unknown',
        }),
      sleep: (ms) => this.clock.sleep(ms),
    });
  }

  /**
   * One rate-limited HTTP exchange, classified but not retried
   */
  private async send<T>(request: ProviderRequest<T>): Promise<T> {
    await this.rateLimiter.acquire();

    const url = new URL(`${this.baseUrl}/api/3/${request.path}`);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let status: number;
    let text: string;
    let retryAfter: string | null;

    try {
      const response = await fetch(url.toString(), {
        method: request.method,
        headers: {
          'Api-Token': this.apiToken,
          Accept: 'application/json',
          ...(request.body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });
      status = response.status;
      retryAfter = response.headers.get('retry-after');
      text = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new TransportError(`${request.operation} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    logDebug('ActiveCampaign response', {
      operation: request.operation,
      method: request.method,
      path: request.path,
      status,
    });

    if (status < 200 || status >= 300) {
      throw classifyHttpError(
        request.operation,
        status,
        extractErrorDetail(text, `HTTP ${status}`),
        parseRetryAfter(retryAfter)
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new ProviderError(`${request.operation} failed: response was not JSON`, {
        status,
        cause: error,
      });
    }

    const parsed = request.schema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(
        `${request.operation} failed: unexpected response shape (${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
          .join('; ')})`,
        { status }
      );
    }
    return parsed.data;
  }
}
