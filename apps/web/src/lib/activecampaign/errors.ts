/**
 * ActiveCampaign error taxonomy
 * Every provider client failure is one of these; the orchestrator turns them into PushResults.
 */

export type ProviderErrorKind =
  | 'ValidationError'
  | 'AuthError'
  | 'RateLimited'
  | 'NotFound'
  | 'ProviderError'
  | 'TransportError';

/** Kinds that only exist at the push boundary */
export type PushErrorKind = ProviderErrorKind | 'Cancelled' | 'InternalError';

export interface ProviderErrorOptions {
  status?: number;
  detail?: string;
  cause?: unknown;
}

export abstract class ProviderClientError extends Error {
  abstract readonly kind: ProviderErrorKind;
  readonly status?: number;
  readonly detail?: string;

  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
    this.detail = options.detail;
  }

  /** Whether the client may back off and try the same call again */
  get retryable(): boolean {
    return false;
  }
}

export class ValidationError extends ProviderClientError {
  readonly kind = 'ValidationError';
  readonly missingFields: string[];
  readonly invalidFields: string[];

  constructor(
    message: string,
    options: ProviderErrorOptions & { missingFields?: string[]; invalidFields?: string[] } = {}
  ) {
    super(message, options);
    this.missingFields = options.missingFields ?? [];
    this.invalidFields = options.invalidFields ?? [];
  }
}

export class AuthError extends ProviderClientError {
  readonly kind = 'AuthError';
}

export class NotFoundError extends ProviderClientError {
  readonly kind = 'NotFound';
}

export class ProviderError extends ProviderClientError {
  readonly kind = 'ProviderError';
}

export class RateLimitedError extends ProviderClientError {
  readonly kind = 'RateLimited';
  readonly retryAfterMs?: number;

  constructor(message: string, options: ProviderErrorOptions & { retryAfterMs?: number } = {}) {
    super(message, options);
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return true;
  }
}

/** Network failure or timeout; the request may or may not have reached the provider */
export class TransportError extends ProviderClientError {
  readonly kind = 'TransportError';

  get retryable(): boolean {
    return true;
  }
}

/**
 * Map a non-2xx HTTP status to its error class
 */
export function classifyHttpError(
  operation: string,
  status: number,
  detail: string,
  retryAfterMs?: number
): ProviderClientError {
  const message = `${operation} failed: ${detail} (HTTP ${status})`;

  if (status === 401 || status === 403) {
    return new AuthError(message, { status, detail });
  }
  if (status === 404) {
    return new NotFoundError(message, { status, detail });
  }
  if (status === 422) {
    return new ValidationError(message, { status, detail });
  }
  if (status === 429) {
    return new RateLimitedError(message, { status, detail, retryAfterMs });
  }
  return new ProviderError(message, { status, detail });
}
