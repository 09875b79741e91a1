import { describe, it, expect } from 'vitest';
import { statusForPushResult, toRouteError } from '../http';
import { ConfigError } from '../../config/activecampaign';
import { RateLimitedError } from '../errors';
import type { PushFailure } from '../types';

const failure: PushFailure = {
  success: false,
  errorKind: 'ValidationError',
  message: 'Invalid push request: missing subject',
  lastCompletedStep: 'MESSAGE_CREATED',
  failedOperation: 'validate',
  orphanedHandles: { messageId: '123' },
  missingFields: ['subject'],
  invalidFields: [],
};

describe('statusForPushResult', () => {
  it('should answer 400 for a request rejected on resume', () => {
    expect(statusForPushResult(failure)).toBe(400);
  });

  it('should answer 502 when the provider rejected a call', () => {
    expect(statusForPushResult({ ...failure, failedOperation: 'createCampaign' })).toBe(502);
  });

  it('should answer 409 for a cancelled push', () => {
    expect(
      statusForPushResult({
        ...failure,
        errorKind: 'Cancelled',
        lastCompletedStep: 'INIT',
        failedOperation: 'cancel',
        orphanedHandles: {},
      })
    ).toBe(409);
  });
});

describe('toRouteError', () => {
  it('should map provider errors to 502', () => {
    expect(toRouteError(new RateLimitedError('Get lists failed'))).toEqual({
      status: 502,
      body: { status: 'error', errorKind: 'RateLimited', message: 'Get lists failed' },
    });
  });

  it('should map configuration errors to 500', () => {
    expect(toRouteError(new ConfigError('missing url')).status).toBe(500);
  });
});
