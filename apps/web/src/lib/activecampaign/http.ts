/**
 * HTTP status mapping for the ActiveCampaign routes
 */

import { ConfigError } from '../config/activecampaign';
import { ProviderClientError } from './errors';
import type { PushResult } from './types';

export interface RouteError {
  status: number;
  body: { status: 'error'; errorKind: string; message: string };
}

export function statusForPushResult(result: PushResult): number {
  if (result.success) {
    return 200;
  }
  switch (result.errorKind) {
    case 'ValidationError':
      // a 422 from the provider also lands here; only a locally rejected request is the caller's fault
      return result.failedOperation === 'validate' ? 400 : 502;
    case 'Cancelled':
      return 409;
    case 'InternalError':
      return 500;
    default:
      return 502;
  }
}

export function toRouteError(error: unknown): RouteError {
  if (error instanceof ConfigError) {
    return {
      status: 500,
      body: {
        status: 'error',
        errorKind: 'ConfigError',
        message: `ActiveCampaign not configured: ${error.message}`,
      },
    };
  }
  if (error instanceof ProviderClientError) {
    return {
      status: 502,
      body: { status: 'error', errorKind: error.kind, message: error.message },
    };
  }
  return {
    status: 500,
    body: {
      status: 'error',
      errorKind: 'InternalError',
      message: error instanceof Error ? error.message : 'Unknown error',
    },
  };
}
