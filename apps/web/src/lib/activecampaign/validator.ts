/**
 * Push Request Validator
 * Pure check run before any provider call; rejecting here leaves no remote state behind.
 */

import { z } from 'zod';
import { ValidationError } from './errors';
import type { PushRequest, ValidatedPushRequest } from './types';

/** Loosely-typed request as it arrives from a route body or the CLI */
export type PushRequestInput = { [K in keyof PushRequest]?: unknown };

export type ValidationOutcome =
  | { ok: true; request: ValidatedPushRequest }
  | { ok: false; error: ValidationError };

const REQUIRED_FIELDS = [
  'listId',
  'campaignName',
  'subject',
  'htmlContent',
  'senderName',
  'senderEmail',
] as const satisfies readonly (keyof PushRequest)[];

const requiredText = z.string().trim().min(1);
const optionalText = z.string().trim().min(1).optional();
const emailAddress = z.string().trim().email();

// ISO date-time; any offset is ignored and the stated wall-clock time is sent as-is
const SEND_DATE_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?$/;

const pushRequestSchema = z.object({
  listId: requiredText,
  campaignName: requiredText,
  subject: requiredText,
  htmlContent: z.string().refine((html) => html.trim().length > 0),
  senderName: requiredText,
  senderEmail: emailAddress,
  replyTo: emailAddress.optional(),
  textContent: z.string().optional(),
  addressId: optionalText,
  deliveryMode: z.enum(['immediate', 'scheduled', 'draft']).default('immediate'),
  scheduledDate: z
    .string()
    .trim()
    .refine((value) => SEND_DATE_PATTERN.test(value) && !Number.isNaN(Date.parse(value)))
    .optional(),
});

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Narrow an arbitrary JSON body to the request shape; non-objects become an empty request */
export function toPushRequestInput(body: unknown): PushRequestInput {
  return isRecord(body) ? body : {};
}

/**
 * Provider send date (YYYY-MM-DD HH:mm:ss) for the wall-clock time an ISO string states
 */
export function toProviderSendDate(value: string): string | undefined {
  const match = SEND_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, date, hours, minutes, seconds = '00'] = match;
  return `${date} ${hours}:${minutes}:${seconds}`;
}

/**
 * Validate a push request.
 * Blank optional fields are treated as absent.
 */
export function validate(input: PushRequestInput, now: Date = new Date()): ValidationOutcome {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const field of REQUIRED_FIELDS) {
    if (isBlank(input[field])) {
      missing.add(field);
    }
  }

  const present = Object.fromEntries(
    Object.entries(input).filter(([, value]) => !isBlank(value))
  );
  const parsed = pushRequestSchema.safeParse(present);

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = String(issue.path[0] ?? 'request');
      if (!missing.has(field)) {
        invalid.add(field);
      }
    }
  } else if (parsed.data.deliveryMode === 'scheduled') {
    if (parsed.data.scheduledDate === undefined) {
      missing.add('scheduledDate');
    } else if (Date.parse(parsed.data.scheduledDate) <= now.getTime()) {
      invalid.add('scheduledDate');
    }
  }

  if (!parsed.success || missing.size > 0 || invalid.size > 0) {
    const missingFields = [...missing];
    const invalidFields = [...invalid];
    const problems = [
      missingFields.length ? `missing ${missingFields.join(', ')}` : '',
      invalidFields.length ? `invalid ${invalidFields.join(', ')}` : '',
    ].filter(Boolean);

    return {
      ok: false,
      error: new ValidationError(`Invalid push request: ${problems.join('; ')}`, {
        missingFields,
        invalidFields,
      }),
    };
  }

  const data = parsed.data;
  const scheduledDate =
    data.deliveryMode === 'scheduled' && data.scheduledDate
      ? toProviderSendDate(data.scheduledDate)
      : undefined;

  return {
    ok: true,
    request: {
      listId: data.listId,
      campaignName: data.campaignName,
      subject: data.subject,
      htmlContent: data.htmlContent,
      senderName: data.senderName,
      senderEmail: data.senderEmail,
      replyTo: data.replyTo ?? data.senderEmail,
      textContent: data.textContent,
      addressId: data.addressId,
      deliveryMode: data.deliveryMode,
      scheduledDate,
    },
  };
}
