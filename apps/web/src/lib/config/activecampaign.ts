/**
 * ActiveCampaign configuration from environment variables.
 * Scripts load .env through dotenv before this runs.
 */

import { z } from 'zod';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly problems: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface SenderDefaults {
  senderName?: string;
  senderEmail?: string;
  replyTo?: string;
}

export interface ActiveCampaignConfig {
  baseUrl: string;
  apiToken: string;
  sender: SenderDefaults;
  timeoutMs: number;
  listsCacheTtlMs: number;
}

const envSchema = z.object({
  ACTIVECAMPAIGN_URL: z.string().trim().url(),
  ACTIVECAMPAIGN_API_KEY: z.string().trim().min(1),
  ACTIVECAMPAIGN_SENDER_NAME: z.string().trim().optional(),
  ACTIVECAMPAIGN_SENDER_EMAIL: z.string().trim().email().optional(),
  ACTIVECAMPAIGN_REPLY_TO: z.string().trim().email().optional(),
  ACTIVECAMPAIGN_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  ACTIVECAMPAIGN_LISTS_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(60000),
});

export function loadActiveCampaignConfig(
  env: Record<string, string | undefined> = process.env
): ActiveCampaignConfig {
  // `FOO=` in .env means unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid ActiveCampaign configuration (${problems.join('; ')})`, problems);
  }

  const vars = parsed.data;
  return {
    baseUrl: vars.ACTIVECAMPAIGN_URL.replace(/\/+$/, ''),
    apiToken: vars.ACTIVECAMPAIGN_API_KEY,
    sender: {
      senderName: vars.ACTIVECAMPAIGN_SENDER_NAME,
      senderEmail: vars.ACTIVECAMPAIGN_SENDER_EMAIL,
      replyTo: vars.ACTIVECAMPAIGN_REPLY_TO,
    },
    timeoutMs: vars.ACTIVECAMPAIGN_TIMEOUT_MS,
    listsCacheTtlMs: vars.ACTIVECAMPAIGN_LISTS_CACHE_TTL_MS,
  };
}
