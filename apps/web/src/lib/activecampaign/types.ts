/**
 * ActiveCampaign push domain types
 */

import type { PushErrorKind } from './errors';

/** Numeric campaign status codes as the provider stores them */
export const CampaignStatus = {
  DRAFT: 0,
  SCHEDULED: 1,
  SENDING: 2,
  PAUSED: 3,
  STOPPED: 4,
  COMPLETED: 5,
} as const;

export type CampaignStatusName = keyof typeof CampaignStatus;

function isCampaignStatusName(name: string): name is CampaignStatusName {
  return name in CampaignStatus;
}

export function campaignStatusName(code: number): CampaignStatusName | undefined {
  return Object.keys(CampaignStatus)
    .filter(isCampaignStatusName)
    .find((name) => CampaignStatus[name] === code);
}

export interface SubscriberList {
  id: string;
  name: string;
  subscriberCount: number;
}

export interface MailingAddress {
  id: string;
  companyName: string;
  display: string;
}

export interface MessageHandle {
  id: string;
}

export interface CampaignHandle {
  id: string;
  status: CampaignStatusName;
}

export interface CampaignMessageLink {
  id: string;
  campaignId: string;
  messageId: string;
}

/**
 * immediate: send now (status COMPLETED)
 * scheduled: status SCHEDULED with a send date
 * draft: stop once the message is linked
 */
export type DeliveryMode = 'immediate' | 'scheduled' | 'draft';

export interface PushRequest {
  listId: string;
  campaignName: string;
  subject: string;
  htmlContent: string;
  senderName: string;
  senderEmail: string;
  replyTo?: string;
  textContent?: string;
  addressId?: string;
  deliveryMode?: DeliveryMode;
  /** ISO date-time, required for scheduled delivery */
  scheduledDate?: string;
}

/** PushRequest after validation: defaults applied, date parsed */
export interface ValidatedPushRequest {
  listId: string;
  campaignName: string;
  subject: string;
  htmlContent: string;
  senderName: string;
  senderEmail: string;
  replyTo: string;
  textContent?: string;
  addressId?: string;
  deliveryMode: DeliveryMode;
  /** Provider send date, YYYY-MM-DD HH:mm:ss as stated in the request */
  scheduledDate?: string;
}

export type PushStep = 'INIT' | 'MESSAGE_CREATED' | 'CAMPAIGN_CREATED' | 'LINKED' | 'SENT';

export type CompletedStep = Exclude<PushStep, 'SENT'>;

/** Remote objects a failed push left behind */
export interface OrphanedHandles {
  messageId?: string;
  campaignId?: string;
}

export interface PushSuccess {
  success: true;
  campaignId: string;
  messageId: string;
  deliveryMode: DeliveryMode;
  message: string;
}

export interface PushFailure {
  success: false;
  errorKind: PushErrorKind;
  message: string;
  lastCompletedStep: CompletedStep;
  /** Provider call in flight when the push failed; `validate` and `cancel` are the local checkpoints before the first call */
  failedOperation: PushOperation;
  orphanedHandles: OrphanedHandles;
  deliveryMode?: DeliveryMode;
  missingFields?: string[];
  invalidFields?: string[];
}

export type PushResult = PushSuccess | PushFailure;

export type PushOperation =
  | 'validate'
  | 'cancel'
  | 'createMessage'
  | 'createCampaign'
  | 'linkMessageToCampaign'
  | 'setCampaignStatus';
