/**
 * Push Orchestrator
 * Turns one newsletter into a delivered campaign:
 * INIT -> MESSAGE_CREATED -> CAMPAIGN_CREATED -> LINKED -> SENT, or FAILED with the
 * last completed step and every remote id created so far.
 */

import { randomUUID } from 'crypto';
import { withCorrelationId, serializeError, type Logger } from '../observability/logger';
import { ProviderClientError, type PushErrorKind, type ValidationError } from './errors';
import type { ActiveCampaignClient } from './client';
import { validate, type PushRequestInput } from './validator';
import type {
  CompletedStep,
  DeliveryMode,
  OrphanedHandles,
  PushFailure,
  PushOperation,
  PushResult,
  PushStep,
  ValidatedPushRequest,
} from './types';

/** The provider calls a push makes */
export type PushProvider = Pick<
  ActiveCampaignClient,
  'createMessage' | 'createCampaign' | 'linkMessageToCampaign' | 'listCampaignMessageLinks' | 'setCampaignStatus'
>;

export interface PushOptions {
  /** Honoured only until the first provider call */
  signal?: AbortSignal;
}

export interface PushOrchestratorOptions {
  newPushId?: () => string;
  now?: () => Date;
}

export class IllegalTransitionError extends Error {
  constructor(from: PushStep | 'FAILED', action: string) {
    super(`Cannot ${action} from state ${from}`);
    this.name = 'IllegalTransitionError';
  }
}

/** Provider call that moves the machine out of each non-terminal step */
const NEXT_OPERATION: Record<CompletedStep, PushOperation> = {
  INIT: 'createMessage',
  MESSAGE_CREATED: 'createCampaign',
  CAMPAIGN_CREATED: 'linkMessageToCampaign',
  LINKED: 'setCampaignStatus',
};

/**
 * State of a single push attempt.
 * Each transition checks the current step, so the send can never precede the link.
 */
export class PushStateMachine {
  private current: PushStep | 'FAILED' = 'INIT';
  private lastCompleted: CompletedStep = 'INIT';
  private messageHandleId?: string;
  private campaignHandleId?: string;

  /** Set when resuming a push whose link step may have partially happened */
  readonly verifyExistingLink: boolean;

  constructor(resumeFrom?: { step: CompletedStep; handles: OrphanedHandles }) {
    this.verifyExistingLink = resumeFrom?.step === 'CAMPAIGN_CREATED';

    if (!resumeFrom) {
      return;
    }

    const { step, handles } = resumeFrom;
    const needsMessage = step !== 'INIT';
    const needsCampaign = step === 'CAMPAIGN_CREATED' || step === 'LINKED';

    if ((needsMessage && !handles.messageId) || (needsCampaign && !handles.campaignId)) {
      throw new IllegalTransitionError(step, 'resume without the recorded handles');
    }

    this.current = step;
    this.lastCompleted = step;
    this.messageHandleId = handles.messageId;
    this.campaignHandleId = handles.campaignId;
  }

  get step(): PushStep | 'FAILED' {
    return this.current;
  }

  get lastCompletedStep(): CompletedStep {
    return this.lastCompleted;
  }

  /** Remote ids created so far; absent ids are omitted */
  get handles(): OrphanedHandles {
    const handles: OrphanedHandles = {};
    if (this.messageHandleId) {
      handles.messageId = this.messageHandleId;
    }
    if (this.campaignHandleId) {
      handles.campaignId = this.campaignHandleId;
    }
    return handles;
  }

  get messageId(): string {
    if (!this.messageHandleId) {
      throw new IllegalTransitionError(this.current, 'read message id');
    }
    return this.messageHandleId;
  }

  get campaignId(): string {
    if (!this.campaignHandleId) {
      throw new IllegalTransitionError(this.current, 'read campaign id');
    }
    return this.campaignHandleId;
  }

  get nextOperation(): PushOperation {
    return NEXT_OPERATION[this.lastCompleted];
  }

  messageCreated(messageId: string): void {
    this.advance('INIT', 'MESSAGE_CREATED', 'record message');
    this.messageHandleId = messageId;
  }

  campaignCreated(campaignId: string): void {
    this.advance('MESSAGE_CREATED', 'CAMPAIGN_CREATED', 'record campaign');
    this.campaignHandleId = campaignId;
  }

  linked(): void {
    this.advance('CAMPAIGN_CREATED', 'LINKED', 'record link');
  }

  delivered(): void {
    this.advance('LINKED', 'SENT', 'record delivery');
  }

  fail(): void {
    if (this.current === 'SENT' || this.current === 'FAILED') {
      throw new IllegalTransitionError(this.current, 'fail');
    }
    this.current = 'FAILED';
  }

  private advance(from: CompletedStep, to: PushStep, action: string): void {
    if (this.current !== from) {
      throw new IllegalTransitionError(this.current, action);
    }
    this.current = to;
    if (to !== 'SENT') {
      this.lastCompleted = to;
    }
  }
}

/** Failure for a request rejected before any provider call; earlier remote objects stay reported */
function rejected(
  error: ValidationError,
  lastCompletedStep: CompletedStep,
  orphanedHandles: OrphanedHandles
): PushFailure {
  return {
    success: false,
    errorKind: 'ValidationError',
    message: error.message,
    lastCompletedStep,
    failedOperation: 'validate',
    orphanedHandles,
    missingFields: error.missingFields,
    invalidFields: error.invalidFields,
  };
}

const SUCCESS_MESSAGES: Record<DeliveryMode, string> = {
  immediate: 'Campaign sent successfully',
  scheduled: 'Campaign scheduled successfully',
  draft: 'Campaign draft created successfully',
};

export class PushOrchestrator {
  private readonly newPushId: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly provider: PushProvider,
    options: PushOrchestratorOptions = {}
  ) {
    this.newPushId = options.newPushId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate and push a newsletter. Never throws; every outcome is a PushResult.
   */
  async push(input: PushRequestInput, options: PushOptions = {}): Promise<PushResult> {
    const log = withCorrelationId(this.newPushId());
    const validation = validate(input, this.now());

    if (!validation.ok) {
      const { error } = validation;
      log.warn('Push request rejected', {
        missingFields: error.missingFields,
        invalidFields: error.invalidFields,
      });
      return rejected(error, 'INIT', {});
    }

    const request = validation.request;

    if (options.signal?.aborted) {
      log.info('Push cancelled before any provider call', { listId: request.listId });
      return {
        success: false,
        errorKind: 'Cancelled',
        message: 'Push cancelled before any remote object was created',
        lastCompletedStep: 'INIT',
        failedOperation: 'cancel',
        orphanedHandles: {},
        deliveryMode: request.deliveryMode,
      };
    }

    log.info('Starting newsletter push', {
      listId: request.listId,
      campaignName: request.campaignName,
      deliveryMode: request.deliveryMode,
    });

    return this.run(new PushStateMachine(), request, log);
  }

  /**
   * Continue a failed push from its last completed step, reusing the recorded ids.
   * A push that failed before creating anything is not resumable; push it again instead.
   */
  async resume(failure: PushFailure, input: PushRequestInput): Promise<PushResult> {
    const log = withCorrelationId(this.newPushId());
    const validation = validate(input, this.now());

    if (!validation.ok) {
      log.warn('Resume request rejected', {
        missingFields: validation.error.missingFields,
        invalidFields: validation.error.invalidFields,
      });
      return {
        ...rejected(validation.error, failure.lastCompletedStep, failure.orphanedHandles),
        deliveryMode: failure.deliveryMode,
      };
    }

    if (failure.lastCompletedStep === 'INIT') {
      return {
        ...failure,
        errorKind: 'InternalError',
        message: 'Nothing was created remotely; push the newsletter again instead of resuming',
      };
    }

    let machine: PushStateMachine;
    try {
      machine = new PushStateMachine({
        step: failure.lastCompletedStep,
        handles: failure.orphanedHandles,
      });
    } catch (error) {
      return {
        ...failure,
        errorKind: 'InternalError',
        message: error instanceof Error ? error.message : String(error),
      };
    }

    log.info('Resuming newsletter push', {
      fromStep: failure.lastCompletedStep,
      ...failure.orphanedHandles,
    });

    return this.run(machine, validation.request, log);
  }

  private async run(
    machine: PushStateMachine,
    request: ValidatedPushRequest,
    log: Logger
  ): Promise<PushResult> {
    try {
      while (machine.step !== 'SENT') {
        await this.advance(machine, request, log);
      }
    } catch (error) {
      return this.failed(machine, request, error, log);
    }

    log.info('Newsletter push completed', {
      campaignId: machine.campaignId,
      messageId: machine.messageId,
      deliveryMode: request.deliveryMode,
    });

    return {
      success: true,
      campaignId: machine.campaignId,
      messageId: machine.messageId,
      deliveryMode: request.deliveryMode,
      message: SUCCESS_MESSAGES[request.deliveryMode],
    };
  }

  private async advance(
    machine: PushStateMachine,
    request: ValidatedPushRequest,
    log: Logger
  ): Promise<void> {
    switch (machine.step) {
      case 'INIT': {
        const message = await this.provider.createMessage({
          fromName: request.senderName,
          fromEmail: request.senderEmail,
          replyTo: request.replyTo,
          subject: request.subject,
          html: request.htmlContent,
          text: request.textContent,
        });
        machine.messageCreated(message.id);
        log.info('Message created', { messageId: message.id });
        return;
      }

      case 'MESSAGE_CREATED': {
        const campaign = await this.provider.createCampaign({
          name: request.campaignName,
          listId: request.listId,
          addressId: request.addressId,
        });
        machine.campaignCreated(campaign.id);
        log.info('Campaign created', { campaignId: campaign.id, status: campaign.status });
        return;
      }

      case 'CAMPAIGN_CREATED': {
        const { campaignId, messageId } = machine;
        if (machine.verifyExistingLink) {
          const links = await this.provider.listCampaignMessageLinks(campaignId);
          const existing = links.find((link) => link.messageId === messageId);
          if (existing) {
            machine.linked();
            log.info('Message already linked to campaign', { campaignId, messageId, linkId: existing.id });
            return;
          }
        }
        const linkId = await this.provider.linkMessageToCampaign(campaignId, messageId);
        machine.linked();
        log.info('Message linked to campaign', { campaignId, messageId, linkId });
        return;
      }

      case 'LINKED': {
        const { campaignId } = machine;
        if (request.deliveryMode === 'immediate') {
          await this.provider.setCampaignStatus(campaignId, 'COMPLETED');
        } else if (request.deliveryMode === 'scheduled') {
          await this.provider.setCampaignStatus(campaignId, 'SCHEDULED', request.scheduledDate);
        }
        machine.delivered();
        return;
      }

      default:
        throw new IllegalTransitionError(machine.step, 'advance');
    }
  }

  private failed(
    machine: PushStateMachine,
    request: ValidatedPushRequest,
    error: unknown,
    log: Logger
  ): PushFailure {
    const failedOperation = machine.nextOperation;
    const lastCompletedStep = machine.lastCompletedStep;
    const orphanedHandles = machine.handles;
    machine.fail();

    const errorKind: PushErrorKind =
      error instanceof ProviderClientError ? error.kind : 'InternalError';
    const message = error instanceof Error ? error.message : String(error);

    log.error('Newsletter push failed', {
      failedOperation,
      lastCompletedStep,
      errorKind,
      orphanedMessageId: orphanedHandles.messageId,
      orphanedCampaignId: orphanedHandles.campaignId,
      error: serializeError(error),
    });

    return {
      success: false,
      errorKind,
      message,
      lastCompletedStep,
      failedOperation,
      orphanedHandles,
      deliveryMode: request.deliveryMode,
    };
  }
}
