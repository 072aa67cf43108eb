import { Clock } from '../domain-types';
import {
  Application,
  Award,
  Borrower,
  Lender,
  Message,
  MessageType,
  Recipient,
} from '../domain/application/application-types';
import { describeError, DispatchError } from '../errors';
import { NotificationRecipient, NotificationSender, TemplateVariables } from '../notifications/notification-sender';
import { buildTemplateVariables } from '../notifications/template-variables';
import { StoreTransaction } from '../store/lifecycle-store';
import { withTimeout } from '../utils/timeout';

export interface DispatchRequest {
  application: Application;
  messageType: MessageType;
  recipient: Recipient;
  body?: string;
  award?: Award | null;
  borrower?: Borrower | null;
  lender?: Lender | null;
  extraVariables?: TemplateVariables;
}

export interface DispatcherOptions {
  timeoutMs: number;
  frontendUrl: string;
  adminEmailGroup: string;
}

/**
 * Sends one notification and records its Message inside the caller's
 * transaction. A failed or timed-out send raises DispatchError so the
 * enclosing unit of work rolls back.
 */
export class NotificationDispatcher {
  constructor(
    private sender: NotificationSender,
    private options: DispatcherOptions,
    private clock: Clock
  ) {}

  async dispatch(tx: StoreTransaction, request: DispatchRequest): Promise<Message> {
    const { application, messageType } = request;

    const award = request.award !== undefined ? request.award : await tx.getAward(application.awardId);
    const borrower = request.borrower !== undefined ? request.borrower : await tx.getBorrower(application.borrowerId);
    const lender =
      request.lender !== undefined
        ? request.lender
        : application.lenderId
          ? await tx.getLender(application.lenderId)
          : null;

    const to = this.resolveRecipient(request.recipient, application, borrower, lender);
    const variables: TemplateVariables = {
      ...buildTemplateVariables({
        frontendUrl: this.options.frontendUrl,
        application,
        award,
        borrower,
        lender,
        body: request.body,
      }),
      ...request.extraVariables,
    };

    let externalMessageId: string;
    try {
      externalMessageId = await withTimeout(
        this.sender.send(messageType, to, variables),
        this.options.timeoutMs,
        `notification ${messageType}`
      );
    } catch (error) {
      throw new DispatchError(`Failed to send ${messageType}: ${describeError(error)}`, {
        applicationId: application.id,
        messageType,
      });
    }

    return tx.insertMessage({
      applicationId: application.id,
      type: messageType,
      externalMessageId,
      body: request.body ?? '',
      lenderId: lender?.id ?? null,
      createdAt: this.clock(),
    });
  }

  private resolveRecipient(
    recipient: Recipient,
    application: Application,
    borrower: Borrower | null,
    lender: Lender | null
  ): NotificationRecipient {
    switch (recipient) {
      case 'BORROWER': {
        const email = application.primaryEmail || borrower?.email || '';
        if (!email) {
          throw new DispatchError('Borrower has no email address', { applicationId: application.id });
        }
        return { email, name: borrower?.legalName };
      }
      case 'LENDER':
        if (!lender) {
          throw new DispatchError('Application has no lender to notify', { applicationId: application.id });
        }
        return { email: lender.emailGroup, name: lender.name };
      case 'ADMIN':
        return { email: this.options.adminEmailGroup };
    }
  }
}
