import axios, { AxiosInstance } from 'axios';
import crypto from 'crypto';
import { z } from 'zod';
import { MessageType } from '../domain/application/application-types';

export interface NotificationRecipient {
  email: string;
  name?: string;
}

export type TemplateVariables = Record<string, string>;

/**
 * Outbound notification transport. Returns the transport's message id, which
 * is recorded on the Message audit row.
 */
export interface NotificationSender {
  send(templateKind: MessageType, recipient: NotificationRecipient, variables: TemplateVariables): Promise<string>;
}

/**
 * Used when no relay is configured: logs the message and returns a local id.
 */
export class ConsoleNotificationSender implements NotificationSender {
  async send(templateKind: MessageType, recipient: NotificationRecipient, variables: TemplateVariables): Promise<string> {
    const messageId = `local-${crypto.randomUUID()}`;
    console.log('[Notification]', { messageId, templateKind, to: recipient.email, variables });
    return messageId;
  }
}

const relayResponseSchema = z.object({
  messageId: z.string().min(1),
});

/**
 * Posts each notification to an HTTP relay that renders templates and owns
 * delivery.
 */
export class RelayNotificationSender implements NotificationSender {
  private http: AxiosInstance;

  constructor(relayUrl: string, timeoutMs: number, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL: relayUrl, timeout: timeoutMs });
  }

  async send(templateKind: MessageType, recipient: NotificationRecipient, variables: TemplateVariables): Promise<string> {
    const response = await this.http.post('/messages', {
      template: templateKind,
      to: recipient,
      variables,
    });
    return relayResponseSchema.parse(response.data).messageId;
  }
}
