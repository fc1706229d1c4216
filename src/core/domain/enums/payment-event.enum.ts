import { WebhookPayload } from '../../interfaces/common.types';

/**
 * Domain events emitted by the payment core
 */
export enum PaymentEventType {
  WEBHOOK_RECEIVED = 'payment.webhook.received',
}

/**
 * Payload of PaymentEventType.WEBHOOK_RECEIVED
 */
export interface WebhookReceivedEvent {
  provider: string;
  reference: string | null;
  status: string;
  channel: string | null;
  payload: WebhookPayload;
}
