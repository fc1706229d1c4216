import { Logger as NestLogger } from '@nestjs/common';
import { PaymentEventType, PaymentStatus, WebhookReceivedEvent } from '../domain/enums';
import {
  EventDispatcher,
  Logger,
  TransactionStore,
  UpdatePaymentTransactionDto,
} from '../interfaces';
import { PaymentOrchestrator } from '../services';
import { WebhookJob } from './webhook-queue';

export const IGNORED_WEBHOOK_STATUS = 'ignored';

export interface WebhookProcessorOptions {
  /** Apply webhook outcomes to the transaction store */
  persistTransactions: boolean;
}

export interface WebhookProcessingResult {
  reference: string | null;
  status: string;
  /** False when the delivery repeated a state already recorded */
  dispatched: boolean;
}

/**
 * Applies an authenticated webhook: extract, normalize, update the
 * transaction under its row lock, then announce the delivery.
 * Store errors propagate so the queue retries the job.
 */
export class WebhookProcessor {
  private readonly logger: Logger;

  constructor(
    private readonly orchestrator: PaymentOrchestrator,
    private readonly store: TransactionStore,
    private readonly eventDispatcher: EventDispatcher,
    private readonly options: WebhookProcessorOptions,
    logger?: Logger,
  ) {
    this.logger = logger ?? new NestLogger(WebhookProcessor.name);
  }

  async handle(job: WebhookJob): Promise<WebhookProcessingResult> {
    const driver = this.orchestrator.driver(job.provider);

    if (driver.isActionableWebhook && !driver.isActionableWebhook(job.payload)) {
      this.logger.debug(`Ignoring non-actionable ${job.provider} webhook`);
      return { reference: null, status: IGNORED_WEBHOOK_STATUS, dispatched: false };
    }

    const payload = driver.resolveWebhookPayload
      ? await driver.resolveWebhookPayload(job.payload)
      : job.payload;

    const reference = driver.extractWebhookReference(payload);
    const channel = driver.extractWebhookChannel(payload);
    const status = this.orchestrator.statusNormalizer.normalize(
      driver.extractWebhookStatus(payload),
      job.provider,
    );

    if (reference && this.options.persistTransactions) {
      const { transaction, changed } = await this.store.updateWithLock(reference, (current) => {
        const fields: UpdatePaymentTransactionDto = {};
        if (current.status !== status) {
          fields.status = status;
        }
        if (channel && current.channel !== channel) {
          fields.channel = channel;
        }
        if (status === PaymentStatus.SUCCESS && !current.paidAt) {
          fields.paidAt = new Date().toISOString();
        }
        return Object.keys(fields).length > 0 ? fields : null;
      });

      if (transaction && !changed) {
        this.logger.debug(`Duplicate ${job.provider} webhook for ${reference} (${status}); skipped`);
        return { reference, status, dispatched: false };
      }
      if (!transaction) {
        this.logger.warn(`${job.provider} webhook for untracked reference ${reference}`);
      }
    }

    const event: WebhookReceivedEvent = {
      provider: job.provider,
      reference,
      status,
      channel,
      payload,
    };
    await this.eventDispatcher.dispatch(PaymentEventType.WEBHOOK_RECEIVED, event);

    this.logger.log(`Processed ${job.provider} webhook for ${reference ?? 'unknown reference'}: ${status}`);
    return { reference, status, dispatched: true };
  }
}
