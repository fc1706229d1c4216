import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import type { InProcessWebhookQueue } from '../../../core';
import { WEBHOOK_QUEUE } from '../constants';

/**
 * Owns the in-process webhook queue's lifecycle
 */
@Injectable()
export class WebhookWorkerService implements OnModuleDestroy {
  private readonly logger = new Logger(WebhookWorkerService.name);

  constructor(
    @Inject(WEBHOOK_QUEUE)
    private readonly queue: InProcessWebhookQueue,
  ) {}

  get pending(): number {
    return this.queue.pending;
  }

  /**
   * Wait until every queued delivery has been processed or dropped
   */
  async drain(): Promise<void> {
    await this.queue.drain();
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log(`Stopping webhook worker (${this.queue.pending} pending)`);
    await this.queue.stop();
  }
}
