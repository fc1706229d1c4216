import { Logger as NestLogger } from '@nestjs/common';
import { errorMessage } from '../errors';
import { Logger, WebhookPayload } from '../interfaces';

/**
 * An authenticated webhook delivery waiting to be processed
 */
export interface WebhookJob {
  provider: string;
  payload: WebhookPayload;
  receivedAt: Date;
  /** 1 on the first run */
  attempt: number;
}

export type WebhookJobInput = Pick<WebhookJob, 'provider' | 'payload'> & { receivedAt?: Date };

export type WebhookJobHandler = (job: WebhookJob) => Promise<unknown>;

/**
 * Hands authenticated deliveries to background processing
 */
export interface WebhookQueue {
  enqueue(job: WebhookJobInput): Promise<void>;
}

export interface WebhookQueueOptions {
  maxAttempts?: number;
  backoffMs?: number;
  logger?: Logger;
}

export const DEFAULT_WEBHOOK_MAX_ATTEMPTS = 3;
export const DEFAULT_WEBHOOK_BACKOFF_MS = 60_000;

/**
 * In-process webhook worker
 *
 * Jobs run on a timer, off the request that enqueued them. A failing job
 * is re-scheduled after `backoffMs` until `maxAttempts` is reached, then
 * logged and dropped.
 */
export class InProcessWebhookQueue implements WebhookQueue {
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly running = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(
    private readonly handler: WebhookJobHandler,
    options: WebhookQueueOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_WEBHOOK_MAX_ATTEMPTS;
    this.backoffMs = options.backoffMs ?? DEFAULT_WEBHOOK_BACKOFF_MS;
    this.logger = options.logger ?? new NestLogger(InProcessWebhookQueue.name);
  }

  async enqueue(job: WebhookJobInput): Promise<void> {
    if (this.stopped) {
      throw new Error('Webhook queue is stopped');
    }

    this.schedule(
      {
        provider: job.provider,
        payload: job.payload,
        receivedAt: job.receivedAt ?? new Date(),
        attempt: 1,
      },
      0,
    );
  }

  /**
   * Resolve once no job is running or scheduled
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Cancel scheduled retries, refuse new jobs and wait for running ones
   */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();

    await Promise.allSettled([...this.running]);
    this.notifyIfIdle();
  }

  get pending(): number {
    return this.timers.size + this.running.size;
  }

  private schedule(job: WebhookJob, delayMs: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      const run = this.run(job).finally(() => {
        this.running.delete(run);
        this.notifyIfIdle();
      });
      this.running.add(run);
    }, delayMs);
    this.timers.add(timer);
  }

  private async run(job: WebhookJob): Promise<void> {
    try {
      await this.handler(job);
      this.logger.debug(`Processed ${job.provider} webhook (attempt ${job.attempt})`);
    } catch (error) {
      if (job.attempt >= this.maxAttempts || this.stopped) {
        this.logger.error(
          `Giving up on ${job.provider} webhook after ${job.attempt} attempt(s): ${errorMessage(error)}`,
        );
        return;
      }

      this.logger.warn(
        `${job.provider} webhook failed (attempt ${job.attempt}/${this.maxAttempts}), retrying in ${this.backoffMs}ms: ${errorMessage(error)}`,
      );
      this.schedule({ ...job, attempt: job.attempt + 1 }, this.backoffMs);
    }
  }

  private isIdle(): boolean {
    return this.timers.size === 0 && this.running.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
