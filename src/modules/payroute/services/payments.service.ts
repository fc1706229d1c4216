import { Injectable, Inject, Logger } from '@nestjs/common';
import type {
  ChargeRequest,
  ChargeRequestInput,
  ChargeResponse,
  EventDispatcher,
  EventHandler,
  EventSubscription,
  PaymentDriver,
  PaymentOrchestrator,
  PaymentTransaction,
  ProviderHealth,
  TransactionStore,
  VerificationResponse,
} from '../../../core';
import { EVENT_DISPATCHER, PAYMENT_ORCHESTRATOR, TRANSACTION_STORE } from '../constants';

/**
 * PaymentsService
 *
 * Application-facing entry point: charge, verify, look up and subscribe
 */
@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);

  constructor(
    @Inject(PAYMENT_ORCHESTRATOR)
    private readonly orchestrator: PaymentOrchestrator,
    @Inject(TRANSACTION_STORE)
    private readonly store: TransactionStore,
    @Inject(EVENT_DISPATCHER)
    private readonly eventDispatcher: EventDispatcher,
  ) {}

  /**
   * Charge through the default provider, falling back when it fails.
   * Pass `providers` to walk an explicit chain instead.
   */
  async charge(
    request: ChargeRequest | ChargeRequestInput,
    providers?: string[],
  ): Promise<ChargeResponse> {
    return this.orchestrator.charge(request, providers);
  }

  async verify(reference: string, provider?: string): Promise<VerificationResponse> {
    return this.orchestrator.verify(reference, provider);
  }

  /**
   * Recorded transaction for a reference
   */
  async getTransaction(reference: string): Promise<PaymentTransaction | null> {
    return this.store.findByReference(reference);
  }

  driver(name?: string): PaymentDriver {
    return this.orchestrator.driver(name);
  }

  getEnabledProviders(): string[] {
    return this.orchestrator.getEnabledProviders();
  }

  async checkHealth(): Promise<Record<string, ProviderHealth>> {
    return this.orchestrator.checkHealth();
  }

  /**
   * Subscribe to a payment event, e.g. PaymentEventType.WEBHOOK_RECEIVED
   */
  on(eventType: string, handler: EventHandler): EventSubscription {
    this.logger.debug(`Handler subscribed to ${eventType}`);
    return this.eventDispatcher.on(eventType, handler);
  }
}
