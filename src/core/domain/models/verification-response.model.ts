import { PaymentStatus } from '../enums';

export interface PaymentCustomer {
  email?: string | null;
  name?: string | null;
  code?: string | null;
}

export interface VerificationResponseInit {
  reference: string;
  status: string;
  amount: number;
  currency: string;
  provider: string;
  paidAt?: string | null;
  channel?: string | null;
  cardType?: string | null;
  bank?: string | null;
  customer?: PaymentCustomer | null;
  metadata?: Record<string, unknown>;
}

/**
 * Provider verification result, status already normalized
 */
export class VerificationResponse {
  readonly reference: string;
  readonly status: string;
  readonly amount: number;
  readonly currency: string;
  readonly provider: string;
  readonly paidAt: string | null;
  readonly channel: string | null;
  readonly cardType: string | null;
  readonly bank: string | null;
  readonly customer: PaymentCustomer | null;
  readonly metadata: Record<string, unknown>;

  constructor(init: VerificationResponseInit) {
    this.reference = init.reference;
    this.status = init.status;
    this.amount = init.amount;
    this.currency = init.currency;
    this.provider = init.provider;
    this.paidAt = init.paidAt ?? null;
    this.channel = init.channel ?? null;
    this.cardType = init.cardType ?? null;
    this.bank = init.bank ?? null;
    this.customer = init.customer ?? null;
    this.metadata = { ...(init.metadata ?? {}) };
    Object.freeze(this);
  }

  isSuccessful(): boolean {
    return this.status === PaymentStatus.SUCCESS;
  }

  isFailed(): boolean {
    return this.status === PaymentStatus.FAILED;
  }

  isPending(): boolean {
    return this.status === PaymentStatus.PENDING;
  }
}
