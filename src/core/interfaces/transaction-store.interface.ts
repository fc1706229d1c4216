/**
 * Persisted payment transaction
 */
export interface PaymentTransaction {
  reference: string;
  provider: string;
  /** Provider-issued session/order/payment id, when one exists */
  providerId: string | null;
  status: string;
  amount: number;
  currency: string;
  email: string | null;
  channel: string | null;
  paidAt: string | null;
  metadata: Record<string, unknown>;
  customer: Record<string, unknown> | null;
  createdAt: Date;
  updatedAt: Date;
}

export type CreatePaymentTransactionDto = Omit<PaymentTransaction, 'createdAt' | 'updatedAt'>;

export type UpdatePaymentTransactionDto = Partial<
  Pick<PaymentTransaction, 'status' | 'channel' | 'paidAt' | 'providerId' | 'metadata'>
>;

/**
 * Mutation applied while the reference row is locked.
 * Return null to leave the row untouched.
 */
export type LockedMutation = (
  current: PaymentTransaction,
) => UpdatePaymentTransactionDto | null;

export interface LockedUpdateResult {
  /** Row after the mutation, null when the reference is unknown */
  transaction: PaymentTransaction | null;
  /** Whether the mutation wrote anything */
  changed: boolean;
}

/**
 * Transaction store consumed by the orchestrator and the webhook processor
 */
export interface TransactionStore {
  create(dto: CreatePaymentTransactionDto): Promise<PaymentTransaction>;

  findByReference(reference: string): Promise<PaymentTransaction | null>;

  /**
   * Unlocked update, used by verify. Returns null for an unknown reference.
   */
  update(
    reference: string,
    fields: UpdatePaymentTransactionDto,
  ): Promise<PaymentTransaction | null>;

  /**
   * Read, mutate and write the reference row under an exclusive lock
   */
  updateWithLock(reference: string, mutate: LockedMutation): Promise<LockedUpdateResult>;

  isHealthy(): Promise<boolean>;
}
