import {
  CreatePaymentTransactionDto,
  LockedMutation,
  LockedUpdateResult,
  PaymentTransaction,
  TransactionStore,
  UpdatePaymentTransactionDto,
} from '../../../core';
import { KeyedMutex } from '../keyed-mutex';

export interface MockStoreOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  /** Every operation rejects; isHealthy answers false */
  throwOnError?: boolean;
}

/**
 * In-memory transaction store for tests and single-process setups
 */
export class MockTransactionStore implements TransactionStore {
  private transactions: Map<string, PaymentTransaction> = new Map();
  private readonly locks = new KeyedMutex();
  private readonly options: Required<MockStoreOptions>;

  constructor(options: MockStoreOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      throwOnError: false,
      ...options,
    };
  }

  async create(dto: CreatePaymentTransactionDto): Promise<PaymentTransaction> {
    await this.beforeOperation('create');

    if (this.transactions.has(dto.reference)) {
      throw new Error(`Transaction already exists: ${dto.reference}`);
    }

    const now = new Date();
    const transaction: PaymentTransaction = {
      ...dto,
      metadata: { ...dto.metadata },
      customer: dto.customer ? { ...dto.customer } : null,
      createdAt: now,
      updatedAt: now,
    };
    this.transactions.set(dto.reference, transaction);
    return { ...transaction };
  }

  async findByReference(reference: string): Promise<PaymentTransaction | null> {
    await this.beforeOperation('findByReference');
    const transaction = this.transactions.get(reference);
    return transaction ? { ...transaction } : null;
  }

  async update(
    reference: string,
    fields: UpdatePaymentTransactionDto,
  ): Promise<PaymentTransaction | null> {
    await this.beforeOperation('update');
    return this.apply(reference, fields);
  }

  async updateWithLock(reference: string, mutate: LockedMutation): Promise<LockedUpdateResult> {
    await this.beforeOperation('updateWithLock');

    return this.locks.runExclusive(reference, async () => {
      const current = this.transactions.get(reference);
      if (!current) {
        return { transaction: null, changed: false };
      }

      // latency inside the critical section widens the race window in tests
      await this.simulateLatency();

      const fields = mutate({ ...current });
      if (!fields) {
        return { transaction: { ...current }, changed: false };
      }
      return { transaction: this.apply(reference, fields), changed: true };
    });
  }

  async isHealthy(): Promise<boolean> {
    await this.simulateLatency();
    return !this.options.throwOnError;
  }

  /**
   * Reset all stored data
   */
  clear(): void {
    this.transactions.clear();
  }

  get size(): number {
    return this.transactions.size;
  }

  private apply(reference: string, fields: UpdatePaymentTransactionDto): PaymentTransaction | null {
    const current = this.transactions.get(reference);
    if (!current) {
      return null;
    }

    const updated: PaymentTransaction = { ...current, ...fields, updatedAt: new Date() };
    this.transactions.set(reference, updated);
    return { ...updated };
  }

  private async beforeOperation(operation: string): Promise<void> {
    await this.simulateLatency();
    if (this.options.throwOnError) {
      throw new Error(`Mock store failure: ${operation}`);
    }
  }

  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs));
    }
  }
}
