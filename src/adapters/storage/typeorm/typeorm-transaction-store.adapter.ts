import { DataSource, EntityManager, Repository } from 'typeorm';
import {
  CreatePaymentTransactionDto,
  LockedMutation,
  LockedUpdateResult,
  PaymentTransaction,
  TransactionStore,
  UpdatePaymentTransactionDto,
} from '../../../core';
import { KeyedMutex } from '../keyed-mutex';
import { PaymentTransactionEntity } from './entities';

// drivers without SELECT ... FOR UPDATE; locked updates are serialized in process instead
const DRIVERS_WITHOUT_ROW_LOCKS = ['sqlite', 'better-sqlite3', 'sqljs', 'capacitor', 'expo'];

/**
 * TypeORM implementation of TransactionStore
 */
export class TypeORMTransactionStore implements TransactionStore {
  private transactionRepo: Repository<PaymentTransactionEntity>;
  private readonly localLocks = new KeyedMutex();
  private readonly rowLocks: boolean;

  constructor(private readonly dataSource: DataSource) {
    this.transactionRepo = dataSource.getRepository(PaymentTransactionEntity);
    this.rowLocks = !DRIVERS_WITHOUT_ROW_LOCKS.includes(dataSource.options.type);
  }

  async create(dto: CreatePaymentTransactionDto): Promise<PaymentTransaction> {
    const entity = this.transactionRepo.create({
      reference: dto.reference,
      provider: dto.provider,
      providerId: dto.providerId,
      status: dto.status,
      amount: dto.amount,
      currency: dto.currency,
      email: dto.email,
      channel: dto.channel,
      paidAt: dto.paidAt,
      metadata: dto.metadata,
      customer: dto.customer,
    });

    const saved = await this.transactionRepo.save(entity);
    return this.toDomain(saved);
  }

  async findByReference(reference: string): Promise<PaymentTransaction | null> {
    const entity = await this.transactionRepo.findOne({ where: { reference } });
    return entity ? this.toDomain(entity) : null;
  }

  async update(
    reference: string,
    fields: UpdatePaymentTransactionDto,
  ): Promise<PaymentTransaction | null> {
    const entity = await this.transactionRepo.findOne({ where: { reference } });
    if (!entity) {
      return null;
    }

    this.transactionRepo.merge(entity, fields);
    const saved = await this.transactionRepo.save(entity);
    return this.toDomain(saved);
  }

  async updateWithLock(reference: string, mutate: LockedMutation): Promise<LockedUpdateResult> {
    if (this.rowLocks) {
      return this.lockedUpdate(reference, mutate);
    }
    // one connection: transactions may not interleave, whatever the reference
    return this.localLocks.runExclusive('*', () => this.lockedUpdate(reference, mutate));
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private async lockedUpdate(reference: string, mutate: LockedMutation): Promise<LockedUpdateResult> {
    return this.withTransaction(async (manager) => {
      const entity = await manager.findOne(PaymentTransactionEntity, {
        where: { reference },
        ...(this.rowLocks ? { lock: { mode: 'pessimistic_write' as const } } : {}),
      });

      if (!entity) {
        return { transaction: null, changed: false };
      }

      const fields = mutate(this.toDomain(entity));
      if (!fields) {
        return { transaction: this.toDomain(entity), changed: false };
      }

      manager.merge(PaymentTransactionEntity, entity, fields);
      const saved = await manager.save(entity);
      return { transaction: this.toDomain(saved), changed: true };
    });
  }

  private async withTransaction<T>(callback: (manager: EntityManager) => Promise<T>): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await callback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  private toDomain(entity: PaymentTransactionEntity): PaymentTransaction {
    return {
      reference: entity.reference,
      provider: entity.provider,
      providerId: entity.providerId,
      status: entity.status,
      amount: entity.amount,
      currency: entity.currency,
      email: entity.email,
      channel: entity.channel,
      paidAt: entity.paidAt,
      metadata: entity.metadata ?? {},
      customer: entity.customer,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
