import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
  ValueTransformer,
} from 'typeorm';

// decimal columns come back as strings from pg
const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? 0 : Number(value)),
};

/**
 * TypeORM entity for a payment transaction.
 * Column types stay portable across postgres and sqlite.
 */
@Entity('payment_transactions')
@Index(['provider'])
@Index(['status'])
@Index(['createdAt'])
export class PaymentTransactionEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true, length: 100 })
  reference!: string;

  @Column({ length: 50 })
  provider!: string;

  @Column({ name: 'provider_id', type: 'varchar', length: 255, nullable: true })
  providerId!: string | null;

  @Column({ type: 'varchar', length: 32, default: 'pending' })
  status!: string;

  @Column({ type: 'decimal', precision: 15, scale: 2, transformer: decimalTransformer })
  amount!: number;

  @Column({ length: 3 })
  currency!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  channel!: string | null;

  @Column({ name: 'paid_at', type: 'varchar', length: 64, nullable: true })
  paidAt!: string | null;

  @Column({ type: 'simple-json' })
  metadata!: Record<string, unknown>;

  @Column({ type: 'simple-json', nullable: true })
  customer!: Record<string, unknown> | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
