/**
 * TypeORM transaction store (postgres in production)
 */
export { TypeORMTransactionStore } from './typeorm-transaction-store.adapter';
export { createDataSource, createTypeORMConfig } from './typeorm.config';
export * from './entities';
