import { DataSource, DataSourceOptions } from 'typeorm';
import { PaymentTransactionEntity } from './entities';

/**
 * Postgres DataSource options from DB_* environment variables
 */
export const createTypeORMConfig = (
  options: Partial<Pick<DataSourceOptions, 'synchronize' | 'logging'>> = {},
): DataSourceOptions => ({
  type: 'postgres',
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USERNAME || 'payments',
  password: process.env.DB_PASSWORD || 'payments',
  database: process.env.DB_NAME || 'payments',
  entities: [PaymentTransactionEntity],
  synchronize: process.env.NODE_ENV === 'development',
  logging: process.env.DB_LOGGING === 'true',
  extra: {
    max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  },
  ...options,
});

export const createDataSource = (
  options?: Partial<Pick<DataSourceOptions, 'synchronize' | 'logging'>>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
