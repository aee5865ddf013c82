import { DataSource, DataSourceOptions } from 'typeorm';
import type { EnvConfig } from '../../../common/config/env.validation';
import { QUICK_COMMERCE_ENTITIES } from './entities';

export type DatabaseEnv = Pick<EnvConfig, 'DATABASE_URL' | 'DATABASE_SSL' | 'DATABASE_SYNCHRONIZE'>;

export function buildDataSourceOptions(env: DatabaseEnv): DataSourceOptions {
  return {
    type: 'postgres',
    url: env.DATABASE_URL,
    ssl: env.DATABASE_SSL ? { rejectUnauthorized: false } : false,
    entities: QUICK_COMMERCE_ENTITIES,
    synchronize: env.DATABASE_SYNCHRONIZE,
    logging: ['error'],
  };
}

/**
 * Standalone data source for scripts running outside the Nest container
 */
export function createDataSource(env: DatabaseEnv): DataSource {
  return new DataSource(buildDataSourceOptions(env));
}
