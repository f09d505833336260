import 'dotenv/config';
import { DataSource, DataSourceOptions } from 'typeorm';
import * as migrations from './migrations';
import { ENTITIES } from './entities';

/**
 * TypeORM Data Source Configuration
 *
 * Used by the TypeORM CLI for migrations. Supports:
 * - DATABASE_URL (production)
 * - Individual connection params (local dev)
 *
 * Usage (after build):
 *   typeorm migration:run -d dist/services/api/src/data-source.js
 *   typeorm migration:revert -d dist/services/api/src/data-source.js
 */

const isProduction = process.env.NODE_ENV === 'production';
const databaseUrl = process.env.DATABASE_URL;

const shared = {
  type: 'postgres' as const,
  entities: ENTITIES,
  // Use explicit migrations from index to avoid duplicates
  migrations: Object.values(migrations),
  migrationsTableName: 'typeorm_migrations',
  logging: isProduction ? ['error' as const, 'migration' as const] : ['error' as const, 'warn' as const, 'migration' as const],
};

const config: DataSourceOptions = databaseUrl
  ? {
      ...shared,
      url: databaseUrl,
      ssl: { rejectUnauthorized: false },
    }
  : {
      ...shared,
      host: process.env.DATABASE_HOST || 'localhost',
      port: parseInt(process.env.DATABASE_PORT || '5432', 10),
      username: process.env.DATABASE_USER || 'courtside',
      password: process.env.DATABASE_PASSWORD || 'courtside_dev_password',
      database: process.env.DATABASE_NAME || 'courtside',
    };

// Export DataSource for CLI (single export required by TypeORM CLI)
const AppDataSource = new DataSource(config);

export default AppDataSource;
