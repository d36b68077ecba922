import 'reflect-metadata';
import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';
import { ENTITIES } from './entities';

/**
 * Load env vars from the project root .env file.
 * Supports both running from libs/database/ and from project root.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../.env') });

/**
 * TypeORM DataSource for CLI-driven migrations and the seed script.
 *
 * Used by:
 * - `typeorm migration:run`: applies pending migrations
 * - `typeorm migration:revert`: reverts the last applied migration
 * - `seeds/seed.ts`
 *
 * Credentials default to the local docker setup and must be overridden
 * in production.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'hairline',
  password: process.env['POSTGRES_PASSWORD'] || 'hairline_secret',
  database: process.env['POSTGRES_DB'] || 'hairline',
  entities: [...ENTITIES],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
