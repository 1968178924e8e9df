import 'reflect-metadata';
import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { User } from './entities/user.entity';
import { Session } from './entities/session.entity';

/**
 * Load env vars from the project root .env file.
 * Supports both running from libs/database/ and from project root.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../.env') });

/**
 * TypeORM DataSource configuration for CLI-driven migrations.
 *
 * Used by `typeorm migration:run` and `typeorm migration:revert`.
 * Reads database credentials from environment variables with dev
 * defaults. In production, these MUST be overridden.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'warden',
  password: process.env['POSTGRES_PASSWORD'] || 'warden_secret',
  database: process.env['POSTGRES_DB'] || 'warden',
  entities: [User, Session],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
