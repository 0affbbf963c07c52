import 'reflect-metadata';
import { DataSource, DataSourceOptions } from 'typeorm';
import { config, isProd, resolveDbType } from '../config/config';

// Import entities explicitly to ensure metadata is registered (fixes runtime issues in scripts)
import { Installation } from '../entities/Installation';
import { Repository } from '../entities/Repository';
import { StoredCredential } from '../entities/StoredCredential';
import { WebhookRegistration } from '../entities/WebhookRegistration';
import { InitialSchemaMigration } from '../migrations/20240101000000-InitialMigration';
import { AddInstallationMigration } from '../migrations/20240101000001-AddInstallationMigration';

export const entities = [Installation, Repository, StoredCredential, WebhookRegistration];
export const migrations = [InitialSchemaMigration, AddInstallationMigration];

export const buildDataSourceOptions = (dbType: 'postgres' | 'sqlite' | 'sqlite:memory' = resolveDbType()): DataSourceOptions => {
  if (dbType === 'sqlite' || dbType === 'sqlite:memory') {
    // SQLite (better-sqlite3 driver) for dev/test; supports :memory:
    const isMemory = dbType === 'sqlite:memory';
    return {
      type: 'better-sqlite3',
      database: isMemory ? ':memory:' : (config.DB_DATABASE || './data.sqlite'),
      synchronize: true, // Auto-create tables (dev only)
      logging: config.LOG_LEVEL === 'debug',
      entities,
    };
  }
  // Postgres (forced in prod); schema comes from migrations there
  return {
    type: 'postgres',
    host: config.DB_HOST,
    port: config.DB_PORT,
    username: config.DB_USER,
    password: config.DB_PASSWORD,
    database: config.DB_DATABASE,
    synchronize: !isProd(),
    migrationsRun: isProd(),
    logging: config.LOG_LEVEL === 'debug',
    entities,
    migrations,
  };
};

export const AppDataSource = new DataSource(buildDataSourceOptions());
