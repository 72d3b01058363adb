import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import type { AppConfig } from '../../config/app.config';
import { LEDGER_ENTITIES } from './entities';

/** Postgres when DATABASE_URL is set, otherwise a local SQLite file at DB_PATH. */
export function buildLedgerDataSourceOptions(config: AppConfig): TypeOrmModuleOptions {
  if (config.databaseUrl) {
    return {
      type: 'postgres',
      url: config.databaseUrl,
      entities: LEDGER_ENTITIES,
      synchronize: true,
      logging: ['error'],
    };
  }
  return {
    type: 'better-sqlite3',
    database: config.dbPath,
    entities: LEDGER_ENTITIES,
    synchronize: true,
    logging: ['error'],
  };
}
