import { Kysely, Migration, MigrationProvider, Migrator } from 'kysely';
import * as initial from './migrations/001_initial.js';
import { Logger } from '../utils/logger.js';
import type { Database } from './schema.js';
import { env, createDatabase, closeDatabase } from '../config/index.js';

const logger = new Logger('Migrator');

class StaticMigrationProvider implements MigrationProvider {
  async getMigrations(): Promise<Record<string, Migration>> {
    return {
      '001_initial': initial,
    };
  }
}

export async function migrateToLatest(db: Kysely<Database>): Promise<void> {
  const migrator = new Migrator({ db, provider: new StaticMigrationProvider() });
  const { error, results } = await migrator.migrateToLatest();

  for (const result of results ?? []) {
    if (result.status === 'Success') {
      logger.info({ event: 'migration_applied', migration: result.migrationName });
    } else if (result.status === 'Error') {
      logger.error({ event: 'migration_failed', migration: result.migrationName });
    }
  }

  if (error) {
    throw error instanceof Error ? error : new Error(String(error));
  }
}

if (require.main === module) {
  void (async () => {
    const db = createDatabase(env.databaseUrl);
    try {
      await migrateToLatest(db);
      console.log('✅ Database schema is up to date');
    } catch (error) {
      console.error('❌ Migration failed:', error);
      process.exitCode = 1;
    } finally {
      await closeDatabase();
    }
  })();
}
