import { CamelCasePlugin, Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { Database } from '../db/schema.js';

// numeric columns come back as strings; money is converted at the store boundary
let dbInstance: Kysely<Database> | null = null;

export function createDatabase(connectionString: string): Kysely<Database> {
  if (dbInstance) return dbInstance;

  const pool = new pg.Pool({ connectionString, max: 10 });

  dbInstance = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
    plugins: [new CamelCasePlugin()],
  });

  return dbInstance;
}

export async function closeDatabase(): Promise<void> {
  if (!dbInstance) return;
  await dbInstance.destroy();
  dbInstance = null;
}
