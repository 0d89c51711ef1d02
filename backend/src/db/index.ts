import { fileURLToPath } from 'node:url';
import { knex, type Knex } from 'knex';
import { config } from '../config/index.js';
import { logger } from '../config/logger.js';

let db: Knex | null = null;

/** Shared Knex instance (PostgreSQL), created on first use. */
export function getDb(): Knex {
  if (!db) {
    db = knex({
      client: 'pg',
      connection: config.databaseUrl,
      pool: { min: 0, max: 5 },
    });
  }
  return db;
}

/** Run pending migrations. */
export async function initDb(): Promise<void> {
  const [batch, applied]: [number, string[]] = await getDb().migrate.latest({
    directory: fileURLToPath(new URL('./migrations', import.meta.url)),
    loadExtensions: ['.js', '.ts'],
  });
  logger.info(`Database ready (migration batch ${batch}, applied ${applied.length})`);
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
  }
}
