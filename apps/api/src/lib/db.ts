import pg from 'pg';
import { fileURLToPath } from 'node:url';
import type { Logger as DrizzleLogger } from 'drizzle-orm';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import type { AppConfig } from './env.js';

export type Database = NodePgDatabase;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

export interface QueryLogSink {
  debug(data: Record<string, unknown>, msg: string): void;
}

export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle/migrations', import.meta.url));

/** Drizzle query logger writing to the application log at debug level. */
export function createQueryLogger(sink: QueryLogSink): DrizzleLogger {
  return {
    logQuery(query: string, params: unknown[]) {
      sink.debug({ query, params }, 'SQL query');
    },
  };
}

/**
 * Create the connection pool and Drizzle handle. The pool connects lazily,
 * so constructing it never touches the network. Statements are logged only
 * in debug mode.
 */
export function createDb(
  config: Pick<AppConfig, 'databaseUrl' | 'debug'>,
  log: QueryLogSink,
): DatabaseHandle {
  const pool = new pg.Pool({
    connectionString: config.databaseUrl,
    idleTimeoutMillis: 300_000,
  });

  const db = drizzle({
    client: pool,
    logger: config.debug ? createQueryLogger(log) : false,
  });

  return {
    db,
    async close() {
      await pool.end();
    },
  };
}

/** Apply pending migrations from `drizzle/migrations`. */
export async function migrateDb(db: Database): Promise<void> {
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
}
