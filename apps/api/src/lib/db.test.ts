import { describe, it, expect, vi } from 'vitest';
import { readMigrationFiles } from 'drizzle-orm/migrator';
import { createQueryLogger, MIGRATIONS_FOLDER } from './db.js';

describe('createQueryLogger', () => {
  it('writes each statement and its parameters at debug level', () => {
    const debug = vi.fn();
    const logger = createQueryLogger({ debug });

    logger.logQuery('select * from "hospitals" where "provider_state" = $1', ['NY']);

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith(
      { query: 'select * from "hospitals" where "provider_state" = $1', params: ['NY'] },
      'SQL query',
    );
  });
});

describe('migrations', () => {
  const migrations = readMigrationFiles({ migrationsFolder: MIGRATIONS_FOLDER });

  it('ships a single initial migration', () => {
    expect(migrations).toHaveLength(1);
    expect(migrations[0]?.bps).toBe(true);
  });

  it('creates the three pricing tables before their indexes', () => {
    const statements = migrations[0]?.sql ?? [];

    expect(statements).toHaveLength(12);
    expect(statements[0]).toContain('CREATE TABLE IF NOT EXISTS "hospitals"');
    expect(statements[1]).toContain('CREATE TABLE IF NOT EXISTS "procedures"');
    expect(statements[2]).toContain('CREATE TABLE IF NOT EXISTS "ratings"');
    expect(statements.slice(3).every((s) => s.trim().startsWith('CREATE INDEX IF NOT EXISTS'))).toBe(true);
  });

  it('references hospitals from procedures and ratings', () => {
    const statements = migrations[0]?.sql ?? [];

    expect(statements[1]).toContain('REFERENCES "hospitals"("provider_id")');
    expect(statements[2]).toContain('REFERENCES "hospitals"("provider_id")');
  });
});
