import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { loadConfig, loadDotenv, ConfigError, type AppConfig } from './lib/env.js';
import { createDb, migrateDb } from './lib/db.js';
import { createLogger } from './lib/logger.js';
import { createIngestRepository } from './domains/ingest/ingest.repository.js';
import { runIngest } from './domains/ingest/ingest.service.js';

const DEFAULT_CSV_FILE = 'sample_prices_ny.csv';

async function main(): Promise<void> {
  loadDotenv();

  let config: Readonly<AppConfig>;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error('Invalid environment variables:', err.fieldErrors);
    }
    throw err;
  }

  const logger = createLogger(config.logLevel, 'ingest');
  const filePath = path.resolve(process.argv[2] ?? DEFAULT_CSV_FILE);
  const database = createDb(config, logger);

  try {
    await migrateDb(database.db);
    await runIngest(
      {
        repo: createIngestRepository(database.db),
        readFile: (file) => readFile(file),
        random: Math.random,
        logger,
      },
      filePath,
    );
  } catch (err) {
    logger.error({ err, filePath }, 'Ingestion failed');
    process.exitCode = 1;
  } finally {
    await database.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
