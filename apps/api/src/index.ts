import { loadConfig, loadDotenv, ConfigError, type AppConfig } from './lib/env.js';
import { createDb } from './lib/db.js';
import { createLogger } from './lib/logger.js';
import { buildApp } from './server.js';
import { createPricingRepository } from './domains/provider/provider.repository.js';
import { createLanguageModel } from './domains/ask/ask.llm.js';

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

  const logger = createLogger(config.logLevel);
  const database = createDb(config, logger);
  const model = createLanguageModel(config.llm);
  const app = buildApp(
    config,
    { repo: createPricingRepository(database.db), model },
    { logger },
  );

  if (!model.enabled) {
    app.log.warn(`Assistant language model is disabled: ${model.reason}`);
  }

  app.addHook('onClose', async () => {
    await database.close();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    logger.error({ err }, 'Server failed to start');
    await database.close();
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
