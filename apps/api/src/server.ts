import Fastify, { type FastifyBaseLogger } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { SERVICE_NAME, SERVICE_VERSION } from '@costnav/shared/constants/pricing.constants.js';
import type { AppConfig } from './lib/env.js';
import { createLogger } from './lib/logger.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { providerRoutes } from './domains/provider/provider.routes.js';
import { askRoutes } from './domains/ask/ask.routes.js';
import type { PricingRepository } from './domains/provider/provider.repository.js';
import type { LanguageModel } from './domains/ask/ask.llm.js';

export interface AppDeps {
  repo: Pick<PricingRepository, 'findPricedProcedures' | 'executeReadOnly'>;
  model: LanguageModel;
}

export interface BuildAppOptions {
  /** Defaults to a logger at `config.logLevel`. */
  logger?: FastifyBaseLogger;
  rateLimitMax?: number;
}

export function buildApp(
  config: Pick<AppConfig, 'appName' | 'corsOrigin' | 'logLevel'>,
  deps: AppDeps,
  opts: BuildAppOptions = {},
) {
  const logger: FastifyBaseLogger = opts.logger ?? createLogger(config.logLevel);

  const app = Fastify({
    loggerInstance: logger,
    genReqId: () => randomUUID(),
    routerOptions: {
      ignoreTrailingSlash: true,
    },
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  app.register(helmet);
  app.register(cors, {
    origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(',').map((o) => o.trim()),
  });
  app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });
  app.register(errorHandlerPluginFp);

  // Service metadata
  app.get('/', async () => ({
    message: `${config.appName} API`,
    version: SERVICE_VERSION,
    endpoints: {
      providers: '/providers',
      ai_assistant: '/ask',
      health: '/health',
    },
  }));

  // Health check
  app.get('/health', async () => ({ status: 'healthy', service: SERVICE_NAME }));

  app.register(providerRoutes, { deps: { serviceDeps: { repo: deps.repo } } });
  app.register(askRoutes, { deps: { serviceDeps: { repo: deps.repo, model: deps.model } } });

  return app;
}
