import { type FastifyInstance } from 'fastify';
import {
  providerSearchSchema,
  providerTextSearchSchema,
} from '@costnav/shared/schemas/pricing.schema.js';
import {
  createProviderHandlers,
  type ProviderHandlerDeps,
} from './provider.handlers.js';

// ---------------------------------------------------------------------------
// Provider Search Routes: public, read-only
// ---------------------------------------------------------------------------

export async function providerRoutes(
  app: FastifyInstance,
  opts: { deps: ProviderHandlerDeps },
) {
  const handlers = createProviderHandlers(opts.deps);

  app.get('/providers', {
    schema: { querystring: providerSearchSchema },
    handler: handlers.searchProvidersHandler,
  });

  app.get('/providers/search', {
    schema: { querystring: providerTextSearchSchema },
    handler: handlers.searchByTextHandler,
  });
}
