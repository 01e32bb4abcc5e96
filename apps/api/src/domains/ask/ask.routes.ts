import { type FastifyInstance } from 'fastify';
import { askQuestionSchema } from '@costnav/shared/schemas/ask.schema.js';
import {
  createAskHandlers,
  type AskHandlerDeps,
} from './ask.handlers.js';

// ---------------------------------------------------------------------------
// Assistant Routes
// ---------------------------------------------------------------------------

export async function askRoutes(
  app: FastifyInstance,
  opts: { deps: AskHandlerDeps },
) {
  const handlers = createAskHandlers(opts.deps);

  app.post('/ask', {
    schema: { body: askQuestionSchema },
    handler: handlers.askHandler,
  });
}
