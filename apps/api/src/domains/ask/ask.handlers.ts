import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type AskQuestion, type AskResponse } from '@costnav/shared/schemas/ask.schema.js';
import { processQuestion, type AskResult, type AskServiceDeps } from './ask.service.js';
import { ProcessingError, ValidationError } from '../../lib/errors.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface AskHandlerDeps {
  /** Everything except the logger, which comes from the request. */
  serviceDeps: Omit<AskServiceDeps, 'logger'>;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createAskHandlers(deps: AskHandlerDeps) {
  const { serviceDeps } = deps;

  // -------------------------------------------------------------------------
  // POST /ask
  // -------------------------------------------------------------------------

  async function askHandler(
    request: FastifyRequest<{ Body: AskQuestion }>,
    reply: FastifyReply,
  ) {
    const { question } = request.body;

    if (!question.trim()) {
      throw new ValidationError('Question cannot be empty');
    }

    let result: AskResult;
    try {
      result = await processQuestion({ ...serviceDeps, logger: request.log }, question);
    } catch (err) {
      request.log.error({ err }, 'Question processing failed');
      throw new ProcessingError('Failed to process question');
    }

    const body: AskResponse = {
      answer: result.answer,
      results: result.results,
      out_of_scope: result.outOfScope,
      sql_query: result.sqlQuery,
      error: result.error,
    };
    return reply.send(body);
  }

  return {
    askHandler,
  };
}
