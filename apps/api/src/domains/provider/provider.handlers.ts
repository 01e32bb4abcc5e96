import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type ProviderSearch,
  type ProviderTextSearch,
} from '@costnav/shared/schemas/pricing.schema.js';
import { isSortBy } from '@costnav/shared/constants/pricing.constants.js';
import {
  searchProviders,
  searchByText,
  type ProviderServiceDeps,
} from './provider.service.js';
import { ValidationError } from '../../lib/errors.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface ProviderHandlerDeps {
  serviceDeps: ProviderServiceDeps;
}

// ---------------------------------------------------------------------------
// Business-rule checks (400, distinct from schema failures)
// ---------------------------------------------------------------------------

export function assertRadiusRules(zipCode: string | undefined, radiusKm: number | undefined): void {
  if (radiusKm === undefined) return;
  if (!zipCode) {
    throw new ValidationError('radius_km requires zip_code');
  }
  if (radiusKm <= 0) {
    throw new ValidationError('radius_km must be positive');
  }
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createProviderHandlers(deps: ProviderHandlerDeps) {
  const { serviceDeps } = deps;

  // -------------------------------------------------------------------------
  // GET /providers
  // -------------------------------------------------------------------------

  async function searchProvidersHandler(
    request: FastifyRequest<{ Querystring: ProviderSearch }>,
    reply: FastifyReply,
  ) {
    const { drg, zip_code, radius_km, sort_by } = request.query;

    if (!isSortBy(sort_by)) {
      throw new ValidationError("sort_by must be 'cost' or 'rating'");
    }
    assertRadiusRules(zip_code, radius_km);

    const results = await searchProviders(serviceDeps, {
      drg,
      zipCode: zip_code,
      radiusKm: radius_km,
      sortBy: sort_by,
    });
    return reply.send(results);
  }

  // -------------------------------------------------------------------------
  // GET /providers/search
  // -------------------------------------------------------------------------

  async function searchByTextHandler(
    request: FastifyRequest<{ Querystring: ProviderTextSearch }>,
    reply: FastifyReply,
  ) {
    const { q, zip_code, radius_km } = request.query;

    assertRadiusRules(zip_code, radius_km);

    const results = await searchByText(serviceDeps, {
      searchText: q,
      zipCode: zip_code,
      radiusKm: radius_km,
    });
    return reply.send(results);
  }

  return {
    searchProvidersHandler,
    searchByTextHandler,
  };
}
