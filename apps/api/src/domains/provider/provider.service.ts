import {
  SortBy,
  DEFAULT_SORT_BY,
  ZIP_PREFIX_LENGTH,
  isSortBy,
} from '@costnav/shared/constants/pricing.constants.js';
import type { ProviderResult } from '@costnav/shared/schemas/pricing.schema.js';
import type {
  PricingRepository,
  PricedProcedureRow,
  SearchCriteria,
} from './provider.repository.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface ProviderServiceDeps {
  repo: Pick<PricingRepository, 'findPricedProcedures'>;
}

// ---------------------------------------------------------------------------
// Input types
// ---------------------------------------------------------------------------

export interface ProviderSearchInput {
  /** MS-DRG code as digits; compared to the stored code as a string. */
  drg?: string;
  zipCode?: string;
  radiusKm?: number;
  /** Anything other than 'rating' sorts by cost. */
  sortBy?: string;
}

export interface TextSearchInput {
  searchText: string;
  zipCode?: string;
  radiusKm?: number;
}

// ---------------------------------------------------------------------------
// Criteria
// ---------------------------------------------------------------------------

/**
 * Location filter. No distance is computed: when both a ZIP and a radius
 * are given, hospitals sharing the ZIP's 3-digit prefix match, whatever
 * the radius. A ZIP on its own does not filter.
 */
export function zipPrefixFor(zipCode?: string, radiusKm?: number): string | undefined {
  if (!zipCode || radiusKm === undefined || radiusKm <= 0) return undefined;
  return zipCode.slice(0, ZIP_PREFIX_LENGTH);
}

export function resolveSortBy(sortBy?: string): SortBy {
  return sortBy !== undefined && isSortBy(sortBy) ? sortBy : DEFAULT_SORT_BY;
}

export function buildSearchCriteria(input: ProviderSearchInput): SearchCriteria {
  return {
    drgCode: input.drg ? String(input.drg) : undefined,
    zipPrefix: zipPrefixFor(input.zipCode, input.radiusKm),
    sortBy: resolveSortBy(input.sortBy),
  };
}

export function buildTextCriteria(input: TextSearchInput): SearchCriteria {
  return {
    text: input.searchText,
    zipPrefix: zipPrefixFor(input.zipCode, input.radiusKm),
    sortBy: SortBy.COST,
  };
}

// ---------------------------------------------------------------------------
// Result mapping
// ---------------------------------------------------------------------------

/** One decimal place, halves rounded up. */
export function roundRating(average: number | null): number | null {
  if (average === null || Number.isNaN(average)) return null;
  return Math.round(average * 10) / 10;
}

export function toProviderResult(row: PricedProcedureRow): ProviderResult {
  return {
    provider_id: row.providerId,
    provider_name: row.providerName,
    provider_city: row.providerCity,
    provider_state: row.providerState,
    provider_zip_code: row.providerZipCode,
    ms_drg_code: row.msDrgCode,
    ms_drg_definition: row.msDrgDefinition,
    total_discharges: row.totalDischarges,
    average_covered_charges: row.averageCoveredCharges,
    average_total_payments: row.averageTotalPayments,
    average_medicare_payments: row.averageMedicarePayments,
    average_rating: roundRating(row.averageRating),
  };
}

// ---------------------------------------------------------------------------
// Searches
// ---------------------------------------------------------------------------

/**
 * Structured search by DRG and location, sorted by cost (ascending) or
 * mean rating (descending). Read-only; unbounded.
 */
export async function searchProviders(
  deps: ProviderServiceDeps,
  input: ProviderSearchInput,
): Promise<ProviderResult[]> {
  const rows = await deps.repo.findPricedProcedures(buildSearchCriteria(input));
  return rows.map(toProviderResult);
}

/**
 * Substring search over procedure definitions and hospital names,
 * always cheapest first.
 */
export async function searchByText(
  deps: ProviderServiceDeps,
  input: TextSearchInput,
): Promise<ProviderResult[]> {
  const rows = await deps.repo.findPricedProcedures(buildTextCriteria(input));
  return rows.map(toProviderResult);
}
