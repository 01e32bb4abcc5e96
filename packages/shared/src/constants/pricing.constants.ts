// ============================================================================
// Hospital Pricing: Constants
// ============================================================================

// --- Sort Keys ---

export const SortBy = {
  /** Ascending average covered charges */
  COST: 'cost',
  /** Descending mean rating, unrated providers last */
  RATING: 'rating',
} as const;

export type SortBy = (typeof SortBy)[keyof typeof SortBy];

export const SORT_BY_VALUES: readonly SortBy[] = Object.freeze([
  SortBy.COST,
  SortBy.RATING,
]);

export function isSortBy(value: string): value is SortBy {
  return SORT_BY_VALUES.some((sortBy) => sortBy === value);
}

export const DEFAULT_SORT_BY: SortBy = SortBy.COST;

// --- Location Matching ---

/**
 * Radius searches do not compute distances: a hospital matches when its ZIP
 * starts with the first ZIP_PREFIX_LENGTH characters of the requested ZIP.
 */
export const ZIP_PREFIX_LENGTH = 3;

export const MILES_TO_KM = 1.60934;

// --- Ratings ---

export const RATING_MIN = 1;

/** Weights for synthetic ratings 1..10 assigned at ingestion. */
export const SYNTHETIC_RATING_WEIGHTS: readonly number[] = Object.freeze([
  1, 1, 2, 3, 4, 5, 6, 7, 8, 9,
]);

// --- Health Service Identity ---

export const SERVICE_NAME = 'healthcare-cost-navigator';
export const SERVICE_VERSION = '0.1.0';
