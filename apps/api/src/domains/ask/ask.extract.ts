import { DOMAIN_KEYWORDS } from '@costnav/shared/constants/ask.constants.js';
import { MILES_TO_KM, SortBy } from '@costnav/shared/constants/pricing.constants.js';
import type { PlaceholderValues } from './ask.sql.js';

/** Structured hints pulled out of a free-text question. All optional. */
export interface ExtractedParameters {
  drg?: string;
  zipCode?: string;
  radiusKm?: number;
  sortBy?: SortBy;
}

export function isInScope(question: string): boolean {
  const lower = question.toLowerCase();
  return DOMAIN_KEYWORDS.some((keyword) => lower.includes(keyword));
}

const DRG_PATTERN = /drg\s+(\d+)/;
const ZIP_PATTERN = /(?<!\d)(\d{5})(?!\d)/;
const RADIUS_PATTERN = /(\d+)\s*(miles?|km)/;

/**
 * Best-effort, order-independent pattern matching. Fields that do not
 * match are left out.
 */
export function extractParameters(question: string): ExtractedParameters {
  const lower = question.toLowerCase();
  const params: ExtractedParameters = {};

  const drg = DRG_PATTERN.exec(lower);
  if (drg) {
    params.drg = drg[1];
  }

  const zip = ZIP_PATTERN.exec(question);
  if (zip) {
    params.zipCode = zip[1];
  }

  const radius = RADIUS_PATTERN.exec(lower);
  if (radius) {
    const value = parseInt(radius[1], 10);
    params.radiusKm = radius[2] === 'km' ? value : Math.trunc(value * MILES_TO_KM);
  }

  if (lower.includes('cheapest') || lower.includes('lowest cost')) {
    params.sortBy = SortBy.COST;
  } else if (lower.includes('best rating') || lower.includes('highest rating')) {
    params.sortBy = SortBy.RATING;
  }

  return params;
}

/** Values for the `:name` placeholders a generated statement may reference. */
export function toPlaceholderValues(params: ExtractedParameters): PlaceholderValues {
  return {
    drg: params.drg,
    zip_code: params.zipCode,
    radius_km: params.radiusKm,
    sort_by: params.sortBy,
  };
}
