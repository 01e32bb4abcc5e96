// ============================================================================
// Hospital Pricing: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { DEFAULT_SORT_BY } from '../constants/pricing.constants.js';

// --- Shared fields ---

const drgCodeSchema = z
  .string()
  .regex(/^\d{1,4}$/, 'drg must be a numeric MS-DRG code')
  .refine((code) => /[1-9]/.test(code), 'drg must be positive');

const zipCodeSchema = z.string().regex(/^\d{5}$/, 'zip_code must be 5 digits');

// Sign is checked by the handler: a non-positive radius is a 400, not a
// schema failure.
const radiusKmSchema = z.coerce.number().int();

// --- Structured search: GET /providers ---

export const providerSearchSchema = z.object({
  drg: drgCodeSchema.optional(),
  zip_code: zipCodeSchema.optional(),
  radius_km: radiusKmSchema.optional(),
  // Accepted as free text so an unknown value surfaces as a 400 business
  // rule rather than a schema failure.
  sort_by: z.string().default(DEFAULT_SORT_BY),
});

export type ProviderSearch = z.infer<typeof providerSearchSchema>;

// --- Text search: GET /providers/search ---

export const providerTextSearchSchema = z.object({
  q: z.string().min(1),
  zip_code: zipCodeSchema.optional(),
  radius_km: radiusKmSchema.optional(),
});

export type ProviderTextSearch = z.infer<typeof providerTextSearchSchema>;

// --- Result record (both search endpoints and /ask results) ---

export const providerResultSchema = z.object({
  provider_id: z.string(),
  provider_name: z.string(),
  provider_city: z.string(),
  provider_state: z.string(),
  provider_zip_code: z.string(),
  ms_drg_code: z.string(),
  ms_drg_definition: z.string(),
  total_discharges: z.number().int(),
  average_covered_charges: z.number(),
  average_total_payments: z.number(),
  average_medicare_payments: z.number(),
  average_rating: z.number().nullable(),
});

export type ProviderResult = z.infer<typeof providerResultSchema>;
