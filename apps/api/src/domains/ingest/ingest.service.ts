// ============================================================================
// Ingestion: dataset assembly and reload
// ============================================================================

import {
  RATING_MIN,
  SYNTHETIC_RATING_WEIGHTS,
} from '@costnav/shared/constants/pricing.constants.js';
import type {
  InsertHospital,
  InsertProcedure,
  InsertRating,
} from '@costnav/shared/schemas/db/pricing.schema.js';
import { decodeCsv, parseCmsCsv, type IngestRecord } from './ingest.parse.js';
import { SAMPLE_RECORDS } from './ingest.sample.js';
import type { IngestRepository } from './ingest.repository.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by CLI / test)
// ---------------------------------------------------------------------------

/** Uniform draw in [0, 1), as Math.random. */
export type RandomSource = () => number;

export interface IngestLogger {
  info(data: Record<string, unknown>, msg: string): void;
  warn(data: Record<string, unknown>, msg: string): void;
}

export interface IngestServiceDeps {
  repo: Pick<IngestRepository, 'replaceAll'>;
  readFile: (path: string) => Promise<Uint8Array>;
  random: RandomSource;
  logger: IngestLogger;
}

export interface PricingDataset {
  hospitals: InsertHospital[];
  procedures: InsertProcedure[];
  ratings: InsertRating[];
}

export interface IngestSummary {
  source: 'csv' | 'sample';
  hospitals: number;
  procedures: number;
  ratings: number;
}

// ---------------------------------------------------------------------------
// Ratings
// ---------------------------------------------------------------------------

/**
 * Weighted draw over RATING_MIN.. using SYNTHETIC_RATING_WEIGHTS, so higher
 * scores are more likely.
 */
export function drawWeightedRating(
  random: RandomSource,
  weights: readonly number[] = SYNTHETIC_RATING_WEIGHTS,
): number {
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  let target = random() * total;
  for (let i = 0; i < weights.length; i++) {
    target -= weights[i];
    if (target < 0) return RATING_MIN + i;
  }
  return RATING_MIN + weights.length - 1;
}

// ---------------------------------------------------------------------------
// Dataset
// ---------------------------------------------------------------------------

/**
 * Hospitals de-duplicated by provider id (first occurrence wins), every
 * record as a procedure, and one synthetic rating per hospital.
 */
export function buildDataset(records: readonly IngestRecord[], random: RandomSource): PricingDataset {
  const hospitalsById = new Map<string, InsertHospital>();
  const procedures: InsertProcedure[] = [];

  for (const record of records) {
    if (!hospitalsById.has(record.providerId)) {
      hospitalsById.set(record.providerId, {
        providerId: record.providerId,
        providerName: record.providerName,
        providerCity: record.providerCity,
        providerState: record.providerState,
        providerZipCode: record.providerZipCode,
      });
    }

    procedures.push({
      providerId: record.providerId,
      msDrgCode: record.msDrgCode,
      msDrgDefinition: record.msDrgDefinition,
      totalDischarges: record.totalDischarges,
      averageCoveredCharges: record.averageCoveredCharges,
      averageTotalPayments: record.averageTotalPayments,
      averageMedicarePayments: record.averageMedicarePayments,
    });
  }

  const hospitals = [...hospitalsById.values()];
  const ratings = hospitals.map((hospital) => ({
    providerId: hospital.providerId,
    rating: drawWeightedRating(random),
  }));

  return { hospitals, procedures, ratings };
}

// ---------------------------------------------------------------------------
// Reload
// ---------------------------------------------------------------------------

async function loadRecords(
  deps: Pick<IngestServiceDeps, 'readFile' | 'logger'>,
  filePath: string,
): Promise<IngestRecord[]> {
  let bytes: Uint8Array;
  try {
    bytes = await deps.readFile(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      deps.logger.warn({ filePath }, 'CSV file not found');
      return [];
    }
    throw err;
  }

  const { text, encoding } = decodeCsv(bytes);
  const records = parseCmsCsv(text);
  deps.logger.info({ filePath, encoding, records: records.length }, 'CSV parsed');
  return records;
}

/**
 * Rebuild the pricing tables from a CMS CSV, or from the sample dataset
 * when the file is missing or yields no usable rows.
 */
export async function runIngest(deps: IngestServiceDeps, filePath: string): Promise<IngestSummary> {
  let records = await loadRecords(deps, filePath);
  let source: IngestSummary['source'] = 'csv';

  if (records.length === 0) {
    deps.logger.warn({ filePath }, 'No CSV data loaded; using sample dataset');
    records = [...SAMPLE_RECORDS];
    source = 'sample';
  }

  const dataset = buildDataset(records, deps.random);
  await deps.repo.replaceAll(dataset);

  const summary: IngestSummary = {
    source,
    hospitals: dataset.hospitals.length,
    procedures: dataset.procedures.length,
    ratings: dataset.ratings.length,
  };
  deps.logger.info({ ...summary }, 'Pricing data reloaded');
  return summary;
}
