import { hospitals, procedures, ratings } from '@costnav/shared/schemas/db/pricing.schema.js';
import { type Database } from '../../lib/db.js';
import type { PricingDataset } from './ingest.service.js';

/** Rows per INSERT; keeps each statement under the pg parameter limit. */
const INSERT_BATCH_SIZE = 1000;

function batches<T>(rows: readonly T[]): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
    out.push(rows.slice(i, i + INSERT_BATCH_SIZE));
  }
  return out;
}

// ---------------------------------------------------------------------------
// Ingest Repository
// ---------------------------------------------------------------------------

export function createIngestRepository(db: Database) {
  return {
    /**
     * Replace the contents of all three tables. Everything runs in one
     * transaction, so readers see either the old data or the new data.
     */
    async replaceAll(dataset: PricingDataset): Promise<void> {
      await db.transaction(async (tx) => {
        await tx.delete(ratings);
        await tx.delete(procedures);
        await tx.delete(hospitals);

        for (const chunk of batches(dataset.hospitals)) {
          await tx.insert(hospitals).values(chunk);
        }
        for (const chunk of batches(dataset.procedures)) {
          await tx.insert(procedures).values(chunk);
        }
        for (const chunk of batches(dataset.ratings)) {
          await tx.insert(ratings).values(chunk);
        }
      });
    },
  };
}

export type IngestRepository = ReturnType<typeof createIngestRepository>;
