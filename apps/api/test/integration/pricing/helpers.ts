import { vi } from 'vitest';
import { type SQL } from 'drizzle-orm';
import { pino } from 'pino';
import { buildApp } from '../../../src/server.js';
import { DISABLED_MODEL, type LanguageModel } from '../../../src/domains/ask/ask.llm.js';
import type { PricedProcedureRow, QueryRow } from '../../../src/domains/provider/provider.repository.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

export const LENOX_HILL: PricedProcedureRow = {
  providerId: '330125',
  providerName: 'LENOX HILL HOSPITAL',
  providerCity: 'NEW YORK',
  providerState: 'NY',
  providerZipCode: '10021',
  procedureId: 3,
  msDrgCode: '470',
  msDrgDefinition: '470 – MAJOR JOINT REPLACEMENT W/O MCC',
  totalDischarges: 80,
  averageCoveredCharges: 78000,
  averageTotalPayments: 22000,
  averageMedicarePayments: 18000,
  averageRating: 7.66666,
};

export const MONTEFIORE: PricedProcedureRow = {
  providerId: '330127',
  providerName: 'MONTEFIORE MEDICAL CENTER',
  providerCity: 'BRONX',
  providerState: 'NY',
  providerZipCode: '10467',
  procedureId: 5,
  msDrgCode: '470',
  msDrgDefinition: '470 – MAJOR JOINT REPLACEMENT W/O MCC',
  totalDischarges: 90,
  averageCoveredCharges: 72000,
  averageTotalPayments: 20000,
  averageMedicarePayments: 17000,
  averageRating: null,
};

// ---------------------------------------------------------------------------
// App with in-process fakes
// ---------------------------------------------------------------------------

export function buildTestApp(options: { rows?: PricedProcedureRow[]; model?: LanguageModel } = {}) {
  const findPricedProcedures = vi.fn(async (): Promise<PricedProcedureRow[]> => options.rows ?? []);
  const executeReadOnly = vi.fn(async (_statement: SQL): Promise<QueryRow[]> => []);

  const app = buildApp(
    { appName: 'Healthcare Cost Navigator', corsOrigin: '*', logLevel: 'info' },
    { repo: { findPricedProcedures, executeReadOnly }, model: options.model ?? DISABLED_MODEL },
    { logger: pino({ level: 'silent' }) },
  );

  return { app, findPricedProcedures, executeReadOnly };
}
