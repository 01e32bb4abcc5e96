// ============================================================================
// Hospital Pricing: Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  serial,
  varchar,
  integer,
  doublePrecision,
  index,
} from 'drizzle-orm/pg-core';

// --- Hospitals Table ---
// One row per CMS provider (CCN). Created by ingestion, never updated;
// a reload truncates and rebuilds all three tables.
// ZIP codes are stored as text so leading zeros survive.

export const hospitals = pgTable(
  'hospitals',
  {
    providerId: varchar('provider_id', { length: 20 }).primaryKey(),
    providerName: varchar('provider_name', { length: 255 }).notNull(),
    providerCity: varchar('provider_city', { length: 100 }).notNull(),
    providerState: varchar('provider_state', { length: 2 }).notNull(),
    providerZipCode: varchar('provider_zip_code', { length: 10 }).notNull(),
  },
  (table) => [
    index('idx_hospital_zip').on(table.providerZipCode),
    index('idx_hospital_state').on(table.providerState),
    index('idx_hospital_city').on(table.providerCity),
  ],
);

// --- Procedures Table ---
// One (provider, MS-DRG) pricing record. (provider_id, ms_drg_code) is not
// unique: readers must tolerate duplicates.

export const procedures = pgTable(
  'procedures',
  {
    id: serial('id').primaryKey(),
    providerId: varchar('provider_id', { length: 20 })
      .notNull()
      .references(() => hospitals.providerId),
    msDrgCode: varchar('ms_drg_code', { length: 10 }).notNull(),
    msDrgDefinition: varchar('ms_drg_definition', { length: 500 }).notNull(),
    totalDischarges: integer('total_discharges').notNull(),
    averageCoveredCharges: doublePrecision('average_covered_charges').notNull(),
    averageTotalPayments: doublePrecision('average_total_payments').notNull(),
    averageMedicarePayments: doublePrecision('average_medicare_payments').notNull(),
  },
  (table) => [
    index('idx_procedure_drg').on(table.msDrgCode),
    index('idx_procedure_provider').on(table.providerId),
    index('idx_procedure_charges').on(table.averageCoveredCharges),
    index('idx_procedure_payments').on(table.averageTotalPayments),
  ],
);

// --- Ratings Table ---
// Opaque 1-10 quality score; zero or more per hospital, averaged at query time.

export const ratings = pgTable(
  'ratings',
  {
    id: serial('id').primaryKey(),
    providerId: varchar('provider_id', { length: 20 })
      .notNull()
      .references(() => hospitals.providerId),
    rating: doublePrecision('rating').notNull(),
  },
  (table) => [
    index('idx_rating_provider').on(table.providerId),
    index('idx_rating_value').on(table.rating),
  ],
);

// --- Inferred Types ---

export type InsertHospital = typeof hospitals.$inferInsert;
export type InsertProcedure = typeof procedures.$inferInsert;
export type InsertRating = typeof ratings.$inferInsert;
