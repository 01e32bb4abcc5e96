import { eq, and, or, like, ilike, asc, sql, type SQL } from 'drizzle-orm';
import { type PgDatabase } from 'drizzle-orm/pg-core';
import { type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import {
  hospitals,
  procedures,
  ratings,
} from '@costnav/shared/schemas/db/pricing.schema.js';
import { SortBy } from '@costnav/shared/constants/pricing.constants.js';
import { type Database } from '../../lib/db.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Either the pool-backed database or a transaction opened on it. */
export type QueryRunner = PgDatabase<NodePgQueryResultHKT>;

/**
 * Filter/sort policy for one search, already normalised by the service.
 * Every present field narrows the result; absent fields do not filter.
 */
export interface SearchCriteria {
  /** Exact match against procedures.ms_drg_code. */
  drgCode?: string;
  /** Hospitals whose ZIP starts with this prefix. */
  zipPrefix?: string;
  /** Case-insensitive substring of the DRG definition OR the hospital name. */
  text?: string;
  sortBy: SortBy;
}

export interface PricedProcedureRow {
  providerId: string;
  providerName: string;
  providerCity: string;
  providerState: string;
  providerZipCode: string;
  procedureId: number;
  msDrgCode: string;
  msDrgDefinition: string;
  totalDischarges: number;
  averageCoveredCharges: number;
  averageTotalPayments: number;
  averageMedicarePayments: number;
  /** Unrounded mean of the provider's ratings; null when it has none. */
  averageRating: number | null;
}

export type QueryRow = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Query construction
// ---------------------------------------------------------------------------

/** Escape LIKE metacharacters so user text is matched literally. */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

const averageRating = sql`avg(${ratings.rating})`.mapWith(
  (value: unknown): number | null => (value === null ? null : Number(value)),
);

/**
 * One row per procedure (inner join) with its hospital and the hospital's
 * mean rating (left join, so unrated hospitals still appear).
 */
export function buildPricedProcedureQuery(runner: QueryRunner, criteria: SearchCriteria) {
  const conditions: Array<SQL | undefined> = [];

  if (criteria.drgCode !== undefined) {
    conditions.push(eq(procedures.msDrgCode, criteria.drgCode));
  }

  if (criteria.zipPrefix !== undefined) {
    conditions.push(like(hospitals.providerZipCode, `${escapeLikePattern(criteria.zipPrefix)}%`));
  }

  if (criteria.text !== undefined) {
    const pattern = `%${escapeLikePattern(criteria.text)}%`;
    conditions.push(
      or(
        ilike(procedures.msDrgDefinition, pattern),
        ilike(hospitals.providerName, pattern),
      ),
    );
  }

  const ordering =
    criteria.sortBy === SortBy.RATING
      ? [sql`avg(${ratings.rating}) desc nulls last`, asc(procedures.averageCoveredCharges), asc(procedures.id)]
      : [asc(procedures.averageCoveredCharges), asc(procedures.id)];

  return runner
    .select({
      providerId: hospitals.providerId,
      providerName: hospitals.providerName,
      providerCity: hospitals.providerCity,
      providerState: hospitals.providerState,
      providerZipCode: hospitals.providerZipCode,
      procedureId: procedures.id,
      msDrgCode: procedures.msDrgCode,
      msDrgDefinition: procedures.msDrgDefinition,
      totalDischarges: procedures.totalDischarges,
      averageCoveredCharges: procedures.averageCoveredCharges,
      averageTotalPayments: procedures.averageTotalPayments,
      averageMedicarePayments: procedures.averageMedicarePayments,
      averageRating,
    })
    .from(procedures)
    .innerJoin(hospitals, eq(procedures.providerId, hospitals.providerId))
    .leftJoin(ratings, eq(ratings.providerId, hospitals.providerId))
    .where(and(...conditions))
    .groupBy(hospitals.providerId, procedures.id)
    .orderBy(...ordering);
}

// ---------------------------------------------------------------------------
// Pricing Repository
// ---------------------------------------------------------------------------

export function createPricingRepository(db: Database) {
  return {
    /**
     * Run a search inside a read-only transaction. Drizzle rolls the
     * transaction back before rethrowing when the query fails.
     */
    async findPricedProcedures(criteria: SearchCriteria): Promise<PricedProcedureRow[]> {
      return db.transaction(
        async (tx) => buildPricedProcedureQuery(tx, criteria),
        { accessMode: 'read only' },
      );
    },

    /**
     * Execute an already-bound statement (model-generated SQL) read-only.
     * Any failure, including a write attempt the guard missed, rolls back.
     */
    async executeReadOnly(statement: SQL): Promise<QueryRow[]> {
      return db.transaction(
        async (tx) => {
          const result = await tx.execute(statement);
          return result.rows;
        },
        { accessMode: 'read only' },
      );
    },
  };
}

export type PricingRepository = ReturnType<typeof createPricingRepository>;
