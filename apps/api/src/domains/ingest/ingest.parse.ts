// ============================================================================
// Ingestion: CMS inpatient CSV parsing
// ============================================================================

import { parse } from 'csv-parse/sync';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Record shape
// ---------------------------------------------------------------------------

/** One CSV row, normalised: a hospital and one of its DRG pricing records. */
export interface IngestRecord {
  providerId: string;
  providerName: string;
  providerCity: string;
  providerState: string;
  providerZipCode: string;
  msDrgCode: string;
  msDrgDefinition: string;
  totalDischarges: number;
  averageCoveredCharges: number;
  averageTotalPayments: number;
  averageMedicarePayments: number;
}

/** CMS "Medicare Inpatient Hospitals, by Provider and Service" headers. */
export const CmsColumn = {
  PROVIDER_ID: 'Rndrng_Prvdr_CCN',
  PROVIDER_NAME: 'Rndrng_Prvdr_Org_Name',
  PROVIDER_CITY: 'Rndrng_Prvdr_City',
  PROVIDER_STATE: 'Rndrng_Prvdr_State_Abrvtn',
  PROVIDER_ZIP: 'Rndrng_Prvdr_Zip5',
  DRG_CODE: 'DRG_Cd',
  DRG_DEFINITION: 'DRG_Desc',
  DISCHARGES: 'Tot_Dschrgs',
  COVERED_CHARGES: 'Avg_Submtd_Cvrd_Chrg',
  TOTAL_PAYMENTS: 'Avg_Tot_Pymt_Amt',
  MEDICARE_PAYMENTS: 'Avg_Mdcr_Pymt_Amt',
} as const;

// ---------------------------------------------------------------------------
// Field cleaning
// ---------------------------------------------------------------------------

export function cleanString(value: string | undefined): string {
  if (!value) return '';
  return value.trim().toUpperCase();
}

/** Thousands separators allowed; anything unparseable is 0. */
export function parseLenientFloat(value: string | undefined): number {
  if (!value) return 0;
  const normalised = value.replace(/,/g, '').trim();
  if (normalised === '') return 0;
  const parsed = Number(normalised);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Integers only: "12.5" is 0, like any other unparseable text. */
export function parseLenientInt(value: string | undefined): number {
  if (!value) return 0;
  const normalised = value.replace(/,/g, '').trim();
  return /^[+-]?\d+$/.test(normalised) ? parseInt(normalised, 10) : 0;
}

const DRG_WITH_TITLE = /^(\d+)\s*[–-]\s*(.+)/;
const LEADING_DRG = /^(\d{3})/;

/**
 * DRG code from a definition such as "470 – MAJOR JOINT REPLACEMENT W/O MCC".
 * Falls back to three leading digits, then to the empty string.
 */
export function extractDrgCode(definition: string | undefined): string {
  if (!definition) return '';
  const trimmed = definition.trim();

  const titled = DRG_WITH_TITLE.exec(trimmed);
  if (titled) return titled[1];

  const leading = LEADING_DRG.exec(trimmed);
  if (leading) return leading[1];

  return '';
}

// ---------------------------------------------------------------------------
// Decoding + parsing
// ---------------------------------------------------------------------------

/** UTF-8 when the bytes are valid UTF-8, Latin-1 otherwise. */
export function decodeCsv(bytes: Uint8Array): { text: string; encoding: 'utf-8' | 'latin1' } {
  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(bytes), encoding: 'utf-8' };
  } catch {
    return { text: new TextDecoder('latin1').decode(bytes), encoding: 'latin1' };
  }
}

const csvRowsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text into records. Rows without a provider id or a DRG code
 * (taken from the code column, or from the definition when that is blank)
 * are skipped.
 */
export function parseCmsCsv(content: string): IngestRecord[] {
  const rows = csvRowsSchema.parse(
    parse(content, {
      columns: true,
      skip_empty_lines: true,
      bom: true,
      relax_column_count: true,
    }),
  );

  const records: IngestRecord[] = [];
  for (const row of rows) {
    const providerId = cleanString(row[CmsColumn.PROVIDER_ID]);
    const msDrgDefinition = cleanString(row[CmsColumn.DRG_DEFINITION]);
    const msDrgCode = cleanString(row[CmsColumn.DRG_CODE]) || extractDrgCode(msDrgDefinition);

    if (!providerId || !msDrgCode) continue;

    records.push({
      providerId,
      providerName: cleanString(row[CmsColumn.PROVIDER_NAME]),
      providerCity: cleanString(row[CmsColumn.PROVIDER_CITY]),
      providerState: cleanString(row[CmsColumn.PROVIDER_STATE]),
      providerZipCode: cleanString(row[CmsColumn.PROVIDER_ZIP]),
      msDrgCode,
      msDrgDefinition,
      totalDischarges: parseLenientInt(row[CmsColumn.DISCHARGES]),
      averageCoveredCharges: parseLenientFloat(row[CmsColumn.COVERED_CHARGES]),
      averageTotalPayments: parseLenientFloat(row[CmsColumn.TOTAL_PAYMENTS]),
      averageMedicarePayments: parseLenientFloat(row[CmsColumn.MEDICARE_PAYMENTS]),
    });
  }
  return records;
}
