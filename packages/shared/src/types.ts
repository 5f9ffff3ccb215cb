/**
 * Shared TypeScript Types
 *
 * Types for the CAS statement extraction pipeline, matching the JSON schema
 * in docs/contracts/
 */

// ============================================================================
// Transaction Records
// ============================================================================

export type TransactionType = 'Buy' | 'Sell';

/**
 * One statement row, resolved against the current folio and fund context.
 * Field order is the CSV column order.
 */
export interface TransactionRecord {
  fund_name: string;
  isin: string;
  scheme_code: string;
  folio_num: string;
  date: string;
  txn: TransactionType;
  amount: number;
  units: number;
  nav: number;
  balance_units: number;
}

export const TRANSACTION_FIELDS = [
  'fund_name',
  'isin',
  'scheme_code',
  'folio_num',
  'date',
  'txn',
  'amount',
  'units',
  'nav',
  'balance_units',
] as const satisfies ReadonlyArray<keyof TransactionRecord>;

export type TransactionField = (typeof TRANSACTION_FIELDS)[number];

// ============================================================================
// Output
// ============================================================================

export const OUTPUT_FORMATS = ['dicts', 'csv', 'json', 'df'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as ReadonlyArray<string>).includes(value);
}

// ============================================================================
// Reference Data
// ============================================================================

/**
 * One row of the AMFI NAVopen.txt table
 */
export interface SchemeEntry {
  scheme_code: string;
  isin_growth: string;
  isin_div_reinv: string;
  scheme_name: string;
  nav: string;
  date: string;
}

/**
 * Resolves an ISIN to its AMFI scheme code
 */
export interface SchemeCodeResolver {
  getSchemeCode(isin: string): string;
}

// ============================================================================
// PDF Text
// ============================================================================

export interface PageText {
  pageNumber: number;
  text: string;
}
