/**
 * AMFI NAV Reference Table
 *
 * Parses the semicolon-separated NAVopen.txt published by AMFI and resolves
 * fund ISINs to AMFI scheme codes.
 *
 * Example rows:
 * "Scheme Code;ISIN Div Payout/ ISIN Growth;ISIN Div Reinvestment;Scheme Name;Net Asset Value;Date"
 * "119551;INF209KA12Z1;INF209KA13Z9;Aditya Birla Sun Life Banking & PSU Debt Fund - DIRECT - IDCW;105.4399;17-Oct-2026"
 */

import type { SchemeEntry, SchemeCodeResolver } from '../types';
import { logger } from '../logger';
import { malformedReferenceRowsCounter, referenceSchemesGauge } from '../metrics';

const FIELD_SEPARATOR = ';';
const HEADER_MARKER = 'Scheme Code';
const FIELD_COUNT = 6;

export interface NavTableParseResult {
  entries: SchemeEntry[];
  malformedRows: number;
}

/**
 * Parse NAVopen.txt lines into scheme entries.
 * Section titles and blank lines carry no separator and are ignored;
 * rows with fewer than six fields are skipped.
 */
export function parseNavTable(lines: string[]): NavTableParseResult {
  const entries: SchemeEntry[] = [];
  let malformedRows = 0;

  for (const line of lines) {
    if (!line.includes(FIELD_SEPARATOR) || line.includes(HEADER_MARKER)) continue;

    const tokens = line.split(FIELD_SEPARATOR);
    if (tokens.length < FIELD_COUNT) {
      malformedRows++;
      logger.debug('Skipping malformed NAV row', { line });
      continue;
    }

    const [scheme_code, isin_growth, isin_div_reinv, scheme_name, nav, date] = tokens;
    entries.push({ scheme_code, isin_growth, isin_div_reinv, scheme_name, nav, date });
  }

  return { entries, malformedRows };
}

/**
 * In-memory ISIN index over the AMFI table.
 * When an ISIN appears on several rows the earliest row wins.
 */
export class SchemeLookup implements SchemeCodeResolver {
  private readonly byIsin = new Map<string, SchemeEntry>();

  constructor(readonly entries: SchemeEntry[] = []) {
    for (const entry of entries) {
      for (const isin of [entry.isin_growth, entry.isin_div_reinv]) {
        if (isin && !this.byIsin.has(isin)) {
          this.byIsin.set(isin, entry);
        }
      }
    }
  }

  /**
   * Build a lookup from raw NAVopen.txt content
   */
  static fromText(text: string): SchemeLookup {
    const { entries, malformedRows } = parseNavTable(text.split(/\r?\n/));

    referenceSchemesGauge.set(entries.length);
    if (malformedRows > 0) {
      malformedReferenceRowsCounter.inc(malformedRows);
      logger.warn('Skipped malformed NAV rows', { malformed_rows: malformedRows });
    }

    logger.info('Loaded AMFI scheme table', { scheme_count: entries.length });
    return new SchemeLookup(entries);
  }

  /**
   * Empty lookup; every ISIN resolves to an empty scheme code
   */
  static empty(): SchemeLookup {
    referenceSchemesGauge.set(0);
    return new SchemeLookup();
  }

  get size(): number {
    return this.entries.length;
  }

  getScheme(isin: string): SchemeEntry | undefined {
    if (!isin) return undefined;
    return this.byIsin.get(isin);
  }

  getSchemeCode(isin: string): string {
    return this.getScheme(isin)?.scheme_code ?? '';
  }
}
