/**
 * CAS Statement Parser
 *
 * Single forward pass over statement lines. Folio and fund headers update
 * the running context; every transaction row becomes a record tagged with
 * that context and the AMFI scheme code of its ISIN.
 */

import type { SchemeCodeResolver, TransactionRecord } from '../../types';
import { logger } from '../../logger';
import {
  ISIN_LABEL,
  cleanFundName,
  cleanFundNameSmart,
  extractIsin,
  hasFundNamePattern,
  joinSplitIsin,
  matchFolio,
  matchFundIsin,
  matchTransaction,
  splitOnIsinLabel,
  startsWithHoldingMode,
  type TransactionLayout,
} from './patterns';
import { extractFundAndIsin } from './fund-header';

/**
 * Parser version for tracking
 */
export const PARSER_VERSION = '1.0.0';

/**
 * Lines echoed at debug level before parsing starts
 */
const PREVIEW_LINES = 20;

/**
 * Line boundaries, including the form feeds some PDFs emit between pages
 */
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

export interface StatementParseStats {
  linesScanned: number;
  fundHeaders: Record<string, number>;
  transactions: Record<TransactionLayout, number>;
  unmatchedLines: number;
}

export interface StatementParseResult {
  records: TransactionRecord[];
  warnings: string[];
  stats: StatementParseStats;
}

/**
 * Turn per-page text into parser input: pages are joined by newlines,
 * thousands separators are dropped, and the result is split into lines.
 */
export function prepareStatementLines(pageTexts: string[]): string[] {
  let text = '';
  for (const pageText of pageTexts) {
    if (pageText) {
      text = `${text}\n${pageText}`;
    }
  }
  return text.replaceAll(',', '').split(LINE_BREAK);
}

interface ParseState {
  folioNum: string;
  fundName: string;
  isin: string;
}

/**
 * Parse prepared statement lines into transaction records
 */
export function parseStatementLines(
  lines: string[],
  resolver: SchemeCodeResolver
): StatementParseResult {
  const records: TransactionRecord[] = [];
  const warnings: string[] = [];
  const stats: StatementParseStats = {
    linesScanned: 0,
    fundHeaders: {},
    transactions: { regular_buy: 0, regular_sell: 0, segregated_buy: 0 },
    unmatchedLines: 0,
  };

  if (lines.length === 0) {
    return { records, warnings, stats };
  }

  const state: ParseState = { folioNum: '', fundName: '', isin: '' };
  const unresolvedIsins = new Set<string>();

  const countHeader = (rule: string) => {
    stats.fundHeaders[rule] = (stats.fundHeaders[rule] || 0) + 1;
    logger.debug('Found fund header', { rule, fund_name: state.fundName, isin: state.isin });
  };

  logger.debug('Statement preview', {
    parser_version: PARSER_VERSION,
    lines: lines.slice(0, PREVIEW_LINES).map(line => line.trim()),
  });

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const nextLine = i + 1 < lines.length ? lines[i + 1] : null;
    stats.linesScanned++;

    const folio = matchFolio(line);
    if (folio) {
      state.folioNum = folio.folioNum;
      logger.debug('Found folio', { folio_num: state.folioNum, pan: folio.pan });
      i++;
      continue;
    }

    const fundIsin = matchFundIsin(line);
    if (fundIsin) {
      state.fundName = fundIsin.fundName;
      state.isin = fundIsin.isin;
      countHeader('single_line');
      i++;
      continue;
    }

    const hasLabel = line.includes(ISIN_LABEL);
    const nextHasLabel = nextLine !== null && nextLine.includes(ISIN_LABEL);

    if (hasLabel || nextHasLabel) {
      const header = extractFundAndIsin(lines, i);
      if (header.fundName && header.isin) {
        state.fundName = header.fundName;
        state.isin = header.isin;
        countHeader(header.rule ?? 'multi_line');
        i = header.endIndex + 1;
        continue;
      }
    }

    // ISIN cut after "INF", remainder opens the next line
    if (hasLabel && line.includes('INF') && nextLine !== null) {
      const joined = joinSplitIsin(nextLine.trim());
      if (joined) {
        const labelled = splitOnIsinLabel(line);
        if (labelled) {
          state.fundName = cleanFundNameSmart(labelled.before);
        }
        state.isin = joined;
        countHeader('split_isin_fallback');
        i += 2;
        continue;
      }
    }

    // Fund name here, ISIN on the next line. An unreadable ISIN clears the context.
    if (nextHasLabel && nextLine !== null) {
      const currentTrimmed = line.trim();
      const nextTrimmed = nextLine.trim();

      if (hasFundNamePattern(currentTrimmed) || startsWithHoldingMode(nextTrimmed)) {
        state.fundName = cleanFundName(currentTrimmed);
        state.isin = extractIsin(nextTrimmed.replaceAll(ISIN_LABEL, '').trim());
        if (state.isin) {
          countHeader('next_line_fallback');
          i += 2;
          continue;
        }
      }
    }

    // Any other labelled line overwrites both fund name and ISIN, even with blanks
    const labelled = splitOnIsinLabel(line);
    if (labelled) {
      state.fundName = cleanFundNameSmart(labelled.before);
      const isinPart = labelled.after.trim();
      state.isin = extractIsin(isinPart);

      if (!state.isin && isinPart.includes('INF') && nextLine !== null) {
        const joined = joinSplitIsin(nextLine.trim());
        if (joined) {
          state.isin = joined;
          i++;
        }
      }

      countHeader('label_fallback');
      i++;
      continue;
    }

    const txn = matchTransaction(line);
    if (txn) {
      const scheme_code = resolver.getSchemeCode(state.isin);

      if (!state.isin) {
        warnings.push(`Line ${i + 1}: ${txn.txn} on ${txn.date} has no fund ISIN`);
      } else if (!scheme_code && !unresolvedIsins.has(state.isin)) {
        unresolvedIsins.add(state.isin);
        warnings.push(`ISIN ${state.isin} has no AMFI scheme code`);
      }

      records.push({
        fund_name: state.fundName,
        isin: state.isin,
        scheme_code,
        folio_num: state.folioNum,
        date: txn.date,
        txn: txn.txn,
        amount: txn.amount,
        units: txn.units,
        nav: txn.nav,
        balance_units: txn.balanceUnits,
      });
      stats.transactions[txn.layout]++;
      logger.debug('Found transaction', {
        line: i + 1,
        layout: txn.layout,
        description: txn.description,
        date: txn.date,
      });
      i++;
      continue;
    }

    stats.unmatchedLines++;
    i++;
  }

  logger.debug('Statement parse complete', {
    record_count: records.length,
    lines_scanned: stats.linesScanned,
    unmatched_lines: stats.unmatchedLines,
    warnings: warnings.length,
  });

  return { records, warnings, stats };
}
