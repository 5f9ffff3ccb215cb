/**
 * CAS Statement Extractor
 *
 * Pattern-based extraction of mutual fund transactions from the page text
 * of a consolidated account statement.
 */

import type { PageText, SchemeCodeResolver } from '../../types';
import { logger } from '../../logger';
import { parseStatementLines, prepareStatementLines, PARSER_VERSION, type StatementParseResult } from './parser';

/**
 * Extract transaction records from statement pages
 */
export function extractCasStatement(pages: PageText[], resolver: SchemeCodeResolver): StatementParseResult {
  const lines = prepareStatementLines(pages.map(page => page.text));

  logger.info('Parsing statement text', {
    page_count: pages.length,
    line_count: lines.length,
    parser_version: PARSER_VERSION,
  });

  const result = parseStatementLines(lines, resolver);

  logger.info('Statement parse result', {
    record_count: result.records.length,
    fund_headers: result.stats.fundHeaders,
    transactions: result.stats.transactions,
    unmatched_lines: result.stats.unmatchedLines,
    warnings: result.warnings.length,
  });

  for (const warning of result.warnings) {
    logger.warn('Statement parse warning', { warning });
  }

  return result;
}

// Re-export patterns and parser for testing
export * from './patterns';
export * from './fund-header';
export * from './parser';
