/**
 * Multi-line Fund Header Resolution
 *
 * PDF text extraction frequently breaks the fund header across lines:
 * the ISIN label lands on the next line, the ISIN itself is cut after
 * its "INF" prefix, or a holding mode marker precedes the ISIN.
 *
 * "B205RG-Axis Midcap Fund - Regular Growth -"
 * "ISIN: INF846K01859(Advisor: ARN-0000)"
 */

import { logger } from '../../logger';
import {
  ISIN_LABEL,
  cleanFundName,
  extractIsin,
  hasFundNamePattern,
  joinSplitIsin,
  splitOnIsinLabel,
  startsWithHoldingMode,
} from './patterns';

/**
 * Which layout the fund header was recognised from
 */
export type FundHeaderRule =
  | 'hyphen_continuation'
  | 'same_line'
  | 'same_line_split_isin'
  | 'next_line_fund_pattern'
  | 'next_line_holding_mode'
  | 'next_line_label'
  | 'split_isin'
  | 'lookahead';

export interface FundHeaderMatch {
  fundName: string;
  isin: string;
  /** Index of the last line consumed by the header */
  endIndex: number;
  rule: FundHeaderRule | null;
}

/**
 * Lines scanned by the lookahead fallback, counting the starting line
 */
const LOOKAHEAD_LINES = 3;

/**
 * Resolve a fund name and ISIN starting at lines[startIdx].
 *
 * Rules are tried in order and the first one yielding an ISIN wins.
 * When none does, the returned ISIN is empty and endIndex is startIdx.
 */
export function extractFundAndIsin(lines: string[], startIdx: number): FundHeaderMatch {
  let fundName = '';
  const currentLine = lines[startIdx].trim();
  const nextLine = startIdx + 1 < lines.length ? lines[startIdx + 1].trim() : null;

  logger.debug('Checking line for ISIN', { line: currentLine });

  // Name ends with a dangling hyphen, ISIN label opens the next line
  if (currentLine.endsWith('-') && nextLine !== null && nextLine.startsWith(ISIN_LABEL)) {
    fundName = cleanFundName(currentLine.replace(/-+$/, '').trim());
    const isin = extractIsin(nextLine.replaceAll(ISIN_LABEL, '').trim());
    if (isin) {
      return { fundName, isin, endIndex: startIdx + 1, rule: 'hyphen_continuation' };
    }
  }

  const sameLine = splitOnIsinLabel(currentLine);
  if (sameLine) {
    fundName = cleanFundName(sameLine.before);
    const isinPart = sameLine.after.trim();

    const isin = extractIsin(isinPart);
    if (isin) {
      return { fundName, isin, endIndex: startIdx, rule: 'same_line' };
    }

    // "ISIN: INF" with the remaining nine characters on the next line
    if (isinPart.includes('INF') && nextLine !== null) {
      const joined = joinSplitIsin(nextLine);
      if (joined) {
        logger.debug('Found split ISIN', { isin: joined });
        return { fundName, isin: joined, endIndex: startIdx + 1, rule: 'same_line_split_isin' };
      }
    }
  }

  if (nextLine !== null) {
    const nextLabel = splitOnIsinLabel(nextLine);
    if (nextLabel) {
      if (hasFundNamePattern(currentLine) || startsWithHoldingMode(nextLine)) {
        fundName = cleanFundName(currentLine);
        const isin = extractIsin(nextLine.replaceAll(ISIN_LABEL, '').trim());
        if (isin) {
          const rule = hasFundNamePattern(currentLine) ? 'next_line_fund_pattern' : 'next_line_holding_mode';
          return { fundName, isin, endIndex: startIdx + 1, rule };
        }
      } else {
        fundName = cleanFundName(nextLabel.before);
        const isin = extractIsin(nextLabel.after);
        if (isin) {
          return { fundName, isin, endIndex: startIdx + 1, rule: 'next_line_label' };
        }
      }
    }

    const joined = joinSplitIsin(nextLine);
    if (joined && currentLine.includes('INF')) {
      logger.debug('Found split ISIN across lines', { isin: joined });
      return { fundName, isin: joined, endIndex: startIdx + 1, rule: 'split_isin' };
    }
  }

  const lookaheadEnd = Math.min(startIdx + LOOKAHEAD_LINES, lines.length);
  for (let i = startIdx; i < lookaheadEnd; i++) {
    const labelled = splitOnIsinLabel(lines[i].trim());
    if (labelled) {
      fundName = cleanFundName(labelled.before);
      const isin = extractIsin(labelled.after);
      if (isin) {
        return { fundName, isin, endIndex: i, rule: 'lookahead' };
      }
    }
  }

  return { fundName, isin: '', endIndex: startIdx, rule: null };
}
