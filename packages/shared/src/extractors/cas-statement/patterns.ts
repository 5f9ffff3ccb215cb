/**
 * CAS Statement Extraction Patterns
 *
 * Regular expressions and helpers for reading folio, fund and transaction
 * lines out of CAMS/KFintech consolidated account statements.
 *
 * Statement text arrives with thousands separators stripped, e.g.:
 * "Folio No: 12345678 / 90 PAN: ABCDE1234F"
 * "B205RG-Axis Midcap Fund - Regular Growth - ISIN: INF846K01859(Advisor: ARN-0000)"
 * "01-Apr-2023 Purchase 5000.00 87.719 57.0000 87.719"
 * "15-Jun-2023 Redemption (1000.00) (16.234) 61.6000 71.485"
 */

import FUND_NAME_INDICATORS from '../../../data/fund-name-indicators.json';

/**
 * Folio header: "Folio No: <folio> PAN: <pan>"
 */
export const FOLIO_PAN_PATTERN = /^Folio No:\s+(?<folio_num>.*)\s+PAN:\s+(?<pan>[A-Z,0-9]{10})/;

/**
 * Fund name and ISIN on one line, separated by a hyphen or whitespace
 */
export const FUND_ISIN_PATTERN = /^(?<fund_name>.*?)(?:\s*-\s*|\s+)ISIN:\s*(?<isin>INF[A-Z0-9]{9}).*/;

/**
 * Purchase row: date, description, amount, units, NAV, unit balance
 */
export const REGULAR_BUY_PATTERN =
  /^(?<date>\d+-\S+-\d+)\s+(?<txn>.*)\s+(?<amount>[0-9]+\.[0-9]*)\s+(?<units>[0-9]+\.[0-9]*)\s+(?<nav>[0-9]+\.[0-9]*)\s+(?<unitbalance>[0-9]+\.[0-9]*).*/;

/**
 * Redemption row: amount and units printed in parentheses
 */
export const REGULAR_SELL_PATTERN =
  /^(?<date>\d+-\S+-\d+)\s+(?<txn>.*)\s+(?<amount>\([0-9]+\.[0-9]*\))\s+(?<units>\([0-9]+\.[0-9]*\))\s+(?<nav>[0-9]+\.[0-9]*)\s+(?<unitbalance>[0-9]+\.[0-9]*).*/;

/**
 * Segregated portfolio allotment: units and unit balance only
 */
export const SEGREGATED_BUY_PATTERN =
  /^(?<date>\d+-\S+-\d+)\s+(?<txn>.*)\s+(?<units>[0-9]+\.[0-9]*)\s+(?<unitbalance>[0-9]+\.[0-9]*).*/;

/**
 * Mutual fund ISINs issued in India: INF + 9 alphanumerics
 */
export const ISIN_PATTERN = /INF[A-Z0-9]{9}/;

/**
 * The nine characters that complete an ISIN broken after its "INF" prefix
 */
export const ISIN_REMAINDER_PATTERN = /[A-Z0-9]{9}/;

export const ISIN_LABEL = 'ISIN:';

const REGISTRAR_SUFFIX = 'Registrar : CAMS';

const HOLDING_MODE_PREFIXES = ['(Non-Demat)', '(Demat)', '(Physical)'];

/**
 * Check if a line contains a known fund name fragment (plan, option, AMC, registrar)
 */
export function hasFundNamePattern(line: string): boolean {
  return FUND_NAME_INDICATORS.some(pattern => line.includes(pattern));
}

/**
 * Check if a line starts with a holding mode marker such as "(Non-Demat)"
 */
export function startsWithHoldingMode(line: string): boolean {
  return HOLDING_MODE_PREFIXES.some(prefix => line.startsWith(prefix));
}

/**
 * Remove the registrar tag CAMS statements append to fund names
 */
export function stripRegistrar(name: string): string {
  return name.includes(REGISTRAR_SUFFIX) ? name.replace(REGISTRAR_SUFFIX, '').trim() : name;
}

/**
 * Clean a raw fund name by dropping the scheme code prefix before the first hyphen.
 *
 * "B205RG-Axis Midcap Fund - Regular Growth -" -> "Axis Midcap Fund - Regular Growth"
 */
export function cleanFundName(rawName: string): string {
  let name = rawName.trim();
  const hyphen = name.indexOf('-');
  if (hyphen !== -1) {
    name = name.slice(hyphen + 1).trim();
    name = name.replace(/[- ]+$/, '').trim();
  }
  return stripRegistrar(name);
}

/**
 * Clean a raw fund name by keeping the segment after the last hyphen,
 * unless that segment is too short or parenthesised, in which case
 * everything after the first hyphen is kept.
 */
export function cleanFundNameSmart(rawName: string): string {
  let name = rawName.trim();
  if (name.includes('-')) {
    const lastPart = name.slice(name.lastIndexOf('-') + 1).trim();
    if (lastPart.length < 5 || lastPart.startsWith('(')) {
      name = name.slice(name.indexOf('-') + 1).trim();
    } else {
      name = lastPart;
    }
  }
  return stripRegistrar(name);
}

/**
 * Extract the first ISIN in the text, or an empty string
 */
export function extractIsin(text: string): string {
  const match = text.match(ISIN_PATTERN);
  return match ? match[0] : '';
}

/**
 * Rebuild an ISIN whose "INF" prefix ended the previous line
 */
export function joinSplitIsin(nextLine: string): string {
  const match = nextLine.match(ISIN_REMAINDER_PATTERN);
  return match ? `INF${match[0]}` : '';
}

/**
 * Text before the first "ISIN:" label, and after it (empty if absent)
 */
export function splitOnIsinLabel(line: string): { before: string; after: string } | null {
  const index = line.indexOf(ISIN_LABEL);
  if (index === -1) return null;
  const rest = line.slice(index + ISIN_LABEL.length);
  const nextLabel = rest.indexOf(ISIN_LABEL);
  return {
    before: line.slice(0, index),
    after: nextLabel === -1 ? rest : rest.slice(0, nextLabel),
  };
}

/**
 * Parsed folio header
 */
export interface FolioMatch {
  folioNum: string;
  pan: string;
}

export function matchFolio(line: string): FolioMatch | null {
  const groups = FOLIO_PAN_PATTERN.exec(line)?.groups;
  if (!groups) return null;
  return { folioNum: groups.folio_num ?? '', pan: groups.pan ?? '' };
}

/**
 * Parsed single-line fund header
 */
export interface FundIsinMatch {
  fundName: string;
  isin: string;
}

export function matchFundIsin(line: string): FundIsinMatch | null {
  const groups = FUND_ISIN_PATTERN.exec(line)?.groups;
  if (!groups) return null;
  return {
    fundName: stripRegistrar(groups.fund_name ?? ''),
    isin: groups.isin ?? '',
  };
}

/**
 * Row layouts a transaction line can take
 */
export type TransactionLayout = 'regular_buy' | 'regular_sell' | 'segregated_buy';

/**
 * Parsed transaction row, before fund context is attached
 */
export interface TransactionMatch {
  layout: TransactionLayout;
  date: string;
  txn: 'Buy' | 'Sell';
  description: string;
  amount: number;
  units: number;
  nav: number;
  balanceUnits: number;
}

function toNumber(value: string | undefined): number {
  if (!value) return 0;
  return parseFloat(value.replace(/[()]/g, ''));
}

/**
 * Match a transaction row. Purchase layout is tried first, then
 * redemption, then the units-only segregated portfolio layout.
 */
export function matchTransaction(line: string): TransactionMatch | null {
  const buy = REGULAR_BUY_PATTERN.exec(line)?.groups;
  if (buy) {
    return {
      layout: 'regular_buy',
      date: buy.date ?? '',
      txn: 'Buy',
      description: (buy.txn ?? '').trim(),
      amount: toNumber(buy.amount),
      units: toNumber(buy.units),
      nav: toNumber(buy.nav),
      balanceUnits: toNumber(buy.unitbalance),
    };
  }

  const sell = REGULAR_SELL_PATTERN.exec(line)?.groups;
  if (sell) {
    return {
      layout: 'regular_sell',
      date: sell.date ?? '',
      txn: 'Sell',
      description: (sell.txn ?? '').trim(),
      amount: toNumber(sell.amount),
      units: toNumber(sell.units),
      nav: toNumber(sell.nav),
      balanceUnits: toNumber(sell.unitbalance),
    };
  }

  const segregated = SEGREGATED_BUY_PATTERN.exec(line)?.groups;
  if (segregated) {
    return {
      layout: 'segregated_buy',
      date: segregated.date ?? '',
      txn: 'Buy',
      description: (segregated.txn ?? '').trim(),
      amount: 0,
      units: toNumber(segregated.units),
      nav: 0,
      balanceUnits: toNumber(segregated.unitbalance),
    };
  }

  return null;
}
