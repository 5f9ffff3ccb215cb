/**
 * CAS Statement Parser Tests
 *
 * Tests the line loop over prepared statement text.
 */

import {
  config,
  extractCasStatement,
  parseStatementLines,
  prepareStatementLines,
  SchemeLookup,
  type SchemeCodeResolver,
} from '@cas-extractor/shared';
import { NAV_TABLE, STATEMENT_PAGE_1, STATEMENT_PAGE_2 } from './fixtures';

const BUY_ROW = '01-Apr-2023 Purchase 5000.00 87.719 57.0000 87.719';

const noSchemes: SchemeCodeResolver = { getSchemeCode: () => '' };

describe('prepareStatementLines', () => {
  it('should join pages, drop commas and split lines', () => {
    expect(prepareStatementLines(['a,b\nc', '', 'd\r\ne'])).toEqual(['', 'ab', 'c', 'd', 'e']);
  });

  it('should split on form feeds', () => {
    expect(prepareStatementLines(['x\fy'])).toEqual(['', 'x', 'y']);
  });
});

describe('parseStatementLines', () => {
  const lines = prepareStatementLines([STATEMENT_PAGE_1, STATEMENT_PAGE_2]);

  it('should extract every transaction with its folio and fund', () => {
    const { records, warnings } = parseStatementLines(lines, SchemeLookup.fromText(NAV_TABLE));

    expect(warnings).toEqual([]);
    expect(records).toEqual([
      {
        fund_name: 'Axis Midcap Fund - Regular Growth',
        isin: 'INF846K01859',
        scheme_code: '120503',
        folio_num: '12345678 / 90',
        date: '01-Apr-2023',
        txn: 'Buy',
        amount: 5000,
        units: 87.719,
        nav: 57,
        balance_units: 87.719,
      },
      {
        fund_name: 'Axis Midcap Fund - Regular Growth',
        isin: 'INF846K01859',
        scheme_code: '120503',
        folio_num: '12345678 / 90',
        date: '15-Jun-2023',
        txn: 'Sell',
        amount: 1000,
        units: 16.234,
        nav: 61.6,
        balance_units: 71.485,
      },
      {
        fund_name: 'P8042-ICICI Prudential Bluechip Fund - Direct Plan Growth',
        isin: 'INF109K016L0',
        scheme_code: '118989',
        folio_num: '99887766',
        date: '10-Jul-2023',
        txn: 'Buy',
        amount: 2500,
        units: 30.12,
        nav: 83,
        balance_units: 30.12,
      },
    ]);
  });

  it('should report parse statistics', () => {
    const { stats } = parseStatementLines(lines, noSchemes);

    expect(stats).toEqual({
      linesScanned: 13,
      fundHeaders: { hyphen_continuation: 1, single_line: 1 },
      transactions: { regular_buy: 2, regular_sell: 1, segregated_buy: 0 },
      unmatchedLines: 6,
    });
  });

  it('should warn once per ISIN without a scheme code', () => {
    const { records, warnings } = parseStatementLines(lines, noSchemes);

    expect(records.map(r => r.scheme_code)).toEqual(['', '', '']);
    expect(warnings).toEqual([
      'ISIN INF846K01859 has no AMFI scheme code',
      'ISIN INF109K016L0 has no AMFI scheme code',
    ]);
  });

  it('should return nothing for empty input', () => {
    const result = parseStatementLines([], noSchemes);

    expect(result.records).toEqual([]);
    expect(result.stats.linesScanned).toBe(0);
  });

  it('should emit a context-free record for a transaction before any header', () => {
    const { records, warnings } = parseStatementLines([BUY_ROW], noSchemes);

    expect(records).toHaveLength(1);
    expect(records[0].fund_name).toBe('');
    expect(records[0].isin).toBe('');
    expect(records[0].scheme_code).toBe('');
    expect(records[0].folio_num).toBe('');
    expect(warnings).toEqual(['Line 1: Buy on 01-Apr-2023 has no fund ISIN']);
  });

  it('should complete an ISIN from the next line when the name cleans to nothing', () => {
    const { records, stats } = parseStatementLines(
      ['ISIN: INF', '846K01859 (Advisor: DIRECT)', BUY_ROW],
      SchemeLookup.fromText(NAV_TABLE)
    );

    expect(stats.fundHeaders).toEqual({ split_isin_fallback: 1 });
    expect(stats.linesScanned).toBe(2);
    expect(records[0].fund_name).toBe('');
    expect(records[0].isin).toBe('INF846K01859');
    expect(records[0].scheme_code).toBe('120503');
  });

  it('should take the ISIN from a bare label line', () => {
    const { records, stats } = parseStatementLines(['ISIN: INF846K01859(Advisor)', BUY_ROW], noSchemes);

    expect(stats.fundHeaders).toEqual({ label_fallback: 1 });
    expect(records[0].fund_name).toBe('');
    expect(records[0].isin).toBe('INF846K01859');
  });

  it('should clear the fund context when the ISIN is unreadable', () => {
    const { records, stats, warnings } = parseStatementLines(
      ['Axis Bluechip Fund-Growth', 'ISIN: pending', BUY_ROW],
      noSchemes
    );

    expect(stats.fundHeaders).toEqual({ label_fallback: 1 });
    expect(stats.unmatchedLines).toBe(1);
    expect(records[0].fund_name).toBe('');
    expect(records[0].isin).toBe('');
    expect(warnings).toEqual(['Line 3: Buy on 01-Apr-2023 has no fund ISIN']);
  });

  it('should take the ISIN from the next line and skip that line when the name cleans to nothing', () => {
    const { records, stats } = parseStatementLines(
      ['PAMP-', '(Demat) ISIN: INF846K01859', BUY_ROW],
      SchemeLookup.fromText(NAV_TABLE)
    );

    expect(stats.fundHeaders).toEqual({ next_line_fallback: 1 });
    expect(stats.linesScanned).toBe(2);
    expect(stats.unmatchedLines).toBe(0);
    expect(records).toHaveLength(1);
    expect(records[0].fund_name).toBe('');
    expect(records[0].isin).toBe('INF846K01859');
    expect(records[0].scheme_code).toBe('120503');
  });

  it('should resolve a header whose ISIN is split after the label', () => {
    const { records } = parseStatementLines(
      [
        'Folio No: 5550001 PAN: ABCDE1234F',
        'P8042-ICICI Prudential Bluechip Fund ISIN: INF',
        '109K016L0 (Advisor: DIRECT)',
        BUY_ROW,
      ],
      SchemeLookup.fromText(NAV_TABLE)
    );

    expect(records).toHaveLength(1);
    expect(records[0].folio_num).toBe('5550001');
    expect(records[0].fund_name).toBe('ICICI Prudential Bluechip Fund');
    expect(records[0].isin).toBe('INF109K016L0');
    expect(records[0].scheme_code).toBe('118989');
  });
});

describe('extractCasStatement', () => {
  it('should parse page text end to end', () => {
    const result = extractCasStatement(
      [
        { pageNumber: 1, text: STATEMENT_PAGE_1 },
        { pageNumber: 2, text: STATEMENT_PAGE_2 },
      ],
      SchemeLookup.fromText(NAV_TABLE)
    );

    expect(result.records).toHaveLength(3);
    expect(result.records.map(r => r.txn)).toEqual(['Buy', 'Sell', 'Buy']);
  });
});

describe('parser debug logging', () => {
  const originalLevel = config.logLevel;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    config.logLevel = 'debug';
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    config.logLevel = originalLevel;
    errorSpy.mockRestore();
  });

  it('should log the PAN of each folio and the description of each transaction', () => {
    parseStatementLines(['Folio No: 12345678 PAN: ABCDE1234F', BUY_ROW], noSchemes);

    const entries = errorSpy.mock.calls.map(call => JSON.parse(String(call[0])));
    const folio = entries.find(entry => entry.message === 'Found folio');
    const transaction = entries.find(entry => entry.message === 'Found transaction');

    expect(folio.folio_num).toBe('12345678');
    expect(folio.pan).toBe('ABCDE1234F');
    expect(transaction).toMatchObject({
      level: 'DEBUG',
      line: 2,
      layout: 'regular_buy',
      description: 'Purchase',
      date: '01-Apr-2023',
    });
  });
});
