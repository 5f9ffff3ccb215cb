/**
 * Output Serialization Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  defaultCsvFileName,
  serializeRecords,
  toCsv,
  TransactionTable,
  validateTransactionRecords,
  type TransactionRecord,
} from '@cas-extractor/shared';

const RECORDS: TransactionRecord[] = [
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
];

const HEADER = 'fund_name,isin,scheme_code,folio_num,date,txn,amount,units,nav,balance_units';

describe('CSV output', () => {
  it('should write a header row and one row per record', () => {
    expect(toCsv(RECORDS).split('\r\n')).toEqual([
      HEADER,
      'Axis Midcap Fund - Regular Growth,INF846K01859,120503,12345678 / 90,01-Apr-2023,Buy,5000,87.719,57,87.719',
      'Axis Midcap Fund - Regular Growth,INF846K01859,120503,12345678 / 90,15-Jun-2023,Sell,1000,16.234,61.6,71.485',
    ]);
  });

  it('should quote values containing the delimiter', () => {
    const csv = toCsv([{ ...RECORDS[0], fund_name: 'Axis Fund, Growth' }]);

    expect(csv.split('\r\n')[1]).toBe(
      '"Axis Fund, Growth",INF846K01859,120503,12345678 / 90,01-Apr-2023,Buy,5000,87.719,57,87.719'
    );
  });

  it('should write only the header for no records', () => {
    expect(toCsv([])).toBe(HEADER);
  });

  it('should stamp the default file name with local time', () => {
    expect(defaultCsvFileName(new Date(2026, 9, 19, 9, 5))).toBe('CAMS_data_19_10_2026_09_05.csv');
  });

  it('should write the csv format to the given file and return nothing', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cas-csv-'));
    const csvFileName = path.join(dir, 'out.csv');

    try {
      const result = serializeRecords(RECORDS, 'csv', { csvFileName });

      expect(result).toBeUndefined();
      const lines = fs.readFileSync(csvFileName, 'utf-8').split('\r\n');
      expect(lines).toHaveLength(4);
      expect(lines[0]).toBe(HEADER);
      expect(lines[3]).toBe('');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('JSON and dicts output', () => {
  it('should serialize records as a JSON array', () => {
    const json = serializeRecords(RECORDS.slice(0, 1), 'json');

    expect(json).toBe(
      '[{"fund_name":"Axis Midcap Fund - Regular Growth","isin":"INF846K01859","scheme_code":"120503",' +
        '"folio_num":"12345678 / 90","date":"01-Apr-2023","txn":"Buy","amount":5000,"units":87.719,' +
        '"nav":57,"balance_units":87.719}]'
    );
  });

  it('should return copies of the records', () => {
    const dicts = serializeRecords(RECORDS, 'dicts');

    expect(dicts).toEqual(RECORDS);
    expect(dicts[0]).not.toBe(RECORDS[0]);
  });
});

describe('TransactionTable', () => {
  const table = serializeRecords(RECORDS, 'df');

  it('should expose columns in record field order', () => {
    expect(table).toBeInstanceOf(TransactionTable);
    expect(table.columns).toEqual(HEADER.split(','));
    expect(table.length).toBe(2);
  });

  it('should return rows as value arrays', () => {
    expect(table.rows[1]).toEqual([
      'Axis Midcap Fund - Regular Growth',
      'INF846K01859',
      '120503',
      '12345678 / 90',
      '15-Jun-2023',
      'Sell',
      1000,
      16.234,
      61.6,
      71.485,
    ]);
  });

  it('should return single columns', () => {
    expect(table.column('txn')).toEqual(['Buy', 'Sell']);
    expect(table.column('amount')).toEqual([5000, 1000]);
  });

  it('should be unaffected by later changes to the source records', () => {
    const source = RECORDS.map(record => ({ ...record }));
    const snapshot = new TransactionTable(source);
    source[0].amount = 1;

    expect(snapshot.toRecords()[0].amount).toBe(5000);
  });
});

describe('validateTransactionRecords', () => {
  it('should accept extracted records', () => {
    expect(validateTransactionRecords(RECORDS)).toEqual({ valid: true });
  });

  it('should accept a record without fund context', () => {
    const record = { ...RECORDS[0], fund_name: '', isin: '', scheme_code: '', folio_num: '' };

    expect(validateTransactionRecords([record]).valid).toBe(true);
  });

  it('should report each violation with its location', () => {
    const result = validateTransactionRecords([RECORDS[0], { ...RECORDS[1], txn: 'Hold' }]);

    expect(result).toEqual({
      valid: false,
      errors: ['/1/txn: must be equal to one of the allowed values'],
    });
  });

  it('should reject malformed ISINs', () => {
    const result = validateTransactionRecords([{ ...RECORDS[0], isin: 'INF846' }]);

    expect(result.errors).toEqual(['/0/isin: must match pattern "^(INF[A-Z0-9]{9})?$"']);
  });
});
