/**
 * Column-oriented view over extracted records, the in-memory tabular
 * output format ("df").
 */

import { TRANSACTION_FIELDS, type TransactionField, type TransactionRecord } from '../types';

export type CellValue = TransactionRecord[TransactionField];

export class TransactionTable {
  readonly columns: readonly TransactionField[] = TRANSACTION_FIELDS;
  private readonly records: TransactionRecord[];

  constructor(records: TransactionRecord[]) {
    this.records = records.map(record => ({ ...record }));
  }

  get length(): number {
    return this.records.length;
  }

  /**
   * One value array per record, in column order
   */
  get rows(): CellValue[][] {
    return this.records.map(record => this.columns.map(column => record[column]));
  }

  /**
   * All values of one column, in row order
   */
  column<K extends TransactionField>(name: K): Array<TransactionRecord[K]> {
    return this.records.map(record => record[name]);
  }

  toRecords(): TransactionRecord[] {
    return this.records.map(record => ({ ...record }));
  }
}
