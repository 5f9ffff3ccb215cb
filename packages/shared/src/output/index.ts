/**
 * Output Serialization
 */

import type { OutputFormat, TransactionRecord } from '../types';
import { TransactionTable } from './table';
import { writeCsv } from './csv';

/**
 * Result type for each output format
 */
export interface OutputByFormat {
  csv: undefined;
  df: TransactionTable;
  json: string;
  dicts: TransactionRecord[];
}

export interface SerializeOptions {
  /** Target file for the csv format */
  csvFileName?: string;
}

/**
 * Serialize records in the requested format. The csv format writes a
 * file and returns nothing.
 */
export function serializeRecords<F extends OutputFormat>(
  records: TransactionRecord[],
  format: F,
  options?: SerializeOptions
): OutputByFormat[F];
export function serializeRecords(
  records: TransactionRecord[],
  format: OutputFormat,
  options: SerializeOptions = {}
): OutputByFormat[OutputFormat] {
  switch (format) {
    case 'csv':
      writeCsv(records, options.csvFileName);
      return undefined;
    case 'df':
      return new TransactionTable(records);
    case 'json':
      return JSON.stringify(records);
    case 'dicts':
      return records.map(record => ({ ...record }));
  }
}

export { TransactionTable, type CellValue } from './table';
export { writeCsv, toCsv, defaultCsvFileName } from './csv';
