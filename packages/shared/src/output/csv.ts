/**
 * CSV Output
 *
 * Writes extracted records with a header row in record field order.
 */

import fs from 'fs';
import path from 'path';
import * as Papa from 'papaparse';
import { TRANSACTION_FIELDS, type TransactionRecord } from '../types';
import { config } from '../config';
import { logger } from '../logger';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Default file name, stamped with the local time: CAMS_data_DD_MM_YYYY_HH_MM.csv
 */
export function defaultCsvFileName(now: Date = new Date()): string {
  const stamp = [
    pad(now.getDate()),
    pad(now.getMonth() + 1),
    now.getFullYear(),
    pad(now.getHours()),
    pad(now.getMinutes()),
  ].join('_');
  return `CAMS_data_${stamp}.csv`;
}

/**
 * Render records as CSV text
 */
export function toCsv(records: TransactionRecord[]): string {
  return Papa.unparse({
    fields: [...TRANSACTION_FIELDS],
    data: records.map(record => TRANSACTION_FIELDS.map(field => record[field])),
  });
}

/**
 * Write records to a CSV file and return the path written.
 * Without a file name the file goes to the configured output directory.
 */
export function writeCsv(records: TransactionRecord[], csvFileName?: string): string {
  const filePath = csvFileName ?? path.join(config.csvOutputDir, defaultCsvFileName());

  fs.writeFileSync(filePath, `${toCsv(records)}\r\n`, 'utf-8');

  logger.info(`CSV file "${filePath}" created successfully.`, { record_count: records.length });
  return filePath;
}
