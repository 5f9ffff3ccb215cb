/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  // Reference data
  amfiNavUrl: string;
  navFetchTimeoutMs: number;

  // Input
  pdfPassword: string;

  // Output
  csvOutputDir: string;

  // Logging
  logLevel: LogLevel;
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

export const config: Config = {
  // Reference data
  amfiNavUrl: process.env.AMFI_NAV_URL || 'https://portal.amfiindia.com/spages/NAVopen.txt',
  navFetchTimeoutMs: parseInt(process.env.NAV_FETCH_TIMEOUT_MS || '60000', 10),

  // Input
  pdfPassword: process.env.CAS_PDF_PASSWORD || '',

  // Output
  csvOutputDir: process.env.CSV_OUTPUT_DIR || '.',

  // Logging
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
