/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  createRunContext,
  runWithContextAsync,
  type RunContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type LogLevel } from './config';

// Errors
export {
  InputFileError,
  OutputFormatError,
  PdfDecryptionError,
  PdfExtractionError,
  ReferenceDataError,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  linesScannedCounter,
  fundHeadersCounter,
  transactionsCounter,
  unmatchedLinesCounter,
  invalidRecordsCounter,
  referenceSchemesGauge,
  malformedReferenceRowsCounter,
  navFetchDurationHistogram,
  extractionDurationHistogram,
  getMetrics,
  resetMetrics,
} from './metrics';

// Schemas
export { validateTransactionRecords, type ValidationResult } from './schemas';

// Reference data
export { SchemeLookup, parseNavTable, type NavTableParseResult } from './reference/amfi-nav';

// CAS statement extraction
export {
  extractCasStatement,
  // Parser
  parseStatementLines,
  prepareStatementLines,
  PARSER_VERSION,
  type StatementParseResult,
  type StatementParseStats,
  // Fund headers
  extractFundAndIsin,
  type FundHeaderMatch,
  type FundHeaderRule,
  // Patterns
  FOLIO_PAN_PATTERN,
  FUND_ISIN_PATTERN,
  REGULAR_BUY_PATTERN,
  REGULAR_SELL_PATTERN,
  SEGREGATED_BUY_PATTERN,
  hasFundNamePattern,
  startsWithHoldingMode,
  stripRegistrar,
  cleanFundName,
  cleanFundNameSmart,
  extractIsin,
  joinSplitIsin,
  splitOnIsinLabel,
  matchFolio,
  matchFundIsin,
  matchTransaction,
  type FolioMatch,
  type FundIsinMatch,
  type TransactionMatch,
  type TransactionLayout,
} from './extractors/cas-statement';

// Output
export {
  serializeRecords,
  TransactionTable,
  writeCsv,
  toCsv,
  defaultCsvFileName,
  type OutputByFormat,
  type SerializeOptions,
  type CellValue,
} from './output';
