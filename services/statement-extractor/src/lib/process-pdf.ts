/**
 * Statement Extraction Pipeline
 *
 * PDF text -> statement parser -> AMFI scheme lookup -> validation -> output.
 * One statement file per instance, processed in a single pass.
 */

import fs from 'fs';
import {
  logger,
  createRunContext,
  runWithContextAsync,
  extractCasStatement,
  serializeRecords,
  validateTransactionRecords,
  isOutputFormat,
  InputFileError,
  OutputFormatError,
  OUTPUT_FORMATS,
  linesScannedCounter,
  fundHeadersCounter,
  transactionsCounter,
  unmatchedLinesCounter,
  invalidRecordsCounter,
  extractionDurationHistogram,
  type OutputByFormat,
  type OutputFormat,
  type SchemeLookup,
  type SerializeOptions,
  type StatementParseStats,
  type TransactionRecord,
} from '@cas-extractor/shared';
import { extractTextFromPdf, type PdfTextResult } from './pdf';
import { fetchSchemeLookup } from './nav-source';

/**
 * Collaborators the pipeline calls out to; replaced in tests
 */
export interface ProcessPdfDeps {
  extractText?: (filePath: string, password?: string) => Promise<PdfTextResult>;
  loadSchemes?: () => Promise<SchemeLookup>;
}

function recordParseMetrics(stats: StatementParseStats): void {
  linesScannedCounter.inc(stats.linesScanned);
  unmatchedLinesCounter.inc(stats.unmatchedLines);
  for (const [rule, count] of Object.entries(stats.fundHeaders)) {
    fundHeadersCounter.inc({ rule }, count);
  }
  for (const [layout, count] of Object.entries(stats.transactions)) {
    transactionsCounter.inc({ layout }, count);
  }
}

export class ProcessPdf {
  readonly filename: string;
  readonly password?: string;
  /** Records from the most recent getPdfData call */
  records: TransactionRecord[] = [];
  /** Parser warnings from the most recent getPdfData call */
  warnings: string[] = [];

  private readonly extractText: NonNullable<ProcessPdfDeps['extractText']>;
  private readonly loadSchemes: NonNullable<ProcessPdfDeps['loadSchemes']>;

  constructor(filename: string, password?: string, deps: ProcessPdfDeps = {}) {
    if (!filename) {
      throw new InputFileError('filename cannot be empty');
    }
    if (!fs.existsSync(filename) || !fs.statSync(filename).isFile()) {
      throw new InputFileError(`PDF file not found: ${filename}`);
    }

    this.filename = filename;
    this.password = password;
    this.extractText = deps.extractText ?? extractTextFromPdf;
    this.loadSchemes = deps.loadSchemes ?? (() => fetchSchemeLookup());
  }

  /**
   * Extract the statement's transactions in the requested format.
   * The default csv format writes a file and resolves to undefined.
   */
  getPdfData(): Promise<undefined>;
  getPdfData<F extends OutputFormat>(format: F, options?: SerializeOptions): Promise<OutputByFormat[F]>;
  getPdfData(format: string, options?: SerializeOptions): Promise<OutputByFormat[OutputFormat]>;
  async getPdfData(
    format: string = 'csv',
    options: SerializeOptions = {}
  ): Promise<OutputByFormat[OutputFormat]> {
    if (!isOutputFormat(format)) {
      throw new OutputFormatError(`Output format must be one of ${OUTPUT_FORMATS.join(', ')}`);
    }

    return runWithContextAsync(createRunContext(this.filename), async () => {
      const endTimer = extractionDurationHistogram.startTimer({ format });

      try {
        logger.info('Processing PDF. Please wait...');

        const { pages } = await this.extractText(this.filename, this.password);
        const schemes = await this.loadSchemes();
        const result = extractCasStatement(pages, schemes);
        recordParseMetrics(result.stats);

        const validation = validateTransactionRecords(result.records);
        if (!validation.valid) {
          invalidRecordsCounter.inc(validation.errors?.length ?? 1);
        }

        this.records = result.records;
        this.warnings = result.warnings;

        const output = serializeRecords(result.records, format, options);
        endTimer({ status: 'success' });
        return output;
      } catch (error) {
        endTimer({ status: 'failed' });
        throw error;
      }
    });
  }
}
