#!/usr/bin/env node
/**
 * cas-extract
 *
 * Extracts mutual fund transactions from a CAS statement PDF and writes
 * them as CSV, JSON, records or a console table.
 */

import fs from 'fs';
import path from 'path';
import {
  logger,
  config,
  defaultCsvFileName,
  getMetrics,
} from '@cas-extractor/shared';
import { ProcessPdf, type ProcessPdfDeps } from './lib/process-pdf';
import { loadSchemeLookupFromFile } from './lib/nav-source';
import { parseCliArgs, UsageError, USAGE, type CliArgs } from './lib/cli-args';

async function extract(args: CliArgs, baseDeps: ProcessPdfDeps): Promise<void> {
  const { navFile } = args;
  const deps: ProcessPdfDeps = navFile
    ? { ...baseDeps, loadSchemes: async () => loadSchemeLookupFromFile(navFile) }
    : baseDeps;
  const password = args.password ?? (config.pdfPassword || undefined);
  const processor = new ProcessPdf(args.filename, password, deps);

  switch (args.format) {
    case 'csv': {
      const csvFileName = args.output ?? path.join(config.csvOutputDir, defaultCsvFileName());
      await processor.getPdfData('csv', { csvFileName });
      break;
    }
    case 'json': {
      const json = await processor.getPdfData('json');
      process.stdout.write(`${json}\n`);
      break;
    }
    case 'dicts': {
      const records = await processor.getPdfData('dicts');
      process.stdout.write(`${JSON.stringify(records, null, 2)}\n`);
      break;
    }
    case 'df': {
      const table = await processor.getPdfData('df');
      console.table(table.toRecords(), [...table.columns]);
      break;
    }
    default:
      // Rejected with the list of supported formats
      await processor.getPdfData(args.format);
  }
}

export async function main(argv: string[], deps: ProcessPdfDeps = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  let exitCode = 0;
  try {
    await extract(args, deps);
  } catch (error) {
    logger.error('Statement extraction failed', error, { filename: args.filename });
    exitCode = 1;
  }

  if (args.metricsFile) {
    fs.writeFileSync(args.metricsFile, await getMetrics(), 'utf-8');
    logger.info('Metrics written', { metricsFile: args.metricsFile });
  }

  return exitCode;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error('Unexpected failure', error);
      process.exitCode = 1;
    });
}
