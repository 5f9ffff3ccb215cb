/**
 * AMFI NAV Table Source
 *
 * Downloads NAVopen.txt once per run, or reads a saved copy from disk.
 */

import fs from 'fs';
import {
  config,
  logger,
  navFetchDurationHistogram,
  ReferenceDataError,
  SchemeLookup,
} from '@cas-extractor/shared';

export interface NavFetchOptions {
  url?: string;
  timeoutMs?: number;
}

/**
 * Fetch the AMFI scheme table.
 *
 * A non-2xx response leaves every scheme code blank rather than failing
 * the run; a transport error or timeout is fatal.
 */
export async function fetchSchemeLookup(options: NavFetchOptions = {}): Promise<SchemeLookup> {
  const url = options.url ?? config.amfiNavUrl;
  const timeoutMs = options.timeoutMs ?? config.navFetchTimeoutMs;
  const endTimer = navFetchDurationHistogram.startTimer();

  logger.info('Fetching AMFI NAV table', { url, timeout_ms: timeoutMs });

  let text: string;
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });

    if (!response.ok) {
      endTimer({ status: String(response.status) });
      logger.warn('Failed to retrieve the latest NAV table', { url, status: response.status });
      return SchemeLookup.empty();
    }

    text = await response.text();
  } catch (error) {
    endTimer({ status: 'error' });
    throw new ReferenceDataError(
      `Failed to fetch AMFI NAV table from ${url}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  endTimer({ status: 'ok' });
  return SchemeLookup.fromText(text);
}

/**
 * Load the AMFI scheme table from a saved NAVopen.txt
 */
export function loadSchemeLookupFromFile(filePath: string): SchemeLookup {
  logger.info('Reading AMFI NAV table from file', { filePath });

  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ReferenceDataError(
      `Cannot read NAV table ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return SchemeLookup.fromText(text);
}
