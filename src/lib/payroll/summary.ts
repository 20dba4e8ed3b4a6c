import type { AxiosInstance } from 'axios';
import { readHrisConfig } from '../config';
import { defaultFiscalWindow, previousFiscalWindow, toIsoDate, type DateWindow } from '../date-helpers';
import { createLogger } from '../logger';
import {
  DEFAULT_CATEGORY_MAP_FILE,
  DEFAULT_EARNINGS_MAP_FILE,
  loadMappingFile,
  type MappingRoots,
} from '../mapping-loader';
import { createHrisClient, type HrisCredentials } from '../providers/merge-hris';
import { fetchPayrollRunsForPeriod } from './period-fetcher';
import { toFiscalYearResult } from '../utils/earnings-agg';
import type { EarningsMappings, SummaryResult } from '../types';

const log = createLogger('summary');

export type SummaryOptions = {
  /** HRIS UUID of the employee */
  employeeId: string;
  /** Defaults to Jan 1 of the current UTC year */
  currentFyStart?: Date;
  /** Defaults to Dec 31 of the current UTC year */
  currentFyEnd?: Date;
  /** US, EU or APAC; defaults to MERGE_REGION, then US */
  region?: string;
  useCheckDateFiltering?: boolean;
  earningsMapFile?: string;
  categoryMapFile?: string;
  mappingRoots?: Partial<MappingRoots>;
  /** Read from MERGE_API_KEY / MERGE_ACCOUNT_TOKEN when omitted */
  credentials?: HrisCredentials;
  /** Prebuilt HRIS client; when set, region and credentials are not used */
  client?: AxiosInstance;
  /** Reference date for the default window */
  today?: Date;
};

export function resolveHrisClient({ client, credentials, region }: SummaryOptions): AxiosInstance {
  if (client) return client;
  if (credentials) {
    return createHrisClient({ ...credentials, region: region ?? process.env.MERGE_REGION ?? 'US' });
  }
  const config = readHrisConfig();
  return createHrisClient({
    apiKey: config.apiKey,
    accountToken: config.accountToken,
    region: region ?? config.region,
  });
}

/**
 * Summarizes an employee's payroll runs for the current fiscal year and the one before
 * it. Both windows are fetched concurrently; if either fetch fails the returned promise
 * rejects with that error and no partial summary is produced.
 */
export async function summarizeEmployeePayrollRuns(options: SummaryOptions): Promise<SummaryResult> {
  const defaults = defaultFiscalWindow(options.today);
  const currentWindow: DateWindow = {
    start: options.currentFyStart ?? defaults.start,
    end: options.currentFyEnd ?? defaults.end,
  };
  const lastWindow = previousFiscalWindow(currentWindow);

  const mappings: EarningsMappings = {
    earnings: loadMappingFile(options.earningsMapFile ?? DEFAULT_EARNINGS_MAP_FILE, options.mappingRoots),
    categories: loadMappingFile(options.categoryMapFile ?? DEFAULT_CATEGORY_MAP_FILE, options.mappingRoots),
  };

  const client = resolveHrisClient(options);
  const useCheckDateFiltering = options.useCheckDateFiltering ?? false;

  log.info(
    `Summarizing employee ${options.employeeId}: ` +
      `${toIsoDate(currentWindow.start)}..${toIsoDate(currentWindow.end)} and ` +
      `${toIsoDate(lastWindow.start)}..${toIsoDate(lastWindow.end)}`
  );

  const [currentData, lastData] = await Promise.all([
    fetchPayrollRunsForPeriod({
      client,
      employeeId: options.employeeId,
      window: currentWindow,
      year: currentWindow.end.getUTCFullYear(),
      mappings,
      useCheckDateFiltering,
    }),
    fetchPayrollRunsForPeriod({
      client,
      employeeId: options.employeeId,
      window: lastWindow,
      year: lastWindow.end.getUTCFullYear(),
      mappings,
      useCheckDateFiltering,
    }),
  ]);

  return {
    current_fy: toFiscalYearResult(currentData, currentWindow),
    last_fy: toFiscalYearResult(lastData, lastWindow),
  };
}
