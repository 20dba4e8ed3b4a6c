export { summarizeEmployeePayrollRuns, type SummaryOptions } from './lib/payroll/summary';
export { fetchPayrollRunsForPeriod, type PeriodFetchOptions } from './lib/payroll/period-fetcher';
export {
  DEFAULT_CATEGORY_MAP_FILE,
  DEFAULT_EARNINGS_MAP_FILE,
  loadMappingFile,
  type MappingRoots,
} from './lib/mapping-loader';
export {
  HRIS_HOSTS,
  createHrisClient,
  type HrisCredentials,
  type HrisRegion,
} from './lib/providers/merge-hris';
export { loadEnvironment, readHrisConfig, type HrisConfig } from './lib/config';
export { ConfigError, HrisApiError, HrisResponseError, MappingFileError } from './lib/errors';
export { OTHER_ALLOWANCES_CATEGORY, OTHER_ALLOWANCES_KEY } from './lib/utils/earnings-agg';
export type {
  EarningDetailResult,
  EarningLine,
  EarningsMapping,
  FiscalYearResult,
  PayrollRun,
  SummaryResult,
} from './lib/types';
