import type { AxiosInstance } from 'axios';
import { fetchPayrollRunsPage } from '../providers/merge-hris';
import { accumulatePayrollRun, createFiscalYearEarnings } from '../utils/earnings-agg';
import { isCheckDateInWindow, toIsoDate, type DateWindow } from '../date-helpers';
import { createLogger } from '../logger';
import type { EarningsMappings, FiscalYearEarnings, PayrollRunQuery } from '../types';

const log = createLogger('period-fetcher');

export const PAGE_SIZE = 100;
export const PAYROLL_RUN_EXPANSIONS = 'earnings,deductions,taxes';

export type PeriodFetchOptions = {
  /** HRIS client already carrying the bearer and account tokens */
  client: AxiosInstance;
  employeeId: string;
  window: DateWindow;
  /** Label stored on the result, usually the window's end year */
  year: number;
  mappings: EarningsMappings;
  /**
   * false: the server filters on ended_after/ended_before.
   * true: every run is fetched and filtered here on check_date.
   */
  useCheckDateFiltering?: boolean;
};

export function buildPayrollRunQuery(
  employeeId: string,
  window: DateWindow,
  useCheckDateFiltering: boolean
): PayrollRunQuery {
  const query: PayrollRunQuery = {
    employee_id: employeeId,
    expand: PAYROLL_RUN_EXPANSIONS,
    page_size: String(PAGE_SIZE),
  };
  if (!useCheckDateFiltering) {
    query.ended_after = toIsoDate(window.start);
    query.ended_before = toIsoDate(window.end);
  }
  return query;
}

/**
 * Walks every page of an employee's payroll runs for one window and folds them into a
 * fresh accumulator. Pages are requested one after another since each needs the
 * previous page's cursor. Any failed request rejects the whole fetch.
 */
export async function fetchPayrollRunsForPeriod({
  client,
  employeeId,
  window,
  year,
  mappings,
  useCheckDateFiltering = false,
}: PeriodFetchOptions): Promise<FiscalYearEarnings> {
  const result = createFiscalYearEarnings(year);
  const query = buildPayrollRunQuery(employeeId, window, useCheckDateFiltering);

  let cursor: string | undefined;
  let pages = 0;
  let accepted = 0;
  let skipped = 0;

  do {
    const page = await fetchPayrollRunsPage(client, cursor ? { ...query, cursor } : query);
    pages++;
    log.debug(`FY${year} page ${pages}: ${page.results.length} runs`);

    for (const run of page.results) {
      // Net pay must only be counted for runs that pass the check-date window.
      if (useCheckDateFiltering && !isCheckDateInWindow(run.check_date, window)) {
        skipped++;
        continue;
      }
      accumulatePayrollRun(result, run, mappings);
      accepted++;
    }

    cursor = page.next || undefined;
  } while (cursor);

  log.info(
    `FY${year} ${toIsoDate(window.start)}..${toIsoDate(window.end)}: ${accepted} runs over ${pages} page(s)` +
      (useCheckDateFiltering ? `, ${skipped} outside check-date window` : '')
  );
  return result;
}
