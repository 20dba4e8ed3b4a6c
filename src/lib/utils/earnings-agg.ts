import type {
  EarningsMapping,
  EarningsMappings,
  FiscalYearEarnings,
  FiscalYearResult,
  PayrollRun,
} from '../types';
import { add, dec, toDecimal, toNum } from '../money';
import { toIsoDate, type DateWindow } from '../date-helpers';

/** Catch-all key some category mapping files define for unmapped codes. */
export const OTHER_ALLOWANCES_KEY = 'Other Allowances or Earnings';
/** Category used when neither the code nor OTHER_ALLOWANCES_KEY is mapped. */
export const OTHER_ALLOWANCES_CATEGORY = 'Other Allowances';

const lookup = (mapping: EarningsMapping, key: string): string | undefined =>
  Object.hasOwn(mapping, key) ? mapping[key] : undefined;

export function createFiscalYearEarnings(year: number): FiscalYearEarnings {
  return {
    year,
    netPay: dec(0),
    totalGrossEarnings: dec(0),
    earningsByType: new Map(),
    earningsByCategory: new Map(),
  };
}

export const resolveEarningLabel = (code: string, earningsMap: EarningsMapping) =>
  lookup(earningsMap, code) ?? code;

export function resolveEarningCategory(code: string, categoryMap: EarningsMapping): string {
  return (
    lookup(categoryMap, code) ??
    lookup(categoryMap, OTHER_ALLOWANCES_KEY) ??
    OTHER_ALLOWANCES_CATEGORY
  );
}

/**
 * Folds one accepted payroll run into the accumulator: net pay first, then every
 * non-zero earning line into the gross total, its code entry and its category.
 */
export function accumulatePayrollRun(
  acc: FiscalYearEarnings,
  run: PayrollRun,
  mappings: EarningsMappings
): void {
  const netPay = toDecimal(run.net_pay);
  if (netPay) {
    acc.netPay = add(acc.netPay, netPay);
  }

  for (const earning of run.earnings ?? []) {
    const amount = toDecimal(earning.amount);
    if (!amount || amount.eq(0)) continue;

    const code = earning.type ?? '';

    acc.totalGrossEarnings = add(acc.totalGrossEarnings, amount);

    let detail = acc.earningsByType.get(code);
    if (!detail) {
      detail = { code, label: resolveEarningLabel(code, mappings.earnings), amount: dec(0) };
      acc.earningsByType.set(code, detail);
    }
    detail.amount = add(detail.amount, amount);

    const category = resolveEarningCategory(code, mappings.categories);
    acc.earningsByCategory.set(category, add(acc.earningsByCategory.get(category) ?? dec(0), amount));
  }
}

export function toFiscalYearResult(acc: FiscalYearEarnings, window: DateWindow): FiscalYearResult {
  return {
    start_date: toIsoDate(window.start),
    end_date: toIsoDate(window.end),
    year: acc.year,
    net_pay: toNum(acc.netPay),
    total_gross_earnings: toNum(acc.totalGrossEarnings),
    earnings_by_type: Object.fromEntries(
      Array.from(acc.earningsByType, ([code, detail]) => [
        code,
        { code: detail.code, label: detail.label, amount: toNum(detail.amount) },
      ] as const)
    ),
    earnings_by_category: Object.fromEntries(
      Array.from(acc.earningsByCategory, ([category, amount]) => [category, toNum(amount)] as const)
    ),
  };
}
