import { describe, it, expect } from '@jest/globals';
import {
  OTHER_ALLOWANCES_CATEGORY,
  OTHER_ALLOWANCES_KEY,
  accumulatePayrollRun,
  createFiscalYearEarnings,
  resolveEarningCategory,
  resolveEarningLabel,
  toFiscalYearResult,
} from '@/lib/utils/earnings-agg';
import { utcDate } from '@/lib/date-helpers';
import { dec } from '@/lib/money';
import type { EarningsMappings, FiscalYearEarnings } from '@/lib/types';
import { payrollRun } from '../helpers/fake-hris';

const mappings: EarningsMappings = {
  earnings: { REG: 'Regular Pay', OT: 'Overtime' },
  categories: { REG: 'Base', OT: 'Overtime' },
};

const byTypeTotal = (acc: FiscalYearEarnings) =>
  Array.from(acc.earningsByType.values()).reduce((s, d) => s.plus(d.amount), dec(0));
const byCategoryTotal = (acc: FiscalYearEarnings) =>
  Array.from(acc.earningsByCategory.values()).reduce((s, v) => s.plus(v), dec(0));

describe('resolveEarningCategory', () => {
  it('uses the mapped category for a known code', () => {
    expect(resolveEarningCategory('REG', { REG: 'Base' })).toBe('Base');
  });

  it('falls back to the mapping entry for "Other Allowances or Earnings"', () => {
    const categories = { REG: 'Base', [OTHER_ALLOWANCES_KEY]: 'Misc Allowances' };
    expect(resolveEarningCategory('TIPS', categories)).toBe('Misc Allowances');
  });

  it('falls back to the literal "Other Allowances" when the catch-all is not mapped', () => {
    expect(resolveEarningCategory('TIPS', { REG: 'Base' })).toBe(OTHER_ALLOWANCES_CATEGORY);
    expect(OTHER_ALLOWANCES_CATEGORY).toBe('Other Allowances');
  });

  it('does not treat inherited object properties as mapped codes', () => {
    expect(resolveEarningCategory('toString', {})).toBe('Other Allowances');
  });
});

describe('resolveEarningLabel', () => {
  it('returns the mapped label or the raw code', () => {
    expect(resolveEarningLabel('REG', mappings.earnings)).toBe('Regular Pay');
    expect(resolveEarningLabel('XYZ', mappings.earnings)).toBe('XYZ');
  });
});

describe('accumulatePayrollRun', () => {
  it('adds net pay and groups earnings by code and category', () => {
    const acc = createFiscalYearEarnings(2024);

    accumulatePayrollRun(acc, payrollRun({ net_pay: 800, earnings: [['REG', 1000], ['OT', 200]] }), mappings);
    accumulatePayrollRun(acc, payrollRun({ net_pay: 400.5, earnings: [['REG', 500]] }), mappings);

    expect(acc.netPay.toNumber()).toBe(1200.5);
    expect(acc.totalGrossEarnings.toNumber()).toBe(1700);
    expect(acc.earningsByType.get('REG')?.label).toBe('Regular Pay');
    expect(acc.earningsByType.get('REG')?.amount.toNumber()).toBe(1500);
    expect(acc.earningsByType.get('OT')?.amount.toNumber()).toBe(200);
    expect(acc.earningsByCategory.get('Base')?.toNumber()).toBe(1500);
    expect(acc.earningsByCategory.get('Overtime')?.toNumber()).toBe(200);
  });

  it('ignores earning lines with a zero, null or non-numeric amount', () => {
    const acc = createFiscalYearEarnings(2024);

    accumulatePayrollRun(
      acc,
      payrollRun({ earnings: [['REG', 0], ['OT', null], ['BON', 'n/a'], ['HOL', '0.00']] }),
      mappings
    );

    expect(acc.totalGrossEarnings.toNumber()).toBe(0);
    expect(acc.earningsByType.size).toBe(0);
    expect(acc.earningsByCategory.size).toBe(0);
  });

  it('keeps negative adjustments and numeric strings', () => {
    const acc = createFiscalYearEarnings(2024);

    accumulatePayrollRun(acc, payrollRun({ earnings: [['REG', '250.10'], ['REG', -50.1]] }), mappings);

    expect(acc.earningsByType.get('REG')?.amount.toNumber()).toBe(200);
    expect(acc.totalGrossEarnings.toNumber()).toBe(200);
  });

  it('sums decimal amounts without float drift', () => {
    const acc = createFiscalYearEarnings(2024);

    accumulatePayrollRun(acc, payrollRun({ net_pay: 0.1, earnings: [['REG', 0.1]] }), mappings);
    accumulatePayrollRun(acc, payrollRun({ net_pay: 0.2, earnings: [['REG', 0.2]] }), mappings);

    expect(acc.netPay.toNumber()).toBe(0.3);
    expect(acc.totalGrossEarnings.toNumber()).toBe(0.3);
  });

  it('records a missing earning type under the empty code', () => {
    const acc = createFiscalYearEarnings(2024);

    accumulatePayrollRun(acc, { earnings: [{ type: null, amount: 75 }] }, mappings);

    const detail = acc.earningsByType.get('');
    expect(detail?.code).toBe('');
    expect(detail?.label).toBe('');
    expect(detail?.amount.toNumber()).toBe(75);
    expect(acc.earningsByCategory.get('Other Allowances')?.toNumber()).toBe(75);
  });

  it('skips net pay when the run has none and tolerates a run without earnings', () => {
    const acc = createFiscalYearEarnings(2024);

    accumulatePayrollRun(acc, { net_pay: null, earnings: null }, mappings);

    expect(acc.netPay.toNumber()).toBe(0);
    expect(acc.totalGrossEarnings.toNumber()).toBe(0);
  });

  it('keeps gross, per-code and per-category totals equal', () => {
    const acc = createFiscalYearEarnings(2024);
    const categories = { REG: 'Base', HOL: 'Base', OT: 'Overtime' };

    accumulatePayrollRun(
      acc,
      payrollRun({ earnings: [['REG', 1234.56], ['HOL', 80], ['OT', 99.99], ['TIPS', 12.5]] }),
      { earnings: {}, categories }
    );
    accumulatePayrollRun(acc, payrollRun({ earnings: [['REG', 1000], ['CAR', 300], ['OT', 0]] }), {
      earnings: {},
      categories,
    });

    expect(acc.totalGrossEarnings.toNumber()).toBe(2727.05);
    expect(byTypeTotal(acc).eq(acc.totalGrossEarnings)).toBe(true);
    expect(byCategoryTotal(acc).eq(acc.totalGrossEarnings)).toBe(true);
    expect(acc.earningsByCategory.get('Base')?.toNumber()).toBe(2314.56);
    expect(acc.earningsByCategory.get('Other Allowances')?.toNumber()).toBe(312.5);
  });
});

describe('toFiscalYearResult', () => {
  it('serializes the accumulator with ISO window dates and plain numbers', () => {
    const acc = createFiscalYearEarnings(2025);
    accumulatePayrollRun(acc, payrollRun({ net_pay: 900, earnings: [['REG', 1000], ['OT', 150]] }), mappings);

    const result = toFiscalYearResult(acc, { start: utcDate(2024, 6, 1), end: utcDate(2025, 5, 30) });

    expect(result).toEqual({
      start_date: '2024-07-01',
      end_date: '2025-06-30',
      year: 2025,
      net_pay: 900,
      total_gross_earnings: 1150,
      earnings_by_type: {
        REG: { code: 'REG', label: 'Regular Pay', amount: 1000 },
        OT: { code: 'OT', label: 'Overtime', amount: 150 },
      },
      earnings_by_category: { Base: 1000, Overtime: 150 },
    });
    expect(JSON.parse(JSON.stringify(result))).toEqual(result);
  });
});
