import { z } from 'zod';
import type Big from 'big.js';

// --- Wire shapes of the HRIS employee-payroll-runs collection ---
// Only the fields the aggregation reads are declared; zod strips the rest.

export const earningLineSchema = z.object({
  type: z.string().nullish(),
  amount: z.unknown(),        // number, numeric string or null; see money.toDecimal
});

export const payrollRunSchema = z.object({
  net_pay: z.unknown(),
  check_date: z.unknown(),    // ISO-8601; only read under check-date filtering
  earnings: z.array(earningLineSchema).nullish(),
});

export const payrollRunPageSchema = z.object({
  results: z
    .array(payrollRunSchema)
    .nullish()
    .transform((results) => results ?? []),
  next: z.string().nullish(),
});

export type EarningLine = z.infer<typeof earningLineSchema>;
export type PayrollRun = z.infer<typeof payrollRunSchema>;
export type PayrollRunPage = z.infer<typeof payrollRunPageSchema>;

/** Query string of one employee-payroll-runs request. */
export type PayrollRunQuery = {
  employee_id: string;
  expand: string;
  page_size: string;
  ended_after?: string;
  ended_before?: string;
  cursor?: string;
};

// --- Mapping tables ---

export const mappingFileSchema = z.record(z.string());

/** Flat code → value table loaded from a JSON file; never mutated after load. */
export type EarningsMapping = Readonly<Record<string, string>>;

export interface EarningsMappings {
  /** earning code → human-readable label */
  earnings: EarningsMapping;
  /** earning code → reporting category */
  categories: EarningsMapping;
}

// --- Aggregation ---

export interface EarningDetail {
  code: string;
  label: string;
  amount: Big;
}

/** Working accumulator for one fiscal-year window. */
export interface FiscalYearEarnings {
  year: number;
  netPay: Big;
  totalGrossEarnings: Big;
  earningsByType: Map<string, EarningDetail>;
  earningsByCategory: Map<string, Big>;
}

// --- Output (JSON-serializable) ---

export interface EarningDetailResult {
  code: string;
  label: string;
  amount: number;
}

export interface FiscalYearResult {
  start_date: string;     // YYYY-MM-DD
  end_date: string;       // YYYY-MM-DD
  year: number;
  net_pay: number;
  total_gross_earnings: number;
  earnings_by_type: Record<string, EarningDetailResult>;
  earnings_by_category: Record<string, number>;
}

export interface SummaryResult {
  current_fy: FiscalYearResult;
  last_fy: FiscalYearResult;
}
