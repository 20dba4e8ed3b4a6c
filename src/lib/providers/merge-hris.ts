import type { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { bodyAsText, createHttpClient, isSuccessStatus } from '../http';
import { ConfigError, HrisApiError, HrisResponseError } from '../errors';
import { payrollRunPageSchema, type PayrollRunPage, type PayrollRunQuery } from '../types';

export const hrisRegionSchema = z.enum(['US', 'EU', 'APAC']);
export type HrisRegion = z.infer<typeof hrisRegionSchema>;

export const HRIS_HOSTS: Record<HrisRegion, string> = {
  US: 'https://api.merge.dev',
  EU: 'https://api.eu.merge.dev',
  APAC: 'https://api.apac.merge.dev',
};

export const PAYROLL_RUNS_PATH = '/api/hris/v1/employee-payroll-runs';

export function resolveHost(region: string): string {
  const parsed = hrisRegionSchema.safeParse(region);
  if (!parsed.success) {
    throw new ConfigError(`Unknown HRIS region "${region}" (expected US, EU or APAC)`);
  }
  return HRIS_HOSTS[parsed.data];
}

export type HrisCredentials = {
  /** Server-side API key, sent as the bearer token */
  apiKey: string;
  /** Linked-account token scoping requests to one customer */
  accountToken: string;
};

export type HrisClientOptions = HrisCredentials & {
  region: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
};

export function createHrisClient({ region, apiKey, accountToken, timeoutMs, adapter }: HrisClientOptions): AxiosInstance {
  return createHttpClient({
    baseURL: resolveHost(region),
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'X-Account-Token': accountToken,
    },
    timeoutMs,
    adapter,
  });
}

/**
 * Fetches one page of employee payroll runs.
 * Non-2xx responses throw HrisApiError with the body untouched; there is no retry.
 */
export async function fetchPayrollRunsPage(
  client: AxiosInstance,
  params: PayrollRunQuery
): Promise<PayrollRunPage> {
  const res = await client.get<unknown>(PAYROLL_RUNS_PATH, { params });
  const body = bodyAsText(res.data);

  if (!isSuccessStatus(res.status)) {
    throw new HrisApiError(res.status, body);
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new HrisResponseError(`HRIS API returned a non-JSON body (status ${res.status})`, { cause: err });
  }

  const parsed = payrollRunPageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new HrisResponseError(
      `Unexpected payroll-run page shape at "${issue.path.join('.')}": ${issue.message}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}
