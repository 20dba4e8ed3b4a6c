import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

export const DEFAULT_TIMEOUT_MS = 30_000;

export type HttpClientOptions = {
  baseURL: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Replaces the network transport; tests pass an in-process stand-in here. */
  adapter?: AxiosAdapter;
};

/**
 * JSON-over-HTTP client that hands back the raw response text and never throws on
 * status, so callers can report non-2xx bodies verbatim.
 */
export function createHttpClient({ baseURL, headers, timeoutMs, adapter }: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs ?? DEFAULT_TIMEOUT_MS,
    headers: { Accept: 'application/json', ...headers },
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
    ...(adapter ? { adapter } : {}),
  });
}

export const isSuccessStatus = (status: number) => status >= 200 && status < 300;

export const bodyAsText = (data: unknown): string =>
  typeof data === 'string' ? data : data === undefined || data === null ? '' : JSON.stringify(data);
