import type { z } from 'zod';
import type { HttpSettings } from './config';

export type FetchFn = typeof fetch;
export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = ms => new Promise(resolve => setTimeout(resolve, ms));

/** A non-2xx upstream response, or a request that never produced one (`status` 0). */
export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly url: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface FetchJsonOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  fetchFn?: FetchFn;
  sleepFn?: SleepFn;
  settings: HttpSettings;
}

type QueryValue = string | number | boolean | readonly (string | number)[] | undefined;

/** Join a base URL, a path and query parameters. Arrays become comma lists. */
export function buildUrl(base: string, path: string, params: Record<string, QueryValue> = {}): string {
  const url = new URL(`${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    url.searchParams.set(key, Array.isArray(value) ? value.join(',') : String(value));
  }
  return url.toString();
}

/** `response.json()`, abandoned when `signal` aborts so a stalled body cannot outlive the timeout. */
function readJson(response: Response, signal: AbortSignal): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new Error('body aborted'));
    if (signal.aborted) return onAbort();
    signal.addEventListener('abort', onAbort, { once: true });
    void response.json().then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

const isRetryableStatus = (status: number) => status === 429 || status >= 500;

/**
 * Fetch JSON with a per-attempt timeout and exponential backoff, then parse it with `schema`.
 * The timeout covers reading the body. Network errors, timeouts, unreadable
 * bodies, 429 and 5xx are retried `settings.maxRetries` times,
 * waiting backoffMs, 2·backoffMs, 4·backoffMs … between attempts. Other 4xx fail at once,
 * as does a body that does not match the schema.
 */
export async function fetchJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: FetchJsonOptions): Promise<T> {
  const { settings, fetchFn = fetch, sleepFn = sleep } = options;
  let lastError: HttpError | null = null;

  for (let attempt = 0; attempt <= settings.maxRetries; attempt++) {
    if (attempt > 0) await sleepFn(settings.backoffMs * 2 ** (attempt - 1));

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), settings.timeoutMs);
    const failure = (err: unknown) => {
      const reason = controller.signal.aborted
        ? `timed out after ${settings.timeoutMs} ms`
        : err instanceof Error ? err.message : String(err);
      return new HttpError(`Request to ${url} failed: ${reason}`, 0, url);
    };

    let response: Response;
    let body: unknown;
    try {
      response = await fetchFn(url, {
        method: options.method ?? 'GET',
        headers: options.headers,
        body: options.body,
        signal: controller.signal,
      });
      if (response.ok) body = await readJson(response, controller.signal);
    } catch (err) {
      lastError = failure(err);
      continue;
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.ok) {
      const parsed = schema.safeParse(body);
      if (parsed.success) return parsed.data;
      throw new HttpError(`Unexpected payload from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, response.status, url);
    }

    const error = new HttpError(`Request to ${url} returned ${response.status}`, response.status, url);
    if (!isRetryableStatus(response.status)) throw error;
    lastError = error;
  }

  throw lastError ?? new HttpError(`Request to ${url} failed`, 0, url);
}
