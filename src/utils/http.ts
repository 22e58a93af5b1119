// CHANGE: Provide retrying HTTP utilities with concurrency limits.
// WHY: Transient failures are retried with backoff inside a bounded timeout; 4xx answers are final.

import axios, { AxiosError, AxiosInstance, AxiosResponse, RawAxiosRequestHeaders } from "axios";
import pLimit from "p-limit";
import { NET } from "../config.js";
import { debug } from "../logger.js";

const concurrencyLimit = pLimit(Math.max(1, NET.CONCURRENCY));

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "mw-manifest-diff/1.0"
  }
});

function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * Decide whether a failed request is worth another attempt.
 *
 * @param error - Error raised by axios or the transport.
 */
export function isTransient(error: unknown): boolean {
  if (!(error instanceof AxiosError)) {
    return false;
  }
  const status = error.response?.status;
  if (typeof status === "number") {
    return status === 429 || (status >= 500 && status < 600);
  }
  // No response at all: connection refused/reset, DNS failure, timeout.
  return true;
}

async function executeWithRetry<T>(operation: () => Promise<AxiosResponse<T>>, attempt: number): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (error) {
    const nextAttempt = attempt + 1;
    if (nextAttempt >= NET.RETRIES || !isTransient(error)) {
      throw error;
    }
    const backoff = NET.RETRY_BASE_DELAY_MS * 2 ** attempt;
    const url = error instanceof AxiosError ? error.config?.url : undefined;
    debug(`HTTP retry (${nextAttempt}/${NET.RETRIES}) after ${backoff}ms for ${url ?? "unknown-url"}`);
    await sleep(backoff);
    return executeWithRetry(operation, nextAttempt);
  }
}

/**
 * Perform GET request expecting a text payload.
 *
 * @param url - Target URL.
 * @param headers - Extra request headers.
 * @returns Response body and status.
 */
export async function getText(
  url: string,
  headers: RawAxiosRequestHeaders = {}
): Promise<{ readonly data: string; readonly status: number }> {
  const response = await concurrencyLimit(() =>
    executeWithRetry(() => httpClient.get<string>(url, { headers, responseType: "text" }), 0)
  );
  return {
    data: String(response.data),
    status: response.status
  };
}

/**
 * Perform GET request expecting binary payload.
 *
 * @param url - Target URL.
 * @param headers - Extra request headers.
 * @returns Buffer with binary payload and status.
 */
export async function getBinary(
  url: string,
  headers: RawAxiosRequestHeaders = {}
): Promise<{ readonly data: Buffer; readonly status: number }> {
  const response = await concurrencyLimit(() =>
    executeWithRetry(() => httpClient.get<ArrayBuffer>(url, { headers, responseType: "arraybuffer" }), 0)
  );
  return {
    data: Buffer.from(response.data),
    status: response.status
  };
}

export { httpClient };
