import type { DeliveryResult } from '../types.js';

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

/**
 * Request timeouts, rate limiting and server errors are worth retrying.
 * Every other non-2xx status is a permanent failure.
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export async function postJson(
  url: string,
  body: unknown,
  timeoutMs = DEFAULT_HTTP_TIMEOUT_MS
): Promise<DeliveryResult> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    // Network failures and timeouts
    return { status: 'transient', error: error instanceof Error ? error.message : String(error) };
  }

  if (response.ok) {
    return { status: 'success' };
  }

  const error = `HTTP ${response.status}`;
  return isTransientStatus(response.status) ? { status: 'transient', error } : { status: 'permanent', error };
}
