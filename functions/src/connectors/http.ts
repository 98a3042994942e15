import * as logger from 'firebase-functions/logger';

export interface FetchPolicy {
  timeoutMs: number;
  maxAttempts: number;
}

export class UpstreamHttpError extends Error {
  constructor(message: string, readonly status: number | null) {
    super(message);
    this.name = 'UpstreamHttpError';
  }
}

const USER_AGENT = 'EventsNewsAPI/1.0';

/**
 * GETs a url with a per-attempt timeout and linear back-off. Client errors
 * (4xx) are not retried.
 */
export async function fetchWithRetry(url: string, accept: string, policy: FetchPolicy): Promise<Response> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': USER_AGENT,
          Accept: accept,
        },
        signal: AbortSignal.timeout(policy.timeoutMs),
      });

      if (response.ok) {
        return response;
      }

      const body = await response.text().catch(() => '');
      const error = new UpstreamHttpError(`Upstream responded ${response.status}: ${body.slice(0, 200)}`, response.status);
      if (response.status < 500 && response.status !== 429) {
        throw error;
      }
      lastError = error;
    } catch (error) {
      if (error instanceof UpstreamHttpError && error.status !== null && error.status < 500 && error.status !== 429) {
        throw error;
      }
      lastError = error;
    }

    if (attempt < maxAttempts) {
      logger.warn('Retrying upstream request', { url: redactUrl(url), attempt });
      await new Promise(resolve => setTimeout(resolve, attempt * 250));
    }
  }

  throw lastError instanceof Error ? lastError : new Error(`Failed to fetch ${redactUrl(url)}`);
}

export async function fetchJson(url: string, policy: FetchPolicy): Promise<unknown> {
  const response = await fetchWithRetry(url, 'application/json', policy);
  return response.json();
}

export async function fetchText(url: string, accept: string, policy: FetchPolicy): Promise<string> {
  const response = await fetchWithRetry(url, accept, policy);
  return response.text();
}

/** Drops query parameters that carry credentials before a url is logged. */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const key of ['apikey', 'api_key', 'key']) {
      if (parsed.searchParams.has(key)) {
        parsed.searchParams.set(key, 'redacted');
      }
    }
    return parsed.toString();
  } catch {
    return url;
  }
}
