/**
 * HTTP Transport
 *
 * Single GET requests against indexing sites with a bounded timeout.
 * User-Agent is the only header sent. No retries: callers decide how a
 * failure affects their result.
 */

import { fetch as undiciFetch } from 'undici';
import { PROVIDER_DEFAULTS } from '../config';

/**
 * Raised when a request cannot be performed or its body cannot be read
 */
export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

export interface FetchOptions {
  /** User-Agent header (default: PROVIDER_DEFAULTS.userAgent) */
  userAgent?: string;
  /** Timeout covering the request and the body read (default: PROVIDER_DEFAULTS.timeoutMs) */
  timeoutMs?: number;
}

export interface FetchedPage {
  url: string;
  status: number;
  ok: boolean;
  body: string;
}

/**
 * GET a URL and read its body as text.
 *
 * Non-2xx responses are returned, not thrown.
 *
 * @throws HttpRequestError on network failure, timeout or an unreadable body
 */
export async function fetchText(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
  const timeoutMs = options.timeoutMs ?? PROVIDER_DEFAULTS.timeoutMs;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await undiciFetch(url, {
      method: 'GET',
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent ?? PROVIDER_DEFAULTS.userAgent,
      },
    });

    const body = await response.text();

    return {
      url,
      status: response.status,
      ok: response.ok,
      body,
    };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new HttpRequestError(`Request timed out after ${timeoutMs}ms`, url);
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new HttpRequestError(`Request failed: ${cause.message}`, url, cause);
  } finally {
    clearTimeout(timeoutId);
  }
}
