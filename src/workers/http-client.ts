import { request } from 'undici';
import { acquireRateLimit } from '../compliance/rate-limiter.js';
import { config } from '../config.js';
import { CantFindTheRightTable, HttpError } from '../errors.js';
import type { SiteAdapterConfig } from '../types/adapter.js';

export interface HttpResult {
  body: string;
  status: number;
}

/** Retrieve a page. Tests substitute an in-process implementation. */
export type FetchPage = (url: string) => Promise<HttpResult>;

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

export async function fetchHttp(url: string): Promise<HttpResult> {
  const { statusCode, body } = await request(url, {
    method: 'GET',
    headers: { ...DEFAULT_HEADERS, 'User-Agent': config.HTTP_USER_AGENT },
    maxRedirections: 3,
    headersTimeout: config.HTTP_TIMEOUT_MS,
    bodyTimeout: config.HTTP_TIMEOUT_MS,
  });

  const text = await body.text();

  return {
    body: text,
    status: statusCode,
  };
}

/**
 * Fetch a source document, spaced by the source's rate limit. A 404 means the
 * page for this game does not exist, which the caller treats like a missing
 * table; any other non-2xx status is an HTTP failure.
 */
export async function fetchDocument(
  url: string,
  source: SiteAdapterConfig,
  what: string,
  fetchPage: FetchPage = fetchHttp,
): Promise<string> {
  await acquireRateLimit(source.id, source.rateLimitMs);

  const { status, body } = await fetchPage(url);
  if (status === 404) throw new CantFindTheRightTable(what, 0);
  if (status < 200 || status >= 300) throw new HttpError(url, status);
  return body;
}
