/**
 * OASIS Bulk Query Fetcher
 * Builds SingleZip queries and downloads them with bounded retry
 */

import { TimeUtil, PACIFIC_TIMEZONE, type DateInput } from '../../../shared/utils/time';
import { NetworkError } from '../../../shared/utils/errors';
import { getMarketQuery, type MarketQuery } from './markets';

export const OASIS_URL = 'http://oasis.caiso.com/oasisapi/SingleZip';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryPolicy {
  maxAttempts: number;
  retryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  retryDelayMs: 5000
};

export interface HttpContext {
  fetch: FetchLike;
  sleep: Sleep;
  retry: RetryPolicy;
}

export type OasisResponse =
  | { ok: true; status: number; attempts: number; body: Uint8Array }
  | { ok: false; status: number; attempts: number; body: Uint8Array };

export interface OasisQuery {
  queryName: string;
  version: number;
  start: number;
  end: number;
  marketRunId?: string;
  /** Trailing filter parameters, e.g. node or pnode_id */
  filters: Record<string, string>;
}

export interface LmpQuery {
  url: string;
  market: MarketQuery;
  start: number;
  end: number;
}

/**
 * Build a SingleZip URL. Parameter order is fixed; values are not
 * form-encoded because OASIS expects the literal ":" and "," separators.
 */
export function buildOasisUrl(query: OasisQuery, baseUrl: string = OASIS_URL): string {
  const params = [
    'resultformat=6',
    `queryname=${query.queryName}`,
    `version=${query.version}`,
    `startdatetime=${TimeUtil.formatOasisUTC(query.start)}`,
    `enddatetime=${TimeUtil.formatOasisUTC(query.end)}`
  ];
  if (query.marketRunId) {
    params.push(`market_run_id=${query.marketRunId}`);
  }
  for (const [key, value] of Object.entries(query.filters)) {
    params.push(`${key}=${value}`);
  }
  return `${baseUrl}?${params.join('&')}`;
}

/**
 * One-day LMP query starting at `date` in the operator's zone.
 * The window ends one calendar day later, so DST days span 23 or 25 hours.
 */
export function buildLmpQuery(
  market: string,
  date: DateInput,
  nodes: readonly string[],
  options: { baseUrl?: string; timezone?: string; now?: number } = {}
): LmpQuery {
  const marketQuery = getMarketQuery(market);
  const timezone = options.timezone ?? PACIFIC_TIMEZONE;

  const start = TimeUtil.resolveDate(date, timezone, options.now);
  const end = TimeUtil.addCalendarDays(start, 1, timezone);

  const url = buildOasisUrl({
    queryName: marketQuery.queryName,
    version: marketQuery.version,
    start,
    end,
    marketRunId: marketQuery.marketRunId,
    filters: { node: nodes.map(encodeURIComponent).join(',') }
  }, options.baseUrl);

  return { url, market: marketQuery, start, end };
}

/**
 * GET an OASIS ZIP, retrying non-2xx responses.
 *
 * Up to `maxAttempts` requests are made with a fixed pause between them; the
 * last response is returned either way, tagged ok/not ok. Network errors are
 * not retried. The politeness delay runs after the final attempt whatever the
 * outcome, to stay under the OASIS rate limit.
 */
export async function fetchOasisZip(
  url: string,
  ctx: HttpContext,
  politenessSeconds = 5
): Promise<OasisResponse> {
  const { maxAttempts, retryDelayMs } = ctx.retry;

  let attempt = 1;
  let response = await requestZip(url, ctx.fetch);

  while (!response.ok && attempt < maxAttempts) {
    console.warn(`[OASIS] Failed to get data from CAISO. Error: ${response.status}`);
    console.warn(`[OASIS] Retrying ${attempt}...`);
    await ctx.sleep(retryDelayMs);
    attempt++;
    response = await requestZip(url, ctx.fetch);
  }

  if (!response.ok) {
    console.warn(`[OASIS] Giving up after ${attempt} attempts, last status ${response.status}`);
  }

  const body = new Uint8Array(await response.arrayBuffer());

  if (politenessSeconds > 0) {
    await ctx.sleep(politenessSeconds * 1000);
  }

  return response.ok
    ? { ok: true, status: response.status, attempts: attempt, body }
    : { ok: false, status: response.status, attempts: attempt, body };
}

async function requestZip(url: string, fetchImpl: FetchLike): Promise<Response> {
  try {
    return await fetchImpl(url, {
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; caiso-grid-feed/1.0)',
        'Accept': 'application/zip,application/octet-stream,*/*'
      }
    });
  } catch (error) {
    throw new NetworkError(url, error);
  }
}
