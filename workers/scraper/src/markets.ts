// OASIS price markets and their query parameters

import { UnsupportedMarketError } from '../../../shared/utils/errors';

export const Markets = {
  DAY_AHEAD_HOURLY: 'DAY_AHEAD_HOURLY',
  REAL_TIME_15_MIN: 'REAL_TIME_15_MIN',
  REAL_TIME_HOURLY: 'REAL_TIME_HOURLY'
} as const;

export type Market = typeof Markets[keyof typeof Markets];

export interface MarketQuery {
  queryName: string;
  marketRunId: string;
  version: number;
  /** Column holding the price in the returned CSV */
  valueColumn: 'MW' | 'PRC';
}

export const MARKET_QUERIES = {
  DAY_AHEAD_HOURLY: { queryName: 'PRC_LMP', marketRunId: 'DAM', version: 12, valueColumn: 'MW' },
  REAL_TIME_15_MIN: { queryName: 'PRC_RTPD_LMP', marketRunId: 'RTPD', version: 3, valueColumn: 'PRC' },
  REAL_TIME_HOURLY: { queryName: 'PRC_HASP_LMP', marketRunId: 'HASP', version: 3, valueColumn: 'MW' }
} satisfies Record<Market, MarketQuery>;

export function isMarket(value: string): value is Market {
  return Object.prototype.hasOwnProperty.call(MARKET_QUERIES, value);
}

/**
 * Validate a market coming from an untyped caller (query string, JS code).
 */
export function resolveMarket(value: string): Market {
  if (!isMarket(value)) {
    throw new UnsupportedMarketError(value);
  }
  return value;
}

export function getMarketQuery(market: string): MarketQuery {
  return MARKET_QUERIES[resolveMarket(market)];
}
