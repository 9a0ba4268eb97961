// CAISO grid data client
export { Caiso, TRADING_HUB_NODES, type CaisoOptions } from './caiso';
export { Markets, MARKET_QUERIES, resolveMarket, isMarket, type Market, type MarketQuery } from './markets';
export {
  extractCSVFromZip,
  parseCSV,
  parseLmpCsv,
  pivotLmpRows,
  normalizeLmpTable,
  filterLmpNodes
} from './caiso-parser';
export {
  buildLmpQuery,
  buildOasisUrl,
  fetchOasisZip,
  type OasisResponse,
  type RetryPolicy
} from './oasis-fetcher';
export { getHistorical, toIntervalRows } from './outlook-fetcher';
export * from './types';
export * from '../../../shared/utils/errors';
export { TimeUtil, PACIFIC_TIMEZONE, type CalendarDate, type DateInput } from '../../../shared/utils/time';
