// CAISO client - Today's Outlook and OASIS accessors

import { TimeUtil, PACIFIC_TIMEZONE, type CalendarDate, type DateInput } from '../../../shared/utils/time';
import { CaisoError, HttpStatusError, SchemaError } from '../../../shared/utils/errors';
import {
  extractCSVFromZip,
  filterLmpNodes,
  normalizeLmpTable,
  parseLmpCsv,
  parseNumber,
  parsePnodeCsv,
  pivotLmpRows
} from './caiso-parser';
import { resolveMarket } from './markets';
import {
  DEFAULT_RETRY_POLICY,
  OASIS_URL,
  buildLmpQuery,
  buildOasisUrl,
  fetchOasisZip,
  sleep,
  type FetchLike,
  type HttpContext,
  type RetryPolicy,
  type Sleep
} from './oasis-fetcher';
import {
  DATE_TOKEN,
  HISTORY_BASE,
  OUTLOOK_BASE,
  fetchCSV,
  fetchStats,
  getHistorical
} from './outlook-fetcher';
import {
  ISO_NAME,
  type DemandRow,
  type FuelMix,
  type GridStatus,
  type IntervalRow,
  type LatestDemand,
  type LatestSupply,
  type LmpRow,
  type PnodeRow,
  type SupplyRow
} from './types';

export const TRADING_HUB_NODES = [
  'TH_NP15_GEN-APND',
  'TH_SP15_GEN-APND',
  'TH_ZP26_GEN-APND'
] as const;

const DEMAND_COLUMN = 'Current demand';

export interface CaisoOptions {
  fetch?: FetchLike;
  sleep?: Sleep;
  retry?: Partial<RetryPolicy>;
  outlookBase?: string;
  historyBase?: string;
  oasisUrl?: string;
  /** Clock used for "today" and "yesterday" */
  now?: () => number;
  /**
   * Throw HttpStatusError when OASIS still answers with an error status after
   * the last retry. Off by default: the final response is parsed as-is.
   */
  failOnHttpError?: boolean;
}

export class Caiso {
  readonly name = ISO_NAME;
  readonly isoId = 'caiso';
  readonly defaultTimezone = PACIFIC_TIMEZONE;

  private readonly http: HttpContext;
  private readonly outlookBase: string;
  private readonly historyBase: string;
  private readonly oasisUrl: string;
  private readonly now: () => number;
  private readonly failOnHttpError: boolean;

  constructor(options: CaisoOptions = {}) {
    this.http = {
      fetch: options.fetch ?? ((url, init) => fetch(url, init)),
      sleep: options.sleep ?? sleep,
      retry: { ...DEFAULT_RETRY_POLICY, ...options.retry }
    };
    this.outlookBase = options.outlookBase ?? OUTLOOK_BASE;
    this.historyBase = options.historyBase ?? HISTORY_BASE;
    this.oasisUrl = options.oasisUrl ?? OASIS_URL;
    this.now = options.now ?? Date.now;
    this.failOnHttpError = options.failOnHttpError ?? false;
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  /**
   * Current grid status. Known values: "Normal".
   */
  async getLatestStatus(): Promise<GridStatus> {
    const stats = await fetchStats(`${this.outlookBase}/stats.txt`, this.http.fetch);
    return {
      time: TimeUtil.parseSlotDate(stats.slotDate, this.defaultTimezone),
      status: stats.gridstatus[0],
      reserves: stats.Current_reserve,
      iso: this.name
    };
  }

  /** Operating day according to the status endpoint */
  private async currentDay(): Promise<CalendarDate> {
    const status = await this.getLatestStatus();
    return TimeUtil.calendarDateOfZoned(status.time);
  }

  private today(): CalendarDate {
    return TimeUtil.today(this.defaultTimezone, this.now());
  }

  private yesterday(): CalendarDate {
    return TimeUtil.shiftCalendarDate(this.today(), -1);
  }

  // ---------------------------------------------------------------------------
  // Fuel mix
  // ---------------------------------------------------------------------------

  /**
   * Most recent fuel mix in MW. Updates every 5 minutes.
   */
  async getLatestFuelMix(): Promise<FuelMix> {
    const table = await fetchCSV(`${this.outlookBase}/fuelsource.csv`, this.http.fetch);
    if (!table.header.includes('Time')) {
      throw new SchemaError(['Time'], table.header);
    }
    const last = table.rows[table.rows.length - 1];
    if (!last) {
      throw new CaisoError('fuelsource.csv has no rows');
    }

    const day = await this.currentDay();
    const mix: Record<string, number | null> = {};
    for (const column of table.header) {
      if (column !== 'Time') {
        mix[column] = parseNumber(last[column]);
      }
    }

    return {
      time: TimeUtil.makeTimestamp(last.Time, day, this.defaultTimezone),
      mix,
      iso: this.name
    };
  }

  getFuelMixToday(): Promise<IntervalRow[]> {
    return this.getHistoricalFuelMix(this.today());
  }

  getFuelMixYesterday(): Promise<IntervalRow[]> {
    return this.getHistoricalFuelMix(this.yesterday());
  }

  /**
   * Fuel mix for one day in 5-minute intervals.
   * @param date "YYYYMMDD", "YYYY-MM-DD", a calendar date or a Date
   */
  async getHistoricalFuelMix(date: DateInput): Promise<IntervalRow[]> {
    return getHistorical(
      `${this.historyBase}/${DATE_TOKEN}/fuelsource.csv`,
      TimeUtil.toCalendarDate(date, this.defaultTimezone, this.now()),
      this.http.fetch,
      this.defaultTimezone
    );
  }

  // ---------------------------------------------------------------------------
  // Demand
  // ---------------------------------------------------------------------------

  async getLatestDemand(): Promise<LatestDemand> {
    const table = await fetchCSV(`${this.outlookBase}/demand.csv`, this.http.fetch, ['Time', DEMAND_COLUMN]);
    const latest = [...table.rows].reverse().find(row => parseNumber(row[DEMAND_COLUMN]) !== null);
    if (!latest) {
      throw new CaisoError('demand.csv has no current demand values');
    }

    const day = await this.currentDay();
    return {
      time: TimeUtil.makeTimestamp(latest.Time, day, this.defaultTimezone),
      demand: Number(latest[DEMAND_COLUMN])
    };
  }

  getDemandToday(): Promise<DemandRow[]> {
    return this.getHistoricalDemand(this.today());
  }

  getDemandYesterday(): Promise<DemandRow[]> {
    return this.getHistoricalDemand(this.yesterday());
  }

  async getHistoricalDemand(date: DateInput): Promise<DemandRow[]> {
    const rows = await getHistorical(
      `${this.historyBase}/${DATE_TOKEN}/demand.csv`,
      TimeUtil.toCalendarDate(date, this.defaultTimezone, this.now()),
      this.http.fetch,
      this.defaultTimezone
    );

    if (rows.length > 0 && !(DEMAND_COLUMN in rows[0])) {
      throw new SchemaError([DEMAND_COLUMN], Object.keys(rows[0]));
    }

    const demand: DemandRow[] = [];
    for (const row of rows) {
      const value = row[DEMAND_COLUMN];
      if (typeof value === 'number') {
        demand.push({ Time: row.Time, Demand: value });
      }
    }
    return demand;
  }

  // ---------------------------------------------------------------------------
  // Supply (sum of the fuel mix)
  // ---------------------------------------------------------------------------

  async getLatestSupply(): Promise<LatestSupply> {
    const fuelMix = await this.getLatestFuelMix();
    return {
      time: fuelMix.time,
      supply: sumValues(Object.values(fuelMix.mix))
    };
  }

  getSupplyToday(): Promise<SupplyRow[]> {
    return this.getHistoricalSupply(this.today());
  }

  getSupplyYesterday(): Promise<SupplyRow[]> {
    return this.getHistoricalSupply(this.yesterday());
  }

  async getHistoricalSupply(date: DateInput): Promise<SupplyRow[]> {
    const fuelMix = await this.getHistoricalFuelMix(date);
    return fuelMix.map(({ Time, ...fuels }) => ({
      Time,
      Supply: sumValues(Object.values(fuels))
    }));
  }

  // ---------------------------------------------------------------------------
  // Pricing nodes
  // ---------------------------------------------------------------------------

  /**
   * Aggregate pricing node to pricing node mapping.
   */
  async getPnodes(): Promise<PnodeRow[]> {
    const start = TimeUtil.resolveDate('2022-08-01', this.defaultTimezone);
    const url = buildOasisUrl({
      queryName: 'ATL_PNODE_MAP',
      version: 1,
      start,
      end: TimeUtil.addCalendarDays(start, 1, this.defaultTimezone),
      filters: { pnode_id: 'ALL' }
    }, this.oasisUrl);

    const result = await fetchOasisZip(url, this.http, 0);
    if (!result.ok) {
      throw new HttpStatusError(url, result.status, result.attempts);
    }
    return parsePnodeCsv(extractCSVFromZip(result.body));
  }

  // ---------------------------------------------------------------------------
  // LMP
  // ---------------------------------------------------------------------------

  /**
   * Latest interval of today's prices, one row per node.
   * `market` is any string; resolveMarket rejects names outside Markets.
   */
  async getLatestLmp(market: string, nodes?: readonly string[]): Promise<LmpRow[]> {
    const rows = await this.getLmpToday(market, nodes);

    const latestByNode = new Map<string, LmpRow>();
    for (const row of rows) {
      latestByNode.set(row.Node, row);
    }
    return resolveNodes(nodes)
      .map(node => latestByNode.get(node))
      .filter((row): row is LmpRow => row !== undefined);
  }

  getLmpToday(market: string, nodes?: readonly string[]): Promise<LmpRow[]> {
    return this.getHistoricalLmp(this.today(), market, nodes);
  }

  getLmpYesterday(market: string, nodes?: readonly string[]): Promise<LmpRow[]> {
    return this.getHistoricalLmp(this.yesterday(), market, nodes);
  }

  /**
   * LMP for one day starting at `date`, for a list of nodes.
   *
   * @param market DAY_AHEAD_HOURLY, REAL_TIME_15_MIN or REAL_TIME_HOURLY;
   *   validated by resolveMarket, UnsupportedMarketError otherwise
   * @param nodes nodes to fetch; defaults to the NP15, SP15 and ZP26 trading
   *   hubs. See getPnodes() for the full list.
   * @param sleepSeconds pause after the request to stay under the OASIS rate
   *   limit in regular usage
   */
  async getHistoricalLmp(
    date: DateInput,
    market: string,
    nodes?: readonly string[],
    sleepSeconds = 5
  ): Promise<LmpRow[]> {
    const resolvedMarket = resolveMarket(market);
    const requestedNodes = resolveNodes(nodes);

    const query = buildLmpQuery(resolvedMarket, date, requestedNodes, {
      baseUrl: this.oasisUrl,
      timezone: this.defaultTimezone,
      now: this.now()
    });
    console.log(`[OASIS] ${resolvedMarket} ${TimeUtil.toZonedISO(query.start, this.defaultTimezone)} for ${requestedNodes.length} node(s)`);

    const result = await fetchOasisZip(query.url, this.http, sleepSeconds);
    if (!result.ok) {
      if (this.failOnHttpError) {
        throw new HttpStatusError(query.url, result.status, result.attempts);
      }
      console.warn(`[OASIS] Parsing HTTP ${result.status} response after ${result.attempts} attempts`);
    }

    const csvContent = extractCSVFromZip(result.body);
    const rawRows = parseLmpCsv(csvContent, query.market.valueColumn);
    const wide = pivotLmpRows(rawRows);
    const normalized = normalizeLmpTable(wide, resolvedMarket, this.defaultTimezone);

    return filterLmpNodes(normalized, requestedNodes);
  }
}

function resolveNodes(nodes?: readonly string[]): readonly string[] {
  return nodes && nodes.length > 0 ? nodes : TRADING_HUB_NODES;
}

function sumValues(values: ReadonlyArray<string | number | null>): number {
  let total = 0;
  for (const value of values) {
    if (typeof value === 'number') {
      total += value;
    }
  }
  return total;
}
