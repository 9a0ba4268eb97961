/**
 * Today's Outlook Fetcher
 * Live and archived 5-minute CSVs plus the stats.txt status blob
 */

import { z } from 'zod';
import { TimeUtil, PACIFIC_TIMEZONE, type CalendarDate } from '../../../shared/utils/time';
import { HttpStatusError, NetworkError, SchemaError } from '../../../shared/utils/errors';
import { parseCSV, parseNumber, type CSVTable } from './caiso-parser';
import type { FetchLike } from './oasis-fetcher';
import type { IntervalRow } from './types';

export const OUTLOOK_BASE = 'https://www.caiso.com/outlook/SP';
export const HISTORY_BASE = 'https://www.caiso.com/outlook/SP/History';

/** Placeholder replaced with YYYYMMDD in history URL templates */
export const DATE_TOKEN = '{date}';

export const StatsSchema = z.object({
  slotDate: z.string(),
  gridstatus: z.array(z.string()).min(1),
  Current_reserve: z.coerce.number()
});

export type Stats = z.infer<typeof StatsSchema>;

async function get(url: string, fetchImpl: FetchLike, accept: string): Promise<Response> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; caiso-grid-feed/1.0)',
        'Accept': accept
      }
    });
  } catch (error) {
    throw new NetworkError(url, error);
  }

  if (!response.ok) {
    console.error(`[Outlook] ${url} returned ${response.status}`);
    throw new HttpStatusError(url, response.status);
  }
  return response;
}

export async function fetchCSV(url: string, fetchImpl: FetchLike, columns?: readonly string[]): Promise<CSVTable> {
  const response = await get(url, fetchImpl, 'text/csv,text/plain,*/*');
  return parseCSV(await response.text(), columns);
}

export async function fetchStats(url: string, fetchImpl: FetchLike): Promise<Stats> {
  const response = await get(url, fetchImpl, 'application/json,text/plain,*/*');
  const text = await response.text();

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw new SchemaError(Object.keys(StatsSchema.shape), []);
  }

  const result = StatsSchema.safeParse(payload);
  if (!result.success) {
    const missing = result.error.issues.map(issue => issue.path.join('.'));
    throw new SchemaError(missing, []);
  }
  return result.data;
}

/**
 * Attach `date` to each row's bare "HH:MM" Time; other columns become numbers.
 */
export function toIntervalRows(
  table: CSVTable,
  date: CalendarDate,
  timezone: string = PACIFIC_TIMEZONE
): IntervalRow[] {
  if (!table.header.includes('Time')) {
    throw new SchemaError(['Time'], table.header);
  }

  return table.rows.map(record => {
    const row: IntervalRow = { Time: TimeUtil.makeTimestamp(record.Time, date, timezone) };
    for (const column of table.header) {
      if (column !== 'Time') {
        row[column] = parseNumber(record[column]);
      }
    }
    return row;
  });
}

/**
 * Fetch one day from the history archive.
 * `urlTemplate` contains {date}, e.g. `${HISTORY_BASE}/{date}/demand.csv`.
 */
export async function getHistorical(
  urlTemplate: string,
  date: CalendarDate,
  fetchImpl: FetchLike,
  timezone: string = PACIFIC_TIMEZONE
): Promise<IntervalRow[]> {
  const url = urlTemplate.replace(DATE_TOKEN, TimeUtil.formatHistoryDate(date));
  console.log(`[Outlook] Fetching ${url}`);
  const table = await fetchCSV(url, fetchImpl);
  return toIntervalRows(table, date, timezone);
}
