// CAISO Data Parser - Handles OASIS ZIP files and Outlook CSV extraction

import { unzipSync } from 'fflate';
import { TimeUtil, PACIFIC_TIMEZONE } from '../../../shared/utils/time';
import { MalformedArchiveError, SchemaError } from '../../../shared/utils/errors';
import type { Market } from './markets';
import type {
  LmpRow,
  PnodeRow,
  RawPriceRow,
  WidePriceRow,
  WidePriceTable
} from './types';

export interface CSVTable {
  header: string[];
  rows: Record<string, string>[];
}

/** OASIS price file columns kept after projection (plus the market's value column) */
export const LMP_KEY_COLUMNS = ['INTERVALSTARTTIME_GMT', 'NODE', 'LMP_TYPE'] as const;

const COMPONENT_NAMES = {
  LMP: 'LMP',
  MCE: 'Energy',
  MCC: 'Congestion',
  MCL: 'Loss'
} as const;

/**
 * Extract the CSV member of an OASIS ZIP.
 * OASIS SingleZip archives hold exactly one file, so the first entry is taken.
 */
export function extractCSVFromZip(payload: ArrayBuffer | Uint8Array): string {
  const bytes = payload instanceof Uint8Array ? payload : new Uint8Array(payload);

  let unzipped: Record<string, Uint8Array>;
  try {
    unzipped = unzipSync(bytes);
  } catch (error) {
    throw new MalformedArchiveError(
      `Response is not a valid ZIP archive (${bytes.byteLength} bytes)`,
      { cause: error }
    );
  }

  const [firstEntry] = Object.keys(unzipped);
  if (firstEntry === undefined) {
    throw new MalformedArchiveError('ZIP archive has no entries');
  }

  return new TextDecoder('utf-8').decode(unzipped[firstEntry]);
}

/**
 * Parse CSV line handling quoted fields ("" is an escaped quote)
 */
export function parseCSVLine(line: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Parse a headed CSV into records, keeping only `columns` when given.
 * Throws SchemaError if any requested column is missing from the header.
 */
export function parseCSV(csvContent: string, columns?: readonly string[]): CSVTable {
  const lines = csvContent
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter(line => line.trim());

  const header = lines.length > 0 ? parseCSVLine(lines[0]) : [];

  const wanted = columns ?? header;
  const missing = wanted.filter(column => !header.includes(column));
  if (missing.length > 0) {
    throw new SchemaError(missing, header);
  }

  const indexes = wanted.map(column => header.indexOf(column));
  const rows = lines.slice(1).map(line => {
    const fields = parseCSVLine(line);
    const record: Record<string, string> = {};
    wanted.forEach((column, i) => {
      record[column] = fields[indexes[i]] ?? '';
    });
    return record;
  });

  return { header: [...wanted], rows };
}

/** Empty cells (and anything non-numeric) become null */
export function parseNumber(text: string | undefined): number | null {
  if (text === undefined || text.trim() === '') return null;
  const value = Number(text);
  return isNaN(value) ? null : value;
}

/**
 * Parse an OASIS price CSV into long-format rows.
 */
export function parseLmpCsv(csvContent: string, valueColumn: string): RawPriceRow[] {
  const [timeColumn, nodeColumn, typeColumn] = LMP_KEY_COLUMNS;
  const table = parseCSV(csvContent, [...LMP_KEY_COLUMNS, valueColumn]);

  return table.rows.map(record => ({
    time: record[timeColumn],
    node: record[nodeColumn],
    lmpType: record[typeColumn],
    value: parseNumber(record[valueColumn])
  }));
}

/**
 * Pivot long price rows (one per LMP_TYPE) into one row per (time, node).
 *
 * Every LMP_TYPE seen anywhere in the input becomes a column of every output
 * row. When a (time, node, type) key repeats, the first non-null value in
 * input order is kept. Rows come out sorted by time, then node.
 */
export function pivotLmpRows(rows: readonly RawPriceRow[]): WidePriceTable {
  const columns: string[] = [];
  const seenColumns = new Set<string>();
  const groups = new Map<string, WidePriceRow>();

  for (const row of rows) {
    if (!seenColumns.has(row.lmpType)) {
      seenColumns.add(row.lmpType);
      columns.push(row.lmpType);
    }

    const key = `${row.time}\u0000${row.node}`;
    let group = groups.get(key);
    if (!group) {
      group = { time: row.time, node: row.node, components: {} };
      groups.set(key, group);
    }

    const existing = group.components[row.lmpType];
    if (existing === undefined || existing === null) {
      group.components[row.lmpType] = row.value;
    }
  }

  const wideRows = [...groups.values()].map(group => {
    const components: Record<string, number | null> = {};
    for (const column of columns) {
      components[column] = group.components[column] ?? null;
    }
    return { time: group.time, node: group.node, components };
  });

  wideRows.sort((a, b) => compareText(a.time, b.time) || compareText(a.node, b.node));

  return { columns, rows: wideRows };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Rename components to canonical names, convert GMT interval starts to local
 * time and tag each row with the requested market. Components other than
 * LMP/MCE/MCC/MCL are dropped; missing ones are null.
 */
export function normalizeLmpTable(
  table: WidePriceTable,
  market: Market,
  timezone: string = PACIFIC_TIMEZONE
): LmpRow[] {
  return table.rows.map(row => {
    const normalized: LmpRow = {
      Time: TimeUtil.utcToZoned(row.time, timezone),
      Market: market,
      Node: row.node,
      LMP: null,
      Energy: null,
      Congestion: null,
      Loss: null
    };
    for (const [lmpType, name] of Object.entries(COMPONENT_NAMES)) {
      normalized[name] = row.components[lmpType] ?? null;
    }
    return normalized;
  });
}

/**
 * Keep only rows for the requested nodes; OASIS may return extra ones.
 */
export function filterLmpNodes(rows: readonly LmpRow[], nodes: readonly string[]): LmpRow[] {
  const wanted = new Set(nodes);
  return rows.filter(row => wanted.has(row.Node));
}

/**
 * Parse the ATL_PNODE_MAP report into aggregate/pnode pairs.
 */
export function parsePnodeCsv(csvContent: string): PnodeRow[] {
  const table = parseCSV(csvContent, ['APNODE_ID', 'PNODE_ID']);
  return table.rows.map(record => ({
    'Aggregate PNode ID': record.APNODE_ID,
    'PNode ID': record.PNODE_ID
  }));
}
