import type { Market } from './markets';

export const ISO_NAME = 'California ISO';

export interface GridStatus {
  time: string;
  status: string;
  reserves: number;
  iso: string;
}

export interface FuelMix {
  time: string;
  mix: Record<string, number | null>;
  iso: string;
}

export interface LatestDemand {
  time: string;
  demand: number;
}

export interface LatestSupply {
  time: string;
  supply: number;
}

/** One 5-minute interval from a Today's Outlook CSV */
export interface IntervalRow {
  Time: string;
  [metric: string]: string | number | null;
}

export interface DemandRow {
  Time: string;
  Demand: number;
}

export interface SupplyRow {
  Time: string;
  Supply: number;
}

export interface PnodeRow {
  'Aggregate PNode ID': string;
  'PNode ID': string;
}

/** One OASIS price record before pivoting */
export interface RawPriceRow {
  time: string;
  node: string;
  lmpType: string;
  value: number | null;
}

/** Pivot output: one row per (time, node), one entry per observed LMP_TYPE */
export interface WidePriceRow {
  time: string;
  node: string;
  components: Record<string, number | null>;
}

export interface WidePriceTable {
  /** Distinct LMP_TYPE values, in first-seen order */
  columns: string[];
  rows: WidePriceRow[];
}

export interface LmpRow {
  Time: string;
  Market: Market;
  Node: string;
  LMP: number | null;
  Energy: number | null;
  Congestion: number | null;
  Loss: number | null;
}

export const LMP_COLUMNS = ['Time', 'Market', 'Node', 'LMP', 'Energy', 'Congestion', 'Loss'] as const;
