export const AVERAGE_WINDOWS = [7, 30, 90] as const;

export type WindowDays = (typeof AVERAGE_WINDOWS)[number];

export type WindowKey = `${WindowDays}_day`;

export function windowKey(days: WindowDays): WindowKey {
  return `${days}_day`;
}

export function parseWindowKey(key: string): WindowDays | null {
  for (const days of AVERAGE_WINDOWS) {
    if (windowKey(days) === key) return days;
  }
  return null;
}

export interface WatchlistEntry {
  id: number;
  symbol: string;
  name: string;
  sector: string;
  notes?: string;
  active: boolean;
  addedAt: string;
}

export interface NewWatchlistEntry {
  symbol: string;
  name?: string;
  sector?: string;
  notes?: string;
}

/** One trading day of OHLCV data. `date` is the exchange date as YYYY-MM-DD. */
export interface PricePoint {
  symbol: string;
  date: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  adjClose: number | null;
  volume: number | null;
}

export interface Quote {
  symbol: string;
  name: string;
  price: number;
  bid: number | null;
  ask: number | null;
  previousClose: number | null;
  observedAt: Date;
  sessionState: string;
}

export interface LatestQuote {
  symbol: string;
  price: number;
  bid: number | null;
  ask: number | null;
  previousClose: number | null;
  observedAt: string;
  fetchedAt: string;
}

/** `null` means no usable history for that window. */
export type WindowAverages = Map<WindowDays, number | null>;

export interface AlertCandidate {
  window: WindowDays;
  average: number;
  absDiff: number;
  pctDiff: number;
}

export interface NewAlertRecord {
  symbol: string;
  window: WindowDays;
  currentPrice: number;
  averagePrice: number;
  absDiff: number;
  pctDiff: number;
  sessionStart: Date;
  sentAt: Date;
}

export interface AlertRecord extends Omit<NewAlertRecord, "sessionStart" | "sentAt"> {
  id: number;
  sessionStart: string;
  sentAt: string;
}

export interface ClockTime {
  hour: number;
  minute: number;
}

export interface MarketSession {
  timeZone: string;
  open: ClockTime;
  close: ClockTime;
}

export type CycleStage = "quote" | "persist-quote" | "averages" | "dedup" | "notify" | "record";

export interface CycleFailure {
  symbol: string;
  stage: CycleStage;
  kind: string;
  message: string;
}

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  skipped: boolean;
  sessionStart: string | null;
  instruments: number;
  quotes: number;
  candidates: number;
  alertsSent: number;
  suppressed: number;
  failures: CycleFailure[];
}

export interface SyncReport {
  startedAt: string;
  finishedAt: string;
  backfilled: string[];
  refreshed: string[];
  upToDate: string[];
  failures: { symbol: string; kind: string; message: string }[];
}

export interface StatusSnapshot {
  now: string;
  marketOpen: boolean;
  timeZone: string;
  sessionStart: string;
  symbols: string[];
  lastCycle: CycleReport | null;
  lastSync: SyncReport | null;
}

export interface InstrumentSummary {
  symbol: string;
  quote: LatestQuote | null;
  averages: Partial<Record<WindowKey, number | null>>;
  candidates: AlertCandidate[];
}
