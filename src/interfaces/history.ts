export const HISTORY_PERIODS = [
    "1d", "5d", "1mo", "3mo", "6mo", "1y", "2y", "5y", "10y", "ytd", "max",
] as const;

// Intraday steps the upstream candle endpoint has no resolution for are left out
export const HISTORY_INTERVALS = [
    "1m", "5m", "15m", "30m", "60m", "1h", "1d", "1wk", "1mo",
] as const;

export type HistoryPeriod = (typeof HISTORY_PERIODS)[number];
export type HistoryInterval = (typeof HISTORY_INTERVALS)[number];

export interface Candle {
    timestamp: string;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

/** Unix seconds, inclusive on both ends. */
export interface HistoryRange {
    interval: HistoryInterval;
    from: number;
    to: number;
}

export interface HistoryProvider {
    getHistory(symbol: string, range: HistoryRange): Promise<Candle[]>;
}

export interface PriceHistory {
    symbol: string;
    period: HistoryPeriod;
    interval: HistoryInterval;
    data: Candle[];
}
