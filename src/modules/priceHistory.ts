import { logger } from "../logger";
import { RateLimitedError } from "../errors";
import { RateLimitGate } from "./rateLimitGate";
import {
    Candle,
    HistoryInterval,
    HistoryPeriod,
    HistoryProvider,
    HistoryRange,
    PriceHistory,
} from "../interfaces/history";

export const DEFAULT_HISTORY_PERIOD: HistoryPeriod = "1d";
export const DEFAULT_HISTORY_INTERVAL: HistoryInterval = "5m";

const DAY_SECONDS = 24 * 60 * 60;

const PERIOD_DAYS: Record<Exclude<HistoryPeriod, "ytd" | "max">, number> = {
    "1d": 1,
    "5d": 5,
    "1mo": 30,
    "3mo": 91,
    "6mo": 182,
    "1y": 365,
    "2y": 730,
    "5y": 1826,
    "10y": 3652,
};

export function historyRange(
    period: HistoryPeriod,
    interval: HistoryInterval,
    now = Date.now()
): HistoryRange {
    const to = Math.floor(now / 1000);

    let from: number;
    if (period === "max") {
        from = 0;
    } else if (period === "ytd") {
        from = Date.UTC(new Date(now).getUTCFullYear(), 0, 1) / 1000;
    } else {
        from = to - PERIOD_DAYS[period] * DAY_SECONDS;
    }

    return { interval, from, to };
}

export type PriceHistoryServiceOptions = {
    provider: HistoryProvider;
    // Pass the quote fetcher's gate: both draw on one upstream quota
    gate?: RateLimitGate;
};

/**
 * Live price history for charts. Never rejects: a cooldown, a throttled
 * call or any upstream failure yields an empty series.
 */
export class PriceHistoryService {
    private readonly provider: HistoryProvider;
    private readonly gate: RateLimitGate;

    constructor(options: PriceHistoryServiceOptions) {
        this.provider = options.provider;
        this.gate = options.gate ?? new RateLimitGate({ name: "history-provider" });
    }

    async fetch(
        symbol: string,
        period: HistoryPeriod = DEFAULT_HISTORY_PERIOD,
        interval: HistoryInterval = DEFAULT_HISTORY_INTERVAL
    ): Promise<PriceHistory> {
        const key = symbol.trim().toUpperCase();
        const data = await this.load(key, period, interval);
        return { symbol: key, period, interval, data };
    }

    private async load(
        symbol: string,
        period: HistoryPeriod,
        interval: HistoryInterval
    ): Promise<Candle[]> {
        if (this.gate.isBlocked()) {
            logger.debug({ symbol }, "Rate limit cooldown active, skipping price history");
            return [];
        }

        try {
            const data = await this.provider.getHistory(symbol, historyRange(period, interval));
            logger.debug({ symbol, period, interval, points: data.length }, "Fetched price history");
            return data;
        } catch (err) {
            if (err instanceof RateLimitedError) {
                this.gate.trip();
                return [];
            }
            logger.warn({ symbol, period, interval, err }, "Failed to fetch price history");
            return [];
        }
    }
}
