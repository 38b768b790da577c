export type QuoteSource = "live" | "fallback";

export interface Quote {
    symbol: string;
    companyName: string;
    price: number;
    changePercent: number;
    volume: number;
    marketCap: number;
    previousClose?: number;
    open?: number;
    dayHigh?: number;
    dayLow?: number;
    yearHigh?: number;
    yearLow?: number;
    timestamp: string;
    // "fallback" marks synthetic data served while upstream is unavailable
    source: QuoteSource;
}

/**
 * Upstream quote fields before validation. Any of them may be missing;
 * a missing or zero price means the provider had nothing usable.
 */
export interface RawQuote {
    symbol: string;
    companyName?: string;
    price?: number;
    previousClose?: number;
    open?: number;
    dayHigh?: number;
    dayLow?: number;
    yearHigh?: number;
    yearLow?: number;
    volume?: number;
    marketCap?: number;
}

export interface QuoteProvider {
    getQuote(symbol: string): Promise<RawQuote>;
}
