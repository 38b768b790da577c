import { logger } from "../logger";
import { Quote, QuoteProvider, RawQuote } from "../interfaces/quote";
import { NoPriceDataError, RateLimitedError } from "../errors";
import { QuoteCache } from "./quoteCache";
import { RateLimitGate } from "./rateLimitGate";
import { FallbackGenerator } from "./fallbackQuotes";
import { RandomSource, uniform } from "../utils/random";
import { Sleep, sleep as defaultSleep } from "../utils/time";

export const MAX_FETCH_ATTEMPTS = 2;

type AttemptOutcome =
    | { kind: "success"; quote: Quote }
    | { kind: "throttled" }
    | { kind: "no-price" }
    | { kind: "failed"; error: unknown };

export type QuoteFetcherOptions = {
    provider: QuoteProvider;
    cache?: QuoteCache;
    gate?: RateLimitGate;
    fallback?: FallbackGenerator;
    random?: RandomSource;
    sleep?: Sleep;
    maxAttempts?: number;
};

/**
 * Builds a live quote from upstream fields. Throws NoPriceDataError when the
 * price is absent or zero; such quotes are never served as live data.
 */
export function buildQuote(symbol: string, raw: RawQuote, fetchedAt = new Date()): Quote {
    if (!raw.price || raw.price <= 0) {
        throw new NoPriceDataError(symbol);
    }

    const previousClose = raw.previousClose;
    const changePercent = previousClose
        ? ((raw.price - previousClose) / previousClose) * 100
        : 0;

    return {
        symbol,
        companyName: raw.companyName || symbol,
        price: +raw.price.toFixed(2),
        changePercent: +changePercent.toFixed(2),
        volume: raw.volume ?? 0,
        marketCap: raw.marketCap ?? 0,
        previousClose: raw.previousClose,
        open: raw.open,
        dayHigh: raw.dayHigh,
        dayLow: raw.dayLow,
        yearHigh: raw.yearHigh,
        yearLow: raw.yearLow,
        timestamp: fetchedAt.toISOString(),
        source: "live",
    };
}

/**
 * cache -> rate-limit gate -> upstream (with retry) -> fallback.
 * fetch() always resolves with a quote; failures degrade to fallback data.
 */
export class QuoteFetcher {
    readonly cache: QuoteCache;
    readonly gate: RateLimitGate;
    readonly fallback: FallbackGenerator;

    private readonly provider: QuoteProvider;
    private readonly random: RandomSource;
    private readonly sleep: Sleep;
    private readonly maxAttempts: number;

    constructor(options: QuoteFetcherOptions) {
        this.provider = options.provider;
        this.random = options.random ?? Math.random;
        this.cache = options.cache ?? new QuoteCache();
        this.gate = options.gate ?? new RateLimitGate({ name: "quote-provider" });
        this.fallback = options.fallback ?? new FallbackGenerator(this.random);
        this.sleep = options.sleep ?? defaultSleep;
        this.maxAttempts = options.maxAttempts ?? MAX_FETCH_ATTEMPTS;
    }

    async fetch(symbol: string): Promise<Quote> {
        const key = symbol.trim().toUpperCase();

        const cached = this.cache.get(key);
        if (cached) {
            logger.debug({ symbol: key }, "Serving quote from cache");
            return cached;
        }

        for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
            if (this.gate.isBlocked()) {
                logger.debug({ symbol: key }, "Rate limit cooldown active, using fallback");
                return this.fallback.fallbackFor(key);
            }

            const delayMs = this.backoffMs(attempt);
            if (attempt > 0) {
                logger.info({ symbol: key, delayMs, attempt: attempt + 1 }, "Retrying quote fetch");
            }
            await this.sleep(delayMs);

            // Another fetch may have tripped the gate while this one waited
            if (this.gate.isBlocked()) {
                return this.fallback.fallbackFor(key);
            }

            const outcome = await this.attempt(key);

            switch (outcome.kind) {
                case "success":
                    logger.debug({ symbol: key }, "Got live quote");
                    return this.cache.put(key, outcome.quote);

                case "throttled":
                    this.gate.trip();
                    return this.fallback.fallbackFor(key);

                case "no-price":
                    logger.warn({ symbol: key }, "No price data, using fallback");
                    return this.fallback.fallbackFor(key);

                case "failed":
                    logger.warn(
                        { symbol: key, attempt: attempt + 1, err: outcome.error },
                        "Failed to fetch stock quote"
                    );
                    break;
            }
        }

        return this.fallback.fallbackFor(key);
    }

    // Attempt 0 gets a short pacing jitter; retries wait (attempt + 1) * 2s
    private backoffMs(attempt: number): number {
        return attempt === 0
            ? uniform(this.random, 200, 500)
            : (attempt + 1) * 2_000;
    }

    private async attempt(symbol: string): Promise<AttemptOutcome> {
        try {
            const raw = await this.provider.getQuote(symbol);
            return { kind: "success", quote: buildQuote(symbol, raw) };
        } catch (err) {
            if (err instanceof RateLimitedError) return { kind: "throttled" };
            if (err instanceof NoPriceDataError) return { kind: "no-price" };
            return { kind: "failed", error: err };
        }
    }
}
