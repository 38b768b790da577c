import { z } from "zod";
import { logger } from "../logger";
import { Quote } from "../interfaces/quote";
import { RandomSource, randomInt, uniform } from "../utils/random";
import baseline from "../data/fallback-quotes.json";

const fallbackRecordSchema = z.object({
    symbol: z.string().min(1),
    companyName: z.string(),
    price: z.number().nonnegative(),
    changePercent: z.number(),
    volume: z.number().int().nonnegative(),
    marketCap: z.number().int().nonnegative(),
});

export type FallbackRecord = z.infer<typeof fallbackRecordSchema>;

export const FALLBACK_RECORDS: ReadonlyMap<string, FallbackRecord> = new Map(
    z
        .array(fallbackRecordSchema)
        .parse(baseline)
        .map((record) => [record.symbol, record])
);

const PRICE_JITTER_PERCENT = 0.5;
const CHANGE_JITTER_POINTS = 0.1;

/**
 * Synthetic quotes for when live data is unavailable. Known symbols are
 * jittered around a static baseline; anything else gets a plausible but
 * fictitious placeholder. Never touches the network.
 */
export class FallbackGenerator {
    constructor(
        private readonly random: RandomSource = Math.random,
        private readonly records: ReadonlyMap<string, FallbackRecord> = FALLBACK_RECORDS
    ) {}

    isKnown(symbol: string): boolean {
        return this.records.has(symbol.toUpperCase());
    }

    fallbackFor(symbol: string): Quote {
        const key = symbol.toUpperCase();
        const record = this.records.get(key);
        const timestamp = new Date().toISOString();

        if (record) {
            logger.debug({ symbol: key }, "Using fallback data");
            const priceJitter = uniform(this.random, -PRICE_JITTER_PERCENT, PRICE_JITTER_PERCENT);
            const changeJitter = uniform(this.random, -CHANGE_JITTER_POINTS, CHANGE_JITTER_POINTS);

            return {
                symbol: key,
                companyName: record.companyName,
                price: +(record.price * (1 + priceJitter / 100)).toFixed(2),
                changePercent: +(record.changePercent + changeJitter).toFixed(2),
                volume: record.volume,
                marketCap: record.marketCap,
                timestamp,
                source: "fallback",
            };
        }

        logger.debug({ symbol: key }, "Using placeholder data, no fallback baseline");
        return {
            symbol: key,
            companyName: `${key} (Data temporarily unavailable)`,
            price: +(100 + uniform(this.random, -10, 10)).toFixed(2),
            changePercent: +uniform(this.random, -2, 2).toFixed(2),
            volume: randomInt(this.random, 1_000_000, 50_000_000),
            marketCap: randomInt(this.random, 10_000_000_000, 500_000_000_000),
            timestamp,
            source: "fallback",
        };
    }
}
