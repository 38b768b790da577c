import { logger } from "../logger";
import { Quote } from "../interfaces/quote";
import { QuoteFetcher } from "./quoteFetcher";
import { RandomSource, uniform } from "../utils/random";
import { Sleep, sleep as defaultSleep } from "../utils/time";

const MIN_PACING_MS = 300;
const MAX_PACING_MS = 800;

/**
 * Fetches symbols one after another, pausing between requests to spread
 * load on the shared upstream quota. Output order and length match the
 * input; duplicates are fetched again.
 */
export class BatchFetcher {
    private readonly random: RandomSource;
    private readonly sleep: Sleep;

    constructor(
        private readonly fetcher: Pick<QuoteFetcher, "fetch">,
        options: { random?: RandomSource; sleep?: Sleep } = {}
    ) {
        this.random = options.random ?? Math.random;
        this.sleep = options.sleep ?? defaultSleep;
    }

    async fetchMany(symbols: readonly string[]): Promise<Quote[]> {
        const quotes: Quote[] = [];
        const start = Date.now();

        for (const [i, symbol] of symbols.entries()) {
            quotes.push(await this.fetcher.fetch(symbol));

            if (i < symbols.length - 1) {
                await this.sleep(uniform(this.random, MIN_PACING_MS, MAX_PACING_MS));
            }
        }

        logger.debug(
            { symbolsCount: symbols.length, durationMs: Date.now() - start },
            "Quote batch complete"
        );
        return quotes;
    }
}
