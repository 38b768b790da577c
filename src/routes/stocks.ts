import { Router, RequestHandler } from "express";
import { z } from "zod";
import { HttpError } from "../errors";
import { toStockUpdate } from "../interfaces/stockUpdate";
import { QuoteFetcher } from "../modules/quoteFetcher";
import { BatchFetcher } from "../modules/batchFetcher";
import { searchStocks } from "../modules/stockSearch";
import { PriceHistoryService } from "../modules/priceHistory";
import { HISTORY_INTERVALS, HISTORY_PERIODS } from "../interfaces/history";

export const MAX_BATCH_SYMBOLS = 25;

const SYMBOL_PATTERN = /^[A-Za-z0-9.^-]{1,10}$/;

const batchQuerySchema = z.object({
    symbols: z.string().optional(),
});

const historyQuerySchema = z.object({
    period: z.enum(HISTORY_PERIODS).default("1d"),
    interval: z.enum(HISTORY_INTERVALS).default("5m"),
});

export type StocksRouterDeps = {
    fetcher: Pick<QuoteFetcher, "fetch">;
    history: Pick<PriceHistoryService, "fetch">;
    batchFetcher: Pick<BatchFetcher, "fetchMany">;
    defaultSymbols: readonly string[];
};

export function parseSymbols(raw: string | undefined, defaults: readonly string[]): string[] {
    if (raw === undefined) return [...defaults];

    const symbols = raw
        .split(",")
        .map((s) => s.trim().toUpperCase())
        .filter(Boolean);

    if (symbols.length === 0) {
        throw new HttpError(400, "At least one symbol is required");
    }
    if (symbols.length > MAX_BATCH_SYMBOLS) {
        throw new HttpError(400, `At most ${MAX_BATCH_SYMBOLS} symbols per request`);
    }
    const invalid = symbols.find((s) => !SYMBOL_PATTERN.test(s));
    if (invalid) {
        throw new HttpError(400, `Invalid symbol: ${invalid}`);
    }
    return symbols;
}

// Polling endpoint: same payload shape as the Socket.IO broadcast
export function batchQuotesHandler(deps: StocksRouterDeps): RequestHandler {
    return async (req, res, next) => {
        try {
            const parsed = batchQuerySchema.safeParse(req.query);
            if (!parsed.success) {
                throw new HttpError(400, "symbols must be a comma-separated string");
            }

            const symbols = parseSymbols(parsed.data.symbols, deps.defaultSymbols);
            const quotes = await deps.batchFetcher.fetchMany(symbols);
            res.json(toStockUpdate(quotes));
        } catch (err) {
            next(err);
        }
    };
}

export function searchHandler(): RequestHandler<{ query: string }> {
    return (req, res) => {
        res.json({ results: searchStocks(req.params.query) });
    };
}

export function quoteHandler(deps: StocksRouterDeps): RequestHandler<{ symbol: string }> {
    return async (req, res, next) => {
        try {
            const { symbol } = req.params;
            if (!SYMBOL_PATTERN.test(symbol)) {
                throw new HttpError(400, `Invalid symbol: ${symbol}`);
            }
            res.json(await deps.fetcher.fetch(symbol));
        } catch (err) {
            next(err);
        }
    };
}

export function historyHandler(deps: StocksRouterDeps): RequestHandler<{ symbol: string }> {
    return async (req, res, next) => {
        try {
            const { symbol } = req.params;
            if (!SYMBOL_PATTERN.test(symbol)) {
                throw new HttpError(400, `Invalid symbol: ${symbol}`);
            }

            const parsed = historyQuerySchema.safeParse(req.query);
            if (!parsed.success) {
                const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
                throw new HttpError(400, `Invalid history query: ${fields}`);
            }

            const { period, interval } = parsed.data;
            res.json(await deps.history.fetch(symbol, period, interval));
        } catch (err) {
            next(err);
        }
    };
}

export function createStocksRouter(deps: StocksRouterDeps): Router {
    const router = Router();

    // Order matters: the fixed paths must win over /:symbol
    router.get("/batch", batchQuotesHandler(deps));
    router.get("/search/:query", searchHandler());
    router.get("/:symbol/history", historyHandler(deps));
    router.get("/:symbol", quoteHandler(deps));

    return router;
}
