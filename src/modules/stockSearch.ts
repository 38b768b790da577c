import { z } from "zod";
import commonStocks from "../data/common-stocks.json";

const searchEntrySchema = z.object({
    symbol: z.string().min(1),
    name: z.string(),
});

export type StockSearchResult = z.infer<typeof searchEntrySchema>;

export const COMMON_STOCKS: readonly StockSearchResult[] = z
    .array(searchEntrySchema)
    .parse(commonStocks);

export const MAX_SEARCH_RESULTS = 8;

/**
 * Case-insensitive substring match on symbol or company name. A short
 * alphabetic query that matches nothing is echoed back as a custom symbol.
 */
export function searchStocks(
    query: string,
    stocks: readonly StockSearchResult[] = COMMON_STOCKS
): StockSearchResult[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    const results = stocks.filter(
        (stock) =>
            stock.symbol.toLowerCase().includes(needle) ||
            stock.name.toLowerCase().includes(needle)
    );

    if (results.length === 0 && /^[a-z]{1,5}$/.test(needle)) {
        const symbol = needle.toUpperCase();
        return [{ symbol, name: `${symbol} (Custom)` }];
    }

    return results.slice(0, MAX_SEARCH_RESULTS);
}
