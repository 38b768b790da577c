import { Quote } from "../interfaces/quote";

export const QUOTE_TTL_MS = 300_000; // 5 minutes

type CacheEntry = Readonly<{
    quote: Readonly<Quote>;
    expiresAt: number;
}>;

/**
 * Per-symbol in-process quote cache. Staleness is checked on read; expired
 * entries stay in place until the next successful fetch overwrites them.
 */
export class QuoteCache {
    private readonly entries = new Map<string, CacheEntry>();

    constructor(private readonly ttlMs: number = QUOTE_TTL_MS) {}

    get(symbol: string): Quote | null {
        const entry = this.entries.get(symbol.toUpperCase());
        if (!entry || Date.now() >= entry.expiresAt) return null;
        return entry.quote;
    }

    /** Stores a frozen copy and returns it. Entries are replaced whole. */
    put(symbol: string, quote: Quote): Quote {
        const stored = Object.freeze({ ...quote });
        this.entries.set(
            symbol.toUpperCase(),
            Object.freeze({ quote: stored, expiresAt: Date.now() + this.ttlMs })
        );
        return stored;
    }

    size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}
