import axios, { AxiosInstance } from "axios";
import Bottleneck from "bottleneck";
import { logger } from "../logger";
import { QuoteProvider, RawQuote } from "../interfaces/quote";
import { Candle, HistoryInterval, HistoryProvider, HistoryRange } from "../interfaces/history";
import { RateLimitedError } from "../errors";
import {
  FinnhubCandles,
  FinnhubProfile,
  finnhubCandleSchema,
  finnhubProfileSchema,
  finnhubQuoteSchema,
} from "../schemas/finnhub.schema";

const BASE_URL = "https://finnhub.io/api/v1";
const PROFILE_TTL_MS = 24 * 60 * 60 * 1000; // 1 day

const CANDLE_RESOLUTIONS: Record<HistoryInterval, string> = {
  "1m": "1",
  "5m": "5",
  "15m": "15",
  "30m": "30",
  "60m": "60",
  "1h": "60",
  "1d": "D",
  "1wk": "W",
  "1mo": "M",
};

// Shared by every fetch in the process: the quota is per API key
export const finnhubLimiter = new Bottleneck({
  maxConcurrent: 2,
  minTime: 250,
});

export function isRateLimitResponse(err: unknown): boolean {
  return axios.isAxiosError(err) && err.response?.status === 429;
}

const round2 = (n: number) => +n.toFixed(2);

export function toCandles(candles: FinnhubCandles): Candle[] {
  if (candles.s !== "ok") return [];

  const { t, o, h, l, c, v } = candles;
  const count = Math.min(t.length, o.length, h.length, l.length, c.length, v.length);

  return Array.from({ length: count }, (_, i) => ({
    timestamp: new Date(t[i] * 1000).toISOString(),
    open: round2(o[i]),
    high: round2(h[i]),
    low: round2(l[i]),
    close: round2(c[i]),
    volume: Math.round(v[i]),
  }));
}

type CachedProfile = {
  profile: FinnhubProfile;
  expiresAt: number;
};

export class FinnhubProvider implements QuoteProvider, HistoryProvider {
  private readonly profiles = new Map<string, CachedProfile>();
  private readonly limiter: Bottleneck;

  constructor(
    private readonly params: {
      apiKey: string;
      axiosClient: AxiosInstance;
      limiter?: Bottleneck;
    }
  ) {
    this.limiter = params.limiter ?? finnhubLimiter;
  }

  async getQuote(symbol: string): Promise<RawQuote> {
    const data = await this.request("/quote", symbol);
    const parsed = finnhubQuoteSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ symbol, issues: parsed.error.issues }, "Invalid Finnhub quote payload");
      throw new Error(`Finnhub quote schema mismatch for ${symbol}`);
    }

    const quote = parsed.data;
    const raw: RawQuote = {
      symbol,
      price: quote.c,
      previousClose: quote.pc,
      open: quote.o,
      dayHigh: quote.h,
      dayLow: quote.l,
    };

    // No price means fallback data; the profile would be wasted quota
    if (quote.c <= 0) return raw;

    const profile = await this.getProfile(symbol);
    return {
      ...raw,
      companyName: profile?.name || undefined,
      marketCap:
        profile?.marketCapitalization !== undefined
          ? Math.round(profile.marketCapitalization * 1_000_000)
          : undefined,
    };
  }

  async getHistory(symbol: string, range: HistoryRange): Promise<Candle[]> {
    const data = await this.request("/stock/candle", symbol, {
      resolution: CANDLE_RESOLUTIONS[range.interval],
      from: range.from,
      to: range.to,
    });
    const parsed = finnhubCandleSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ symbol, issues: parsed.error.issues }, "Invalid Finnhub candle payload");
      throw new Error(`Finnhub candle schema mismatch for ${symbol}`);
    }

    return toCandles(parsed.data);
  }

  /**
   * Company profiles change rarely, so they are memoized for a day to keep
   * the per-symbol cost at one quote request. A profile failure other than a
   * rate limit only costs the company name and market cap.
   */
  private async getProfile(symbol: string): Promise<FinnhubProfile | null> {
    const cached = this.profiles.get(symbol);
    if (cached) {
      if (Date.now() < cached.expiresAt) return cached.profile;
      this.profiles.delete(symbol);
    }

    try {
      const data = await this.request("/stock/profile2", symbol);
      const parsed = finnhubProfileSchema.safeParse(data);
      if (!parsed.success) {
        logger.warn({ symbol, issues: parsed.error.issues }, "Invalid Finnhub profile payload");
        return null;
      }

      // Unknown tickers answer with {}; only real companies are memoized
      if (parsed.data.name) {
        this.profiles.set(symbol, {
          profile: parsed.data,
          expiresAt: Date.now() + PROFILE_TTL_MS,
        });
      }
      return parsed.data;
    } catch (err) {
      if (err instanceof RateLimitedError) throw err;
      logger.warn({ symbol, err }, "Failed to fetch company profile");
      return null;
    }
  }

  private async request(
    path: string,
    symbol: string,
    query: Record<string, string | number> = {}
  ): Promise<unknown> {
    try {
      const res = await this.limiter.schedule(() =>
        this.params.axiosClient.get<unknown>(`${BASE_URL}${path}`, {
          params: { symbol, ...query, token: this.params.apiKey },
        })
      );
      return res.data;
    } catch (err) {
      if (isRateLimitResponse(err)) {
        throw new RateLimitedError(symbol, err);
      }
      throw err;
    }
  }
}
