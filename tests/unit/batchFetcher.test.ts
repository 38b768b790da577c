jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { BatchFetcher } from '@/modules/batchFetcher';
import { QuoteFetcher } from '@/modules/quoteFetcher';
import { QuoteCache } from '@/modules/quoteCache';
import { Quote, RawQuote } from '@/interfaces/quote';

const quoteFor = (symbol: string, source: Quote['source'] = 'live'): Quote => ({
  symbol,
  companyName: `${symbol} Corp`,
  price: 10,
  changePercent: 0,
  volume: 0,
  marketCap: 0,
  timestamp: '2023-11-14T22:13:20.000Z',
  source,
});

describe('BatchFetcher (unit)', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('preserves input order and length', async () => {
    const fetcher = { fetch: jest.fn(async (symbol: string) => quoteFor(symbol)) };
    const batch = new BatchFetcher(fetcher, { sleep, random: () => 0.5 });

    const result = await batch.fetchMany(['A', 'B', 'C']);

    expect(result.map((q) => q.symbol)).toEqual(['A', 'B', 'C']);
    expect(fetcher.fetch.mock.calls).toEqual([['A'], ['B'], ['C']]);
  });

  /**
   * Purpose:
   * Pacing happens only between fetches:
   * - none before the first or after the last
   * - 300–800ms, drawn from the random source
   */
  test('waits between fetches only', async () => {
    const fetcher = { fetch: jest.fn(async (symbol: string) => quoteFor(symbol)) };
    const batch = new BatchFetcher(fetcher, { sleep, random: () => 0.5 });

    await batch.fetchMany(['A', 'B', 'C']);

    expect(sleep.mock.calls).toEqual([[550], [550]]);
  });

  test('does not wait for a single symbol or an empty list', async () => {
    const fetcher = { fetch: jest.fn(async (symbol: string) => quoteFor(symbol)) };
    const batch = new BatchFetcher(fetcher, { sleep });

    expect(await batch.fetchMany([])).toEqual([]);
    expect(await batch.fetchMany(['A'])).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  test('fetches duplicates again instead of deduplicating', async () => {
    const fetcher = { fetch: jest.fn(async (symbol: string) => quoteFor(symbol)) };
    const batch = new BatchFetcher(fetcher, { sleep });

    const result = await batch.fetchMany(['A', 'A']);

    expect(result).toHaveLength(2);
    expect(fetcher.fetch).toHaveBeenCalledTimes(2);
  });

  /**
   * Purpose:
   * Mixed outcomes inside one batch:
   * - a cache hit, a live fetch and a fallback
   * - still one quote per symbol, in input order
   */
  test('keeps order when fetches mix cache hits, live data and fallback', async () => {
    jest.spyOn(Date, 'now').mockReturnValue(1700000000000);
    const cache = new QuoteCache();
    cache.put('MSFT', quoteFor('MSFT'));

    const provider = {
      getQuote: jest.fn(async (symbol: string): Promise<RawQuote> => {
        if (symbol === 'AAPL') return { symbol, price: 180, previousClose: 180 };
        throw new Error('upstream down');
      }),
    };
    const fetcher = new QuoteFetcher({ provider, cache, sleep, random: () => 0.5 });
    const batch = new BatchFetcher(fetcher, { sleep, random: () => 0.5 });

    const result = await batch.fetchMany(['ZZZZ', 'MSFT', 'AAPL']);

    expect(result.map((q) => [q.symbol, q.source])).toEqual([
      ['ZZZZ', 'fallback'],
      ['MSFT', 'live'],
      ['AAPL', 'live'],
    ]);
  });
});
