/**
 * Focus:
 * - Valkey client built from the loaded env
 * - snapshot availability tracking
 * - validated reads, TTL writes
 * - degraded behavior when Valkey is unavailable
 */

import { EventEmitter } from 'events';
import IORedis from 'ioredis';

type MockRedis = EventEmitter & {
  get: jest.Mock;
  set: jest.Mock;
  connect: jest.Mock;
  disconnect: jest.Mock;
};

const mockRedis = Object.assign(new EventEmitter(), {
  get: jest.fn(),
  set: jest.fn(),
  connect: jest.fn(),
  disconnect: jest.fn(),
}) as MockRedis;

jest.mock('ioredis', () => {
  return jest.fn(() => mockRedis);
});

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { createSnapshotStore, SnapshotStore } from '@/cache';
import { StockUpdatePayload } from '@/interfaces/stockUpdate';
import { logger } from '@/logger';

const payload: StockUpdatePayload = {
  type: 'stock_update',
  data: [
    {
      symbol: 'AAPL',
      companyName: 'Apple Inc.',
      price: 178.5,
      changePercent: 1.25,
      volume: 50000000,
      marketCap: 2800000000000,
      timestamp: '2023-11-14T22:13:20.000Z',
      source: 'fallback',
    },
  ],
  timestamp: '2023-11-14T22:13:20.000Z',
};

describe('snapshot store (unit)', () => {
  let store: SnapshotStore;

  beforeEach(() => {
    mockRedis.removeAllListeners();
    mockRedis.get.mockReset();
    mockRedis.set.mockReset();
    mockRedis.connect.mockReset();
    mockRedis.disconnect.mockReset();

    store = createSnapshotStore({
      VALKEY_HOST: 'valkey',
      VALKEY_PORT: 6380,
      VALKEY_PASSWORD: 'test-secret',
    });
  });

  test('configures the client from env without connecting eagerly', () => {
    expect(IORedis).toHaveBeenCalledWith(
      expect.objectContaining({
        host: 'valkey',
        port: 6380,
        password: 'test-secret',
        lazyConnect: true,
      })
    );
    expect(mockRedis.connect).not.toHaveBeenCalled();
  });

  test('updates availability on connect, error and close events', () => {
    expect(store.isAvailable()).toBe(false);

    mockRedis.emit('connect');
    expect(store.isAvailable()).toBe(true);

    mockRedis.emit('error', new Error('valkey down'));
    expect(store.isAvailable()).toBe(false);

    mockRedis.emit('connect');
    mockRedis.emit('close');
    expect(store.isAvailable()).toBe(false);
  });

  test('returns the stored snapshot when available', async () => {
    mockRedis.emit('connect');
    mockRedis.get.mockResolvedValue(JSON.stringify(payload));

    await expect(store.getLatest()).resolves.toEqual(payload);
    expect(mockRedis.get).toHaveBeenCalledWith('stock:broadcast:latest');
  });

  test('returns null when no snapshot is stored', async () => {
    mockRedis.emit('connect');
    mockRedis.get.mockResolvedValue(null);

    await expect(store.getLatest()).resolves.toBeNull();
  });

  /**
   * Purpose:
   * A snapshot written by an incompatible build:
   * - is not handed to clients
   * - is logged
   */
  test('discards a snapshot that does not match the payload shape', async () => {
    mockRedis.emit('connect');
    mockRedis.get.mockResolvedValue(JSON.stringify({ type: 'stock_update', data: [{ symbol: 'AAPL' }] }));

    await expect(store.getLatest()).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ issues: expect.any(Array) }),
      'Discarding malformed stock snapshot'
    );
  });

  test('returns null for unparseable JSON', async () => {
    mockRedis.emit('connect');
    mockRedis.get.mockResolvedValue('{not json');

    await expect(store.getLatest()).resolves.toBeNull();
  });

  test('returns null without touching Valkey when unavailable', async () => {
    mockRedis.emit('error', new Error('down'));

    await expect(store.getLatest()).resolves.toBeNull();
    expect(mockRedis.get).not.toHaveBeenCalled();
  });

  test('returns null when the read fails', async () => {
    mockRedis.emit('connect');
    mockRedis.get.mockRejectedValue(new Error('timeout'));

    await expect(store.getLatest()).resolves.toBeNull();
  });

  test('writes the snapshot with a five minute TTL when available', async () => {
    mockRedis.emit('connect');

    await store.saveLatest(payload);

    expect(mockRedis.set).toHaveBeenCalledWith(
      'stock:broadcast:latest',
      JSON.stringify(payload),
      'EX',
      300
    );
  });

  test('skips writes when unavailable', async () => {
    await store.saveLatest(payload);

    expect(mockRedis.set).not.toHaveBeenCalled();
  });

  test('swallows write errors', async () => {
    mockRedis.emit('connect');
    mockRedis.set.mockRejectedValue(new Error('READONLY'));

    await expect(store.saveLatest(payload)).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith(
      { err: expect.any(Error) },
      'Error while saving stock snapshot'
    );
  });

  test('connect tolerates Valkey being down at startup', async () => {
    mockRedis.connect.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(store.connect()).resolves.toBeUndefined();
    expect(mockRedis.connect).toHaveBeenCalledTimes(1);
  });

  test('close disconnects the client and stops serving reads', async () => {
    mockRedis.emit('connect');

    store.close();

    expect(mockRedis.disconnect).toHaveBeenCalled();
    expect(store.isAvailable()).toBe(false);
    await expect(store.getLatest()).resolves.toBeNull();
  });
});
