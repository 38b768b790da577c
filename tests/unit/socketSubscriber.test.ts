jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { Socket } from 'socket.io';
import {
  attachStockUpdates,
  socketSubscriber,
  StockUpdateSources,
} from '@/modules/socketSubscriber';
import { Subscriber } from '@/interfaces/subscriber';
import { StockUpdatePayload } from '@/interfaces/stockUpdate';

const payload: StockUpdatePayload = {
  type: 'stock_update',
  data: [],
  timestamp: '2023-11-14T22:13:20.000Z',
};

describe('socketSubscriber (unit)', () => {
  test('emits stock_update on the socket', () => {
    const socket = { id: 'socket-1', connected: true, emit: jest.fn() };

    const subscriber = socketSubscriber(socket as unknown as Socket);
    subscriber.send(payload);

    expect(subscriber.id).toBe('socket-1');
    expect(socket.emit).toHaveBeenCalledWith('stock_update', payload);
  });

  test('reflects the live connection state', () => {
    const socket = { id: 'socket-1', connected: true, emit: jest.fn() };
    const subscriber = socketSubscriber(socket as unknown as Socket);

    expect(subscriber.isOpen()).toBe(true);

    socket.connected = false;

    expect(subscriber.isOpen()).toBe(false);
  });
});

describe('attachStockUpdates (unit)', () => {
  const stored: StockUpdatePayload = { ...payload, timestamp: '2023-11-14T22:00:00.000Z' };

  let socket: { id: string; connected: boolean; emit: jest.Mock; on: jest.Mock };
  let sources: {
    loop: { latest: jest.Mock; subscribe: jest.Mock; unsubscribe: jest.Mock };
    store: { getLatest: jest.Mock };
  };

  const attach = () =>
    attachStockUpdates(socket as unknown as Socket, sources as unknown as StockUpdateSources);

  beforeEach(() => {
    socket = { id: 'socket-1', connected: true, emit: jest.fn(), on: jest.fn() };
    sources = {
      loop: { latest: jest.fn().mockReturnValue(null), subscribe: jest.fn(), unsubscribe: jest.fn() },
      store: { getLatest: jest.fn().mockResolvedValue(stored) },
    };
  });

  test('leaves hydration to the loop once it has broadcast', async () => {
    sources.loop.latest.mockReturnValue(payload);

    await attach();

    expect(sources.store.getLatest).not.toHaveBeenCalled();
    expect(socket.emit).not.toHaveBeenCalled();
    expect(sources.loop.subscribe).toHaveBeenCalledTimes(1);
  });

  /**
   * Purpose:
   * Right after a restart the loop has nothing yet:
   * - the Valkey snapshot is emitted first
   * - then the client joins the broadcast
   */
  test('hydrates from the stored snapshot before the first broadcast', async () => {
    await attach();

    expect(socket.emit).toHaveBeenCalledWith('stock_update', stored);
    expect(sources.loop.subscribe).toHaveBeenCalledTimes(1);
  });

  test('subscribes without hydration when nothing is stored', async () => {
    sources.store.getLatest.mockResolvedValue(null);

    await attach();

    expect(socket.emit).not.toHaveBeenCalled();
    expect(sources.loop.subscribe).toHaveBeenCalledTimes(1);
  });

  test('does not subscribe a client that left during the snapshot read', async () => {
    sources.store.getLatest.mockImplementation(async () => {
      socket.connected = false;
      return stored;
    });

    await attach();

    expect(socket.emit).not.toHaveBeenCalled();
    expect(sources.loop.subscribe).not.toHaveBeenCalled();
  });

  test('unsubscribes the same subscriber on disconnect', async () => {
    await attach();

    const [event, onDisconnect] = socket.on.mock.calls[0];
    expect(event).toBe('disconnect');
    onDisconnect('transport close');

    const subscribed: Subscriber = sources.loop.subscribe.mock.calls[0][0];
    expect(sources.loop.unsubscribe).toHaveBeenCalledWith(subscribed);
  });
});
