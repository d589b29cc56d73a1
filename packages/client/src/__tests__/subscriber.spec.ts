import type { CountPayload } from '@tallystream/shared';
import { StreamSubscriber, reconnectDelay } from '../subscriber';
import { API_KEY, FakeStreamServer, signed, waitFor } from './fake-stream-server';

describe('reconnectDelay', () => {
  it.each([
    [0, 1000],
    [1, 2000],
    [3, 8000],
    [4, 16000],
    [5, 30000],
    [12, 30000],
  ])('attempt %i waits %ims', (attempt, expected) => {
    expect(reconnectDelay(attempt)).toBe(expected);
  });

  it('should honour custom bounds', () => {
    expect(reconnectDelay(2, 10, 25)).toBe(25);
    expect(reconnectDelay(1, 10, 25)).toBe(20);
  });
});

describe('StreamSubscriber', () => {
  let server: FakeStreamServer;
  let subscriber: StreamSubscriber;
  const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };

  beforeEach(() => {
    server = new FakeStreamServer();
  });

  afterEach(async () => {
    await subscriber.stop();
    await server.close();
  });

  it('should deliver records across a dropped connection', async () => {
    const records: CountPayload[] = [];
    server.onAuthenticated = (ws, index) => {
      ws.send(JSON.stringify(signed({ cars: index, vans: 0, motors: 0, buses: 0, bicycles: 0, timestamp: 100 + index })));
      if (index === 1) {
        ws.close(4004, 'Session expired');
      }
    };

    subscriber = new StreamSubscriber({
      url: await server.url(),
      clientId: 'client-a',
      apiKey: API_KEY,
      logger,
      baseReconnectDelayMs: 10,
      onRecord: (payload) => records.push(payload),
    });
    subscriber.start();

    await waitFor(() => records.length === 2);

    expect(records.map((r) => r.cars)).toEqual([1, 2]);
    expect(server.connections).toBe(2);
  });

  it('should keep retrying when the key is refused', async () => {
    const onRecord = jest.fn();
    subscriber = new StreamSubscriber({
      url: await server.url(),
      clientId: 'client-a',
      apiKey: 'wrong-key-000000',
      logger,
      baseReconnectDelayMs: 10,
      onRecord,
    });
    subscriber.start();

    await waitFor(() => server.connections >= 3);

    expect(onRecord).not.toHaveBeenCalled();
    expect(logger.log).toHaveBeenCalledWith('[StreamClient] Reconnecting in 10ms (attempt 1)');
  });

  it('should report refused frames and keep the connection', async () => {
    const errors: string[] = [];
    const records: CountPayload[] = [];
    server.onAuthenticated = (ws) => {
      ws.send(JSON.stringify(signed({ cars: 1, vans: 0, motors: 0, buses: 0, bicycles: 0 }, 'another-secret-000')));
      ws.send(JSON.stringify(signed({ cars: 2, vans: 0, motors: 0, buses: 0, bicycles: 0 })));
    };

    subscriber = new StreamSubscriber({
      url: await server.url(),
      clientId: 'client-a',
      apiKey: API_KEY,
      logger,
      onRecord: (payload) => records.push(payload),
      onError: (error) => errors.push(error.name),
    });
    subscriber.start();

    await waitFor(() => records.length === 1);

    expect(errors).toEqual(['IntegrityError']);
    expect(records[0].cars).toBe(2);
    expect(server.connections).toBe(1);
  });

  it('should stop cleanly', async () => {
    subscriber = new StreamSubscriber({
      url: await server.url(),
      clientId: 'client-a',
      apiKey: API_KEY,
      logger,
      onRecord: jest.fn(),
    });
    subscriber.start();
    await waitFor(() => server.connections === 1);

    await subscriber.stop();

    expect(subscriber.isRunning).toBe(false);
  });
});
