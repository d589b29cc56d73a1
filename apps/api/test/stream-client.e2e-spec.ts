import { NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';
import { StreamClient } from '@tallystream/client';
import { createTestApp, streamUrl, waitFor, TEST_API_KEY } from './test-utils';

const SAMPLE = { cars: 5, vans: 2, motors: 3, buses: 1, bicycles: 0 };
const quietLogger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };

describe('Stream delivery (e2e)', () => {
  let app: NestFastifyApplication;
  let url: string;
  const clients: StreamClient[] = [];

  function newClient(clientId: string, apiKey: string = TEST_API_KEY): StreamClient {
    const client = new StreamClient({ url, clientId, apiKey, logger: quietLogger, receiveTimeoutMs: 2000 });
    clients.push(client);
    return client;
  }

  async function subscribers(expected: number): Promise<void> {
    await waitFor(async () => {
      const res = await request(app.getHttpServer()).get('/health').expect(200);
      return res.body.connectedClients === expected;
    });
  }

  beforeAll(async () => {
    app = await createTestApp();
    url = await streamUrl(app);
  });

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((c) => c.disconnect()));
  });

  afterAll(async () => {
    await app.close();
  });

  it('should deliver an ingested record to every subscriber', async () => {
    const first = newClient('e2e-first');
    const second = newClient('e2e-second');
    expect(await first.connect()).toBe(true);
    expect(await second.connect()).toBe(true);
    await subscribers(2);

    const res = await request(app.getHttpServer())
      .post('/counts')
      .set('x-api-key', TEST_API_KEY)
      .send(SAMPLE)
      .expect(201);
    expect(res.body.recipients).toBe(2);

    const [a, b] = await Promise.all([first.receive(), second.receive()]);
    for (const result of [a, b]) {
      expect(result).toEqual({
        ok: true,
        payload: { ...SAMPLE, timestamp: res.body.record.timestamp },
      });
    }
  });

  it('should refuse a client with the wrong key', async () => {
    const client = newClient('e2e-intruder', 'wrong-key-000000');

    expect(await client.connect()).toBe(false);
    expect(client.lastClose).toEqual({ code: 4002, reason: 'Invalid credentials' });
    await subscribers(0);

    const audit = await request(app.getHttpServer())
      .get('/audit/events')
      .set('x-api-key', TEST_API_KEY)
      .query({ eventType: 'AuthenticationError' })
      .expect(200);
    expect(audit.body[0].message).toBe('Invalid API key from 127.0.0.1');
  });

  it('should answer keep-alives without breaking delivery', async () => {
    const client = newClient('e2e-pinger');
    expect(await client.connect()).toBe(true);
    await subscribers(1);

    expect(client.ping()).toBe(true);
    await request(app.getHttpServer())
      .post('/counts')
      .set('x-api-key', TEST_API_KEY)
      .send({ ...SAMPLE, cars: 7 })
      .expect(201);

    const result = await client.receive();
    expect(result.ok && result.payload.cars).toBe(7);
  });
});
