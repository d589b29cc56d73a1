import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';
import { createTestApp, TEST_API_KEY } from './test-utils';

const SAMPLE = { cars: 5, vans: 2, motors: 3, buses: 1, bicycles: 0 };

describe('Counts API (e2e)', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /counts', () => {
    it('should reject requests without an API key', async () => {
      const res = await request(app.getHttpServer()).post('/counts').send(SAMPLE).expect(401);

      expect(res.body.message).toBe('Missing x-api-key header');
    });

    it('should reject a wrong API key and audit it', async () => {
      await request(app.getHttpServer())
        .post('/counts')
        .set('x-api-key', 'wrong-key')
        .send(SAMPLE)
        .expect(401);

      const audit = await request(app.getHttpServer())
        .get('/audit/events')
        .set('x-api-key', TEST_API_KEY)
        .query({ eventType: 'AuthenticationError' })
        .expect(200);
      expect(audit.body.length).toBeGreaterThanOrEqual(1);
      expect(audit.body[0]).toMatchObject({ eventType: 'AuthenticationError', level: 'WARNING' });
    });

    it('should persist and report the broadcast outcome', async () => {
      const res = await request(app.getHttpServer())
        .post('/counts')
        .set('x-api-key', TEST_API_KEY)
        .send(SAMPLE)
        .expect(201);

      expect(res.body).toMatchObject({
        status: 'delivered',
        recipients: 0,
        evicted: 0,
        record: { ...SAMPLE, id: expect.any(Number), timestamp: expect.any(Number) },
      });
    });

    it('should reject negative counts with 400', async () => {
      await request(app.getHttpServer())
        .post('/counts')
        .set('x-api-key', TEST_API_KEY)
        .send({ ...SAMPLE, cars: -1 })
        .expect(400);
    });

    it('should reject a payload missing a category with 400', async () => {
      const { bicycles: _omitted, ...partial } = SAMPLE;

      await request(app.getHttpServer())
        .post('/counts')
        .set('x-api-key', TEST_API_KEY)
        .send(partial)
        .expect(400);
    });
  });

  describe('queries', () => {
    beforeAll(async () => {
      for (let i = 0; i < 3; i++) {
        await request(app.getHttpServer())
          .post('/counts')
          .set('x-api-key', TEST_API_KEY)
          .send({ ...SAMPLE, cars: 10 + i })
          .expect(201);
      }
    });

    it('GET /counts/latest should return newest first', async () => {
      const res = await request(app.getHttpServer()).get('/counts/latest').query({ limit: 2 }).expect(200);

      expect(res.body).toHaveLength(2);
      expect(res.body[0].cars).toBe(12);
      expect(res.body[1].cars).toBe(11);
    });

    it('GET /counts/latest should reject an out-of-range limit', async () => {
      await request(app.getHttpServer()).get('/counts/latest').query({ limit: 0 }).expect(400);
    });

    it('GET /counts/range should return records inside the window ascending', async () => {
      const latest = await request(app.getHttpServer()).get('/counts/latest').query({ limit: 3 }).expect(200);
      const newest = latest.body[0].timestamp;
      const oldest = latest.body[2].timestamp;

      const res = await request(app.getHttpServer())
        .get('/counts/range')
        .query({ start: oldest, end: newest })
        .expect(200);

      expect(res.body.map((r: { cars: number }) => r.cars)).toEqual([10, 11, 12]);
    });

    it('GET /counts/range should reject an inverted window', async () => {
      await request(app.getHttpServer()).get('/counts/range').query({ start: 10, end: 5 }).expect(400);
    });

    it('GET /counts/statistics should aggregate every record', async () => {
      const total = await request(app.getHttpServer()).get('/counts/total').expect(200);
      const res = await request(app.getHttpServer()).get('/counts/statistics').expect(200);

      expect(res.body.totalRecords).toBe(total.body.totalRecords);
      expect(res.body.maximum.cars).toBe(12);
      expect(res.body.minimum.vans).toBe(2);
    });
  });

  describe('administration', () => {
    const exportDir = path.resolve(process.env.EXPORT_DIR ?? './exports');

    afterAll(() => {
      fs.rmSync(exportDir, { recursive: true, force: true });
    });

    it('POST /counts/export should write a CSV file under the export directory', async () => {
      const total = await request(app.getHttpServer()).get('/counts/total').expect(200);

      const res = await request(app.getHttpServer())
        .post('/counts/export')
        .set('x-api-key', TEST_API_KEY)
        .send({ path: 'counts.csv' })
        .expect(200);

      const file = path.join(exportDir, 'counts.csv');
      expect(res.body).toEqual({ exported: true, path: file });
      const lines = fs.readFileSync(file, 'utf8').trimEnd().split('\n');
      expect(lines).toHaveLength(total.body.totalRecords + 1);
    });

    it.each([
      ['a parent traversal', '../escape.csv'],
      ['an absolute path outside the directory', path.join(os.tmpdir(), 'tallystream-escape.csv')],
    ])('POST /counts/export should refuse %s with 400', async (_label, target) => {
      await request(app.getHttpServer())
        .post('/counts/export')
        .set('x-api-key', TEST_API_KEY)
        .send({ path: target })
        .expect(400);

      expect(fs.existsSync(path.resolve(exportDir, target))).toBe(false);
    });

    it('POST /counts/export should require an API key', async () => {
      await request(app.getHttpServer()).post('/counts/export').send({ path: 'x.csv' }).expect(401);
    });

    it('DELETE /counts/retention should keep recent records', async () => {
      const before = await request(app.getHttpServer()).get('/counts/total').expect(200);

      const res = await request(app.getHttpServer())
        .delete('/counts/retention')
        .set('x-api-key', TEST_API_KEY)
        .query({ days: 1 })
        .expect(200);

      expect(res.body).toEqual({ deleted: 0 });
      const after = await request(app.getHttpServer()).get('/counts/total').expect(200);
      expect(after.body.totalRecords).toBe(before.body.totalRecords);
    });
  });

  describe('GET /audit/events', () => {
    it('should require an API key', async () => {
      const res = await request(app.getHttpServer()).get('/audit/events').expect(401);

      expect(res.body.message).toBe('Missing x-api-key header');
    });

    it('should reject a zero limit with 400', async () => {
      await request(app.getHttpServer())
        .get('/audit/events')
        .set('x-api-key', TEST_API_KEY)
        .query({ limit: 0 })
        .expect(400);
    });
  });

  describe('GET /health', () => {
    it('should report storage readiness and subscriber count', async () => {
      const res = await request(app.getHttpServer()).get('/health').expect(200);

      expect(res.body).toMatchObject({
        status: 'ok',
        storage: { type: 'memory', ready: true },
        connectedClients: 0,
        totalRecords: expect.any(Number),
      });
    });
  });
});
