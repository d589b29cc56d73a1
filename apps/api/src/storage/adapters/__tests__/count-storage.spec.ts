import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MemoryAdapter } from '../memory.adapter';
import { SqliteAdapter } from '../sqlite.adapter';
import { statisticsFromRecords } from '../base-sql.adapter';
import { NewCountRecord, StoragePort } from '../../../common/interfaces/storage-port.interface';

function record(timestamp: number, cars: number, extra: Partial<NewCountRecord> = {}): NewCountRecord {
  return {
    timestamp,
    datetimeStr: `t${timestamp}`,
    cars,
    vans: 0,
    motors: 0,
    buses: 0,
    bicycles: 0,
    ...extra,
  };
}

describe.each([
  ['SqliteAdapter', (): StoragePort => new SqliteAdapter({ filepath: ':memory:' })],
  ['MemoryAdapter', (): StoragePort => new MemoryAdapter()],
])('%s', (_name, createAdapter) => {
  let adapter: StoragePort;

  beforeEach(async () => {
    adapter = createAdapter();
    await adapter.initialize();
  });

  afterEach(async () => {
    await adapter.close();
  });

  describe('lifecycle', () => {
    it('should report ready after initialize and not after close', async () => {
      expect(adapter.isReady()).toBe(true);
      await adapter.close();
      expect(adapter.isReady()).toBe(false);
    });

    it('should reject writes after close', async () => {
      await adapter.close();
      await expect(adapter.insertCountRecord(record(1, 1))).rejects.toThrow('Database not initialized');
    });
  });

  describe('count records', () => {
    it('should assign increasing ids and keep integer values', async () => {
      const first = await adapter.insertCountRecord(record(100, 3, { vans: 1, bicycles: 7 }));
      const second = await adapter.insertCountRecord(record(101, 4));

      expect(second).toBeGreaterThan(first);

      const [latest] = await adapter.getLatestCounts(1);
      expect(latest).toMatchObject({
        id: second,
        timestamp: 101,
        datetimeStr: 't101',
        cars: 4,
        vans: 0,
        motors: 0,
        buses: 0,
        bicycles: 0,
      });
      expect(latest.createdAt).toEqual(expect.any(String));
    });

    it('should return latest records descending by timestamp', async () => {
      await adapter.insertCountRecord(record(20, 2));
      await adapter.insertCountRecord(record(10, 1));
      await adapter.insertCountRecord(record(30, 3));

      const latest = await adapter.getLatestCounts(2);
      expect(latest.map((r) => r.timestamp)).toEqual([30, 20]);
    });

    it('should return a range ascending with inclusive bounds', async () => {
      for (const ts of [5, 10, 15, 20, 25]) {
        await adapter.insertCountRecord(record(ts, ts));
      }

      const rows = await adapter.getCountsByTimeRange(10, 20);
      expect(rows.map((r) => r.timestamp)).toEqual([10, 15, 20]);
    });

    it('should return every record ascending by timestamp', async () => {
      await adapter.insertCountRecord(record(3, 3));
      await adapter.insertCountRecord(record(1, 1));
      await adapter.insertCountRecord(record(2, 2));

      const rows = await adapter.getAllCounts();
      expect(rows.map((r) => r.cars)).toEqual([1, 2, 3]);
    });

    it('should count records', async () => {
      expect(await adapter.getTotalCountRecords()).toBe(0);
      await adapter.insertCountRecord(record(1, 1));
      await adapter.insertCountRecord(record(2, 1));
      expect(await adapter.getTotalCountRecords()).toBe(2);
    });

    it('should prune only records strictly older than the cutoff', async () => {
      await adapter.insertCountRecord(record(100, 1));
      await adapter.insertCountRecord(record(200, 1));
      await adapter.insertCountRecord(record(300, 1));

      const deleted = await adapter.pruneCountsOlderThan(200);

      expect(deleted).toBe(1);
      const rows = await adapter.getAllCounts();
      expect(rows.map((r) => r.timestamp)).toEqual([200, 300]);
    });

    it('should hand out copies that do not alter stored records', async () => {
      await adapter.insertCountRecord(record(10, 4));

      const [latest] = await adapter.getLatestCounts(1);
      latest.cars = -99;
      const [all] = await adapter.getAllCounts();
      all.vans = -99;
      const [ranged] = await adapter.getCountsByTimeRange(0, 100);
      ranged.buses = -99;

      const [again] = await adapter.getLatestCounts(1);
      expect(again).toMatchObject({ cars: 4, vans: 0, buses: 0 });
      const stats = await adapter.getCountStatistics();
      expect(stats.minimum.cars).toBe(4);
    });
  });

  describe('statistics', () => {
    it('should return zeros on an empty table', async () => {
      const stats = await adapter.getCountStatistics();
      const zeros = { cars: 0, vans: 0, motors: 0, buses: 0, bicycles: 0 };

      expect(stats).toEqual({
        totalRecords: 0,
        average: zeros,
        maximum: zeros,
        minimum: zeros,
        total: zeros,
      });
    });

    it('should aggregate per category and round averages to two decimals', async () => {
      await adapter.insertCountRecord(record(1, 1, { vans: 2 }));
      await adapter.insertCountRecord(record(2, 2, { vans: 0 }));
      await adapter.insertCountRecord(record(3, 2, { vans: 9 }));

      const stats = await adapter.getCountStatistics();

      expect(stats.totalRecords).toBe(3);
      expect(stats.average.cars).toBe(1.67);
      expect(stats.average.vans).toBe(3.67);
      expect(stats.maximum.vans).toBe(9);
      expect(stats.minimum.vans).toBe(0);
      expect(stats.total.cars).toBe(5);
      expect(stats.total.bicycles).toBe(0);
    });
  });

  describe('audit events', () => {
    it('should save and list events newest first', async () => {
      await adapter.saveAuditEvent({ timestamp: 10, eventType: 'AuthenticationError', message: 'bad key', level: 'WARNING' });
      await adapter.saveAuditEvent({ timestamp: 20, eventType: 'RateLimitError', message: 'too many', level: 'WARNING' });

      const events = await adapter.getAuditEvents();

      expect(events.map((e) => e.eventType)).toEqual(['RateLimitError', 'AuthenticationError']);
      expect(events[1]).toMatchObject({ timestamp: 10, message: 'bad key', level: 'WARNING' });
    });

    it('should filter by type, level and time window', async () => {
      await adapter.saveAuditEvent({ timestamp: 10, eventType: 'AuthenticationError', message: 'a', level: 'WARNING' });
      await adapter.saveAuditEvent({ timestamp: 20, eventType: 'AuthenticationError', message: 'b', level: 'ERROR' });
      await adapter.saveAuditEvent({ timestamp: 30, eventType: 'IpBlocked', message: 'c', level: 'WARNING' });

      expect((await adapter.getAuditEvents({ eventType: 'AuthenticationError' })).map((e) => e.message)).toEqual(['b', 'a']);
      expect((await adapter.getAuditEvents({ level: 'WARNING' })).map((e) => e.message)).toEqual(['c', 'a']);
      expect((await adapter.getAuditEvents({ startTime: 15, endTime: 30 })).map((e) => e.message)).toEqual(['c', 'b']);
      expect((await adapter.getAuditEvents({ limit: 1 })).map((e) => e.message)).toEqual(['c']);
    });
  });
});

describe('SqliteAdapter on disk', () => {
  it('should create the parent directory and persist across reopen', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tallystream-'));
    const filepath = path.join(dir, 'nested', 'counts.db');

    try {
      const first = new SqliteAdapter({ filepath });
      await first.initialize();
      await first.insertCountRecord(record(1, 9));
      await first.close();

      const second = new SqliteAdapter({ filepath });
      await second.initialize();
      const rows = await second.getAllCounts();
      await second.close();

      expect(rows).toHaveLength(1);
      expect(rows[0].cars).toBe(9);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('SqliteAdapter constraints', () => {
  it('should refuse negative counts at the schema level', async () => {
    const adapter = new SqliteAdapter({ filepath: ':memory:' });
    await adapter.initialize();

    await expect(adapter.insertCountRecord(record(1, -1))).rejects.toThrow(/CHECK constraint failed/);
    expect(await adapter.getTotalCountRecords()).toBe(0);
    await adapter.close();
  });
});

describe('statisticsFromRecords', () => {
  it('should aggregate large record sets', () => {
    const records = Array.from({ length: 200000 }, (_, i) => ({
      cars: i % 10,
      vans: 1,
      motors: 0,
      buses: 0,
      bicycles: 0,
    }));

    const stats = statisticsFromRecords(records);

    expect(stats.totalRecords).toBe(200000);
    expect(stats.maximum.cars).toBe(9);
    expect(stats.minimum.cars).toBe(0);
    expect(stats.total.vans).toBe(200000);
    expect(stats.average.cars).toBe(4.5);
  });
});
