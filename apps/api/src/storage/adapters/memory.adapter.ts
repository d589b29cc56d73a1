import { formatSqlTimestamp } from '@tallystream/shared';
import {
  StoragePort,
  AuditEvent,
  AuditQueryOptions,
  CountRecord,
  CountStatistics,
  NewAuditEvent,
  NewCountRecord,
} from '../../common/interfaces/storage-port.interface';
import { statisticsFromRecords } from './base-sql.adapter';

function copy<T extends object>(row: T): T {
  return { ...row };
}

function byTimestampAsc(a: { timestamp: number; id: number }, b: { timestamp: number; id: number }): number {
  return a.timestamp - b.timestamp || a.id - b.id;
}

/**
 * In-process store with the same ordering and aggregate rules as the SQLite adapter.
 * Backs tests and `STORAGE_TYPE=memory`.
 */
export class MemoryAdapter implements StoragePort {
  private counts: CountRecord[] = [];
  private auditEvents: AuditEvent[] = [];
  private nextCountId = 1;
  private nextAuditId = 1;
  private ready = false;

  async initialize(): Promise<void> {
    this.ready = true;
  }

  async close(): Promise<void> {
    this.ready = false;
  }

  isReady(): boolean {
    return this.ready;
  }

  async insertCountRecord(record: NewCountRecord): Promise<number> {
    this.requireReady();
    const id = this.nextCountId++;
    this.counts.push({
      id,
      timestamp: record.timestamp,
      datetimeStr: record.datetimeStr,
      cars: record.cars,
      vans: record.vans,
      motors: record.motors,
      buses: record.buses,
      bicycles: record.bicycles,
      createdAt: formatSqlTimestamp(),
    });
    return id;
  }

  async getLatestCounts(limit: number): Promise<CountRecord[]> {
    this.requireReady();
    return [...this.counts].sort(byTimestampAsc).reverse().slice(0, Math.max(0, limit)).map(copy);
  }

  async getCountsByTimeRange(startTime: number, endTime: number): Promise<CountRecord[]> {
    this.requireReady();
    return this.counts
      .filter((r) => r.timestamp >= startTime && r.timestamp <= endTime)
      .sort(byTimestampAsc)
      .map(copy);
  }

  async getAllCounts(): Promise<CountRecord[]> {
    this.requireReady();
    return [...this.counts].sort(byTimestampAsc).map(copy);
  }

  async getCountStatistics(): Promise<CountStatistics> {
    this.requireReady();
    return statisticsFromRecords(this.counts);
  }

  async getTotalCountRecords(): Promise<number> {
    this.requireReady();
    return this.counts.length;
  }

  async pruneCountsOlderThan(cutoffTimestamp: number): Promise<number> {
    this.requireReady();
    const before = this.counts.length;
    this.counts = this.counts.filter((r) => r.timestamp >= cutoffTimestamp);
    return before - this.counts.length;
  }

  async saveAuditEvent(event: NewAuditEvent): Promise<number> {
    this.requireReady();
    const id = this.nextAuditId++;
    this.auditEvents.push({ id, ...event, createdAt: formatSqlTimestamp() });
    return id;
  }

  async getAuditEvents(options: AuditQueryOptions = {}): Promise<AuditEvent[]> {
    this.requireReady();
    const { eventType, level, startTime, endTime } = options;

    return this.auditEvents
      .filter((e) => !eventType || e.eventType === eventType)
      .filter((e) => !level || e.level === level)
      .filter((e) => startTime === undefined || e.timestamp >= startTime)
      .filter((e) => endTime === undefined || e.timestamp <= endTime)
      .sort(byTimestampAsc)
      .reverse()
      .slice(0, options.limit ?? 100)
      .map(copy);
  }

  private requireReady(): void {
    if (!this.ready) {
      throw new Error('Database not initialized');
    }
  }
}
