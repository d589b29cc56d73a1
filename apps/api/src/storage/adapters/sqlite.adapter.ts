import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import {
  StoragePort,
  AuditEvent,
  AuditQueryOptions,
  CountRecord,
  CountStatistics,
  NewAuditEvent,
  NewCountRecord,
} from '../../common/interfaces/storage-port.interface';
import {
  AggregateRow,
  AuditRow,
  CountRow,
  aggregateSelectList,
  mapAuditRow,
  mapCountRow,
  statisticsFromAggregate,
} from './base-sql.adapter';

export interface SqliteAdapterConfig {
  filepath: string;
}

export class SqliteAdapter implements StoragePort {
  private db: Database.Database | null = null;
  private ready: boolean = false;

  constructor(private config: SqliteAdapterConfig) {}

  async initialize(): Promise<void> {
    try {
      if (this.config.filepath !== ':memory:') {
        const dir = path.dirname(this.config.filepath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }

      this.db = new Database(this.config.filepath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');

      this.createSchema();
      this.ready = true;
    } catch (error) {
      this.ready = false;
      throw new Error(`Failed to initialize SQLite: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.ready = false;
    }
  }

  isReady(): boolean {
    return this.ready && this.db !== null;
  }

  async insertCountRecord(record: NewCountRecord): Promise<number> {
    const db = this.requireDb();

    const result = db
      .prepare<[number, string, number, number, number, number, number]>(`
        INSERT INTO vehicle_counts (timestamp, datetime_str, cars, vans, motors, buses, bicycles)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        record.timestamp,
        record.datetimeStr,
        record.cars,
        record.vans,
        record.motors,
        record.buses,
        record.bicycles,
      );

    return Number(result.lastInsertRowid);
  }

  async getLatestCounts(limit: number): Promise<CountRecord[]> {
    const db = this.requireDb();

    const rows = db
      .prepare<[number], CountRow>('SELECT * FROM vehicle_counts ORDER BY timestamp DESC, id DESC LIMIT ?')
      .all(limit);

    return rows.map(mapCountRow);
  }

  async getCountsByTimeRange(startTime: number, endTime: number): Promise<CountRecord[]> {
    const db = this.requireDb();

    const rows = db
      .prepare<[number, number], CountRow>(`
        SELECT * FROM vehicle_counts
        WHERE timestamp >= ? AND timestamp <= ?
        ORDER BY timestamp ASC, id ASC
      `)
      .all(startTime, endTime);

    return rows.map(mapCountRow);
  }

  async getAllCounts(): Promise<CountRecord[]> {
    const db = this.requireDb();

    const rows = db
      .prepare<[], CountRow>('SELECT * FROM vehicle_counts ORDER BY timestamp ASC, id ASC')
      .all();

    return rows.map(mapCountRow);
  }

  async getCountStatistics(): Promise<CountStatistics> {
    const db = this.requireDb();

    const totals = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM vehicle_counts').get();
    const aggregates = db
      .prepare<[], AggregateRow>(`
        SELECT
        ${aggregateSelectList()}
        FROM vehicle_counts
      `)
      .get();

    return statisticsFromAggregate(totals?.count ?? 0, aggregates);
  }

  async getTotalCountRecords(): Promise<number> {
    const db = this.requireDb();

    const result = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM vehicle_counts').get();
    return result?.count ?? 0;
  }

  async pruneCountsOlderThan(cutoffTimestamp: number): Promise<number> {
    const db = this.requireDb();

    const result = db.prepare<[number]>('DELETE FROM vehicle_counts WHERE timestamp < ?').run(cutoffTimestamp);
    return result.changes;
  }

  async saveAuditEvent(event: NewAuditEvent): Promise<number> {
    const db = this.requireDb();

    const result = db
      .prepare<[number, string, string, string]>(
        'INSERT INTO audit_logs (timestamp, event_type, message, level) VALUES (?, ?, ?, ?)',
      )
      .run(event.timestamp, event.eventType, event.message, event.level);

    return Number(result.lastInsertRowid);
  }

  async getAuditEvents(options: AuditQueryOptions = {}): Promise<AuditEvent[]> {
    const db = this.requireDb();

    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (options.eventType) {
      conditions.push('event_type = ?');
      params.push(options.eventType);
    }

    if (options.level) {
      conditions.push('level = ?');
      params.push(options.level);
    }

    if (options.startTime !== undefined) {
      conditions.push('timestamp >= ?');
      params.push(options.startTime);
    }

    if (options.endTime !== undefined) {
      conditions.push('timestamp <= ?');
      params.push(options.endTime);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(options.limit ?? 100);

    const rows = db
      .prepare<(string | number)[], AuditRow>(`
        SELECT * FROM audit_logs
        ${whereClause}
        ORDER BY timestamp DESC, id DESC
        LIMIT ?
      `)
      .all(...params);

    return rows.map(mapAuditRow);
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new Error('Database not initialized');
    }
    return this.db;
  }

  private createSchema(): void {
    if (!this.db) {
      return;
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vehicle_counts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp REAL NOT NULL,
        datetime_str TEXT NOT NULL,
        cars INTEGER NOT NULL DEFAULT 0 CHECK (cars >= 0),
        vans INTEGER NOT NULL DEFAULT 0 CHECK (vans >= 0),
        motors INTEGER NOT NULL DEFAULT 0 CHECK (motors >= 0),
        buses INTEGER NOT NULL DEFAULT 0 CHECK (buses >= 0),
        bicycles INTEGER NOT NULL DEFAULT 0 CHECK (bicycles >= 0),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_vehicle_counts_timestamp ON vehicle_counts(timestamp);
      CREATE INDEX IF NOT EXISTS idx_vehicle_counts_datetime_str ON vehicle_counts(datetime_str);

      CREATE TABLE IF NOT EXISTS audit_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp REAL NOT NULL,
        event_type TEXT NOT NULL,
        message TEXT NOT NULL,
        level TEXT NOT NULL DEFAULT 'INFO',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_audit_logs_timestamp ON audit_logs(timestamp);
      CREATE INDEX IF NOT EXISTS idx_audit_logs_event_type ON audit_logs(event_type);
    `);
  }
}
