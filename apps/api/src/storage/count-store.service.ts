import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import {
  PersistenceError,
  ValidationError,
  checkCountPayload,
  errorMessage,
  formatDatetime,
  nowSeconds,
  pickCounts,
} from '@tallystream/shared';
import type { AuditLevel, VehicleCounts } from '@tallystream/shared';
import {
  StoragePort,
  AuditEvent,
  AuditQueryOptions,
  CountRecord,
  CountStatistics,
} from '../common/interfaces/storage-port.interface';
import { ExclusiveScope } from '../common/utils/exclusive-scope';
import { COUNT_COLUMNS } from './adapters/base-sql.adapter';

const SECONDS_PER_DAY = 86400;

function csvField(value: string | number | undefined): string {
  if (value === undefined) {
    return '';
  }
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function requirePositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`);
  }
}

export function toCsv(records: CountRecord[]): string {
  const lines = [COUNT_COLUMNS.join(',')];
  for (const r of records) {
    lines.push(
      [r.id, r.timestamp, r.datetimeStr, r.cars, r.vans, r.motors, r.buses, r.bicycles, r.createdAt]
        .map(csvField)
        .join(','),
    );
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Durable log of count records and audit events.
 *
 * Every storage call runs inside the shared ExclusiveScope. Operations with a
 * boolean contract (`insert`, `export`, `logEvent`) log failures and return
 * false; queries throw PersistenceError.
 */
@Injectable()
export class CountStoreService {
  private readonly logger = new Logger(CountStoreService.name);

  constructor(
    @Inject('STORAGE_CLIENT')
    private readonly storageClient: StoragePort,
    @Inject('EXCLUSIVE_SCOPE')
    private readonly scope: ExclusiveScope,
  ) {}

  isReady(): boolean {
    return this.storageClient.isReady();
  }

  async insert(counts: VehicleCounts, timestamp?: number): Promise<boolean> {
    return (await this.insertRecord(counts, timestamp)) !== null;
  }

  /**
   * Appends one row and returns it, or null when the counts are invalid or the write failed.
   */
  async insertRecord(counts: VehicleCounts, timestamp?: number): Promise<CountRecord | null> {
    const check = checkCountPayload({ ...pickCounts(counts), timestamp: timestamp ?? nowSeconds() });
    if (!check.valid) {
      const detail = check.issues.map((i) => `${i.path}: ${i.message}`).join('; ');
      this.logger.error(`Refused count record: ${detail}`);
      return null;
    }

    try {
      const ts = check.payload.timestamp ?? nowSeconds();
      const record = { ...pickCounts(check.payload), timestamp: ts, datetimeStr: formatDatetime(ts) };
      const id = await this.scope.run(() => this.storageClient.insertCountRecord(record));
      return { id, ...record };
    } catch (error) {
      this.logger.error(`Failed to insert count record: ${errorMessage(error)}`);
      return null;
    }
  }

  async latest(limit: number = 10): Promise<CountRecord[]> {
    requirePositiveInt('limit', limit);
    return this.query('read latest counts', () => this.storageClient.getLatestCounts(limit));
  }

  async range(startTime: number, endTime: number): Promise<CountRecord[]> {
    return this.query('read count range', () => this.storageClient.getCountsByTimeRange(startTime, endTime));
  }

  async statistics(): Promise<CountStatistics> {
    return this.query('compute statistics', () => this.storageClient.getCountStatistics());
  }

  async totalRecords(): Promise<number> {
    return this.query('count records', () => this.storageClient.getTotalCountRecords());
  }

  /**
   * Deletes rows with `timestamp < now - days * 86400` and returns how many went.
   */
  async retain(days: number): Promise<number> {
    if (!Number.isFinite(days) || days < 0) {
      throw new ValidationError(`Retention days must be a non-negative number, got ${days}`);
    }
    const cutoff = nowSeconds() - days * SECONDS_PER_DAY;
    const deleted = await this.query('apply retention', () => this.storageClient.pruneCountsOlderThan(cutoff));
    this.logger.log(`Retention removed ${deleted} records older than ${days} days`);
    return deleted;
  }

  /**
   * Writes every record as CSV, ascending by timestamp. The file is written
   * after the scope is released.
   */
  async export(filePath: string): Promise<boolean> {
    try {
      const records = await this.scope.run(() => this.storageClient.getAllCounts());
      await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
      await fs.promises.writeFile(filePath, toCsv(records), 'utf8');
      this.logger.log(`Exported ${records.length} records to ${filePath}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to export records to ${filePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  async logEvent(eventType: string, message: string, level: AuditLevel = 'INFO'): Promise<boolean> {
    try {
      await this.scope.run(() =>
        this.storageClient.saveAuditEvent({ timestamp: nowSeconds(), eventType, message, level }),
      );
      return true;
    } catch (error) {
      this.logger.error(`Failed to write audit event ${eventType}: ${errorMessage(error)}`);
      return false;
    }
  }

  async auditEvents(options: AuditQueryOptions = {}): Promise<AuditEvent[]> {
    if (options.limit !== undefined) {
      requirePositiveInt('limit', options.limit);
    }
    return this.query('read audit events', () => this.storageClient.getAuditEvents(options));
  }

  private async query<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.scope.run(fn);
    } catch (error) {
      this.logger.error(`Failed to ${operation}: ${errorMessage(error)}`);
      throw new PersistenceError(`Failed to ${operation}: ${errorMessage(error)}`);
    }
  }
}
