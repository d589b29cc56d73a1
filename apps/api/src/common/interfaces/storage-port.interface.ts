export type {
  AuditEvent,
  AuditLevel,
  AuditQueryOptions,
  CountRecord,
  CountStatistics,
  NewCountRecord,
} from '@tallystream/shared';
import type {
  AuditEvent,
  AuditLevel,
  AuditQueryOptions,
  CountRecord,
  CountStatistics,
  NewCountRecord,
} from '@tallystream/shared';

export interface NewAuditEvent {
  timestamp: number;
  eventType: string;
  message: string;
  level: AuditLevel;
}

/**
 * Backing store for count records and audit events.
 * Adapters are not assumed safe for concurrent use; callers serialize through an ExclusiveScope.
 */
export interface StoragePort {
  initialize(): Promise<void>;
  close(): Promise<void>;
  isReady(): boolean;

  // Count records
  insertCountRecord(record: NewCountRecord): Promise<number>;
  getLatestCounts(limit: number): Promise<CountRecord[]>;
  getCountsByTimeRange(startTime: number, endTime: number): Promise<CountRecord[]>;
  getAllCounts(): Promise<CountRecord[]>;
  getCountStatistics(): Promise<CountStatistics>;
  getTotalCountRecords(): Promise<number>;
  pruneCountsOlderThan(cutoffTimestamp: number): Promise<number>;

  // Audit log
  saveAuditEvent(event: NewAuditEvent): Promise<number>;
  getAuditEvents(options?: AuditQueryOptions): Promise<AuditEvent[]>;
}
