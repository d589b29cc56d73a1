/**
 * Shared row mapping and aggregate helpers for the storage adapters.
 */
import { VEHICLE_CATEGORIES, emptyCounts } from '@tallystream/shared';
import type { AuditLevel, VehicleCounts } from '@tallystream/shared';
import type { AuditEvent, CountRecord, CountStatistics } from '../../common/interfaces/storage-port.interface';

export interface CountRow {
  id: number;
  timestamp: number;
  datetime_str: string;
  cars: number;
  vans: number;
  motors: number;
  buses: number;
  bicycles: number;
  created_at: string | null;
}

export interface AuditRow {
  id: number;
  timestamp: number;
  event_type: string;
  message: string;
  level: string;
  created_at: string | null;
}

/**
 * One row of per-category aggregates, e.g. `{ avg_cars, max_cars, min_cars, sum_cars, ... }`.
 * SQLite returns NULL for every aggregate except COUNT on an empty table.
 */
export type AggregateRow = Record<string, number | null>;

export const COUNT_COLUMNS = ['id', 'timestamp', 'datetime_str', ...VEHICLE_CATEGORIES, 'created_at'] as const;

export function mapCountRow(row: CountRow): CountRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    datetimeStr: row.datetime_str,
    cars: row.cars,
    vans: row.vans,
    motors: row.motors,
    buses: row.buses,
    bicycles: row.bicycles,
    createdAt: row.created_at ?? undefined,
  };
}

export function mapAuditRow(row: AuditRow): AuditEvent {
  return {
    id: row.id,
    timestamp: row.timestamp,
    eventType: row.event_type,
    message: row.message,
    level: toAuditLevel(row.level),
    createdAt: row.created_at ?? undefined,
  };
}

export function toAuditLevel(value: string): AuditLevel {
  switch (value) {
    case 'INFO':
    case 'WARNING':
    case 'ERROR':
      return value;
    default:
      return 'WARNING';
  }
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Builds the aggregate SELECT list: AVG/MAX/MIN/SUM for every category.
 */
export function aggregateSelectList(): string {
  return VEHICLE_CATEGORIES.map(
    (c) => `AVG(${c}) AS avg_${c}, MAX(${c}) AS max_${c}, MIN(${c}) AS min_${c}, SUM(${c}) AS sum_${c}`,
  ).join(',\n        ');
}

export function statisticsFromAggregate(totalRecords: number, row: AggregateRow | undefined): CountStatistics {
  const stats: CountStatistics = {
    totalRecords,
    average: emptyCounts(),
    maximum: emptyCounts(),
    minimum: emptyCounts(),
    total: emptyCounts(),
  };
  if (!row || totalRecords === 0) {
    return stats;
  }

  for (const category of VEHICLE_CATEGORIES) {
    stats.average[category] = roundTo2(row[`avg_${category}`] ?? 0);
    stats.maximum[category] = row[`max_${category}`] ?? 0;
    stats.minimum[category] = row[`min_${category}`] ?? 0;
    stats.total[category] = row[`sum_${category}`] ?? 0;
  }
  return stats;
}

export function statisticsFromRecords(records: VehicleCounts[]): CountStatistics {
  if (records.length === 0) {
    return statisticsFromAggregate(0, undefined);
  }

  const row: AggregateRow = {};
  for (const category of VEHICLE_CATEGORIES) {
    let sum = 0;
    let max = -Infinity;
    let min = Infinity;
    for (const record of records) {
      const value = record[category];
      sum += value;
      if (value > max) max = value;
      if (value < min) min = value;
    }
    row[`avg_${category}`] = sum / records.length;
    row[`max_${category}`] = max;
    row[`min_${category}`] = min;
    row[`sum_${category}`] = sum;
  }
  return statisticsFromAggregate(records.length, row);
}
