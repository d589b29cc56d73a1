import { VEHICLE_CATEGORIES, emptyCounts } from '@tallystream/shared';
import type { CountRecord, CountStatistics, VehicleCounts } from '@tallystream/shared';

const LABELS: Record<(typeof VEHICLE_CATEGORIES)[number], string> = {
  cars: 'Cars',
  vans: 'Vans',
  motors: 'Motors',
  buses: 'Buses',
  bicycles: 'Bicycles',
};

const TABLE_WIDTH = 60;

export function separator(title = ''): string[] {
  const rule = '='.repeat(TABLE_WIDTH);
  if (!title) {
    return ['-'.repeat(TABLE_WIDTH)];
  }
  const pad = Math.max(0, Math.floor((TABLE_WIDTH - title.length) / 2));
  return [rule, `${' '.repeat(pad)}${title}`, rule];
}

function countLines(counts: VehicleCounts, format: (n: number) => string): string[] {
  return VEHICLE_CATEGORIES.map((c) => `  ${`${LABELS[c]}:`.padEnd(11)}${format(counts[c])}`);
}

const thousands = (n: number) => n.toLocaleString('en-US');

export function totalVehicles(counts: VehicleCounts): number {
  return VEHICLE_CATEGORIES.reduce((sum, c) => sum + counts[c], 0);
}

export function formatStatistics(stats: CountStatistics): string[] {
  if (stats.totalRecords === 0) {
    return ['No data in database'];
  }
  return [
    `Total Records: ${stats.totalRecords}`,
    '',
    'TOTALS:',
    ...countLines(stats.total, thousands),
    '',
    'AVERAGES PER RECORD:',
    ...countLines(stats.average, (n) => n.toFixed(1)),
    '',
    'PEAKS (Maximum):',
    ...countLines(stats.maximum, String),
    '',
    'MINIMUMS:',
    ...countLines(stats.minimum, String),
  ];
}

export function formatTotals(stats: CountStatistics, latest?: CountRecord): string[] {
  if (stats.totalRecords === 0) {
    return ['No data in database'];
  }
  return [
    ...(latest ? [`Data collected until: ${latest.datetimeStr}`, ''] : []),
    'TOTAL VEHICLES DETECTED:',
    ...countLines(stats.total, thousands),
    '',
    `  ${'TOTAL:'.padEnd(11)}${thousands(totalVehicles(stats.total))} vehicles`,
  ];
}

export function formatRecordTable(records: CountRecord[]): string[] {
  const header = [
    'DateTime'.padEnd(25),
    'Cars'.padEnd(6),
    'Vans'.padEnd(6),
    'Motors'.padEnd(7),
    'Buses'.padEnd(6),
    'Bicycles',
  ].join(' ');
  const rows = records.map((r) =>
    [
      r.datetimeStr.padEnd(25),
      String(r.cars).padEnd(6),
      String(r.vans).padEnd(6),
      String(r.motors).padEnd(7),
      String(r.buses).padEnd(6),
      String(r.bicycles),
    ].join(' '),
  );
  return [header, '-'.repeat(TABLE_WIDTH), ...rows];
}

/**
 * `tallystream_backup_YYYYMMDD_HHMMSS.db`, UTC.
 */
export function backupFileName(date: Date = new Date()): string {
  const stamp = date.toISOString().slice(0, 19).replace(/-|:/g, '').replace('T', '_');
  return `tallystream_backup_${stamp}.db`;
}

export function formatKilobytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

/** Relative traffic weight by hour of day, peaking in the morning and evening rush. */
export function trafficWeight(hour: number): number {
  if ((hour >= 7 && hour <= 9) || (hour >= 16 && hour <= 18)) {
    return 1;
  }
  if (hour >= 6 && hour <= 21) {
    return 0.6;
  }
  return 0.15;
}

const PEAK_COUNTS: VehicleCounts = { cars: 40, vans: 8, motors: 10, buses: 4, bicycles: 12 };

/**
 * Demo rows between `start` and `end` (Unix seconds), one per `intervalSeconds`.
 * `random` returns values in [0, 1).
 */
export function generateDemoCounts(
  start: number,
  end: number,
  intervalSeconds: number,
  random: () => number = Math.random,
): Array<VehicleCounts & { timestamp: number }> {
  const rows: Array<VehicleCounts & { timestamp: number }> = [];
  for (let ts = start; ts <= end; ts += intervalSeconds) {
    const weight = trafficWeight(new Date(ts * 1000).getUTCHours());
    const counts = emptyCounts();
    for (const c of VEHICLE_CATEGORIES) {
      counts[c] = Math.floor(PEAK_COUNTS[c] * weight * random());
    }
    rows.push({ ...counts, timestamp: ts });
  }
  return rows;
}
