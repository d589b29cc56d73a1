#!/usr/bin/env node
/**
 * Offline utility for the Tallystream SQLite file: inspect, query, export,
 * back up, clean and seed.
 *
 * Usage: node dist/apps/api/scripts/count-db.js <command> [--db <path>]
 */

import { Command } from 'commander';
import Database from 'better-sqlite3';
import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import pc from 'picocolors';
import { errorMessage, nowSeconds } from '@tallystream/shared';
import { SqliteAdapter } from '../src/storage/adapters/sqlite.adapter';
import { CountStoreService } from '../src/storage/count-store.service';
import { ExclusiveScope } from '../src/common/utils/exclusive-scope';
import {
  backupFileName,
  formatKilobytes,
  formatRecordTable,
  formatStatistics,
  formatTotals,
  generateDemoCounts,
  separator,
} from './count-db-report';

const DEFAULT_DB_PATH = process.env.STORAGE_SQLITE_FILEPATH || './data/tallystream.db';

Logger.overrideLogger(['error', 'warn']);

function print(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

function fail(message: string): never {
  console.error(pc.red(message));
  process.exit(1);
}

function requireExisting(dbPath: string): void {
  if (!fs.existsSync(dbPath)) {
    fail(`Database not found: ${dbPath}`);
  }
}

function parsePositiveInt(name: string): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      fail(`${name} must be a non-negative integer, got "${value}"`);
    }
    return parsed;
  };
}

async function withStore<T>(dbPath: string, fn: (store: CountStoreService) => Promise<T>): Promise<T> {
  const adapter = new SqliteAdapter({ filepath: dbPath });
  await adapter.initialize();
  try {
    return await fn(new CountStoreService(adapter, new ExclusiveScope()));
  } finally {
    await adapter.close();
  }
}

const program = new Command();

program
  .name('count-db')
  .description('Manage the Tallystream vehicle count database')
  .option('--db <path>', 'SQLite database file', DEFAULT_DB_PATH);

const dbPath = (): string => program.opts<{ db: string }>().db;

program
  .command('info')
  .description('Show file size, record count and the newest record')
  .action(async () => {
    const file = dbPath();
    requireExisting(file);
    print(separator('DATABASE INFORMATION'));
    await withStore(file, async (store) => {
      const total = await store.totalRecords();
      console.log(`Database file: ${file}`);
      console.log(`File size: ${formatKilobytes(fs.statSync(file).size)}`);
      console.log(`Total records: ${total}`);
      const [latest] = await store.latest(1);
      console.log(latest ? `Latest record: ${latest.datetimeStr}` : '(No data in database)');
    });
  });

program
  .command('stats')
  .description('Totals, averages, peaks and minimums per category')
  .action(async () => {
    requireExisting(dbPath());
    print(separator('DATABASE STATISTICS'));
    print(formatStatistics(await withStore(dbPath(), (store) => store.statistics())));
  });

program
  .command('latest')
  .description('Newest records first')
  .option('-n, --limit <n>', 'Number of records', parsePositiveInt('limit'), 20)
  .action(async (options: { limit: number }) => {
    requireExisting(dbPath());
    print(separator(`LATEST ${options.limit} RECORDS`));
    const records = await withStore(dbPath(), (store) => store.latest(options.limit));
    print(records.length > 0 ? formatRecordTable(records) : ['No records found']);
  });

program
  .command('range')
  .description('Records from the last N hours, oldest first')
  .option('--hours <n>', 'Hours back from now', parsePositiveInt('hours'), 24)
  .action(async (options: { hours: number }) => {
    requireExisting(dbPath());
    print(separator(`DATA FROM LAST ${options.hours} HOURS`));
    const end = nowSeconds();
    const records = await withStore(dbPath(), (store) => store.range(end - options.hours * 3600, end));
    if (records.length === 0) {
      console.log(`No records found from the last ${options.hours} hours`);
      return;
    }
    console.log(`Found ${records.length} records`);
    console.log();
    print(formatRecordTable(records));
  });

program
  .command('totals')
  .description('Total vehicles detected across every record')
  .action(async () => {
    requireExisting(dbPath());
    print(separator('VEHICLE TOTALS'));
    const [stats, latest] = await withStore(dbPath(), async (store) => {
      return [await store.statistics(), (await store.latest(1))[0]] as const;
    });
    print(formatTotals(stats, latest));
  });

program
  .command('export')
  .description('Write every record to a CSV file')
  .argument('[file]', 'Output CSV file', 'tallystream_export.csv')
  .action(async (file: string) => {
    requireExisting(dbPath());
    print(separator('EXPORT TO CSV'));
    if (!(await withStore(dbPath(), (store) => store.export(file)))) {
      fail('Export failed');
    }
    console.log(pc.green(`Exported to: ${file} (${formatKilobytes(fs.statSync(file).size)})`));
  });

program
  .command('backup')
  .description('Online backup of the database file')
  .option('-o, --output <file>', 'Backup file (default: timestamped name beside the database)')
  .action(async (options: { output?: string }) => {
    const file = dbPath();
    requireExisting(file);
    print(separator('BACKUP DATABASE'));
    const target = options.output ?? path.join(path.dirname(file), backupFileName());
    const db = new Database(file, { readonly: true });
    try {
      await db.backup(target);
    } finally {
      db.close();
    }
    console.log(pc.green(`Backup created: ${target} (${formatKilobytes(fs.statSync(target).size)})`));
    console.log(`To restore: cp ${target} ${file}`);
  });

program
  .command('clean')
  .description('Delete records older than N days')
  .option('--days <n>', 'Days of history to keep', parsePositiveInt('days'), 30)
  .action(async (options: { days: number }) => {
    requireExisting(dbPath());
    print(separator('CLEAN OLD RECORDS'));
    await withStore(dbPath(), async (store) => {
      const before = await store.totalRecords();
      const deleted = await store.retain(options.days);
      console.log(`Records before: ${before}`);
      console.log(`Records deleted: ${deleted}`);
      console.log(`Records after: ${before - deleted}`);
    });
  });

program
  .command('seed')
  .description('Insert demo records covering the last N days')
  .option('--days <n>', 'Days of history to generate', parsePositiveInt('days'), 7)
  .option('--interval <seconds>', 'Seconds between records', parsePositiveInt('interval'), 300)
  .action(async (options: { days: number; interval: number }) => {
    if (options.interval === 0) {
      fail('interval must be greater than zero');
    }
    print(separator('SEED DEMO DATA'));
    const end = Math.floor(nowSeconds());
    const rows = generateDemoCounts(end - options.days * 86400, end, options.interval);
    const inserted = await withStore(dbPath(), async (store) => {
      let count = 0;
      for (const row of rows) {
        if (await store.insert(row, row.timestamp)) {
          count++;
        }
      }
      return count;
    });
    console.log(pc.green(`Inserted ${inserted} of ${rows.length} records into ${dbPath()}`));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fail(`Error: ${errorMessage(error)}`);
});
