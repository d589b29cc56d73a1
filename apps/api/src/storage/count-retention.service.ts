import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '@tallystream/shared';
import { CountStoreService } from './count-store.service';

/**
 * Periodic retention sweep. Idle unless `retention.days` is configured.
 */
@Injectable()
export class CountRetentionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CountRetentionService.name);
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly days: number | undefined;
  private readonly intervalMs: number;

  constructor(
    private readonly countStore: CountStoreService,
    configService: ConfigService,
  ) {
    this.days = configService.get<number>('retention.days');
    this.intervalMs = configService.get<number>('retention.sweepIntervalMs', 3600000);
  }

  onModuleInit(): void {
    if (this.days === undefined) {
      return;
    }
    this.logger.log(`Starting retention sweep (keep ${this.days} days, interval: ${this.intervalMs}ms)`);
    this.scheduleNextSweep();
  }

  onModuleDestroy(): void {
    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Runs one sweep now. Returns the number of deleted records, or null on failure.
   */
  async sweep(): Promise<number | null> {
    if (this.days === undefined) {
      return null;
    }
    try {
      const deleted = await this.countStore.retain(this.days);
      if (deleted > 0) {
        await this.countStore.logEvent('RetentionSweep', `Deleted ${deleted} records older than ${this.days} days`, 'INFO');
      }
      return deleted;
    } catch (error) {
      this.logger.error(`Retention sweep failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private scheduleNextSweep(): void {
    this.sweepTimer = setTimeout(() => {
      void this.sweep().finally(() => {
        if (this.sweepTimer) {
          this.scheduleNextSweep();
        }
      });
    }, this.intervalMs);
    this.sweepTimer.unref();
  }
}
