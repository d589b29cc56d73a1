import { Injectable, Logger } from '@nestjs/common';
import type { AuditEventType, AuditLevel } from '@tallystream/shared';
import { CountStoreService } from '../storage/count-store.service';

/**
 * Writes security-relevant events to the process log and the durable audit table.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(private readonly countStore: CountStoreService) {}

  /**
   * Never throws. Resolves to false when the durable write failed.
   */
  async record(eventType: AuditEventType, message: string, level: AuditLevel = 'WARNING'): Promise<boolean> {
    const line = `[${eventType}] ${message}`;
    switch (level) {
      case 'ERROR':
        this.logger.error(line);
        break;
      case 'WARNING':
        this.logger.warn(line);
        break;
      default:
        this.logger.log(line);
    }

    return this.countStore.logEvent(eventType, message, level);
  }
}
