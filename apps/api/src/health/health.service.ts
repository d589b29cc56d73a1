import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '@tallystream/shared';
import type { HealthResponse } from '@tallystream/shared';
import { CountStoreService } from '../storage/count-store.service';
import { StreamGateway } from '../stream/stream.gateway';

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startTime = Date.now();
  private readonly storageType: string;

  constructor(
    private readonly countStore: CountStoreService,
    private readonly gateway: StreamGateway,
    configService: ConfigService,
  ) {
    this.storageType = configService.get<string>('storage.type', 'sqlite');
  }

  async getHealth(): Promise<HealthResponse> {
    const ready = this.countStore.isReady();
    let totalRecords: number | null = null;

    if (ready) {
      try {
        totalRecords = await this.countStore.totalRecords();
      } catch (error) {
        this.logger.warn(`Health check could not read storage: ${errorMessage(error)}`);
      }
    }

    return {
      status: ready && totalRecords !== null ? 'ok' : 'degraded',
      storage: { type: this.storageType, ready },
      connectedClients: this.gateway.connectedClients().length,
      totalRecords,
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      timestamp: Date.now(),
    };
  }
}
