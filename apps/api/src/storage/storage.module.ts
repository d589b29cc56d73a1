import { Module, OnModuleDestroy, Inject } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StorageClientFactory } from './factory/storage-client.factory';
import { StoragePort } from '../common/interfaces/storage-port.interface';
import { ExclusiveScope } from '../common/utils/exclusive-scope';
import { CountStoreService } from './count-store.service';
import { CountRetentionService } from './count-retention.service';

@Module({
  imports: [ConfigModule],
  providers: [
    StorageClientFactory,
    {
      provide: 'STORAGE_CLIENT',
      useFactory: async (factory: StorageClientFactory): Promise<StoragePort> => {
        return factory.createStorageClient();
      },
      inject: [StorageClientFactory],
    },
    {
      provide: 'EXCLUSIVE_SCOPE',
      useFactory: (): ExclusiveScope => new ExclusiveScope(),
    },
    CountStoreService,
    CountRetentionService,
  ],
  exports: ['STORAGE_CLIENT', 'EXCLUSIVE_SCOPE', CountStoreService],
})
export class StorageModule implements OnModuleDestroy {
  constructor(@Inject('STORAGE_CLIENT') private readonly storageClient: StoragePort) {}

  async onModuleDestroy(): Promise<void> {
    await this.storageClient.close();
  }
}
