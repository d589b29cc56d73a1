import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { AccessControlModule } from '../access-control/access-control.module';
import { StreamModule } from '../stream/stream.module';
import { CountsController } from './counts.controller';
import { ApiKeyGuard } from '../common/guards/api-key.guard';

@Module({
  imports: [StorageModule, AccessControlModule, StreamModule],
  controllers: [CountsController],
  providers: [ApiKeyGuard],
})
export class CountsModule {}
