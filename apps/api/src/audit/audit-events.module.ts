import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { AccessControlModule } from '../access-control/access-control.module';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import { AuditController } from './audit.controller';

// Separate from AuditModule: the guard needs AccessControlModule, which itself imports AuditModule.
@Module({
  imports: [StorageModule, AccessControlModule],
  controllers: [AuditController],
  providers: [ApiKeyGuard],
})
export class AuditEventsModule {}
