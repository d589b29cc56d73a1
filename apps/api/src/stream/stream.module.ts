import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { AuditModule } from '../audit/audit.module';
import { AccessControlModule } from '../access-control/access-control.module';
import { StreamGateway } from './stream.gateway';

@Module({
  imports: [StorageModule, AuditModule, AccessControlModule],
  providers: [StreamGateway],
  exports: [StreamGateway],
})
export class StreamModule {}
