import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { AccessControlService } from './access-control.service';

@Module({
  imports: [AuditModule],
  providers: [AccessControlService],
  exports: [AccessControlService],
})
export class AccessControlModule {}
