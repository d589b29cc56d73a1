import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { ConfigModule } from './config/config.module';
import { StorageModule } from './storage/storage.module';
import { AuditModule } from './audit/audit.module';
import { AuditEventsModule } from './audit/audit-events.module';
import { AccessControlModule } from './access-control/access-control.module';
import { StreamModule } from './stream/stream.module';
import { CountsModule } from './counts/counts.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule,
    ThrottlerModule.forRoot([{
      ttl: 60000, // 60 seconds
      limit: 10000, // Very high default - endpoint-specific limits provide actual rate limiting
    }]),
    StorageModule,
    AuditModule,
    AuditEventsModule,
    AccessControlModule,
    StreamModule,
    CountsModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule { }
