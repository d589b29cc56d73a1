import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type { AuditEvent, AuditLevel } from '@tallystream/shared';

/**
 * DTO for AuditEvent - mirrors the shared interface for Swagger documentation
 */
export class AuditEventDto implements AuditEvent {
  @ApiProperty({ description: 'Event ID', example: 1 })
  id!: number;

  @ApiProperty({ description: 'Unix timestamp when the event was recorded (seconds)', example: 1704938400.125 })
  timestamp!: number;

  @ApiProperty({
    description: 'Event type',
    example: 'AuthenticationError',
    enum: ['AuthenticationError', 'RateLimitError', 'IpBlocked', 'ValidationError', 'SizeLimitError', 'PersistenceError', 'IntegrityError', 'SessionIssued', 'RetentionSweep'],
  })
  eventType!: string;

  @ApiProperty({ description: 'Human-readable description', example: 'Invalid API key from 192.0.2.10' })
  message!: string;

  @ApiProperty({ description: 'Severity', enum: ['INFO', 'WARNING', 'ERROR'], example: 'WARNING' })
  level!: AuditLevel;

  @ApiPropertyOptional({ description: 'Row creation time (UTC)', example: '2024-01-11 01:00:00' })
  createdAt?: string;
}
