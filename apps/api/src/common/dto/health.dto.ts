import { ApiProperty } from '@nestjs/swagger';
import type { HealthResponse } from '@tallystream/shared';

export class StorageHealthDto {
  @ApiProperty({ description: 'Configured storage backend', enum: ['sqlite', 'memory'], example: 'sqlite' })
  type!: string;

  @ApiProperty({ description: 'Whether the storage handle is open', example: true })
  ready!: boolean;
}

/**
 * DTO for HealthResponse - mirrors the shared interface for Swagger documentation
 */
export class HealthResponseDto implements HealthResponse {
  @ApiProperty({ description: 'Overall status', enum: ['ok', 'degraded'], example: 'ok' })
  status!: 'ok' | 'degraded';

  @ApiProperty({ description: 'Storage status', type: StorageHealthDto })
  storage!: StorageHealthDto;

  @ApiProperty({ description: 'Number of authenticated stream subscribers', example: 3 })
  connectedClients!: number;

  @ApiProperty({ description: 'Persisted count records, null when storage is unreadable', example: 1520, nullable: true })
  totalRecords!: number | null;

  @ApiProperty({ description: 'Seconds since the API started', example: 86400 })
  uptimeSeconds!: number;

  @ApiProperty({ description: 'Unix timestamp of this response (milliseconds)', example: 1704938400000 })
  timestamp!: number;
}
