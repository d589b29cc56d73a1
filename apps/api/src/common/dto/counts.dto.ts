import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import type { CountPayload, CountRecord, CountStatistics, VehicleCounts } from '@tallystream/shared';

/**
 * Ingestion body. Mirrors CountPayloadSchema for the HTTP boundary.
 */
export class CountsDto implements CountPayload {
  @ApiProperty({ description: 'Cars counted in this interval', example: 5, minimum: 0 })
  @IsInt()
  @Min(0)
  cars!: number;

  @ApiProperty({ description: 'Vans counted in this interval', example: 2, minimum: 0 })
  @IsInt()
  @Min(0)
  vans!: number;

  @ApiProperty({ description: 'Motorcycles counted in this interval', example: 3, minimum: 0 })
  @IsInt()
  @Min(0)
  motors!: number;

  @ApiProperty({ description: 'Buses counted in this interval', example: 1, minimum: 0 })
  @IsInt()
  @Min(0)
  buses!: number;

  @ApiProperty({ description: 'Bicycles counted in this interval', example: 0, minimum: 0 })
  @IsInt()
  @Min(0)
  bicycles!: number;

  @ApiPropertyOptional({ description: 'Producer timestamp (Unix seconds); the server assigns its own', example: 1704938400.25 })
  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  timestamp?: number;
}

export class ExportCountsDto {
  @ApiProperty({ description: 'Destination CSV file, relative to EXPORT_DIR', example: 'counts.csv' })
  @IsString()
  @IsNotEmpty()
  path!: string;
}

export class VehicleCountsDto implements VehicleCounts {
  @ApiProperty({ example: 5 })
  cars!: number;

  @ApiProperty({ example: 2 })
  vans!: number;

  @ApiProperty({ example: 3 })
  motors!: number;

  @ApiProperty({ example: 1 })
  buses!: number;

  @ApiProperty({ example: 0 })
  bicycles!: number;
}

export class CountRecordDto extends VehicleCountsDto implements CountRecord {
  @ApiProperty({ description: 'Record ID', example: 42 })
  id!: number;

  @ApiProperty({ description: 'Server-assigned Unix timestamp (seconds)', example: 1704938400.125 })
  timestamp!: number;

  @ApiProperty({ description: 'UTC rendering of timestamp', example: '2024-01-11 02:00:00.125' })
  datetimeStr!: string;

  @ApiPropertyOptional({ description: 'Row creation time (UTC)', example: '2024-01-11 02:00:00' })
  createdAt?: string;
}

export class CountStatisticsDto implements CountStatistics {
  @ApiProperty({ example: 1520 })
  totalRecords!: number;

  @ApiProperty({ type: VehicleCountsDto, description: 'Per-category mean, rounded to two decimals' })
  average!: VehicleCountsDto;

  @ApiProperty({ type: VehicleCountsDto })
  maximum!: VehicleCountsDto;

  @ApiProperty({ type: VehicleCountsDto })
  minimum!: VehicleCountsDto;

  @ApiProperty({ type: VehicleCountsDto })
  total!: VehicleCountsDto;
}

export class BroadcastOutcomeDto {
  @ApiProperty({ enum: ['delivered', 'rejected'], example: 'delivered' })
  status!: 'delivered' | 'rejected';

  @ApiPropertyOptional({ enum: ['validation', 'persistence', 'size'] })
  reason?: 'validation' | 'persistence' | 'size';

  @ApiPropertyOptional()
  message?: string;

  @ApiPropertyOptional({ type: CountRecordDto })
  record?: CountRecordDto;

  @ApiProperty({ description: 'Clients the signed frame reached', example: 3 })
  recipients!: number;

  @ApiProperty({ description: 'Clients evicted after a failed send', example: 0 })
  evicted!: number;
}
