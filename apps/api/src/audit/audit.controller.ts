import { Controller, Get, Query, HttpException, HttpStatus, UseGuards } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiQuery, ApiResponse, ApiHeader } from '@nestjs/swagger';
import { ValidationError, errorMessage } from '@tallystream/shared';
import type { AuditEvent, AuditLevel } from '@tallystream/shared';
import { CountStoreService } from '../storage/count-store.service';
import { AuditEventDto } from '../common/dto/audit.dto';
import { ApiKeyGuard, API_KEY_HEADER } from '../common/guards/api-key.guard';

const LEVELS: readonly AuditLevel[] = ['INFO', 'WARNING', 'ERROR'];

function parseOptionalNumber(name: string, value?: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new HttpException(`${name} must be a number`, HttpStatus.BAD_REQUEST);
  }
  return parsed;
}

function parseLevel(value?: string): AuditLevel | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const level = LEVELS.find((l) => l === value.toUpperCase());
  if (!level) {
    throw new HttpException(`level must be one of ${LEVELS.join(', ')}`, HttpStatus.BAD_REQUEST);
  }
  return level;
}

@ApiTags('audit')
@Controller('audit')
export class AuditController {
  constructor(private readonly countStore: CountStoreService) {}

  @Get('events')
  @UseGuards(ApiKeyGuard)
  @ApiHeader({ name: API_KEY_HEADER, required: true })
  @ApiOperation({ summary: 'List audit events', description: 'Security-relevant events, newest first.' })
  @ApiQuery({ name: 'eventType', required: false })
  @ApiQuery({ name: 'level', required: false, enum: LEVELS })
  @ApiQuery({ name: 'startTime', required: false, description: 'Unix seconds, inclusive' })
  @ApiQuery({ name: 'endTime', required: false, description: 'Unix seconds, inclusive' })
  @ApiQuery({ name: 'limit', required: false, description: 'Default 100' })
  @ApiResponse({ status: 200, type: AuditEventDto, isArray: true })
  @ApiResponse({ status: 400, description: 'Invalid filter' })
  @ApiResponse({ status: 401, description: 'Missing or invalid API key' })
  async getEvents(
    @Query('eventType') eventType?: string,
    @Query('level') level?: string,
    @Query('startTime') startTime?: string,
    @Query('endTime') endTime?: string,
    @Query('limit') limit?: string,
  ): Promise<AuditEvent[]> {
    const options = {
      eventType: eventType || undefined,
      level: parseLevel(level),
      startTime: parseOptionalNumber('startTime', startTime),
      endTime: parseOptionalNumber('endTime', endTime),
      limit: parseOptionalNumber('limit', limit),
    };

    try {
      return await this.countStore.auditEvents(options);
    } catch (error) {
      const status = error instanceof ValidationError ? HttpStatus.BAD_REQUEST : HttpStatus.INTERNAL_SERVER_ERROR;
      throw new HttpException(`Failed to get audit events: ${errorMessage(error)}`, status);
    }
  }
}
