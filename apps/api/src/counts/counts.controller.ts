import {
  Body,
  Controller,
  DefaultValuePipe,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  ParseFloatPipe,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { Throttle } from '@nestjs/throttler';
import { ValidationError, errorMessage } from '@tallystream/shared';
import type { CountRecord, CountStatistics } from '@tallystream/shared';
import { CountStoreService } from '../storage/count-store.service';
import { StreamGateway, BroadcastOutcome } from '../stream/stream.gateway';
import { ApiKeyGuard, API_KEY_HEADER } from '../common/guards/api-key.guard';
import { resolveExportPath } from '../common/utils/export-path';
import {
  BroadcastOutcomeDto,
  CountRecordDto,
  CountStatisticsDto,
  CountsDto,
  ExportCountsDto,
} from '../common/dto/counts.dto';

const MAX_LATEST_LIMIT = 1000;
const THROTTLE_TTL = 60000;
const ADMIN_LIMIT = 10;

const REJECTION_STATUS: Record<NonNullable<BroadcastOutcome['reason']>, HttpStatus> = {
  validation: HttpStatus.BAD_REQUEST,
  size: HttpStatus.PAYLOAD_TOO_LARGE,
  persistence: HttpStatus.INTERNAL_SERVER_ERROR,
};

@ApiTags('counts')
@Controller('counts')
export class CountsController {
  private readonly exportDir: string;

  constructor(
    private readonly gateway: StreamGateway,
    private readonly countStore: CountStoreService,
    configService: ConfigService,
  ) {
    this.exportDir = configService.get<string>('storage.exportDir', './exports');
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(ApiKeyGuard)
  @ApiOperation({ summary: 'Ingest a count snapshot', description: 'Persists, signs and broadcasts one record to every subscriber.' })
  @ApiHeader({ name: API_KEY_HEADER, required: true })
  @ApiResponse({ status: 201, type: BroadcastOutcomeDto })
  @ApiResponse({ status: 400, description: 'Payload failed validation' })
  @ApiResponse({ status: 401, description: 'Missing or invalid API key' })
  @ApiResponse({ status: 413, description: 'Signed frame exceeds the size cap' })
  async ingest(@Body() body: CountsDto): Promise<BroadcastOutcome> {
    const outcome = await this.gateway.broadcast({ ...body });
    if (outcome.status === 'rejected') {
      const status = outcome.reason ? REJECTION_STATUS[outcome.reason] : HttpStatus.INTERNAL_SERVER_ERROR;
      throw new HttpException(outcome.message ?? 'Broadcast rejected', status);
    }
    return outcome;
  }

  @Get('latest')
  @ApiOperation({ summary: 'Most recent records, newest first' })
  @ApiQuery({ name: 'limit', required: false, description: `Default 10, max ${MAX_LATEST_LIMIT}` })
  @ApiResponse({ status: 200, type: CountRecordDto, isArray: true })
  async getLatest(@Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number): Promise<CountRecord[]> {
    if (limit < 1 || limit > MAX_LATEST_LIMIT) {
      throw new HttpException(`limit must be between 1 and ${MAX_LATEST_LIMIT}`, HttpStatus.BAD_REQUEST);
    }
    return this.run('get latest counts', () => this.countStore.latest(limit));
  }

  @Get('range')
  @ApiOperation({ summary: 'Records between two Unix timestamps (seconds, inclusive), oldest first' })
  @ApiResponse({ status: 200, type: CountRecordDto, isArray: true })
  async getRange(
    @Query('start', ParseFloatPipe) start: number,
    @Query('end', ParseFloatPipe) end: number,
  ): Promise<CountRecord[]> {
    if (start > end) {
      throw new HttpException('start must not be after end', HttpStatus.BAD_REQUEST);
    }
    return this.run('get count range', () => this.countStore.range(start, end));
  }

  @Get('statistics')
  @ApiOperation({ summary: 'Per-category aggregates over every record' })
  @ApiResponse({ status: 200, type: CountStatisticsDto })
  async getStatistics(): Promise<CountStatistics> {
    return this.run('get statistics', () => this.countStore.statistics());
  }

  @Get('total')
  @ApiOperation({ summary: 'Number of persisted records' })
  async getTotal(): Promise<{ totalRecords: number }> {
    const totalRecords = await this.run('count records', () => this.countStore.totalRecords());
    return { totalRecords };
  }

  @Post('export')
  @HttpCode(HttpStatus.OK)
  @UseGuards(ApiKeyGuard)
  @Throttle({ default: { limit: ADMIN_LIMIT, ttl: THROTTLE_TTL } })
  @ApiOperation({ summary: 'Write every record to a CSV file under the export directory' })
  @ApiHeader({ name: API_KEY_HEADER, required: true })
  @ApiResponse({ status: 400, description: 'Path resolves outside the export directory' })
  async exportCounts(@Body() body: ExportCountsDto): Promise<{ exported: boolean; path: string }> {
    let target: string;
    try {
      target = resolveExportPath(this.exportDir, body.path);
    } catch (error) {
      throw new HttpException(errorMessage(error), HttpStatus.BAD_REQUEST);
    }

    const exported = await this.countStore.export(target);
    if (!exported) {
      throw new HttpException(`Failed to export counts to ${body.path}`, HttpStatus.INTERNAL_SERVER_ERROR);
    }
    return { exported, path: target };
  }

  @Delete('retention')
  @UseGuards(ApiKeyGuard)
  @Throttle({ default: { limit: ADMIN_LIMIT, ttl: THROTTLE_TTL } })
  @ApiOperation({ summary: 'Delete records older than the given number of days' })
  @ApiHeader({ name: API_KEY_HEADER, required: true })
  @ApiQuery({ name: 'days', required: true })
  async applyRetention(@Query('days', ParseIntPipe) days: number): Promise<{ deleted: number }> {
    if (days < 0) {
      throw new HttpException('days must not be negative', HttpStatus.BAD_REQUEST);
    }
    const deleted = await this.run('apply retention', () => this.countStore.retain(days));
    return { deleted };
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      const status = error instanceof ValidationError ? HttpStatus.BAD_REQUEST : HttpStatus.INTERNAL_SERVER_ERROR;
      throw new HttpException(`Failed to ${operation}: ${errorMessage(error)}`, status);
    }
  }
}
