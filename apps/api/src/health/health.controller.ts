import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import type { HealthResponse } from '@tallystream/shared';
import { HealthService } from './health.service';
import { HealthResponseDto } from '../common/dto/health.dto';

@ApiTags('health')
@Controller('health')
@SkipThrottle()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({
    summary: 'Get health status',
    description: 'Returns storage readiness, the number of connected stream subscribers and the persisted record count.',
  })
  @ApiResponse({ status: 200, description: 'Health status retrieved successfully', type: HealthResponseDto })
  async getHealth(): Promise<HealthResponse> {
    return this.healthService.getHealth();
  }
}
